/**
 * View Types - synchronized, filtered, projected views
 *
 * A view mirrors a source collection as (value, projection) entries and keeps
 * the mirror in step with every change event the source raises.
 */

import type { Logger } from "@logtape/logtape"
import type {
  CollectionChange,
  CollectionChangeAction,
  SyncRoot,
} from "@ringview/collections"

/**
 * One mirrored element: the source value and the projection computed from it
 * when it was added. The projection is never recomputed.
 */
export type ViewEntry<T, TView> = readonly [value: T, view: TView]

export type Transform<T, TView> = (value: T) => TView

/**
 * Visibility predicate over an entry.
 */
export type ViewPredicate<T, TView> = (value: T, view: TView) => boolean

/**
 * What happened to an entry, as reported to `onCollectionChanged`.
 */
export type FilterChangeKind = "add" | "remove" | "move"

/**
 * A pluggable policy attached to a view.
 *
 * `isMatch` decides what enumeration yields. The hooks are called by the view
 * while it holds its lock, after the mirror has been updated (before it for
 * removals of a range and for a reset).
 *
 * Use `nullFilter()` rather than a missing filter.
 */
export interface ViewFilter<T, TView> {
  isMatch(value: T, view: TView): boolean
  /** Called for each existing entry, in mirror order, when attached */
  onAttach(value: T, view: TView): void
  onAdd(value: T, view: TView): void
  onRemove(value: T, view: TView): void
  onMove(value: T, view: TView): void
  /**
   * True for the no-op filter. A reset skips the per-entry `onRemove` pass
   * when this is true.
   */
  isNullFilter(): boolean
}

/**
 * Called once per entry when a filter is detached.
 */
export type FilterResetAction<T, TView> = (value: T, view: TView) => void

export type ViewChangeListener<T> = (change: CollectionChange<T>) => void

export type ViewStateListener = (action: CollectionChangeAction) => void

/**
 * Options for creating a view.
 */
export interface ViewOptions {
  /**
   * Enumerate back to front. The mirror itself stays in source order.
   * Default: false
   */
  reverse?: boolean

  /**
   * Used in lock diagnostics and log messages. Default: "view"
   */
  name?: string

  /**
   * Preferred logger. Default: the `["ringview", "view"]` category.
   */
  logger?: Logger
}

/**
 * A synchronized view over a change source.
 *
 * - The mirror is built from a snapshot taken under the source's lock, in the
 *   same critical section that subscribes to the source
 * - Each source change is applied under the view's own lock, together with
 *   the filter hooks and the re-raised notifications
 * - Enumeration copies the mirror under the lock and yields the entries the
 *   active filter matches
 *
 * @typeParam T - Source element type
 * @typeParam TView - Projection type
 *
 * @example
 * ```typescript
 * const source = new ObservableRingBuffer(["a", "b"])
 * const view = createView(source, s => s.toUpperCase())
 *
 * view.attachFilter(createFilter({ isMatch: v => v !== "b" }))
 * source.addLast("c")
 *
 * [...view] // [["a", "A"], ["c", "C"]]
 *
 * view.dispose()
 * ```
 */
export interface SynchronizedView<T, TView>
  extends Iterable<ViewEntry<T, TView>> {
  readonly syncRoot: SyncRoot

  /**
   * Whether enumeration runs back to front.
   */
  readonly reverse: boolean

  /**
   * Number of mirrored entries, ignoring the filter.
   */
  readonly count: number

  /**
   * Make `filter` the active filter and call its `onAttach` for every entry.
   *
   * @param resetAction - Applied to every entry before the swap, to release
   *   whatever the outgoing filter associated with it
   */
  attachFilter(
    filter: ViewFilter<T, TView>,
    resetAction?: FilterResetAction<T, TView>,
  ): void

  /**
   * Go back to the no-op filter.
   *
   * @param resetAction - Applied to every entry after the filter is cleared
   */
  resetFilter(resetAction?: FilterResetAction<T, TView>): void

  /**
   * Copy the mirror under the lock. The result can be iterated any number of
   * times and always yields the state at the time of this call.
   */
  snapshot(): Iterable<ViewEntry<T, TView>>

  /**
   * Receive every source change after the mirror has applied it.
   *
   * @returns An unsubscribe function
   */
  onChange(listener: ViewChangeListener<T>): () => void

  /**
   * Receive only the action of every source change, after `onChange`
   * listeners have run.
   *
   * @returns An unsubscribe function
   */
  onStateChange(listener: ViewStateListener): () => void

  /**
   * Stop following the source. The mirror and the filter are left as they
   * are. Calling it again does nothing.
   */
  dispose(): void
}
