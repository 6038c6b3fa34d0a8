/**
 * View Implementation - incremental mirror of a change source
 *
 * Architecture:
 * - One snapshot + subscription, taken together under the source's lock
 * - One translation handler: change event in, mirror operations and filter
 *   hooks out, then the event is re-raised to the view's own listeners
 * - One private lock, always nested inside the source's lock
 */

import { getLogger, type Logger } from "@logtape/logtape"
import {
  type ChangeSource,
  type CollectionChange,
  type CollectionChangeAction,
  RingBuffer,
  SyncRoot,
} from "@ringview/collections"
import { synchronizedEnumerable } from "./enumerator.js"
import { nullFilter } from "./filters.js"
import type {
  FilterResetAction,
  SynchronizedView,
  Transform,
  ViewChangeListener,
  ViewEntry,
  ViewFilter,
  ViewOptions,
  ViewStateListener,
} from "./types.js"

/**
 * Create a synchronized view over `source`.
 *
 * `transform` is called exactly once for each value as it enters the view,
 * starting with every value the source holds now.
 *
 * @param source - The collection to follow
 * @param transform - Computes the projection stored beside each value
 * @param options - Direction, diagnostic name, and logger
 *
 * @example
 * ```typescript
 * const source = new ObservableRingBuffer([1, 2, 3])
 * const view = createView(source, n => `#${n}`, { reverse: true })
 *
 * [...view] // [[3, "#3"], [2, "#2"], [1, "#1"]]
 * ```
 */
export function createView<T, TView>(
  source: ChangeSource<T>,
  transform: Transform<T, TView>,
  options?: ViewOptions,
): SynchronizedView<T, TView> {
  return new RingBufferView(source, transform, options)
}

class RingBufferView<T, TView> implements SynchronizedView<T, TView> {
  readonly syncRoot: SyncRoot
  readonly reverse: boolean

  readonly #source: ChangeSource<T>
  readonly #transform: Transform<T, TView>
  readonly #logger: Logger
  readonly #mirror: RingBuffer<ViewEntry<T, TView>>
  readonly #changeListeners = new Set<ViewChangeListener<T>>()
  readonly #stateListeners = new Set<ViewStateListener>()

  #filter: ViewFilter<T, TView> = nullFilter()
  #isDisposed = false

  constructor(
    source: ChangeSource<T>,
    transform: Transform<T, TView>,
    options?: ViewOptions,
  ) {
    const name = options?.name ?? "view"
    this.#source = source
    this.#transform = transform
    this.reverse = options?.reverse ?? false
    this.syncRoot = new SyncRoot("view", name)
    this.#logger = (options?.logger ?? getLogger(["ringview"])).getChild(
      "view",
    )

    // Snapshot and subscribe in one critical section so that no change is
    // missed or applied twice between the two.
    this.#mirror = source.syncRoot.run(() => {
      const mirror = new RingBuffer<ViewEntry<T, TView>>()
      for (const value of source) {
        mirror.pushBack(this.#entry(value))
      }
      source.subscribe(this.#handleChange)
      return mirror
    })

    this.#logger.debug("created {name} with {count} entries", {
      name,
      count: this.#mirror.count,
      reverse: this.reverse,
    })
  }

  get count(): number {
    return this.syncRoot.run(() => this.#mirror.count)
  }

  attachFilter(
    filter: ViewFilter<T, TView>,
    resetAction?: FilterResetAction<T, TView>,
  ): void {
    this.syncRoot.run(() => {
      if (resetAction) {
        for (const [value, view] of this.#mirror) {
          resetAction(value, view)
        }
      }
      this.#filter = filter
      for (const [value, view] of this.#mirror) {
        filter.onAttach(value, view)
      }
      this.#logger.debug("attached filter to {name}", {
        name: this.syncRoot.name,
        count: this.#mirror.count,
      })
    })
  }

  resetFilter(resetAction?: FilterResetAction<T, TView>): void {
    this.syncRoot.run(() => {
      this.#filter = nullFilter()
      if (resetAction) {
        for (const [value, view] of this.#mirror) {
          resetAction(value, view)
        }
      }
      this.#logger.debug("reset filter of {name}", {
        name: this.syncRoot.name,
      })
    })
  }

  snapshot(): Iterable<ViewEntry<T, TView>> {
    return synchronizedEnumerable(
      this.syncRoot,
      this.#mirror,
      () => this.#filter,
      this.reverse,
    )
  }

  [Symbol.iterator](): Iterator<ViewEntry<T, TView>> {
    return this.snapshot()[Symbol.iterator]()
  }

  onChange(listener: ViewChangeListener<T>): () => void {
    this.#changeListeners.add(listener)
    return () => {
      this.#changeListeners.delete(listener)
    }
  }

  onStateChange(listener: ViewStateListener): () => void {
    this.#stateListeners.add(listener)
    return () => {
      this.#stateListeners.delete(listener)
    }
  }

  dispose(): void {
    if (this.#isDisposed) return
    this.#isDisposed = true
    this.#source.unsubscribe(this.#handleChange)
    this.#logger.debug("disposed {name}", { name: this.syncRoot.name })
  }

  // ==========================================================================
  // Translation: source change → mirror + filter hooks
  // ==========================================================================

  /**
   * Called by the source while it holds its own lock.
   */
  readonly #handleChange = (change: CollectionChange<T>): void => {
    this.syncRoot.run(() => {
      this.#apply(change)

      for (const listener of [...this.#changeListeners]) {
        listener(change)
      }
      for (const listener of [...this.#stateListeners]) {
        listener(change.action)
      }
    })
  }

  #apply(change: CollectionChange<T>): void {
    const mirror = this.#mirror
    const filter = this.#filter

    switch (change.action) {
      case "add": {
        const items = change.isSingleItem ? [change.newItem] : change.newItems

        // An add at index 0 of an empty mirror is indistinguishable from an
        // append; both leave the same order, so it is treated as an append.
        // Ranges only ever arrive as appends.
        const atFront = change.newStartingIndex === 0 && mirror.count !== 0

        for (const item of items) {
          const entry = this.#entry(item)
          if (atFront) {
            mirror.pushFront(entry)
          } else {
            mirror.pushBack(entry)
          }
          filter.onAdd(entry[0], entry[1])
        }
        this.#trace(change.action, change.newStartingIndex)
        break
      }

      case "remove": {
        const index = change.oldStartingIndex
        if (change.isSingleItem) {
          const [value, view] = mirror.get(index)
          mirror.removeAt(index)
          filter.onRemove(value, view)
        } else {
          // The filter sees the entries while they are still in place
          const length = change.oldItems.length
          for (let i = index; i < index + length; i++) {
            const [value, view] = mirror.get(i)
            filter.onRemove(value, view)
          }
          mirror.removeRange(index, length)
        }
        this.#trace(change.action, index)
        break
      }

      case "replace": {
        const index = change.newStartingIndex
        const entry = this.#entry(change.newItem)
        const [oldValue, oldView] = mirror.get(index)
        mirror.set(index, entry)
        filter.onRemove(oldValue, oldView)
        filter.onAdd(entry[0], entry[1])
        this.#trace(change.action, index)
        break
      }

      case "move": {
        const entry = mirror.removeAt(change.oldStartingIndex)
        mirror.insertAt(change.newStartingIndex, entry)
        filter.onMove(entry[0], entry[1])
        this.#trace(change.action, change.newStartingIndex)
        break
      }

      case "reset": {
        if (!filter.isNullFilter()) {
          for (const [value, view] of mirror) {
            filter.onRemove(value, view)
          }
        }
        mirror.clear()
        this.#trace(change.action, -1)
        break
      }
    }
  }

  #entry(value: T): ViewEntry<T, TView> {
    return [value, this.#transform(value)]
  }

  #trace(action: CollectionChangeAction, index: number): void {
    this.#logger.trace("{name}: {action} at {index}, {count} entries", {
      name: this.syncRoot.name,
      action,
      index,
      count: this.#mirror.count,
    })
  }
}
