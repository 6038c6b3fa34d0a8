/**
 * View Filters - the no-op filter, a callback-based filter, and predicate
 * combinators for building `isMatch`.
 */

import type {
  FilterChangeKind,
  ViewFilter,
  ViewPredicate,
} from "./types.js"

const NULL_FILTER: ViewFilter<unknown, unknown> = {
  isMatch: () => true,
  onAttach: () => {},
  onAdd: () => {},
  onRemove: () => {},
  onMove: () => {},
  isNullFilter: () => true,
}

/**
 * The filter every view starts with: matches everything, ignores every hook.
 */
export function nullFilter<T, TView>(): ViewFilter<T, TView> {
  return NULL_FILTER
}

/**
 * Options for `createFilter`.
 */
export interface FilterOptions<T, TView> {
  isMatch: ViewPredicate<T, TView>
  /** Called on attach and add when `isMatch` is true */
  whenTrue?: (value: T, view: TView) => void
  /** Called on attach and add when `isMatch` is false */
  whenFalse?: (value: T, view: TView) => void
  /** Called after `whenTrue`/`whenFalse` for add, and for remove and move */
  onCollectionChanged?: (kind: FilterChangeKind, value: T, view: TView) => void
}

/**
 * Build a filter from a predicate and optional callbacks.
 *
 * @example
 * ```typescript
 * const visible = new Set<string>()
 *
 * view.attachFilter(
 *   createFilter({
 *     isMatch: (_, row) => row.enabled,
 *     whenTrue: (id) => visible.add(id),
 *     onCollectionChanged: (kind, id) => {
 *       if (kind === "remove") visible.delete(id)
 *     },
 *   }),
 * )
 * ```
 */
export function createFilter<T, TView>(
  options: FilterOptions<T, TView>,
): ViewFilter<T, TView> {
  const { isMatch, whenTrue, whenFalse, onCollectionChanged } = options

  function evaluate(value: T, view: TView): void {
    if (isMatch(value, view)) {
      whenTrue?.(value, view)
    } else {
      whenFalse?.(value, view)
    }
  }

  return {
    isMatch,
    onAttach: evaluate,
    onAdd(value, view) {
      evaluate(value, view)
      onCollectionChanged?.("add", value, view)
    },
    onRemove(value, view) {
      onCollectionChanged?.("remove", value, view)
    },
    onMove(value, view) {
      onCollectionChanged?.("move", value, view)
    },
    isNullFilter: () => false,
  }
}

/**
 * Match every entry.
 */
export const acceptAll: ViewPredicate<unknown, unknown> = () => true

/**
 * Match no entry. Useful to hide a view's contents while keeping the hooks.
 */
export const rejectAll: ViewPredicate<unknown, unknown> = () => false

/**
 * Compose predicates with AND logic.
 *
 * Predicates are applied in order; short-circuits on first rejection.
 *
 * @example
 * ```typescript
 * const filter = createFilter({
 *   isMatch: composeFilters([
 *     (_, row) => row.enabled,
 *     (_, row) => row.score > 10,
 *   ]),
 * })
 * ```
 */
export function composeFilters<T, TView>(
  predicates: ViewPredicate<T, TView>[],
): ViewPredicate<T, TView> {
  return (value, view) => {
    for (const predicate of predicates) {
      if (!predicate(value, view)) {
        return false
      }
    }
    return true
  }
}

/**
 * Compose predicates with OR logic.
 *
 * Predicates are applied in order; short-circuits on first acceptance.
 */
export function anyFilter<T, TView>(
  predicates: ViewPredicate<T, TView>[],
): ViewPredicate<T, TView> {
  return (value, view) => {
    for (const predicate of predicates) {
      if (predicate(value, view)) {
        return true
      }
    }
    return false
  }
}

/**
 * Negate a predicate.
 */
export function notFilter<T, TView>(
  predicate: ViewPredicate<T, TView>,
): ViewPredicate<T, TView> {
  return (value, view) => !predicate(value, view)
}
