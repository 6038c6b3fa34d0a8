/**
 * @ringview/views
 *
 * Synchronized, filtered, projected views over observable collections.
 *
 * A view keeps a private mirror of its source as (value, projection) entries
 * and updates it incrementally from the source's change events:
 * - Adds at the front or back, single or batched
 * - Removals, single or by range
 * - Replacements and moves
 * - Resets
 *
 * @example
 * ```typescript
 * import { ObservableRingBuffer } from "@ringview/collections"
 * import { createFilter, createView } from "@ringview/views"
 *
 * const source = new ObservableRingBuffer([1, 2, 3])
 * const view = createView(source, n => n * n)
 *
 * view.attachFilter(createFilter({ isMatch: (_, square) => square > 1 }))
 * source.addLast(4)
 *
 * [...view] // [[2, 4], [3, 9], [4, 16]]
 *
 * view.dispose()
 * ```
 *
 * @packageDocumentation
 */

// Enumeration
export { synchronizedEnumerable } from "./enumerator.js"
// Filters
export {
  acceptAll,
  anyFilter,
  composeFilters,
  createFilter,
  type FilterOptions,
  notFilter,
  nullFilter,
  rejectAll,
} from "./filters.js"
// Types
export type {
  FilterChangeKind,
  FilterResetAction,
  SynchronizedView,
  Transform,
  ViewChangeListener,
  ViewEntry,
  ViewFilter,
  ViewOptions,
  ViewPredicate,
  ViewStateListener,
} from "./types.js"
// Core
export { createView } from "./view.js"
