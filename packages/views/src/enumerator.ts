import type { RingBuffer, SyncRoot } from "@ringview/collections"
import type { ViewEntry, ViewFilter } from "./types.js"

/**
 * Copy `entries` and capture `filter` while holding `syncRoot`, then return a
 * restartable iterable over the copy that yields only the entries `filter`
 * matches.
 *
 * The lock is not held while the caller iterates, so a caller may mutate the
 * source from inside a `for...of` over the result.
 */
export function synchronizedEnumerable<T, TView>(
  syncRoot: SyncRoot,
  entries: RingBuffer<ViewEntry<T, TView>>,
  filter: () => ViewFilter<T, TView>,
  reverse: boolean,
): Iterable<ViewEntry<T, TView>> {
  const [snapshot, active] = syncRoot.run(
    () =>
      [
        Array.from(reverse ? entries.reversed() : entries),
        filter(),
      ] as const,
  )

  return {
    *[Symbol.iterator]() {
      for (const entry of snapshot) {
        if (active.isMatch(entry[0], entry[1])) {
          yield entry
        }
      }
    },
  }
}
