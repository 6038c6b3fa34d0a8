import {
  type ChangeHandler,
  type ChangeSource,
  type CollectionChange,
  SyncRoot,
} from "@ringview/collections"
import type { ViewFilter } from "./types.js"

/**
 * A change source whose events are written by the test, so that shapes the
 * ring buffer never produces (or produces only out of sync) can be fed to a
 * view. `items` is what a new view snapshots; `emit` does not touch it.
 */
export class ManualSource<T> implements ChangeSource<T> {
  readonly syncRoot = new SyncRoot("source", "manual")
  readonly #handlers = new Set<ChangeHandler<T>>()

  constructor(public items: T[] = []) {}

  [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]()
  }

  subscribe(handler: ChangeHandler<T>): void {
    this.#handlers.add(handler)
  }

  unsubscribe(handler: ChangeHandler<T>): boolean {
    return this.#handlers.delete(handler)
  }

  emit(change: CollectionChange<T>): void {
    this.syncRoot.run(() => {
      for (const handler of [...this.#handlers]) {
        handler(change)
      }
    })
  }
}

/**
 * A filter that logs every hook call as "hook:value:view".
 */
export function recordingFilter<T, TView>(
  calls: string[],
  options?: { isMatch?: (value: T, view: TView) => boolean; isNull?: boolean },
): ViewFilter<T, TView> {
  return {
    isMatch: options?.isMatch ?? (() => true),
    onAttach(value, view) {
      calls.push(`attach:${String(value)}:${String(view)}`)
    },
    onAdd(value, view) {
      calls.push(`add:${String(value)}:${String(view)}`)
    },
    onRemove(value, view) {
      calls.push(`remove:${String(value)}:${String(view)}`)
    },
    onMove(value, view) {
      calls.push(`move:${String(value)}:${String(view)}`)
    },
    isNullFilter: () => options?.isNull ?? false,
  }
}
