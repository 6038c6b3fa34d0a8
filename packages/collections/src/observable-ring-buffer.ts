import {
  addChange,
  addRangeChange,
  type ChangeHandler,
  type ChangeSource,
  type CollectionChange,
  moveChange,
  removeChange,
  removeRangeChange,
  replaceChange,
  resetChange,
} from "./change-event.js"
import { IndexOutOfRangeError, ReentrantMutationError } from "./errors.js"
import { RingBuffer } from "./ring-buffer.js"
import { SyncRoot } from "./sync-root.js"

export interface ObservableRingBufferOptions {
  /** Used in lock diagnostics. Default: "ring-buffer" */
  name?: string
}

/**
 * A double-ended collection that raises one change event per mutation.
 *
 * Every operation runs under `syncRoot`. Handlers are invoked while the lock
 * is held, in subscription order, so a view that takes its own lock inside the
 * handler always nests it inside this one.
 *
 * There is no insert-in-the-middle: an add event only tells a view whether
 * the item went to the front or the back.
 *
 * @example
 * ```typescript
 * const source = new ObservableRingBuffer([1, 2, 3])
 * const view = createView(source, n => n * 10)
 *
 * source.addFirst(0)
 * source.removeLast()
 * [...view] // [[0, 0], [1, 10], [2, 20]]
 * ```
 */
export class ObservableRingBuffer<T> implements ChangeSource<T> {
  readonly syncRoot: SyncRoot
  readonly #buffer: RingBuffer<T>
  readonly #handlers = new Set<ChangeHandler<T>>()
  #isNotifying = false

  constructor(items?: Iterable<T>, options?: ObservableRingBufferOptions) {
    this.#buffer = new RingBuffer(items)
    this.syncRoot = new SyncRoot("source", options?.name ?? "ring-buffer")
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  get count(): number {
    return this.syncRoot.run(() => this.#buffer.count)
  }

  get subscriberCount(): number {
    return this.syncRoot.run(() => this.#handlers.size)
  }

  get(index: number): T {
    return this.syncRoot.run(() => this.#buffer.get(index))
  }

  indexOf(item: T): number {
    return this.syncRoot.run(() => this.#buffer.indexOf(item))
  }

  toArray(): T[] {
    return this.syncRoot.run(() => this.#buffer.toArray())
  }

  /**
   * Iterates a copy taken under the lock.
   */
  [Symbol.iterator](): Iterator<T> {
    return this.toArray()[Symbol.iterator]()
  }

  // ==========================================================================
  // Subscription
  // ==========================================================================

  subscribe(handler: ChangeHandler<T>): void {
    this.syncRoot.run(() => {
      this.#handlers.add(handler)
    })
  }

  unsubscribe(handler: ChangeHandler<T>): boolean {
    return this.syncRoot.run(() => this.#handlers.delete(handler))
  }

  // ==========================================================================
  // Mutations
  // ==========================================================================

  addFirst(item: T): void {
    this.#mutate(() => {
      this.#buffer.pushFront(item)
      return addChange(item, 0)
    })
  }

  addLast(item: T): void {
    this.#mutate(() => {
      this.#buffer.pushBack(item)
      return addChange(item, this.#buffer.count - 1)
    })
  }

  addLastRange(items: Iterable<T>): void {
    const added = Array.from(items)
    if (added.length === 0) return

    this.#mutate(() => {
      const index = this.#buffer.count
      for (const item of added) {
        this.#buffer.pushBack(item)
      }
      return addRangeChange(added, index)
    })
  }

  removeFirst(): T {
    return this.#mutateReturning(() => {
      const item = this.#buffer.popFront()
      return [item, removeChange(item, 0)]
    })
  }

  removeLast(): T {
    return this.#mutateReturning(() => {
      const item = this.#buffer.popBack()
      return [item, removeChange(item, this.#buffer.count)]
    })
  }

  removeAt(index: number): T {
    return this.#mutateReturning(() => {
      const item = this.#buffer.removeAt(index)
      return [item, removeChange(item, index)]
    })
  }

  removeRange(index: number, count: number): void {
    this.syncRoot.run(() => {
      this.#assertNotNotifying()
      const removed: T[] = []
      for (let i = 0; i < count; i++) {
        removed.push(this.#buffer.get(index + i))
      }
      this.#buffer.removeRange(index, count)
      if (removed.length > 0) {
        this.#notify(removeRangeChange(removed, index))
      }
    })
  }

  set(index: number, item: T): void {
    this.#mutate(() => {
      const oldItem = this.#buffer.get(index)
      this.#buffer.set(index, item)
      return replaceChange(item, oldItem, index)
    })
  }

  move(oldIndex: number, newIndex: number): void {
    this.#mutate(() => {
      const count = this.#buffer.count
      for (const index of [oldIndex, newIndex]) {
        if (!Number.isInteger(index) || index < 0 || index >= count) {
          throw new IndexOutOfRangeError(index, count)
        }
      }
      const item = this.#buffer.removeAt(oldIndex)
      this.#buffer.insertAt(newIndex, item)
      return moveChange(item, newIndex, oldIndex)
    })
  }

  clear(): void {
    this.#mutate(() => {
      this.#buffer.clear()
      return resetChange()
    })
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  #mutate(apply: () => CollectionChange<T>): void {
    this.#mutateReturning(() => [undefined, apply()])
  }

  #mutateReturning<R>(apply: () => [R, CollectionChange<T>]): R {
    return this.syncRoot.run(() => {
      this.#assertNotNotifying()
      const [result, change] = apply()
      this.#notify(change)
      return result
    })
  }

  #assertNotNotifying(): void {
    if (this.#isNotifying) {
      throw new ReentrantMutationError(this.syncRoot.name)
    }
  }

  #notify(change: CollectionChange<T>): void {
    this.#isNotifying = true
    try {
      // Copy so a handler that unsubscribes does not disturb this delivery
      for (const handler of [...this.#handlers]) {
        handler(change)
      }
    } finally {
      this.#isNotifying = false
    }
  }
}
