/**
 * Custom error types for @ringview/collections
 *
 * All errors extend RingViewError for unified catch handling.
 *
 * @module errors
 */

/**
 * Base error class for all ringview errors.
 * Provides a context object for structured error information.
 */
export class RingViewError extends Error {
  constructor(
    message: string,
    public context?: Record<string, unknown>,
  ) {
    super(message)
    this.name = "RingViewError"
  }
}

/**
 * Thrown when a position falls outside the collection.
 *
 * A change event that references an index the mirror does not have means the
 * view is out of sync with its source, so this is never clamped or skipped.
 *
 * @example
 * ```typescript
 * const buffer = new RingBuffer([1, 2, 3])
 * buffer.get(3) // Throws IndexOutOfRangeError
 * ```
 */
export class IndexOutOfRangeError extends RingViewError {
  constructor(
    public index: number,
    public count: number,
    message?: string,
  ) {
    super(
      message ?? `Index ${index} is out of range for a collection of ${count}`,
      { index, count },
    )
    this.name = "IndexOutOfRangeError"
  }
}

/**
 * Thrown when an element is taken from an empty collection.
 */
export class EmptyCollectionError extends RingViewError {
  constructor(public operation: string) {
    super(`Cannot ${operation} on an empty collection`, { operation })
    this.name = "EmptyCollectionError"
  }
}

/**
 * Thrown when a source lock is acquired while a view lock is held.
 *
 * Locks are always taken source first, then view. A view hook or subscriber
 * that reaches back into a different source inverts that order.
 *
 * @example
 * ```typescript
 * view.onChange(() => {
 *   otherSource.addLast(1) // Throws LockOrderError
 * })
 * ```
 */
export class LockOrderError extends RingViewError {
  constructor(
    public requested: string,
    public held: string,
  ) {
    super(
      `Cannot acquire source lock "${requested}" while holding view lock "${held}"`,
      { requested, held },
    )
    this.name = "LockOrderError"
  }
}

/**
 * Thrown when a source is mutated while it is still delivering a change event.
 */
export class ReentrantMutationError extends RingViewError {
  constructor(public source: string) {
    super(
      `Source "${source}" was mutated while notifying subscribers of a previous change`,
      { source },
    )
    this.name = "ReentrantMutationError"
  }
}
