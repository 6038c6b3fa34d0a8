import { EmptyCollectionError, IndexOutOfRangeError } from "./errors.js"

const INITIAL_CAPACITY = 8

/**
 * A growable double-ended ring buffer.
 *
 * - O(1) amortized `pushFront` / `pushBack` / `popFront` / `popBack`
 * - O(1) indexed `get` / `set`
 * - O(n) `insertAt` / `removeAt` away from the ends
 *
 * Capacity is always a power of two so that a physical slot is
 * `(head + index) & mask`.
 *
 * Iteration reads the live buffer. Mutating the buffer while an iterator is
 * open is not supported; callers serialize access with a lock.
 */
export class RingBuffer<T> implements Iterable<T> {
  #slots: T[]
  #head = 0
  #count = 0
  #mask: number

  constructor(items?: Iterable<T>) {
    this.#slots = new Array<T>(INITIAL_CAPACITY)
    this.#mask = INITIAL_CAPACITY - 1
    if (items) {
      for (const item of items) {
        this.pushBack(item)
      }
    }
  }

  get count(): number {
    return this.#count
  }

  /** Number of slots allocated */
  get capacity(): number {
    return this.#slots.length
  }

  get(index: number): T {
    this.#checkIndex(index)
    return this.#slots[this.#slot(index)]
  }

  set(index: number, item: T): void {
    this.#checkIndex(index)
    this.#slots[this.#slot(index)] = item
  }

  pushFront(item: T): void {
    this.#ensureCapacity()
    this.#head = (this.#head - 1) & this.#mask
    this.#slots[this.#head] = item
    this.#count++
  }

  pushBack(item: T): void {
    this.#ensureCapacity()
    this.#slots[this.#slot(this.#count)] = item
    this.#count++
  }

  popFront(): T {
    if (this.#count === 0) {
      throw new EmptyCollectionError("popFront")
    }
    const item = this.#slots[this.#head]
    delete this.#slots[this.#head]
    this.#head = (this.#head + 1) & this.#mask
    this.#count--
    return item
  }

  popBack(): T {
    if (this.#count === 0) {
      throw new EmptyCollectionError("popBack")
    }
    const slot = this.#slot(this.#count - 1)
    const item = this.#slots[slot]
    delete this.#slots[slot]
    this.#count--
    return item
  }

  /**
   * Insert `item` so that it ends up at `index`. `index === count` appends.
   */
  insertAt(index: number, item: T): void {
    if (!Number.isInteger(index) || index < 0 || index > this.#count) {
      throw new IndexOutOfRangeError(index, this.#count)
    }
    if (index === 0) {
      this.pushFront(item)
      return
    }
    if (index === this.#count) {
      this.pushBack(item)
      return
    }

    this.pushBack(this.get(this.#count - 1))
    for (let i = this.#count - 2; i > index; i--) {
      this.#slots[this.#slot(i)] = this.#slots[this.#slot(i - 1)]
    }
    this.#slots[this.#slot(index)] = item
  }

  removeAt(index: number): T {
    this.#checkIndex(index)
    if (index === 0) return this.popFront()
    if (index === this.#count - 1) return this.popBack()

    const item = this.#slots[this.#slot(index)]
    for (let i = index; i < this.#count - 1; i++) {
      this.#slots[this.#slot(i)] = this.#slots[this.#slot(i + 1)]
    }
    this.popBack()
    return item
  }

  /**
   * Remove `length` contiguous items starting at `start`.
   */
  removeRange(start: number, length: number): void {
    if (
      !Number.isInteger(start) ||
      !Number.isInteger(length) ||
      start < 0 ||
      length < 0 ||
      start + length > this.#count
    ) {
      throw new IndexOutOfRangeError(
        start,
        this.#count,
        `Range [${start}, ${start + length}) is out of range for a collection of ${this.#count}`,
      )
    }
    if (length === 0) return

    if (start === 0) {
      for (let i = 0; i < length; i++) this.popFront()
      return
    }

    const tail = this.#count - start - length
    for (let i = 0; i < tail; i++) {
      this.#slots[this.#slot(start + i)] =
        this.#slots[this.#slot(start + length + i)]
    }
    for (let i = 0; i < length; i++) this.popBack()
  }

  clear(): void {
    this.#slots = new Array<T>(INITIAL_CAPACITY)
    this.#mask = INITIAL_CAPACITY - 1
    this.#head = 0
    this.#count = 0
  }

  indexOf(item: T): number {
    for (let i = 0; i < this.#count; i++) {
      if (this.#slots[this.#slot(i)] === item) return i
    }
    return -1
  }

  toArray(): T[] {
    return Array.from(this)
  }

  *[Symbol.iterator](): Iterator<T> {
    for (let i = 0; i < this.#count; i++) {
      yield this.#slots[this.#slot(i)]
    }
  }

  /**
   * Back-to-front traversal. Each call to the returned iterable's iterator
   * starts again from the current last item.
   */
  reversed(): Iterable<T> {
    return {
      [Symbol.iterator]: () => this.#reverseIterator(),
    }
  }

  *#reverseIterator(): Iterator<T> {
    for (let i = this.#count - 1; i >= 0; i--) {
      yield this.#slots[this.#slot(i)]
    }
  }

  #slot(index: number): number {
    return (this.#head + index) & this.#mask
  }

  #checkIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.#count) {
      throw new IndexOutOfRangeError(index, this.#count)
    }
  }

  #ensureCapacity(): void {
    if (this.#count < this.#slots.length) return

    const grown = new Array<T>(this.#slots.length * 2)
    for (let i = 0; i < this.#count; i++) {
      grown[i] = this.#slots[this.#slot(i)]
    }
    this.#slots = grown
    this.#head = 0
    this.#mask = grown.length - 1
  }
}
