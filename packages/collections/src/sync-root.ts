// ============================================================================
// SyncRoot
// ============================================================================
//
// A re-entrant critical section. Everything in this project is synchronous,
// so a lock cannot be contended; what it does enforce is scope (a notification
// delivered inside `run` completes before anyone else observes the state) and
// ordering: a source lock is always taken before a view lock, never after.

import { LockOrderError } from "./errors.js"

export type LockRank = "source" | "view"

/**
 * Locks currently entered, innermost last. Shared by every SyncRoot in the
 * process so that ordering can be checked across unrelated objects.
 */
const held: SyncRoot[] = []

export class SyncRoot {
  #depth = 0

  constructor(
    readonly rank: LockRank,
    readonly name: string = rank,
  ) {}

  get isHeld(): boolean {
    return this.#depth > 0
  }

  /**
   * Run `fn` while holding this lock and return its result.
   *
   * @throws LockOrderError when this is a source lock that is not already
   *   held and a view lock is.
   */
  run<R>(fn: () => R): R {
    if (this.#depth === 0 && this.rank === "source") {
      const view = held.find(lock => lock.rank === "view")
      if (view) {
        throw new LockOrderError(this.name, view.name)
      }
    }

    this.#depth++
    held.push(this)
    try {
      return fn()
    } finally {
      held.pop()
      this.#depth--
    }
  }
}
