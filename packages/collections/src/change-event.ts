/**
 * Change events - one discrete description of one source mutation.
 *
 * Views consume these synchronously and never retain them.
 */

import type { SyncRoot } from "./sync-root.js"

export type CollectionChangeAction =
  | "add"
  | "remove"
  | "replace"
  | "move"
  | "reset"

export interface SingleAddChange<T> {
  readonly action: "add"
  readonly isSingleItem: true
  readonly newItem: T
  readonly newStartingIndex: number
}

export interface RangeAddChange<T> {
  readonly action: "add"
  readonly isSingleItem: false
  readonly newItems: readonly T[]
  readonly newStartingIndex: number
}

export interface SingleRemoveChange<T> {
  readonly action: "remove"
  readonly isSingleItem: true
  readonly oldItem: T
  readonly oldStartingIndex: number
}

export interface RangeRemoveChange<T> {
  readonly action: "remove"
  readonly isSingleItem: false
  readonly oldItems: readonly T[]
  readonly oldStartingIndex: number
}

/**
 * Replace is always single-item; sources do not report replaced ranges.
 */
export interface ReplaceChange<T> {
  readonly action: "replace"
  readonly isSingleItem: true
  readonly newItem: T
  readonly oldItem: T
  readonly newStartingIndex: number
}

export interface MoveChange<T> {
  readonly action: "move"
  readonly isSingleItem: true
  readonly item: T
  readonly newStartingIndex: number
  readonly oldStartingIndex: number
}

export interface ResetChange {
  readonly action: "reset"
}

export type CollectionChange<T> =
  | SingleAddChange<T>
  | RangeAddChange<T>
  | SingleRemoveChange<T>
  | RangeRemoveChange<T>
  | ReplaceChange<T>
  | MoveChange<T>
  | ResetChange

export type ChangeHandler<T> = (change: CollectionChange<T>) => void

/**
 * The surface a view observes.
 *
 * Iteration and the handler calls happen while `syncRoot` is held.
 */
export interface ChangeSource<T> extends Iterable<T> {
  readonly syncRoot: SyncRoot
  subscribe(handler: ChangeHandler<T>): void
  /**
   * @returns false when the handler was not subscribed
   */
  unsubscribe(handler: ChangeHandler<T>): boolean
}

// ============================================================================
// Constructors
// ============================================================================

export function addChange<T>(item: T, index: number): SingleAddChange<T> {
  return {
    action: "add",
    isSingleItem: true,
    newItem: item,
    newStartingIndex: index,
  }
}

export function addRangeChange<T>(
  items: readonly T[],
  index: number,
): RangeAddChange<T> {
  return {
    action: "add",
    isSingleItem: false,
    newItems: items,
    newStartingIndex: index,
  }
}

export function removeChange<T>(item: T, index: number): SingleRemoveChange<T> {
  return {
    action: "remove",
    isSingleItem: true,
    oldItem: item,
    oldStartingIndex: index,
  }
}

export function removeRangeChange<T>(
  items: readonly T[],
  index: number,
): RangeRemoveChange<T> {
  return {
    action: "remove",
    isSingleItem: false,
    oldItems: items,
    oldStartingIndex: index,
  }
}

export function replaceChange<T>(
  newItem: T,
  oldItem: T,
  index: number,
): ReplaceChange<T> {
  return {
    action: "replace",
    isSingleItem: true,
    newItem,
    oldItem,
    newStartingIndex: index,
  }
}

export function moveChange<T>(
  item: T,
  newIndex: number,
  oldIndex: number,
): MoveChange<T> {
  return {
    action: "move",
    isSingleItem: true,
    item,
    newStartingIndex: newIndex,
    oldStartingIndex: oldIndex,
  }
}

const RESET: ResetChange = { action: "reset" }

export function resetChange(): ResetChange {
  return RESET
}
