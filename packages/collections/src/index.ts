/**
 * @ringview/collections
 *
 * Observable double-ended collections and the primitives views are built on:
 * the ring buffer, the lock, and the change-event union.
 *
 * @packageDocumentation
 */

// Change events
export {
  addChange,
  addRangeChange,
  moveChange,
  removeChange,
  removeRangeChange,
  replaceChange,
  resetChange,
} from "./change-event.js"
export type {
  ChangeHandler,
  ChangeSource,
  CollectionChange,
  CollectionChangeAction,
  MoveChange,
  RangeAddChange,
  RangeRemoveChange,
  ReplaceChange,
  ResetChange,
  SingleAddChange,
  SingleRemoveChange,
} from "./change-event.js"
// Errors
export {
  EmptyCollectionError,
  IndexOutOfRangeError,
  LockOrderError,
  ReentrantMutationError,
  RingViewError,
} from "./errors.js"
// Collections
export {
  ObservableRingBuffer,
  type ObservableRingBufferOptions,
} from "./observable-ring-buffer.js"
export { RingBuffer } from "./ring-buffer.js"
// Locking
export { type LockRank, SyncRoot } from "./sync-root.js"
