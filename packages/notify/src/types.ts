import type { Logger } from "@logtape/logtape"
import type { CollectionChangeAction } from "@ringview/collections"

/**
 * Item-level change in the shape host frameworks expect: both item lists are
 * always present, and an index that does not apply is -1.
 */
export interface CollectionChangedArgs<T> {
  action: CollectionChangeAction
  newItems: readonly T[]
  newStartingIndex: number
  oldItems: readonly T[]
  oldStartingIndex: number
}

export interface PropertyChangedArgs {
  propertyName: "count"
}

export interface NotifyCollectionChangedEvents<T> {
  /**
   * Raised for every change the view applies.
   */
  "collection-changed": CollectionChangedArgs<T>

  /**
   * Raised after "collection-changed" when the change altered the count
   * (add, remove, reset).
   */
  "property-changed": PropertyChangedArgs
}

export interface NotifyOptions {
  /**
   * Preferred logger. Default: the `["ringview", "notify"]` category.
   */
  logger?: Logger

  /**
   * Dispose the wrapped view when the adapter is disposed. Default: true
   */
  disposeView?: boolean
}
