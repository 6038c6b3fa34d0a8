/**
 * @ringview/notify
 *
 * Re-exposes a synchronized view through the two-event change protocol UI
 * frameworks bind to: an item-level "collection-changed" event and a
 * "property-changed" event for the count.
 *
 * @packageDocumentation
 */

export {
  NotifyCollectionChangedView,
  toCollectionChangedArgs,
  withNotifyCollectionChanged,
} from "./notify-view.js"
export type {
  CollectionChangedArgs,
  NotifyCollectionChangedEvents,
  NotifyOptions,
  PropertyChangedArgs,
} from "./types.js"
