import { getLogger, type Logger } from "@logtape/logtape"
import type { CollectionChange } from "@ringview/collections"
import type { SynchronizedView, ViewEntry } from "@ringview/views"
import Emittery, {
  type OmnipresentEventData,
  type UnsubscribeFunction,
} from "emittery"
import type {
  CollectionChangedArgs,
  NotifyCollectionChangedEvents,
  NotifyOptions,
} from "./types.js"

/**
 * Translate a change event into the two-list legacy shape.
 */
export function toCollectionChangedArgs<T>(
  change: CollectionChange<T>,
): CollectionChangedArgs<T> {
  switch (change.action) {
    case "add":
      return {
        action: "add",
        newItems: change.isSingleItem ? [change.newItem] : change.newItems,
        newStartingIndex: change.newStartingIndex,
        oldItems: [],
        oldStartingIndex: -1,
      }
    case "remove":
      return {
        action: "remove",
        newItems: [],
        newStartingIndex: -1,
        oldItems: change.isSingleItem ? [change.oldItem] : change.oldItems,
        oldStartingIndex: change.oldStartingIndex,
      }
    case "replace":
      return {
        action: "replace",
        newItems: [change.newItem],
        newStartingIndex: change.newStartingIndex,
        oldItems: [change.oldItem],
        oldStartingIndex: change.newStartingIndex,
      }
    case "move":
      return {
        action: "move",
        newItems: [change.item],
        newStartingIndex: change.newStartingIndex,
        oldItems: [change.item],
        oldStartingIndex: change.oldStartingIndex,
      }
    case "reset":
      return {
        action: "reset",
        newItems: [],
        newStartingIndex: -1,
        oldItems: [],
        oldStartingIndex: -1,
      }
  }
}

/**
 * Re-exposes a view through "collection-changed" and "property-changed"
 * events.
 *
 * Events are delivered asynchronously and in order, after the view has
 * released its lock, so listeners may freely read the view or mutate its
 * source.
 */
export class NotifyCollectionChangedView<T, TView>
  implements Iterable<ViewEntry<T, TView>>
{
  readonly #view: SynchronizedView<T, TView>
  readonly #emitter = new Emittery<NotifyCollectionChangedEvents<T>>()
  readonly #logger: Logger
  readonly #disposeView: boolean
  readonly #detach: () => void
  #delivery: Promise<void> = Promise.resolve()
  #isDisposed = false

  constructor(view: SynchronizedView<T, TView>, options?: NotifyOptions) {
    this.#view = view
    this.#logger = (options?.logger ?? getLogger(["ringview"])).getChild(
      "notify",
    )
    this.#disposeView = options?.disposeView ?? true
    this.#detach = view.onChange(change => {
      this.#enqueue(toCollectionChangedArgs(change))
    })
  }

  get count(): number {
    return this.#view.count
  }

  [Symbol.iterator](): Iterator<ViewEntry<T, TView>> {
    return this.#view[Symbol.iterator]()
  }

  on<Name extends keyof NotifyCollectionChangedEvents<T>>(
    eventName: Name,
    listener: (
      eventData: (NotifyCollectionChangedEvents<T> &
        OmnipresentEventData)[Name],
    ) => void | Promise<void>,
  ): UnsubscribeFunction {
    return this.#emitter.on(eventName, listener)
  }

  /**
   * Resolves once every change received so far has been delivered.
   */
  flush(): Promise<void> {
    return this.#delivery
  }

  dispose(): void {
    if (this.#isDisposed) return
    this.#isDisposed = true
    this.#detach()
    this.#emitter.clearListeners()
    if (this.#disposeView) {
      this.#view.dispose()
    }
  }

  #enqueue(args: CollectionChangedArgs<T>): void {
    this.#delivery = this.#delivery.then(() => this.#deliver(args))
  }

  async #deliver(args: CollectionChangedArgs<T>): Promise<void> {
    try {
      await this.#emitter.emit("collection-changed", args)
      if (
        args.action === "add" ||
        args.action === "remove" ||
        args.action === "reset"
      ) {
        await this.#emitter.emit("property-changed", { propertyName: "count" })
      }
    } catch (error) {
      this.#logger.error("listener failed for {action}: {error}", {
        action: args.action,
        error,
      })
    }
  }
}

/**
 * Wrap `view` in the legacy two-event protocol.
 *
 * @example
 * ```typescript
 * const notifying = withNotifyCollectionChanged(createView(source, render))
 *
 * notifying.on("collection-changed", args => {
 *   grid.apply(args.action, args.newItems, args.newStartingIndex)
 * })
 * notifying.on("property-changed", () => {
 *   footer.textContent = `${notifying.count} rows`
 * })
 * ```
 */
export function withNotifyCollectionChanged<T, TView>(
  view: SynchronizedView<T, TView>,
  options?: NotifyOptions,
): NotifyCollectionChangedView<T, TView> {
  return new NotifyCollectionChangedView(view, options)
}
