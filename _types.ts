// @filename: _types.ts
import type { EventError } from "./error.ts";
import { Symbol } from "./symbol.ts";

/**
 * A function invoked with each value delivered to a subscriber.
 *
 *
 * Handlers may be synchronous or return a promise. The subscriber's next
 * value is not delivered until the returned promise settles, which is what
 * gives each subscriber a strictly ordered view of the values fired at it.
 *
 * The second argument is the subscriber itself, looked up at delivery time.
 * Reach the subscriber through it rather than closing over it: the bus holds
 * handlers strongly, so a handler that captures its subscriber keeps it alive.
 *
 * @typeParam T - The payload type of the event.
 * @typeParam S - The subscriber type.
 *
 * @example
 * ```ts
 * const onRename: EventHandler<string, Editor> = async (name, editor) => {
 *   await editor.saveTitle(name);
 * };
 * ```
 */
export type EventHandler<T, S extends object = object> = (value: T, subscriber: S) => void | PromiseLike<void>;

/**
 * A non-owning handle on a subscriber, used as its liveness probe.
 *
 *
 * `deref()` returns the subscriber while it is alive and `undefined` once it
 * is gone. The built-in `WeakRef` satisfies this interface and is the default;
 * hosts with an explicit "destroyed" notion (a disposed component, a closed
 * connection) can supply their own through {@link EventBusOptions.reference}.
 */
export interface SubscriberReference<S extends object = object> {
  deref(): S | undefined;
}

/**
 * Configuration accepted by the `EventBus` constructor.
 *
 * @example
 * ```ts
 * const bus = new EventBus<Order>({
 *   onError(err) { logger.error(String(err)); },
 * });
 * ```
 */
export interface EventBusOptions {
  /**
   * Creates the liveness probe stored for each subscriber.
   *
   * @default subscriber => new WeakRef(subscriber)
   */
  reference?: <S extends object>(subscriber: S) => SubscriberReference<S>;

  /**
   * Receives faults thrown (or rejected) by handlers. The failing subscriber
   * keeps receiving subsequent values either way.
   *
   * @default rethrows the error on a microtask, surfacing it to the host
   */
  onError?: (error: EventError) => void;
}

/**
 * Options for a single `subscribe` call.
 */
export interface SubscribeOptions {
  /**
   * Removes the subscription when aborted. With an already-aborted signal
   * `subscribe` only sweeps collected subscribers, registers nothing and
   * returns a closed {@link Subscription}.
   */
  signal?: AbortSignal;
}

/**
 * Handle returned by `subscribe`.
 *
 *
 * Holding a `Subscription` does not keep the subscriber alive, and it is
 * never required: the bus forgets a subscriber on its own once the subscriber
 * is gone. It exists for callers who prefer scoped cleanup:
 *
 * ```ts
 * {
 *   using sub = bus.subscribe(view, render);
 *   await bus.fireAndWait(state);
 * } // unsubscribed here
 * ```
 */
export interface Subscription extends Disposable, AsyncDisposable {
  /**
   * `true` once this registration was unsubscribed, replaced by a newer
   * `subscribe` for the same subscriber, cleared, or its subscriber is gone.
   */
  readonly closed: boolean;

  /**
   * Removes this registration. Does nothing if it is already closed, and never
   * touches a newer registration for the same subscriber.
   */
  unsubscribe(): void;

  /** Alias for {@link unsubscribe}, for `using` blocks. */
  [Symbol.dispose](): void;

  /** Alias for {@link unsubscribe}, for `await using` blocks. */
  [Symbol.asyncDispose](): Promise<void>;

  /**
   * Makes `Object.prototype.toString.call(sub)` return `"[object Subscription]"`.
   */
  readonly [Symbol.toStringTag]: "Subscription";
}
