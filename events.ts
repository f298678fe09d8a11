/**
 * @module EventBus
 */

import type { EventBusOptions, EventHandler, SubscribeOptions, SubscriberReference, Subscription } from "./_types.ts";
import type { Registration } from "./registry.ts";

import { identify, peekIdentity } from "./identity.ts";
import { PendingTracker } from "./pending.ts";
import { SubscriptionRegistry, weakReference } from "./registry.ts";
import { Symbol } from "./symbol.ts";

/**
 * A type-safe broadcast bus that holds its subscribers weakly.
 *
 * @typeParam T - The type of values fired on this bus.
 *
 *
 * - Each subscriber object has at most one handler on a bus; subscribing the
 *   same object again replaces its handler.
 * - The bus never keeps a subscriber alive. Once a subscriber is garbage
 *   collected its registration is dropped at the next `subscribe`, `fire` or
 *   `fireAndWait`, so forgetting to unsubscribe does not leak.
 * - Handlers receive the subscriber as their second argument. Use it instead
 *   of capturing the subscriber (or `this`), which would keep it alive.
 * - Every subscriber has its own ordered queue. Values reach a handler one at
 *   a time, in the order they were fired, whichever firing mode was used.
 *   There is no ordering between different subscribers.
 * - {@link fire} returns immediately. {@link fireAndWait} resolves once every
 *   subscriber has finished with the value and with anything fired before it.
 *
 * @example
 * ```ts
 * import { EventBus } from './events.ts';
 *
 * const titleChanged = new EventBus<string>();
 *
 * class TitleBar {
 *   constructor() {
 *     titleChanged.subscribe(this, async (title, bar) => {
 *       await bar.render(title);
 *     });
 *   }
 *   async render(title: string) { ... }
 * }
 *
 * const bar = new TitleBar();
 *
 * titleChanged.fire('Draft');               // returns at once
 * await titleChanged.fireAndWait('Final');  // both renders have finished
 * ```
 */
export class EventBus<T> implements Disposable, AsyncDisposable {
  #tracker = new PendingTracker();
  #registry: SubscriptionRegistry<T>;
  #reference: <S extends object>(subscriber: S) => SubscriberReference<S>;

  /**
   * Construct a new EventBus instance.
   *
   * @param options - Liveness probe factory and handler-fault callback; see
   * {@link EventBusOptions}.
   */
  constructor({ reference = weakReference, onError }: EventBusOptions = {}) {
    this.#reference = reference;
    this.#registry = new SubscriptionRegistry<T>(this.#tracker, { onError });
  }

  /** Number of registered subscribers, including any not yet swept. */
  get size(): number {
    return this.#registry.size;
  }

  /** Values enqueued across all subscribers that are not yet handled. */
  get pending(): number {
    return this.#tracker.total;
  }

  /**
   * Whether `subscriber` is registered and still alive.
   */
  has(subscriber: object): boolean {
    const id = peekIdentity(subscriber);
    if (id === undefined) return false;

    return this.#registry.get(id)?.reference.deref() !== undefined;
  }

  /**
   * Register `handler` to receive every value fired on this bus for as long
   * as `subscriber` is alive.
   *
   *
   * Any earlier registration for the same subscriber is replaced: its handler
   * stops receiving values and whatever was still queued for it is dropped.
   * The bus keeps only a weak reference to `subscriber` and passes it to the
   * handler as the second argument. A handler that closes over the subscriber
   * instead keeps it alive, and with it the registration.
   *
   * @param subscriber - The object whose lifetime bounds the subscription.
   * @param handler - Invoked with each value and the subscriber; may return a promise.
   * @param options - Optional AbortSignal that ends the subscription.
   * @returns A handle for scoped cleanup; keeping it is optional.
   */
  subscribe<S extends object>(subscriber: S, handler: EventHandler<T, S>, { signal }: SubscribeOptions = {}): Subscription {
    const id = identify(subscriber);
    this.#registry.sweep();

    if (signal?.aborted) {
      return new EventSubscription<T>(this.#registry, null);
    }

    const reference = this.#reference(subscriber);
    const registration = this.#registry.register(id, reference, value => {
      const target = reference.deref();
      if (target === undefined) return;
      return handler(value, target);
    });

    if (signal) {
      const onAbort = () => { this.#registry.remove(registration); };
      signal.addEventListener("abort", onAbort, { once: true });
      registration.onTeardown.push(() => signal.removeEventListener("abort", onAbort));
    }

    return new EventSubscription<T>(this.#registry, registration);
  }

  /**
   * Remove `subscriber`'s registration. Values still queued for it are
   * dropped. Does nothing if it is not subscribed.
   */
  unsubscribe(subscriber: object): void {
    const id = peekIdentity(subscriber);
    if (id === undefined) return;

    this.#registry.deregister(id);
  }

  /**
   * Deliver `value` to every live subscriber without waiting for any handler.
   *
   * @param value - The value to broadcast.
   */
  fire(value: T): void {
    this.#registry.sweep();
    for (const registration of this.#registry.activeEntries()) {
      registration.pending.increment();
      registration.delivery.push(value);
    }
  }

  /**
   * Deliver `value` to every live subscriber, then wait until every pending
   * value on the bus (this one and any fired earlier) has been handled.
   *
   *
   * There is no built-in timeout: a handler that never settles makes this
   * wait forever. A handler must not `fireAndWait` on its own bus, since it
   * would be waiting on itself.
   *
   * @param value - The value to broadcast.
   */
  async fireAndWait(value: T): Promise<void> {
    this.fire(value);
    await this.waitForPendingEvents();
  }

  /**
   * Wait until no subscriber has a pending value, without firing anything.
   * Useful after a burst of {@link fire} calls.
   */
  waitForPendingEvents(): Promise<void> {
    return this.#tracker.drain();
  }

  /**
   * Remove every subscription. Queued values are dropped and any waiter on
   * pending values is released.
   */
  clear(): void {
    this.#registry.clear();
  }

  /**
   * Synchronous disposal method (for `using` syntax).
   *
   *
   * Alias for {@link clear}.
   */
  [Symbol.dispose](): void {
    this.clear();
  }

  /**
   * Asynchronous disposal method.
   *
   *
   * Alias for {@link clear}.
   */
  async [Symbol.asyncDispose](): Promise<void> {
    this.clear();
  }
}

/**
 * The {@link Subscription} handle returned by {@link EventBus.subscribe}.
 * Bound to one registration, not to the subscriber, so a stale handle cannot
 * cancel a newer subscription of the same object.
 */
class EventSubscription<T> implements Subscription {
  #registry: SubscriptionRegistry<T>;
  #registration: Registration<T> | null;

  constructor(registry: SubscriptionRegistry<T>, registration: Registration<T> | null) {
    this.#registry = registry;
    this.#registration = registration;
  }

  get closed(): boolean {
    const registration = this.#registration;
    if (registration === null) return true;

    return this.#registry.get(registration.id) !== registration
      || registration.reference.deref() === undefined;
  }

  unsubscribe(): void {
    const registration = this.#registration;
    this.#registration = null;
    if (registration !== null) this.#registry.remove(registration);
  }

  [Symbol.dispose](): void {
    this.unsubscribe();
  }

  async [Symbol.asyncDispose](): Promise<void> {
    this.unsubscribe();
  }

  get [Symbol.toStringTag](): "Subscription" {
    return "Subscription";
  }
}

/**
 * An {@link EventBus} that carries no payload.
 *
 * With `T = void` the payload parameter may be left out, so handlers take no
 * arguments and `fire()` / `fireAndWait()` are called bare.
 *
 * @example
 * ```ts
 * const saved: Signal = createSignal();
 * saved.subscribe(toolbar, (_, bar) => bar.flash());
 * await saved.fireAndWait();
 * ```
 */
export type Signal = EventBus<void>;

/**
 * Creates a zero-payload {@link Signal}.
 */
export function createSignal(options?: EventBusOptions): Signal {
  return new EventBus<void>(options);
}
