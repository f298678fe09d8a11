/**
 * @module SubscriptionRegistry
 */

import type { EventBusOptions, SubscriberReference } from "./_types.ts";
import type { DeliveryHandler } from "./delivery.ts";
import type { EventError } from "./error.ts";
import type { SubscriberId } from "./identity.ts";
import type { PendingCounter, PendingTracker } from "./pending.ts";

import { DeliveryQueue } from "./delivery.ts";
import { reportError } from "./error.ts";

/**
 * Everything the bus holds for one subscriber.
 *
 * The registration never holds the subscriber itself, only `reference`.
 */
export interface Registration<T> {
  readonly id: SubscriberId;
  readonly reference: SubscriberReference;
  readonly delivery: DeliveryQueue<T>;
  readonly pending: PendingCounter;
  /** Callbacks run once when the registration is torn down. */
  readonly onTeardown: Array<() => void>;
}

/**
 * Creates the default liveness probe: a real `WeakRef`.
 */
export function weakReference<S extends object>(subscriber: S): SubscriberReference<S> {
  return new WeakRef(subscriber);
}

/**
 * The map from subscriber identity to {@link Registration}, plus the liveness
 * sweep.
 *
 *
 * At most one registration exists per identity. Tearing one down (explicitly,
 * by sweep, or because it was replaced) always does the same four things:
 * cancel its delivery queue, release its pending counter, run its teardown
 * callbacks, and delete the entry.
 *
 * @typeParam T - The payload type delivered to handlers.
 */
export class SubscriptionRegistry<T> {
  #entries = new Map<SubscriberId, Registration<T>>();
  #tracker: PendingTracker;
  #onError: (error: EventError) => void;

  constructor(tracker: PendingTracker, { onError = reportError }: Pick<EventBusOptions, "onError"> = {}) {
    this.#tracker = tracker;
    this.#onError = onError;
  }

  /** Number of registrations, including any not yet swept. */
  get size(): number {
    return this.#entries.size;
  }

  get(id: SubscriberId): Registration<T> | undefined {
    return this.#entries.get(id);
  }

  /**
   * Registers `handler` under `id`, with `reference` as its liveness probe,
   * replacing (and tearing down) any existing registration under `id`.
   * Values still queued for the replaced handler are dropped.
   */
  register(id: SubscriberId, reference: SubscriberReference, handler: DeliveryHandler<T>): Registration<T> {
    this.deregister(id);

    const pending = this.#tracker.counter();
    const registration: Registration<T> = {
      id,
      reference,
      pending,
      delivery: new DeliveryQueue<T>({ subscriber: id, handler, pending, onError: this.#onError }),
      onTeardown: [],
    };

    this.#entries.set(id, registration);
    return registration;
  }

  /**
   * Tears down the registration under `id`. Returns `false` when there was
   * none.
   */
  deregister(id: SubscriberId): boolean {
    const registration = this.#entries.get(id);
    if (!registration) return false;

    this.#teardown(registration);
    return true;
  }

  /**
   * Tears down `registration` only if it is still the current one for its
   * identity; a registration that has since been replaced is left alone.
   */
  remove(registration: Registration<T>): boolean {
    if (this.#entries.get(registration.id) !== registration) return false;

    this.#teardown(registration);
    return true;
  }

  /**
   * Tears down every registration whose subscriber is gone. Returns how many
   * were removed.
   */
  sweep(): number {
    let removed = 0;
    for (const registration of [...this.#entries.values()]) {
      if (registration.reference.deref() === undefined) {
        this.#teardown(registration);
        removed++;
      }
    }
    return removed;
  }

  /**
   * Snapshot of the registrations whose subscribers are alive right now.
   */
  activeEntries(): Registration<T>[] {
    const active: Registration<T>[] = [];
    for (const registration of this.#entries.values()) {
      if (registration.reference.deref() !== undefined) active.push(registration);
    }
    return active;
  }

  /** Tears down every registration. */
  clear(): void {
    for (const registration of [...this.#entries.values()]) {
      this.#teardown(registration);
    }
  }

  #teardown(registration: Registration<T>): void {
    this.#entries.delete(registration.id);
    registration.delivery.cancel();
    registration.pending.release();

    const callbacks = registration.onTeardown.splice(0);
    for (const callback of callbacks) {
      try { callback(); }
      catch (err) { reportError(err); }
    }
  }
}
