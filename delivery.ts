/**
 * @module DeliveryQueue
 */

import type { SubscriberId } from "./identity.ts";
import type { PendingCounter } from "./pending.ts";
import type { Resolvers } from "./utils.ts";

import { EventError, reportError } from "./error.ts";
import { createQueue, enqueue, dequeue, isEmpty, getSize, clear } from "./queue.ts";
import { withResolvers } from "./utils.ts";

/**
 * What a {@link DeliveryQueue} calls with each value. The bus binds the
 * subscriber's handler to its liveness probe before it gets here.
 */
export type DeliveryHandler<T> = (value: T) => void | PromiseLike<void>;

/**
 * Construction parameters for a {@link DeliveryQueue}.
 */
export interface DeliveryQueueInit<T> {
  /** Identity of the subscriber being served, reported with handler faults. */
  subscriber: SubscriberId;
  handler: DeliveryHandler<T>;
  /** Decremented once per value, after its handler settles. */
  pending: PendingCounter;
  /** Receives handler faults. */
  onError: (error: EventError) => void;
}

/**
 * One subscriber's ordered inbox, together with the processing task that
 * drains it.
 *
 *
 * The task starts as soon as the queue is constructed and, until cancelled,
 * loops: wait for a value (suspending on a promise while the queue is empty),
 * invoke the handler, await it, decrement the pending counter. Exactly one
 * value is in flight at a time, so values reach the handler in the exact order
 * they were pushed.
 *
 * A handler that throws or rejects does not stop the task. The fault is
 * wrapped in an {@link EventError} for the `onError` callback, and the value
 * still counts as handled.
 *
 * @typeParam T - The payload type.
 *
 * @example
 * ```ts
 * const tracker = new PendingTracker();
 * const pending = tracker.counter();
 * const delivery = new DeliveryQueue<number>({
 *   subscriber: 1,
 *   handler: async n => { await save(n); },
 *   pending,
 *   onError: reportError,
 * });
 *
 * pending.increment();
 * delivery.push(1);
 * await tracker.drain();  // save(1) has finished
 * ```
 */
export class DeliveryQueue<T> {
  #queue = createQueue<T>();
  #wake: Resolvers<void> | null = null;
  #cancelled = false;

  #subscriber: SubscriberId;
  #handler: DeliveryHandler<T>;
  #pending: PendingCounter;
  #onError: (error: EventError) => void;

  /** Settles once the processing task has stopped for good. */
  readonly finished: Promise<void>;

  constructor({ subscriber, handler, pending, onError }: DeliveryQueueInit<T>) {
    this.#subscriber = subscriber;
    this.#handler = handler;
    this.#pending = pending;
    this.#onError = onError;

    this.finished = this.#run();
  }

  /** Values waiting for the handler; the one in flight is not included. */
  get size(): number {
    return getSize(this.#queue);
  }

  get cancelled(): boolean {
    return this.#cancelled;
  }

  /**
   * Appends a value and wakes the processing task. Returns `false`, dropping
   * the value, once the queue has been cancelled.
   */
  push(value: T): boolean {
    if (this.#cancelled) return false;

    enqueue(this.#queue, value);
    this.#notify();
    return true;
  }

  /**
   * Stops the processing task. Queued values are discarded; a handler already
   * running is allowed to finish, but nothing after it is delivered.
   */
  cancel(): void {
    if (this.#cancelled) return;

    this.#cancelled = true;
    clear(this.#queue);
    this.#notify();
  }

  #notify(): void {
    const wake = this.#wake;
    this.#wake = null;
    wake?.resolve();
  }

  async #run(): Promise<void> {
    while (!this.#cancelled) {
      if (isEmpty(this.#queue)) {
        this.#wake = withResolvers<void>();
        await this.#wake.promise;
        continue;
      }

      const value = dequeue(this.#queue);
      try {
        await this.#handler(value);
      } catch (err) {
        this.#fail(err, value);
      } finally {
        this.#pending.decrement();
      }
    }
  }

  #fail(err: unknown, value: T): void {
    const error = EventError.from(err, value, this.#subscriber);
    try {
      this.#onError(error);
    } catch (callbackError) {
      // If the callback throws, still surface the original fault
      // but log the callback error to avoid losing it
      console.error("Event error handler threw:", callbackError);
      reportError(error);
    }
  }
}
