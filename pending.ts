/**
 * Pending-event accounting.
 *
 * Every subscription owns a {@link PendingCounter}: incremented once per value
 * enqueued for it, decremented once per value its handler finished with. A bus
 * owns one {@link PendingTracker}, which keeps the running total across all of
 * its attached counters and wakes anyone waiting for that total to reach zero.
 * That is what `fireAndWait` and `waitForPendingEvents` suspend on.
 *
 * @module
 */

import type { Resolvers } from "./utils.ts";
import { withResolvers } from "./utils.ts";

/**
 * Count of values enqueued for one subscription that its handler has not yet
 * finished.
 *
 * A counter starts attached to the tracker that minted it. {@link release}
 * detaches it (on unsubscribe, sweep or replacement); afterwards it still
 * counts locally but no longer moves the tracker's total, so a handler that
 * finishes after its subscription was torn down cannot disturb the
 * subscription that replaced it.
 */
export class PendingCounter {
  #count = 0;
  #onChange: ((delta: number) => void) | null;

  constructor(onChange: (delta: number) => void) {
    this.#onChange = onChange;
  }

  /** Values enqueued but not yet handled. Never negative. */
  get count(): number {
    return this.#count;
  }

  /** Whether the counter still contributes to its tracker's total. */
  get attached(): boolean {
    return this.#onChange !== null;
  }

  increment(): void {
    this.#count++;
    this.#onChange?.(1);
  }

  /** Decrements by one; a counter already at zero stays at zero. */
  decrement(): void {
    if (this.#count === 0) return;
    this.#count--;
    this.#onChange?.(-1);
  }

  /**
   * Detaches from the tracker, withdrawing whatever is still outstanding from
   * its total. Idempotent.
   */
  release(): void {
    const onChange = this.#onChange;
    this.#onChange = null;
    if (onChange !== null && this.#count > 0) onChange(-this.#count);
  }
}

/**
 * Running total of every attached {@link PendingCounter} minted by this
 * tracker, with promise-based waiting for the total to drain.
 *
 * @example
 * ```ts
 * const tracker = new PendingTracker();
 * const counter = tracker.counter();
 *
 * counter.increment();
 * const drained = tracker.drain();   // pending
 * counter.decrement();               // total hits 0, `drained` resolves
 * await drained;
 * ```
 */
export class PendingTracker {
  #total = 0;
  #waiters: Array<Resolvers<void>> = [];

  /** Sum of the counts of all attached counters. */
  get total(): number {
    return this.#total;
  }

  /** Mints a new counter, at zero, attached to this tracker. */
  counter(): PendingCounter {
    return new PendingCounter(delta => this.#adjust(delta));
  }

  /**
   * Resolves once the total is zero: immediately if it already is, otherwise
   * at the moment the last outstanding value is handled or withdrawn. Values
   * enqueued while waiting extend the wait.
   */
  drain(): Promise<void> {
    if (this.#total === 0) return Promise.resolve();

    const waiter = withResolvers<void>();
    this.#waiters.push(waiter);
    return waiter.promise;
  }

  #adjust(delta: number): void {
    this.#total = Math.max(0, this.#total + delta);
    if (this.#total === 0 && this.#waiters.length > 0) {
      const waiters = this.#waiters;
      this.#waiters = [];
      for (const waiter of waiters) waiter.resolve();
    }
  }
}
