import type { SubscriberReference } from "../../_types.ts";

import { withResolvers } from "../../utils.ts";

/**
 * Subscriber references the test can invalidate on demand, standing in for garbage
 * collection. Pass `lifetimes.reference` as the bus's `reference` option and
 * call `lifetimes.destroy(subscriber)` where the subscriber would be collected.
 */
export function createLifetimes() {
  const destroyed = new WeakSet<object>();

  return {
    reference<S extends object>(subscriber: S): SubscriberReference<S> {
      return { deref: () => (destroyed.has(subscriber) ? undefined : subscriber) };
    },
    destroy(subscriber: object): void {
      destroyed.add(subscriber);
    },
  };
}

/**
 * Lets every queued microtask and already-due timer run.
 */
export function flush(): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, 0));
}

export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * A manually opened gate, for holding a handler mid-flight.
 */
export function createGate() {
  const { promise, resolve } = withResolvers<void>();
  return { wait: promise, open: () => resolve() };
}
