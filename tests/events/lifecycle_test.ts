import { test, expect, vi } from "vitest";

import { EventBus } from "../../events.ts";
import { createGate, createLifetimes, flush } from "../_utils/_lifetimes.ts";

test("subscribing the same object twice keeps only the second handler", async () => {
  const bus = new EventBus<number>();
  const subscriber = {};
  let count = 0;

  bus.subscribe(subscriber, () => { count += 1; });
  bus.subscribe(subscriber, () => { count += 10; });
  await bus.fireAndWait(1);

  expect(count).toBe(10);
  expect(bus.size).toBe(1);
});

test("replacing a subscription drops values queued for the old handler", async () => {
  const bus = new EventBus<number>();
  const subscriber = {};
  const gate = createGate();
  const oldSeen: number[] = [];
  const newSeen: number[] = [];

  bus.subscribe(subscriber, async value => {
    await gate.wait;
    oldSeen.push(value);
  });

  bus.fire(1);
  bus.fire(2);
  bus.fire(3);
  await flush();

  bus.subscribe(subscriber, value => { newSeen.push(value); });
  expect(bus.pending).toBe(0);

  gate.open();
  await flush();
  await bus.fireAndWait(4);

  expect(oldSeen).toEqual([1]);
  expect(newSeen).toEqual([4]);
});

test("a destroyed subscriber is removed at the next fireAndWait", async () => {
  const lifetimes = createLifetimes();
  const bus = new EventBus<string>({ reference: lifetimes.reference });
  const subscriber = {};
  const handler = vi.fn();

  bus.subscribe(subscriber, handler);
  await bus.fireAndWait("t1");

  lifetimes.destroy(subscriber);
  expect(bus.has(subscriber)).toBe(false);
  expect(bus.size).toBe(1);

  await bus.fireAndWait("t2");

  expect(handler).toHaveBeenCalledTimes(1);
  expect(handler).toHaveBeenCalledWith("t1", subscriber);
  expect(bus.size).toBe(0);
});

test("a destroyed subscriber is removed at the next fire", () => {
  const lifetimes = createLifetimes();
  const bus = new EventBus<number>({ reference: lifetimes.reference });
  const subscriber = {};

  bus.subscribe(subscriber, vi.fn());
  lifetimes.destroy(subscriber);
  bus.fire(1);

  expect(bus.size).toBe(0);
  expect(bus.pending).toBe(0);
});

test("a destroyed subscriber is removed at the next subscribe", () => {
  const lifetimes = createLifetimes();
  const bus = new EventBus<number>({ reference: lifetimes.reference });
  const gone = {};
  const other = {};

  bus.subscribe(gone, vi.fn());
  lifetimes.destroy(gone);
  expect(bus.size).toBe(1);

  bus.subscribe(other, vi.fn());

  expect(bus.size).toBe(1);
  expect(bus.has(other)).toBe(true);
});

test("values queued for a destroyed subscriber are dropped when it is swept", async () => {
  const lifetimes = createLifetimes();
  const bus = new EventBus<number>({ reference: lifetimes.reference });
  const subscriber = {};
  const gate = createGate();
  const handled: number[] = [];

  bus.subscribe(subscriber, async value => {
    await gate.wait;
    handled.push(value);
  });

  bus.fire(1);
  bus.fire(2);
  bus.fire(3);
  await flush();

  lifetimes.destroy(subscriber);
  await bus.fireAndWait(4);
  expect(bus.pending).toBe(0);

  gate.open();
  await flush();
  expect(handled).toEqual([1]);
});

test("an unsubscribed or destroyed subscriber can subscribe again", async () => {
  const lifetimes = createLifetimes();
  const bus = new EventBus<number>({ reference: lifetimes.reference });
  const subscriber = {};
  const handler = vi.fn();

  bus.subscribe(subscriber, handler);
  bus.unsubscribe(subscriber);
  bus.subscribe(subscriber, handler);
  await bus.fireAndWait(1);

  expect(handler).toHaveBeenCalledTimes(1);
  expect(bus.has(subscriber)).toBe(true);
});

test("a subscribe with an already aborted signal still sweeps destroyed subscribers", () => {
  const lifetimes = createLifetimes();
  const bus = new EventBus<number>({ reference: lifetimes.reference });
  const gone = {};
  const other = {};

  bus.subscribe(gone, vi.fn());
  lifetimes.destroy(gone);
  expect(bus.size).toBe(1);

  const subscription = bus.subscribe(other, vi.fn(), { signal: AbortSignal.abort() });

  expect(subscription.closed).toBe(true);
  expect(bus.size).toBe(0);
  expect(bus.has(other)).toBe(false);
});

test("values queued before a subscriber is destroyed are skipped, not handled", async () => {
  const lifetimes = createLifetimes();
  const bus = new EventBus<number>({ reference: lifetimes.reference });
  const subscriber = {};
  const gate = createGate();
  const handled: number[] = [];

  bus.subscribe(subscriber, async value => {
    await gate.wait;
    handled.push(value);
  });

  bus.fire(1);
  bus.fire(2);
  await flush();

  lifetimes.destroy(subscriber);
  gate.open();
  await bus.waitForPendingEvents();

  expect(handled).toEqual([1]);
  expect(bus.pending).toBe(0);
  expect(bus.size).toBe(1);
});

/**
 * Runs the collector until `target` is gone or the attempts run out, and
 * reports whether it was collected. Vitest runs with `--expose-gc`.
 */
async function collect(target: WeakRef<object>): Promise<boolean> {
  const gc: unknown = Reflect.get(globalThis, "gc");
  expect(gc).toBeTypeOf("function");
  if (typeof gc !== "function") return false;

  for (let attempt = 0; attempt < 10 && target.deref() !== undefined; attempt++) {
    await flush();
    gc();
  }
  return target.deref() === undefined;
}

test("a subscriber that was garbage collected stops receiving values", async ({ skip }) => {
  const bus = new EventBus<string>();
  const received: string[] = [];

  function subscribeTemporary(): WeakRef<object> {
    const subscriber = {};
    bus.subscribe(subscriber, value => { received.push(value); });
    return new WeakRef(subscriber);
  }

  const temporary = subscribeTemporary();
  await bus.fireAndWait("t1");

  if (!(await collect(temporary))) return skip();

  await bus.fireAndWait("t2");

  expect(received).toEqual(["t1"]);
  expect(bus.size).toBe(0);
});

test("a subscriber that reaches itself through the handler argument can be collected", async () => {
  const priceChanged = new EventBus<number>();
  const drawn: number[] = [];

  class Chart {
    constructor() {
      priceChanged.subscribe(this, async (price, chart) => {
        await chart.redraw(price);
      });
    }

    async redraw(price: number): Promise<void> {
      drawn.push(price);
    }
  }

  function openChart(): WeakRef<Chart> {
    return new WeakRef(new Chart());
  }

  const chart = openChart();
  await priceChanged.fireAndWait(1);
  expect(drawn).toEqual([1]);

  expect(await collect(chart)).toBe(true);

  await priceChanged.fireAndWait(2);

  expect(drawn).toEqual([1]);
  expect(priceChanged.size).toBe(0);
});
