/**
 * A small, type-safe broadcast bus for in-process events, with subscribers
 * held **weakly** and delivered to **in order**.
 *
 * If you've ever wired up an event emitter in a long-lived app, you know the
 * two ways it goes wrong: a listener outlives the object it belonged to
 * (because nobody called `off()`), or two values race through an async
 * listener and land out of order.
 *
 * ```ts
 * // The usual way 😫
 * emitter.on('price', async price => {
 *   await this.chart.redraw(price);    // `this` is now kept alive forever
 * });
 *
 * emitter.emit('price', 101);
 * emitter.emit('price', 102);          // may finish redrawing before 101 does
 * ```
 *
 * **`EventBus` fixes both.** A subscription is tied to an object, not to a
 * callback:
 *
 * ```ts
 * import { EventBus } from './mod.ts';
 *
 * const priceChanged = new EventBus<number>();
 *
 * class Chart {
 *   constructor() {
 *     priceChanged.subscribe(this, async (price, chart) => {
 *       await chart.redraw(price);
 *     });
 *   }
 *   async redraw(price: number) { ... }
 * }
 *
 * priceChanged.fire(101);
 * priceChanged.fire(102);                   // redraw(102) starts after redraw(101) ends
 * await priceChanged.fireAndWait(103);      // every chart has drawn 101, 102 and 103
 * ```
 *
 * - **No leaks when you forget to unsubscribe.** The bus only keeps a weak
 *   reference to the subscriber. Once the `Chart` is garbage collected, its
 *   registration is dropped at the next `subscribe`, `fire` or `fireAndWait`.
 *   Handlers get the subscriber as their second argument; reach it through
 *   that, never by closing over it or `this`, or it stays alive.
 * - **One handler per subscriber.** Subscribing the same object again replaces
 *   its handler (and drops anything still queued for the old one).
 * - **Per-subscriber ordering.** Each subscriber has its own queue and its own
 *   processing task; values reach its handler one at a time, in the order they
 *   were fired, whether through `fire` or `fireAndWait`. Different subscribers
 *   run independently, so a slow one never holds up the others.
 * - **Two firing modes.** `fire` returns immediately. `fireAndWait` resolves
 *   once every subscriber has finished with the value (and with everything
 *   fired before it). `waitForPendingEvents` waits for outstanding work after
 *   a burst of `fire` calls.
 * - **Zero-payload events.** `createSignal()` gives an `EventBus<void>`, whose
 *   handlers can ignore the payload and whose `fire()` takes no argument.
 *
 * ## Handler errors
 * A handler that throws does not stall its queue. The fault is wrapped in an
 * `EventError` (subscriber, value, original error) and passed to the bus's
 * `onError` option, or rethrown on a microtask when there is none.
 *
 * ## Caveats
 * - There are no timeouts. A handler that never settles stalls its own queue,
 *   and any `fireAndWait` / `waitForPendingEvents` caller with it. Wrap those
 *   calls in your own timeout if you need a bound.
 * - A handler must not `fireAndWait` on the bus it is subscribed to; it would
 *   wait on itself. Chaining into a *different* bus is fine.
 * - A subscriber collected at the same moment as a `fire` may or may not get
 *   that value. It never gets it twice.
 *
 * @module
 */
export * from "./events.ts";
export * from "./error.ts";
export type * from "./_types.ts";
export type { SubscriberId } from "./identity.ts";
