/**
 * Subscriber identities.
 *
 * The registry needs a comparable, hashable key per subscriber object, but a
 * `Map` keyed by the object itself would keep every subscriber alive for as
 * long as the bus lives. Instead each object is mapped (through a `WeakMap`)
 * to a plain number, and the registry keys on that number.
 *
 * @module
 */

/**
 * Stable token identifying one subscriber object for as long as that object
 * exists. Two distinct objects never share an identity, and identities are
 * never reused.
 */
export type SubscriberId = number;

const identities = new WeakMap<object, SubscriberId>();
let lastId = 0;

/**
 * Returns the identity of `subscriber`, minting one on first sight.
 *
 * @throws {TypeError} If `subscriber` is not an object or function; primitives
 * carry no identity and cannot be weakly referenced.
 *
 * @example
 * ```ts
 * const view = {};
 * identify(view) === identify(view); // true
 * identify(view) === identify({});   // false
 * ```
 */
export function identify(subscriber: object): SubscriberId {
  const value: unknown = subscriber;
  if (!isIdentityBearing(value)) {
    throw new TypeError(`Expected subscriber to be an object or function, got ${value === null ? "null" : typeof value}`);
  }

  let id = identities.get(value);
  if (id === undefined) {
    id = ++lastId;
    identities.set(value, id);
  }

  return id;
}

/**
 * Looks up an identity without minting one. Objects that were never passed to
 * {@link identify} yield `undefined`.
 */
export function peekIdentity(subscriber: object): SubscriberId | undefined {
  return isIdentityBearing(subscriber) ? identities.get(subscriber) : undefined;
}

function isIdentityBearing(value: unknown): value is object {
  return (typeof value === "object" && value !== null) || typeof value === "function";
}
