/**
 * Small promise helpers shared by the delivery and pending-count machinery.
 *
 * @module
 */

/**
 * A promise together with the functions that settle it.
 *
 * Shaped like the result of `Promise.withResolvers()`, which Node 20 does not
 * ship.
 *
 * @typeParam T - The type the promise resolves with.
 */
export interface Resolvers<T> {
  promise: Promise<T>;
  resolve: (value: T | PromiseLike<T>) => void;
  reject: (reason?: unknown) => void;
}

/**
 * Creates a pending promise and hands back its `resolve`/`reject` functions,
 * so the code that settles it can live apart from the code that awaits it.
 *
 * @example
 * ```ts
 * const { promise, resolve } = withResolvers<void>();
 * setTimeout(() => resolve(), 10);
 * await promise;
 * ```
 */
export function withResolvers<T>(): Resolvers<T> {
  let resolve: (value: T | PromiseLike<T>) => void = () => {};
  let reject: (reason?: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });

  return { promise, resolve, reject };
}
