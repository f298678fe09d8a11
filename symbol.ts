// @filename: symbol.ts
/**
 * > Inspired by https://jsr.io/@nick/dispose/1.1.0/symbol.ts
 *
 * Guarantees the explicit-resource-management symbols exist at runtime.
 *
 *
 * `EventBus` and `Subscription` implement `[Symbol.dispose]` and
 * `[Symbol.asyncDispose]` so they work with `using` / `await using`. Early
 * Node 20 releases ship neither symbol, so this module defines them when they
 * are missing. Import `Symbol` from here (rather than relying on the global)
 * in every module that keys a method on them, so the polyfill is loaded first.
 *
 * @example
 * ```ts
 * import { Symbol } from "./symbol.ts";
 *
 * class Connection {
 *   [Symbol.dispose]() { this.close(); }
 * }
 * ```
 *
 * @module
 */
export const Symbol: SymbolConstructor = globalThis.Symbol;

/**
 * Adds Symbol.dispose if it doesn't exist natively.
 */
if (typeof Symbol.dispose !== "symbol") {
  Reflect.defineProperty(Symbol, "dispose", {
    value: Symbol("Symbol.dispose"),
    enumerable: false,
    configurable: false,
    writable: false,
  });
}

/**
 * Adds Symbol.asyncDispose if it doesn't exist natively.
 */
if (typeof Symbol.asyncDispose !== "symbol") {
  Reflect.defineProperty(Symbol, "asyncDispose", {
    value: Symbol("Symbol.asyncDispose"),
    enumerable: false,
    configurable: false,
    writable: false,
  });
}
