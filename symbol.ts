// @filename: symbol.ts
/**
 * Re-exports the global Symbol constructor with `Symbol.dispose` and
 * `Symbol.asyncDispose` guaranteed to exist.
 *
 * Subscriptions and publishers implement `[Symbol.dispose]()` so they can be
 * used with `using` blocks. Older Node 20 releases ship without the
 * well-known disposal symbols, so they are installed here when missing.
 *
 * @example
 * ```ts
 * import { Symbol } from "./symbol.ts";
 *
 * const publisher = TestPublisher.create<number>();
 * publisher[Symbol.dispose](); // completes every subscriber
 * ```
 *
 * @module
 */
export const Symbol: SymbolConstructor = globalThis.Symbol;

/**
 * Installs a well-known symbol on the global Symbol constructor when the
 * runtime does not provide one yet.
 */
function ensureWellKnown(name: "dispose" | "asyncDispose"): void {
  if (typeof Symbol[name] === "symbol") return;

  Reflect.defineProperty(Symbol, name, {
    value: Symbol(`Symbol.${name}`),
    enumerable: false,
    configurable: false,
    writable: false,
  });
}

ensureWellKnown("dispose");
ensureWellKnown("asyncDispose");
