// @filename: symbol.ts
/**
 * Well-known symbols used by connection streams and their subscriptions.
 *
 * `Symbol.observable` makes any {@link ConnectionStream} consumable by other
 * Observable libraries, while `Symbol.dispose` / `Symbol.asyncDispose` let
 * subscriptions and event registrations be released with `using` blocks.
 *
 * @example
 * ```ts
 * const stream = ConnectionStream.createNew(handler);
 * const foreign = stream[Symbol.observable]();
 * ```
 *
 * @module
 */
export interface SymbolConstructor
  extends Omit<typeof globalThis.Symbol, "observable"> {
  /**
   * Well-known symbol for Observable interoperability.
   *
   * @see {@link https://github.com/tc39/proposal-observable | TC39 Observable proposal}
   */
  readonly observable: unique symbol;
}

/**
 * The global `Symbol` constructor, typed with `observable` and guaranteed to
 * carry the disposal symbols.
 */
export const Symbol = globalThis.Symbol as unknown as SymbolConstructor;

/**
 * Installs `key` on the global Symbol constructor when the runtime lacks it.
 * @internal
 */
function define(key: "dispose" | "asyncDispose" | "observable") {
  if (typeof Reflect.get(Symbol, key) === "symbol") return;

  Reflect.defineProperty(Symbol, key, {
    value: globalThis.Symbol(`Symbol.${key}`),
    enumerable: false,
    configurable: false,
    writable: false,
  });
}

define("dispose");
define("asyncDispose");
define("observable");
