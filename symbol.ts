// @filename: symbol.ts
/**
 * Extensions to the global Symbol constructor for interoperability with
 * other Observable implementations.
 *
 * `Symbol.observable` is the well-known symbol of the TC39 Observable
 * proposal; an object with a `[Symbol.observable]()` method can be handed to
 * any library that understands the protocol. `Symbol.dispose` and
 * `Symbol.asyncDispose` back the `using` / `await using` support of consumer
 * handles.
 *
 * @example
 * ```ts
 * const interop = subject[Symbol.observable]();
 * interop.subscribe({ next: v => console.log(v) });
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
 * The global Symbol, typed with the extra well-known symbols.
 */
export const Symbol: SymbolConstructor = globalThis.Symbol as unknown as SymbolConstructor;

/**
 * Installs a well-known symbol on the global Symbol when the host lacks it.
 * @internal
 */
function define(name: "observable" | "dispose" | "asyncDispose"): void {
  if (typeof Reflect.get(globalThis.Symbol, name) === "symbol") return;
  Reflect.defineProperty(globalThis.Symbol, name, {
    value: globalThis.Symbol(`Symbol.${name}`),
    enumerable: false,
    configurable: false,
    writable: false,
  });
}

define("dispose");
define("asyncDispose");
define("observable");
