/**
 * Well-known symbols used across the engine.
 *
 * Node.js 20 ships `Symbol.dispose` and `Symbol.asyncDispose` from 20.4 on but
 * has no `Symbol.observable`; each one missing at load time is defined here so
 * `using` blocks and Observable interop work on every supported release.
 *
 * @example
 * ```ts
 * const interop = {
 *   [Symbol.observable]() {
 *     return of(1, 2, 3);
 *   }
 * };
 *
 * from(interop).subscribe(actor({ next: console.log }));
 * ```
 *
 * @module
 */
export interface SymbolConstructor
  extends Omit<typeof globalThis.Symbol, "observable"> {
  /**
   * Interop symbol from the TC39 Observable proposal. Objects with a
   * `[Symbol.observable]()` method can be handed to `from()`.
   */
  readonly observable: unique symbol;
}

export const Symbol: SymbolConstructor = globalThis.Symbol as unknown as SymbolConstructor;

for (const name of ["dispose", "asyncDispose", "observable"] as const) {
  if (typeof Reflect.get(Symbol, name) !== "symbol") {
    Reflect.defineProperty(Symbol, name, {
      value: globalThis.Symbol.for(`Symbol.${name}`),
      enumerable: false,
      configurable: false,
      writable: false,
    });
  }
}
