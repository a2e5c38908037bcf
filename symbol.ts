// @filename: symbol.ts
/**
 * > Inspired by https://jsr.io/@nick/dispose/1.1.0/symbol.ts
 *
 * The global `Symbol` constructor, guaranteed to carry `Symbol.dispose` and
 * `Symbol.asyncDispose`.
 *
 * Buffers, iterators and the broadcast center expose `[Symbol.dispose]()` and
 * `[Symbol.asyncDispose]()` so they work with `using` / `await using` blocks.
 * Node.js only ships these well-known symbols from 20.4 onward; older
 * runtimes get them defined here on first import.
 *
 * @example
 * ```ts
 * import { Symbol } from './symbol.ts';
 *
 * const iterator = center.sequence('tick')[Symbol.asyncIterator]();
 * await iterator[Symbol.asyncDispose]();
 * ```
 *
 * @module
 */
export const Symbol: SymbolConstructor = globalThis.Symbol;

/**
 * Defines `Symbol[name]` as a fresh, non-writable symbol unless the runtime
 * already has one.
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
