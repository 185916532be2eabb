// @filename: helpers/mod.ts
/**
 * Operators and combinators for Observables.
 *
 * Every operator is a plain function from one Observable to another, built on
 * the proxy engine, and `pipe` applies them in order:
 *
 * @example
 * ```ts
 * import { pipe, filter, map, take } from "./helpers/mod.ts";
 * import { Observable } from "./observable.ts";
 *
 * const source = new Observable<number>(subscriber => {
 *   for (let i = 0; i < 10 && !subscriber.closed; i++) {
 *     subscriber.next(i);
 *   }
 *   subscriber.complete();
 * });
 *
 * pipe(
 *   source,
 *   filter(x => x % 2 === 0), // Keep even numbers
 *   map(x => x * 10),         // Multiply by 10
 *   take(3)                   // Take only the first 3 values
 * ).subscribe({
 *   next: value => console.log(value),
 *   complete: () => console.log('Done')
 * });
 * // Output: 0, 20, 40, Done
 * ```
 *
 * ## What's Here
 *
 * - **Leaf operators**: `map`, `filter`, `take`, `drop`, `scan`, `tap`,
 *   `enumerate`, `uppercase`
 * - **Error handling**: `catchError`, `ignoreErrors`, `errorIfEmpty`
 * - **Scheduling**: `delay`, `async`
 * - **Flattening**: `mergeMap`, `concatMap`, `mergeAll`, `switchMap`, `switchAll`
 * - **Multicast**: `share`, `shareReplay`
 * - **Combining sources**: `collectLatest`, `combineLatest`
 * - **Deferred sources**: `lazy`
 * - **Your own**: `createOperator`, `createStatefulOperator`
 *
 * ## Limitations
 *
 * - `pipe` takes at most 12 operators; nest `pipe` calls for longer chains
 *
 * @module
 */

// Re-export all operators from their respective modules
export type * from "./_types.ts";

export * from "./operations/mod.ts";
export * from "./combination.ts";
export * from "./lazy.ts";
export * from "./operators.ts";
export * from "./pipe.ts";
