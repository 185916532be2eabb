import type { Operator } from "../_types.ts";
import type { Subscription } from "../../_types.ts";
import type { ObservableInput } from "../../observable.ts";

import { ObservableError, isContractViolation } from "../../error.ts";
import { Observable, from } from "../../observable.ts";
import { operator } from "../../proxy.ts";
import { createStatefulOperator } from "../operators.ts";

/**
 * Ends the stream with a completion instead of its error.
 *
 * @example
 * ```ts
 * const flaky = new Observable<number>(subscriber => {
 *   subscriber.next(1);
 *   subscriber.error(new Error("connection reset"));
 * });
 *
 * pipe(flaky, ignoreErrors()); // 1, complete
 * ```
 */
export function ignoreErrors<T>(): Operator<T, T> {
  return operator<T, T>({
    name: 'operator:ignoreErrors',
    actor: downstream => ({
      next: value => downstream.next(value),
      error: () => downstream.complete(),
      complete: () => downstream.complete(),
    }),
  });
}

/**
 * Replaces an error with the Observable returned by `selector`.
 *
 * Values emitted before the error are kept; the replacement's values follow,
 * and its terminal event ends the stream. `selector` also receives the source,
 * so returning `caught` resubscribes to it.
 *
 * If `selector` itself throws, the stream ends with an `ObservableError`.
 *
 * @example
 * ```ts
 * pipe(
 *   fetchPrices(),
 *   catchError(() => of(cachedPrice))
 * );
 * ```
 *
 * @example Retry once
 * ```ts
 * let retried = false;
 * pipe(
 *   source,
 *   catchError((err, caught) => {
 *     if (retried) return faulted(err);
 *     retried = true;
 *     return caught;
 *   })
 * );
 * ```
 */
export function catchError<T, R = T>(
  selector: (err: unknown, caught: Observable<T>) => ObservableInput<R>
): Operator<T, T | R> {
  return operator<T, T | R>({
    name: 'operator:catchError',
    source: source => new Observable<T | R>(subscriber => {
      let replacement: Subscription | null = null;

      const upstream = source.subscribe({
        next: value => subscriber.next(value),
        error: err => {
          let fallback: Observable<R>;
          try {
            fallback = from(selector(err, source));
          } catch (selectorErr) {
            if (isContractViolation(selectorErr)) throw selectorErr;
            subscriber.error(ObservableError.from(selectorErr, 'operator:catchError', err));
            return;
          }
          replacement = fallback.subscribe(subscriber, { signal: subscriber.signal });
        },
        complete: () => subscriber.complete(),
      }, { signal: subscriber.signal });

      return () => {
        replacement?.unsubscribe();
        upstream.unsubscribe();
      };
    }),
  });
}

/**
 * Errors with `error()` when the source completes without emitting anything.
 *
 * @example
 * ```ts
 * pipe(completed(), errorIfEmpty(() => new Error('no results'))); // error
 * pipe(of(1), errorIfEmpty(() => new Error('no results')));      // 1, complete
 * ```
 */
export function errorIfEmpty<T>(error: () => unknown = () => new Error('Source is empty')): Operator<T, T> {
  return createStatefulOperator<T, T, { empty: boolean }>({
    name: 'errorIfEmpty',
    errorMode: 'manual',
    createState: () => ({ empty: true }),
    transform(chunk, state, downstream) {
      state.empty = false;
      downstream.next(chunk);
    },
    flush(state, downstream) {
      if (state.empty) downstream.error(error());
    },
  });
}
