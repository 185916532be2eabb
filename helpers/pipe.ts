// helpers/pipe.ts
// Left-to-right composition of operators

import type { Operator } from "./_types.ts";
import type { Observable, ObservableInput } from "../observable.ts";

import { from } from "../observable.ts";

/**
 * Applies operators to a source, left to right, with full typing for up to
 * 12 operators.
 *
 * Every operator wraps the previous result; nothing is buffered between them,
 * so each value flows through the whole chain in one call stack unless a
 * bridge operator (`delay`, `async`) is part of it.
 *
 * @returns A new Observable with all transforms applied
 *
 * @example
 * ```ts
 * const result = pipe(
 *   of(1, 2, 3, 4),
 *   map(x => x * 2),
 *   filter(x => x > 4),
 *   take(1)
 * );
 * // 6
 * ```
 */

// Overload 0: No operator
export function pipe<T>(
  source: ObservableInput<T>,
): Observable<T>;

// Overload 1: One operator
export function pipe<T, A>(
  source: ObservableInput<T>,
  op1: Operator<T, A>
): Observable<A>;

// Overload 2: Two operators
export function pipe<T, A, B>(
  source: ObservableInput<T>,
  op1: Operator<T, A>,
  op2: Operator<A, B>
): Observable<B>;

// Overload 3: Three operators
export function pipe<T, A, B, C>(
  source: ObservableInput<T>,
  op1: Operator<T, A>,
  op2: Operator<A, B>,
  op3: Operator<B, C>
): Observable<C>;

// Overload 4: Four operators
export function pipe<T, A, B, C, D>(
  source: ObservableInput<T>,
  op1: Operator<T, A>,
  op2: Operator<A, B>,
  op3: Operator<B, C>,
  op4: Operator<C, D>
): Observable<D>;

// Overload 5: Five operators
export function pipe<T, A, B, C, D, E>(
  source: ObservableInput<T>,
  op1: Operator<T, A>,
  op2: Operator<A, B>,
  op3: Operator<B, C>,
  op4: Operator<C, D>,
  op5: Operator<D, E>
): Observable<E>;

// Overload 6: Six operators
export function pipe<T, A, B, C, D, E, F>(
  source: ObservableInput<T>,
  op1: Operator<T, A>,
  op2: Operator<A, B>,
  op3: Operator<B, C>,
  op4: Operator<C, D>,
  op5: Operator<D, E>,
  op6: Operator<E, F>
): Observable<F>;

// Overload 7: Seven operators
export function pipe<T, A, B, C, D, E, F, G>(
  source: ObservableInput<T>,
  op1: Operator<T, A>,
  op2: Operator<A, B>,
  op3: Operator<B, C>,
  op4: Operator<C, D>,
  op5: Operator<D, E>,
  op6: Operator<E, F>,
  op7: Operator<F, G>
): Observable<G>;

// Overload 8: Eight operators
export function pipe<T, A, B, C, D, E, F, G, H>(
  source: ObservableInput<T>,
  op1: Operator<T, A>,
  op2: Operator<A, B>,
  op3: Operator<B, C>,
  op4: Operator<C, D>,
  op5: Operator<D, E>,
  op6: Operator<E, F>,
  op7: Operator<F, G>,
  op8: Operator<G, H>
): Observable<H>;

// Overload 9: Nine operators
export function pipe<T, A, B, C, D, E, F, G, H, I>(
  source: ObservableInput<T>,
  op1: Operator<T, A>,
  op2: Operator<A, B>,
  op3: Operator<B, C>,
  op4: Operator<C, D>,
  op5: Operator<D, E>,
  op6: Operator<E, F>,
  op7: Operator<F, G>,
  op8: Operator<G, H>,
  op9: Operator<H, I>
): Observable<I>;

// Overload 10: Ten operators
export function pipe<T, A, B, C, D, E, F, G, H, I, J>(
  source: ObservableInput<T>,
  op1: Operator<T, A>,
  op2: Operator<A, B>,
  op3: Operator<B, C>,
  op4: Operator<C, D>,
  op5: Operator<D, E>,
  op6: Operator<E, F>,
  op7: Operator<F, G>,
  op8: Operator<G, H>,
  op9: Operator<H, I>,
  op10: Operator<I, J>
): Observable<J>;

// Overload 11: Eleven operators
export function pipe<T, A, B, C, D, E, F, G, H, I, J, K>(
  source: ObservableInput<T>,
  op1: Operator<T, A>,
  op2: Operator<A, B>,
  op3: Operator<B, C>,
  op4: Operator<C, D>,
  op5: Operator<D, E>,
  op6: Operator<E, F>,
  op7: Operator<F, G>,
  op8: Operator<G, H>,
  op9: Operator<H, I>,
  op10: Operator<I, J>,
  op11: Operator<J, K>
): Observable<K>;

// Overload 12: Twelve operators
export function pipe<T, A, B, C, D, E, F, G, H, I, J, K, L>(
  source: ObservableInput<T>,
  op1: Operator<T, A>,
  op2: Operator<A, B>,
  op3: Operator<B, C>,
  op4: Operator<C, D>,
  op5: Operator<D, E>,
  op6: Operator<E, F>,
  op7: Operator<F, G>,
  op8: Operator<G, H>,
  op9: Operator<H, I>,
  op10: Operator<I, J>,
  op11: Operator<J, K>,
  op12: Operator<K, L>
): Observable<L>;

// Implementation
export function pipe(
  source: ObservableInput<unknown>,
  ...operators: AnyOperator[]
): Observable<unknown> {
  if (operators.length > 12) {
    throw new RangeError('pipe: Too many operators (maximum 12).');
  }

  let result = from(source);
  for (const op of operators) result = op(result);
  return result;
}

// Bivariant in its input, so the operators of every overload fit the
// implementation signature.
type AnyOperator = {
  bivarianceHack(source: Observable<unknown>): Observable<unknown>;
}["bivarianceHack"];
