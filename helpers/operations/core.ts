import type { Operator } from "../_types.ts";
import { createOperator, createStatefulOperator } from "../operators.ts";
import { Types } from "../../contract.ts";

/**
 * @module operations/core
 *
 * **Core Stream Operators - Like Array Methods, But Over Time**
 *
 * ```ts
 * // Array methods:
 * [1, 2, 3].map(n => n * 2).filter(n => n > 3)  // [4, 6]
 *
 * // Stream operators:
 * pipe(
 *   of(1, 2, 3),
 *   map(n => n * 2),
 *   filter(n => n > 3)
 * )  // 4, 6, complete
 * ```
 *
 * ## How Errors Work
 *
 * - **Upstream errors**: forwarded unchanged, ending the stream
 * - **Callback crashes**: end the stream with an `ObservableError` naming the
 *   operator and the value being processed
 */

/**
 * Transforms each value.
 *
 * ```ts
 * pipe(of(1, 2, 3), map(n => n * 2))  // 2, 4, 6
 * ```
 *
 * @param project - Receives the value and its zero-based index
 */
export function map<T, R>(
  project: (value: T, index: number) => R
): Operator<T, R> {
  return createStatefulOperator<T, R, { index: number }>({
    name: "map",
    createState: () => ({ index: 0 }),
    transform(chunk, state, downstream) {
      downstream.next(project(chunk, state.index++));
    },
  });
}

/**
 * Keeps values that pass the test.
 *
 * ```ts
 * pipe(of(1, 2, 3, 4), filter(n => n > 2))  // 3, 4
 * ```
 */
export function filter<T, S extends T>(predicate: (value: T, index: number) => value is S): Operator<T, S>;
export function filter<T>(predicate: (value: T, index: number) => boolean): Operator<T, T>;
export function filter<T>(
  predicate: (value: T, index: number) => boolean,
): Operator<T, T> {
  return createStatefulOperator<T, T, { index: number }>({
    name: "filter",
    createState: () => ({ index: 0 }),
    transform(chunk, state, downstream) {
      if (predicate(chunk, state.index++)) downstream.next(chunk);
    },
  });
}

/**
 * Takes the first `count` values, then completes and unsubscribes from the
 * source.
 *
 * ```ts
 * pipe(interval, take(3))  // 0, 1, 2, complete
 * ```
 */
export function take<T>(count: number): Operator<T, T> {
  return createStatefulOperator<T, T, { taken: number }>({
    name: "take",
    createState: () => ({ taken: 0 }),
    start(_, downstream) {
      if (count <= 0) downstream.complete();
    },
    transform(chunk, state, downstream) {
      if (state.taken >= count) return;
      state.taken++;
      downstream.next(chunk);
      if (state.taken >= count) downstream.complete();
    },
  });
}

/**
 * Skips the first `count` values.
 *
 * ```ts
 * pipe(of(1, 2, 3, 4), drop(2))  // 3, 4
 * ```
 */
export function drop<T>(count: number): Operator<T, T> {
  return createStatefulOperator<T, T, { dropped: number }>({
    name: "drop",
    createState: () => ({ dropped: 0 }),
    transform(chunk, state, downstream) {
      if (state.dropped < count) {
        state.dropped++;
        return;
      }
      downstream.next(chunk);
    },
  });
}

/**
 * Runs a side effect for each value and passes the value on unchanged.
 *
 * ```ts
 * pipe(of(1, 2), tap(n => console.log('saw', n)))  // 1, 2
 * ```
 */
export function tap<T>(fn: (value: T) => void): Operator<T, T> {
  return createOperator<T, T>({
    name: "tap",
    transform(chunk, downstream) {
      fn(chunk);
      downstream.next(chunk);
    },
  });
}

/**
 * Emits every intermediate result of a running reduction.
 *
 * ```ts
 * pipe(of(1, 2, 3), scan((sum, n) => sum + n, 0))  // 1, 3, 6
 * ```
 *
 * @param accumulator - Combines the previous result with the next value
 * @param seed - Initial result
 */
export function scan<T, R>(
  accumulator: (acc: R, value: T, index: number) => R,
  seed: R
): Operator<T, R> {
  return createStatefulOperator<T, R, { acc: R; index: number }>({
    name: "scan",
    createState: () => ({ acc: seed, index: 0 }),
    transform(chunk, state, downstream) {
      state.acc = accumulator(state.acc, chunk, state.index++);
      downstream.next(state.acc);
    },
  });
}

/**
 * Pairs each value with its one-based position.
 *
 * ```ts
 * pipe(of(3, 2, 1), enumerate())  // [3, 1], [2, 2], [1, 3]
 * ```
 */
export function enumerate<T>(): Operator<T, [T, number]> {
  return createStatefulOperator<T, [T, number], { position: number }>({
    name: "enumerate",
    createState: () => ({ position: 0 }),
    transform(chunk, state, downstream) {
      downstream.next([chunk, ++state.position]);
    },
  });
}

/**
 * Upper-cases every string. Declares `string` on both sides, so it refuses a
 * source declared with another element type as soon as it is applied.
 */
export function uppercase(): Operator<string, string> {
  return createOperator<string, string>({
    name: "uppercase",
    input: Types.string,
    output: Types.string,
    transform(chunk, downstream) {
      downstream.next(chunk.toUpperCase());
    },
  });
}
