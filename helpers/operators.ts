/**
 * Operators are the building blocks of Observable pipelines.
 *
 * If you've ever used `Array.map` or `Array.filter`, you already know the core
 * idea: an **operator** takes a sequence of values and transforms, filters, or
 * combines them into a new sequence, except here the values arrive over time.
 *
 * ```ts
 * // Double every number in a stream
 * const double = createOperator<number, number>({
 *   name: "double",
 *   transform(chunk, downstream) {
 *     downstream.next(chunk * 2);
 *   }
 * });
 *
 * // Only allow even numbers through
 * const evens = createOperator<number, number>({
 *   name: "evens",
 *   transform(chunk, downstream) {
 *     if (chunk % 2 === 0) downstream.next(chunk);
 *   }
 * });
 *
 * pipe(of(1, 2, 3, 4), double, evens).subscribe(keep()); // 2, 4, 6, 8
 * ```
 *
 * Both factories build on {@link operator}: the transform runs inside an actor
 * wrapped around the downstream subscriber, so a chain of operators delivers
 * each value in a single call stack.
 *
 * ## Error Handling
 *
 * A transform callback can fail. The operator's `errorMode` decides what
 * happens next:
 * - `"throw"` (default): the stream stops with one `ObservableError` that names
 *   the operator and carries the value being processed.
 * - `"ignore"`: the failing value is skipped. The stream keeps going.
 * - `"manual"`: you handle errors yourself. An exception you let escape ends the
 *   stream unwrapped.
 *
 * Errors from upstream are forwarded unchanged in every mode. Contract
 * violations are never caught.
 *
 * ## Stateful Operators
 *
 * `createStatefulOperator` gives each subscription its own state:
 *
 * ```ts
 * const runningSum = createStatefulOperator<number, number, { sum: number }>({
 *   name: "runningSum",
 *   createState: () => ({ sum: 0 }),
 *   transform(chunk, state, downstream) {
 *     state.sum += chunk;
 *     downstream.next(state.sum);
 *   }
 * });
 *
 * pipe(of(1, 2, 3), runningSum).subscribe(keep()); // 1, 3, 6
 * ```
 *
 * @module
 */

import type { Actor } from "../_types.ts";
import type { Subscriber } from "../observable.ts";
import type {
  Operator,
  OperatorErrorMode,
  StatefulTransformFunctionOptions,
  TransformFunctionOptions,
} from "./_types.ts";

import { ObservableError, isContractViolation } from "../error.ts";
import { operator } from "../proxy.ts";
import { Symbol } from "../symbol.ts";

/**
 * Creates a stateless operator.
 *
 * @example
 * ```ts
 * // Stream stops with an ObservableError if JSON.parse throws
 * const parse = createOperator<string, unknown>({
 *   name: 'parse',
 *   transform(chunk, downstream) {
 *     downstream.next(JSON.parse(chunk));
 *   }
 * });
 *
 * // Malformed lines are skipped
 * const lenientParse = createOperator<string, unknown>({
 *   name: 'lenientParse',
 *   errorMode: 'ignore',
 *   transform(chunk, downstream) {
 *     downstream.next(JSON.parse(chunk));
 *   }
 * });
 * ```
 */
export function createOperator<T, R>(options: TransformFunctionOptions<T, R>): Operator<T, R> {
  const { transform, flush, start, cancel } = options;
  return createStatefulOperator<T, R, undefined>({
    name: options.name,
    errorMode: options.errorMode,
    input: options.input,
    output: options.output,
    createState: () => undefined,
    transform: (chunk, _, downstream) => transform(chunk, downstream),
    flush: flush && ((_, downstream) => flush(downstream)),
    start: start && ((_, downstream) => start(downstream)),
    cancel: cancel && (() => cancel()),
  });
}

/**
 * Creates an operator whose callbacks share a state object created for each
 * subscription.
 *
 * @example
 * ```ts
 * // Emits [previous, current] pairs
 * const pairwise = <T>() => createStatefulOperator<T, [T, T], T[]>({
 *   name: 'pairwise',
 *   createState: () => [],
 *   transform(chunk, last, downstream) {
 *     if (last.length > 0) downstream.next([last[0], chunk]);
 *     last[0] = chunk;
 *   }
 * });
 * ```
 */
export function createStatefulOperator<T, R, S>(
  options: StatefulTransformFunctionOptions<T, R, S>
): Operator<T, R> {
  const operatorName = `operator:${options.name || 'unknown'}`;
  const errorMode = options.errorMode ?? "throw";

  // Extract only what we need to avoid retaining the full options object
  const { createState, transform, flush, start, cancel } = options;

  return operator<T, R>({
    name: operatorName,
    input: options.input,
    output: options.output,
    actor: (downstream) => {
      const state = createState();
      const fail = handleError(errorMode, operatorName, downstream);

      start?.(state, downstream);

      const actor: Actor<T> = {
        next(chunk) {
          try {
            transform(chunk, state, downstream);
          } catch (err) {
            fail(err, chunk);
          }
        },
        error(err) {
          downstream.error(err);
        },
        complete() {
          if (flush) {
            try {
              flush(state, downstream);
            } catch (err) {
              fail(err);
            }
          }
          downstream.complete();
        },
      };

      if (!cancel) return actor;
      let cancelled = false;
      return Object.assign(actor, {
        [Symbol.dispose]() {
          if (cancelled) return;
          cancelled = true;
          cancel(state);
        },
      });
    },
  });
}

/**
 * Resolves, once per subscription, how a failing callback is handled.
 *
 * @internal
 */
export function handleError<R>(
  errorMode: OperatorErrorMode,
  operatorName: string,
  downstream: Subscriber<R>,
): (err: unknown, chunk?: unknown) => void {
  switch (errorMode) {
    case "ignore":
      return (err) => {
        if (isContractViolation(err)) throw err;
      };

    case "manual":
      return (err) => {
        if (isContractViolation(err)) throw err;
        downstream.error(err);
      };

    case "throw":
    default:
      return (err, chunk) => {
        if (isContractViolation(err)) throw err;
        downstream.error(ObservableError.from(err, operatorName, chunk));
      };
  }
}
