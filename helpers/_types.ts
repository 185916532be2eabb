import type { ElementType } from "../contract.ts";
import type { Observable, Subscriber } from "../observable.ts";

/**
 * A pure transformation from one Observable to another.
 * Operators hold no per-subscription state; that is created each time the
 * resulting Observable is subscribed.
 */
export type Operator<In, Out> = (source: Observable<In>) => Observable<Out>;

/**
 * How an operator reacts when its transform callback throws.
 *
 * - `"throw"` (default): the stream ends with one `ObservableError` naming
 *   the operator and the value being processed.
 * - `"ignore"`: the failing value is dropped and the stream continues.
 * - `"manual"`: nothing is wrapped; the raw exception ends the stream.
 */
export type OperatorErrorMode = "throw" | "ignore" | "manual";

/**
 * Base interface with properties shared across all transform options
 */
export interface BaseTransformOptions<T, R> {
  /**
   * Optional name for the operator (used in error reporting)
   */
  name?: string;

  /** @default "throw" */
  errorMode?: OperatorErrorMode;

  /** Declared element type accepted from upstream, checked when the operator is applied. */
  input?: ElementType<T>;

  /** Declared element type of the resulting Observable. */
  output?: ElementType<R>;
}

/**
 * Options for custom transformation logic
 */
export interface TransformFunctionOptions<T, R> extends BaseTransformOptions<T, R> {
  /**
   * Called for every value from upstream.
   * @param chunk - The input value
   * @param downstream - The subscriber to forward results to
   */
  transform: (chunk: T, downstream: Subscriber<R>) => void;

  /**
   * Called when upstream completes, before completion is forwarded.
   * Can emit final values.
   */
  flush?: (downstream: Subscriber<R>) => void;

  /**
   * Called once per subscription, before any value arrives.
   */
  start?: (downstream: Subscriber<R>) => void;

  /**
   * Called once when the subscription ends, whether it completed, errored or
   * was unsubscribed.
   */
  cancel?: () => void;
}

/**
 * Options for stateful transformation logic
 */
export interface StatefulTransformFunctionOptions<T, R, S> extends BaseTransformOptions<T, R> {
  /**
   * Creates the state of one subscription.
   */
  createState: () => S;

  /**
   * Called for every value from upstream, with access to the current state.
   */
  transform: (chunk: T, state: S, downstream: Subscriber<R>) => void;

  /**
   * Called when upstream completes. Can emit final values based on the state.
   */
  flush?: (state: S, downstream: Subscriber<R>) => void;

  /**
   * Called once per subscription, before any value arrives.
   */
  start?: (state: S, downstream: Subscriber<R>) => void;

  /**
   * Called once when the subscription ends, with the final state.
   */
  cancel?: (state: S) => void;
}
