// helpers/combination.ts
// Creation functions that combine the latest values of several Observables

import type { Subscription } from "../_types.ts";
import type { ElementType } from "../contract.ts";
import type { ObservableInput } from "../observable.ts";

import { ObservableError, isContractViolation } from "../error.ts";
import { Observable, from } from "../observable.ts";

export interface LatestOptions<R> {
  /** Declared element type of the combined values */
  type?: ElementType<R>;
}

/**
 * Emits the latest value of every source, as an array, each time all of them
 * have produced a new value.
 *
 * A source that has completed counts as updated, so the remaining sources keep
 * driving emissions. The result completes when every source has completed, or
 * as soon as one completes without ever producing a value. The first error
 * cancels the other sources and ends the result.
 *
 * @example
 * ```ts
 * collectLatest([of(1), from([1, 2])]).subscribe(keep());
 * // [1, 1], [1, 2], complete
 * ```
 *
 * @example With a mapping
 * ```ts
 * collectLatest([width, height], ([w, h]) => w * h); // area
 * ```
 *
 * @param sources - Fixed set of sources, subscribed in order
 * @param mapping - Builds the emitted value from a copy of the latest values
 */
export function collectLatest<T>(sources: readonly ObservableInput<T>[]): Observable<T[]>;
export function collectLatest<T, R>(
  sources: readonly ObservableInput<T>[],
  mapping: (values: T[]) => R,
  options?: LatestOptions<R>,
): Observable<R>;
export function collectLatest<T, R>(
  sources: readonly ObservableInput<T>[],
  mapping?: (values: T[]) => R,
  options?: LatestOptions<R>,
): Observable<R> | Observable<T[]> {
  if (!mapping) return latest('collectLatest', sources, copy, true);
  return latest('collectLatest', sources, mapping, true, options?.type);
}

/**
 * Emits the latest value of every source, as an array, each time any source
 * produces a value, once all of them have produced at least one.
 *
 * Completion and errors follow {@link collectLatest}.
 *
 * @example
 * ```ts
 * combineLatest([of(1, 2), of(10)]).subscribe(keep());
 * // [2, 10], complete
 * ```
 */
export function combineLatest<T>(sources: readonly ObservableInput<T>[]): Observable<T[]>;
export function combineLatest<T, R>(
  sources: readonly ObservableInput<T>[],
  mapping: (values: T[]) => R,
  options?: LatestOptions<R>,
): Observable<R>;
export function combineLatest<T, R>(
  sources: readonly ObservableInput<T>[],
  mapping?: (values: T[]) => R,
  options?: LatestOptions<R>,
): Observable<R> | Observable<T[]> {
  if (!mapping) return latest('combineLatest', sources, copy, false);
  return latest('combineLatest', sources, mapping, false, options?.type);
}

function copy<T>(values: T[]): T[] {
  return values.slice();
}

/**
 * Slot bookkeeping shared by both combinators.
 *
 * @param waitForAll - Emit only once every live slot was updated since the
 * last emission, instead of on every update
 */
function latest<T, R>(
  name: string,
  sources: readonly ObservableInput<T>[],
  mapping: (values: T[]) => R,
  waitForAll: boolean,
  type?: ElementType<R>,
): Observable<R> {
  const inputs = sources.map(source => from(source));
  const operatorName = `operator:${name}`;

  return new Observable<R>(subscriber => {
    const size = inputs.length;
    if (size === 0) {
      subscriber.complete();
      return;
    }

    const values = new Array<T>(size);
    const hasValue = new Array<boolean>(size).fill(false);
    const updated = new Array<boolean>(size).fill(false);
    const completed = new Array<boolean>(size).fill(false);
    const subscriptions = new Array<Subscription | null>(size).fill(null);
    let disposed = false;

    const dispose = () => {
      if (disposed) return;
      disposed = true;
      completed.fill(true);
      for (const subscription of subscriptions) subscription?.unsubscribe();
    };

    const onNext = (index: number, value: T) => {
      if (disposed) return;
      values[index] = value;
      hasValue[index] = true;
      updated[index] = true;

      const ready = waitForAll ? updated.every(Boolean) : hasValue.every(Boolean);
      if (!ready || completed.every(Boolean)) return;
      if (waitForAll) {
        for (let i = 0; i < size; i++) updated[i] = completed[i];
      }

      let result: R;
      try {
        result = mapping(values.slice());
      } catch (err) {
        if (isContractViolation(err)) throw err;
        dispose();
        subscriber.error(ObservableError.from(err, operatorName, values.slice()));
        return;
      }
      subscriber.next(result);
    };

    const onError = (index: number, err: unknown) => {
      if (disposed || completed[index]) return;
      dispose();
      subscriber.error(err);
    };

    const onComplete = (index: number) => {
      if (disposed) return;
      completed[index] = true;
      if (hasValue[index]) updated[index] = true;

      if (completed.every(Boolean) || !hasValue[index]) {
        dispose();
        subscriber.complete();
      }
    };

    for (let index = 0; index < size && !disposed; index++) {
      const slot = index;
      const subscription = inputs[slot].subscribe({
        next: value => onNext(slot, value),
        error: err => onError(slot, err),
        complete: () => onComplete(slot),
      });
      subscriptions[slot] = subscription;
      if (disposed) subscription.unsubscribe();
    }

    return dispose;
  }, { type });
}
