// helpers/operations/combination.ts
// Operators that map each value to an inner Observable and flatten the results

import type { Operator } from "../_types.ts";
import type { Subscription } from "../../_types.ts";
import type { ElementType } from "../../contract.ts";
import type { ObservableInput, Subscriber } from "../../observable.ts";

import { assertAssignable } from "../../contract.ts";
import { ObservableError, isContractViolation } from "../../error.ts";
import { Observable, from } from "../../observable.ts";
import { operator } from "../../proxy.ts";
import { createQueue, dequeue, enqueue, clear } from "../../queue.ts";

/** Options shared by the flattening operators. */
export interface FlattenOptions<R> {
  /** Declared element type of the result; inner sources must match it */
  type?: ElementType<R>;
}

export interface MergeMapOptions<R> extends FlattenOptions<R> {
  /**
   * Most inner Observables subscribed at once. Values that arrive beyond it
   * wait, in order, for an inner to complete.
   * @defaultValue Infinity
   */
  concurrent?: number;
}

/**
 * Transforms each item into a new stream and merges their outputs, running
 * them in parallel.
 *
 * Like `Promise.all(items.map(project))` but for streams, with control over
 * concurrency.
 *
 * @example
 * ```ts
 * const ids = [1, 2, 3];
 *
 * // Promise.all behavior
 * const users = await Promise.all(ids.map(id => fetchUser(id)));
 *
 * // Stream behavior, two requests in flight at a time
 * pipe(
 *   from(ids),
 *   mergeMap(id => fetchUser(id), { concurrent: 2 })
 * );
 * ```
 *
 * ## Practical Use Case
 *
 * Use `mergeMap` to fetch data for multiple items concurrently, e.g. the
 * profile of every user ID in a stream.
 *
 * ## Key Insight
 *
 * The result completes once the source and every inner stream have
 * completed. The first error from any of them cancels everything else and
 * ends the result.
 *
 * @param project - Maps a source value and its index to an inner source
 */
export function mergeMap<T, R>(
  project: (value: T, index: number) => ObservableInput<R>,
  options: MergeMapOptions<R> = {},
): Operator<T, R> {
  const { concurrent = Infinity, type } = options;
  if (concurrent !== Infinity && (!Number.isInteger(concurrent) || concurrent < 1)) {
    throw new RangeError(`mergeMap concurrency must be a positive integer or Infinity, got ${concurrent}`);
  }

  const name = 'operator:mergeMap';

  return operator<T, R>({
    name,
    output: type,
    source: source => new Observable<R>(subscriber => {
      const inners = new Set<Subscription>();
      const waiting = createQueue<{ value: T }>(Infinity);
      let index = 0;
      let active = 0;
      let outerDone = false;

      const tryComplete = () => {
        if (outerDone && active === 0 && waiting.size === 0) subscriber.complete();
      };

      const run = (value: T) => {
        const inner = projectInner(project, value, index++, subscriber, name);
        if (!inner) return;
        assertAssignable(inner.type, type, name);

        active++;
        let done = false;
        let subscription: Subscription | null = null;

        subscription = inner.subscribe({
          next: result => subscriber.next(result),
          error: err => subscriber.error(err),
          complete: () => {
            done = true;
            active--;
            if (subscription) inners.delete(subscription);

            while (active < concurrent && !subscriber.closed) {
              const next = dequeue(waiting);
              if (!next) break;
              run(next.value);
            }
            tryComplete();
          },
        });

        if (!done && !subscription.closed) inners.add(subscription);
      };

      const outer = source.subscribe({
        next: value => {
          if (subscriber.closed) return;
          if (active < concurrent) run(value);
          else enqueue(waiting, { value });
        },
        error: err => subscriber.error(err),
        complete: () => {
          outerDone = true;
          tryComplete();
        },
      }, { signal: subscriber.signal });

      return () => {
        for (const inner of [...inners]) inner.unsubscribe();
        inners.clear();
        clear(waiting);
        outer.unsubscribe();
      };
    }),
  });
}

/**
 * Transforms each item into a new stream and runs them one after another, in
 * strict order.
 *
 * Like a series of `await` calls in a `for...of` loop: each inner stream
 * completes before the next one begins.
 *
 * @example
 * ```ts
 * pipe(
 *   from([1, 2, 3]),
 *   concatMap(id => of(`Step ${id}`))
 * ); // "Step 1", "Step 2", "Step 3"
 * ```
 *
 * ## Key Insight
 *
 * `concatMap` is `mergeMap` with a concurrency of one.
 */
export function concatMap<T, R>(
  project: (value: T, index: number) => ObservableInput<R>,
  options: FlattenOptions<R> = {},
): Operator<T, R> {
  return mergeMap(project, { ...options, concurrent: 1 });
}

/**
 * Flattens a stream of streams, subscribing to every inner stream as it
 * arrives.
 *
 * @example
 * ```ts
 * pipe(of(of(1, 2), of(3)), mergeAll()); // 1, 2, 3
 * ```
 */
export function mergeAll<T>(options: MergeMapOptions<T> = {}): Operator<ObservableInput<T>, T> {
  return mergeMap<ObservableInput<T>, T>(inner => inner, options);
}

/**
 * Transforms items into new streams, but cancels the previous stream when a new
 * item arrives.
 *
 * Like an auto-cancelling search input, it only cares about the latest value
 * and discards any pending work from previous values.
 *
 * @example
 * ```ts
 * pipe(
 *   queries,
 *   switchMap(query => search(query))
 * ); // only results for the latest query
 * ```
 *
 * ## Key Insight
 *
 * The previous inner stream is unsubscribed before the next one is
 * subscribed. Completion of the source waits for the active inner stream.
 */
export function switchMap<T, R>(
  project: (value: T, index: number) => ObservableInput<R>,
  options: FlattenOptions<R> = {},
): Operator<T, R> {
  const { type } = options;
  const name = 'operator:switchMap';

  return operator<T, R>({
    name,
    output: type,
    source: source => new Observable<R>(subscriber => {
      let current: Subscription | null = null;
      let generation = 0;
      let index = 0;
      let innerActive = false;
      let outerDone = false;

      const outer = source.subscribe({
        next: value => {
          const previous = current;
          current = null;
          innerActive = false;
          previous?.unsubscribe();
          if (subscriber.closed) return;

          const inner = projectInner(project, value, index++, subscriber, name);
          if (!inner) return;
          assertAssignable(inner.type, type, name);

          const id = ++generation;
          innerActive = true;
          const subscription = inner.subscribe({
            next: result => subscriber.next(result),
            error: err => subscriber.error(err),
            complete: () => {
              if (id !== generation) return;
              innerActive = false;
              current = null;
              if (outerDone) subscriber.complete();
            },
          });

          if (id === generation && innerActive) current = subscription;
        },
        error: err => subscriber.error(err),
        complete: () => {
          outerDone = true;
          if (!innerActive) subscriber.complete();
        },
      }, { signal: subscriber.signal });

      return () => {
        const active = current;
        current = null;
        active?.unsubscribe();
        outer.unsubscribe();
      };
    }),
  });
}

/**
 * Flattens a stream of streams, following only the latest inner stream.
 *
 * @example
 * ```ts
 * pipe(of(of(1, 2), of(3)), switchAll()); // 1, 2, 3
 * ```
 */
export function switchAll<T>(options: FlattenOptions<T> = {}): Operator<ObservableInput<T>, T> {
  return switchMap<ObservableInput<T>, T>(inner => inner, options);
}

/**
 * Calls `project` and converts its result. A failing call ends the stream with
 * an `ObservableError` and yields nothing.
 */
function projectInner<T, R>(
  project: (value: T, index: number) => ObservableInput<R>,
  value: T,
  index: number,
  subscriber: Subscriber<R>,
  name: string,
): Observable<R> | null {
  try {
    return from(project(value, index));
  } catch (err) {
    if (isContractViolation(err)) throw err;
    subscriber.error(ObservableError.from(err, name, value));
    return null;
  }
}
