// helpers/lazy.ts
/**
 * An Observable whose real source is provided after subscribers arrive.
 *
 * @example
 * ```ts
 * const prices = lazy<number>();
 *
 * prices.subscribe(keep()); // waits
 * prices.set(feed);         // the subscriber now follows `feed`
 * ```
 *
 * @module
 */
import type { ObservableInput, ObservableOptions } from "../observable.ts";

import { assertAssignable } from "../contract.ts";
import { Observable, from } from "../observable.ts";
import { ReplaySubject } from "../subject.ts";
import { switchAll } from "./operations/combination.ts";

export class LazyObservable<T> extends Observable<T> {
  /** Holds the source once set, for current and future subscribers */
  #source = new ReplaySubject<ObservableInput<T>>(1);

  constructor(opts?: ObservableOptions<T>) {
    super(subscriber => {
      const follow = switchAll<T>({ type: this.type });
      return follow(this.#source).subscribe(subscriber, { signal: subscriber.signal });
    }, opts);
  }

  /** Whether {@link set} has been called. */
  get ready(): boolean {
    return this.#source.closed;
  }

  /**
   * Provides the real source. Subscribers waiting for it subscribe now; later
   * subscribers subscribe on arrival.
   *
   * @throws {InvalidObservableError} When `source` is not something
   * {@link from} accepts.
   * @throws {InconsistentDataTypeError} When `source` and this Observable
   * declare different element types.
   * @throws {Error} When a source has already been set.
   */
  set(source: ObservableInput<T>): void {
    if (this.ready) throw new Error('LazyObservable source is already set');

    const observable = from(source);
    assertAssignable(observable.type, this.type, 'lazy');

    this.#source.next(observable);
    this.#source.complete();
  }
}

/**
 * Creates a {@link LazyObservable}.
 *
 * @example
 * ```ts
 * const numbers = lazy<number>({ type: Types.number });
 * numbers.set(of(1, 2, 3));
 * ```
 */
export function lazy<T>(opts?: ObservableOptions<T>): LazyObservable<T> {
  return new LazyObservable<T>(opts);
}
