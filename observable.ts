// @filename: observable.ts
/**
 * The Observable core: a **push-based source** that begins delivering once an
 * actor subscribes, and stops once the returned {@link Subscription} is
 * disposed or a terminal event has been delivered.
 *
 * ## Lifecycle
 *
 * ```text
 * subscribe(actor)
 *   classify(actor) ── invalid ──> throws InvalidActorError (nothing runs)
 *   compare declared element types ── mismatch ──> throws InconsistentDataTypeError
 *   actor.start(subscription)
 *   subscribe behavior(subscriber) ──> teardown kept until the subscription closes
 * ```
 *
 * ## Error Propagation Policy
 * 1. **Stream errors** – `subscriber.error(err)` delivers `err` to the actor's
 *    error handler. An actor without one still counts as having received it.
 * 2. **Handler failures** – An exception thrown inside the actor's `next()` or
 *    `complete()` is routed to its `error()` handler and closes the
 *    subscription. With no error handler it is reported to the host.
 * 3. **Contract violations** – Never turned into stream errors. They abort the
 *    `subscribe` or delivery call that detected them.
 * 4. **A throwing subscribe behavior** – Delivered as a stream error.
 *
 * ## Edge-Cases & Gotchas
 * - A subscribe behavior may call `complete()`/`error()` synchronously and
 *   still have its teardown run: the teardown returned afterwards is executed
 *   immediately.
 * - Subscribing twice to a cold observable runs its behavior twice.
 * - `subscriber.signal` aborts once the subscription closes. Sources that loop
 *   synchronously should check `subscriber.closed`; upstreams subscribed with
 *   `{ signal: subscriber.signal }` stop on their own.
 *
 * @example
 * ```ts
 * const ticks = new Observable<number>(subscriber => {
 *   let n = 0;
 *   const id = setInterval(() => subscriber.next(n++), 1000);
 *   return () => clearInterval(id);
 * });
 *
 * const sub = ticks.subscribe(actor({ next: n => console.log(n) }));
 * setTimeout(() => sub.unsubscribe(), 3500); // 0, 1, 2
 * ```
 *
 * @example Async iteration
 * ```ts
 * for await (const value of of(1, 2, 3)) {
 *   console.log(value);
 * }
 * ```
 *
 * @module
 */
import type { ObservableProtocol, SpecObservable, SpecObserver } from "./_spec.ts";
import type { Actor, Subscription } from "./_types.ts";
import type { ElementType, ValidContract } from "./contract.ts";
import type { SubscribeOptions, SubscriptionState, Teardown } from "./subscription.ts";

import { ReadableStream, type QueuingStrategy } from "node:stream/web";
import { accepts, assertAssignable, assertElement, classify } from "./contract.ts";
import {
  InvalidActorError,
  InvalidObservableError,
  ObservableError,
  isContractViolation,
  reportError,
} from "./error.ts";
import {
  SubscriptionStateMap,
  cleanupSubscription,
  closeSubscription,
  createSubscription,
  isTeardown,
  signalOf,
  voidTeardown,
} from "./subscription.ts";
import { Symbol } from "./symbol.ts";

/** The behavior run for every subscription of an {@link Observable}. */
export type SubscribeFunction<T> = (subscriber: Subscriber<T>) => Teardown;

export interface ObservableOptions<T> {
  /** Declared element type, compared against the element type of every subscribing actor. */
  type?: ElementType<T>;
}

/**
 * Anything {@link from} turns into an {@link Observable}.
 */
export type ObservableInput<T> =
  | SpecObservable<T>
  | ObservableProtocol<T>
  | Iterable<T>
  | AsyncIterable<T>
  | PromiseLike<T>
  | ArrayLike<T>;

/**
 * The guarded sink a subscribe behavior delivers to.
 *
 * The actor's handlers are resolved once, from its classification: events the
 * actor does not accept are dropped without looking the handler up again.
 * After a terminal event, or once the subscription is disposed, every call is
 * a no-op.
 *
 * @typeParam T - The type of values delivered by the parent Observable.
 */
export class Subscriber<T> {
  #state: SubscriptionState | null;
  #subscription: Subscription | null;
  #stopped = false;

  readonly #type: ElementType<unknown> | undefined;
  readonly #next: ((value: T) => void) | null;
  readonly #error: ((err: unknown) => void) | null;
  readonly #complete: (() => void) | null;

  /**
   * @param subscription - The subscription this subscriber delivers for
   * @param actor - The receiving actor, already classified
   * @param contract - The actor's classification
   */
  constructor(subscription: Subscription, actor: Actor<T>, contract: ValidContract) {
    this.#subscription = subscription;
    this.#state = SubscriptionStateMap.get(subscription) ?? null;
    this.#type = contract.type;

    const { next, error, complete } = actor;
    this.#next = next && accepts(contract.kind, "next") ? next.bind(actor) : null;
    this.#error = error && accepts(contract.kind, "error") ? error.bind(actor) : null;
    this.#complete = complete && accepts(contract.kind, "complete") ? complete.bind(actor) : null;
  }

  /**
   * Whether further events are ignored.
   *
   * @example
   * ```ts
   * new Observable<number>(subscriber => {
   *   for (let i = 0; !subscriber.closed; i++) subscriber.next(i);
   * });
   * ```
   */
  get closed(): boolean {
    const state = this.#state;
    return this.#stopped || !state || state.closed;
  }

  /**
   * Aborts once this subscription closes. Pass it to upstream subscriptions,
   * timers and fetches owned by the subscribe behavior.
   */
  get signal(): AbortSignal {
    const subscription = this.#subscription;
    if (!subscription) return AbortSignal.abort();
    return signalOf(subscription, this.#state);
  }

  /**
   * Delivers the next value.
   *
   * @throws {InconsistentDataTypeError} When the actor declared an element
   * type and `value` does not satisfy it. The actor's handler is not called.
   */
  next(value: T): void {
    if (this.closed) return;
    if (this.#type) assertElement(this.#type, value, "next");

    const handler = this.#next;
    if (!handler) return;

    try {
      handler(value);
    } catch (err) {
      this.#fail(err);
    }
  }

  /** Delivers the terminal error, then closes the subscription. */
  error(err: unknown): void {
    if (this.closed) return;
    this.#stopped = true;

    const handler = this.#error;
    try {
      handler?.(err);
    } catch (innerErr) {
      this.#close();
      if (isContractViolation(innerErr)) throw innerErr;
      reportError(innerErr);
    }

    this.#close();
  }

  /**
   * Delivers the terminal completion, then closes the subscription. A
   * completion handler that throws is reported, never turned into an error
   * event.
   */
  complete(): void {
    if (this.closed) return;
    this.#stopped = true;

    const handler = this.#complete;
    try {
      handler?.();
    } catch (err) {
      this.#close();
      if (isContractViolation(err)) throw err;
      reportError(err);
    }

    this.#close();
  }

  /** A handler threw: route the failure to the actor's error handler. */
  #fail(err: unknown): void {
    this.#stopped = true;
    if (isContractViolation(err)) {
      this.#close();
      throw err;
    }

    const onError = this.#error;
    if (onError) {
      try {
        onError(err);
      } catch (innerErr) {
        this.#close();
        if (isContractViolation(innerErr)) throw innerErr;
        reportError(innerErr);
      }
    } else {
      reportError(err);
    }

    this.#close();
  }

  #close(): void {
    const subscription = this.#subscription;
    if (!subscription) return;
    this.#subscription = null;
    closeSubscription(subscription, this.#state);
  }

  get [Symbol.toStringTag](): "Subscriber" { return "Subscriber" as const; }
}

/**
 * Observable - a push-based stream of `T` values.
 *
 * Key guarantees:
 * 1. Lazy execution - nothing happens until `subscribe()` is called
 * 2. Each subscription runs the subscribe behavior independently
 * 3. Teardown runs exactly once, when the subscription closes
 * 4. Delivery order is the order the behavior hands values to its subscriber
 *
 * @typeParam T - Type of values emitted by this Observable
 */
export class Observable<T> implements AsyncIterable<T>, SpecObservable<T>, ObservableProtocol<T> {
  /** The subscribe behavior provided when the Observable was created */
  #subscribeFn: SubscribeFunction<T>;

  /** Declared element type, when there is one. */
  readonly type?: ElementType<T>;

  /**
   * @param subscribeFn - Runs on every subscription; returns the teardown
   * @param opts - Declared element type
   *
   * @example
   * ```ts
   * const numbers = new Observable<number>(subscriber => {
   *   subscriber.next(1);
   *   subscriber.complete();
   * }, { type: Types.number });
   * ```
   */
  constructor(subscribeFn: SubscribeFunction<T>, opts?: ObservableOptions<T>) {
    if (typeof subscribeFn !== 'function') {
      throw new InvalidObservableError(subscribeFn, 'subscribe behavior must be a function');
    }

    this.#subscribeFn = subscribeFn;
    this.type = opts?.type;
  }

  /** Returns this Observable (required for interoperability). */
  [Symbol.observable](): Observable<T> { return this; }

  /**
   * Subscribes an actor.
   *
   * @param actor - Receiver of the events
   * @param opts.signal - Closes the subscription when aborted
   * @returns The handle that cancels delivery
   *
   * @throws {InvalidActorError} When `actor` cannot act as an actor. Neither
   * `actor.start` nor the subscribe behavior runs.
   * @throws {InconsistentDataTypeError} When this observable and the actor
   * declare different element types.
   */
  subscribe(actor: Actor<T>, opts?: SubscribeOptions): Subscription;

  /**
   * Subscribes with callback functions.
   *
   * @example
   * ```ts
   * of(1, 2, 3).subscribe(
   *   value => console.log(value),
   *   err => console.error(err),
   *   () => console.log('done')
   * );
   * ```
   */
  subscribe(
    next: (value: T) => void,
    error?: (e: unknown) => void,
    complete?: () => void,
    opts?: SubscribeOptions,
  ): Subscription;

  subscribe(
    actorOrNext: Actor<T> | ((value: T) => void),
    errorOrOpts?: ((e: unknown) => void) | SubscribeOptions,
    complete?: () => void,
    _opts?: SubscribeOptions,
  ): Subscription {
    const callbacks = typeof actorOrNext === 'function';
    const actor: Actor<T> = callbacks
      ? { next: actorOrNext, error: typeof errorOrOpts === 'function' ? errorOrOpts : undefined, complete }
      : actorOrNext;
    const opts = callbacks ? _opts : (typeof errorOrOpts === 'object' ? errorOrOpts : undefined);

    const contract = classify(actor);
    if (contract.kind === 'invalid') {
      throw new InvalidActorError(actor, contract.reason);
    }
    assertAssignable(this.type, contract.type, 'subscribe');

    const subscription = createSubscription(opts);
    if (subscription.closed) return subscription;

    const subscriber = new Subscriber<T>(subscription, actor, contract);

    try {
      actor.start?.(subscription);
      if (subscription.closed) return subscription;
    } catch (err) {
      subscription.unsubscribe();
      if (isContractViolation(err)) throw err;
      reportError(err);
      return subscription;
    }

    try {
      const subscribeFn = this.#subscribeFn;
      const cleanup = subscribeFn(subscriber);

      if (!isTeardown(cleanup)) {
        throw new InvalidObservableError(this,
          'subscribe behavior must return a function, an unsubscribe object, a disposable, or nothing');
      }

      // complete()/error() may already have closed the subscription
      const state = SubscriptionStateMap.get(subscription);
      if (subscription.closed || !state) cleanupSubscription(cleanup);
      else state.cleanup = cleanup;
    } catch (err) {
      if (isContractViolation(err)) {
        subscription.unsubscribe();
        throw err;
      }
      subscriber.error(err);
    }

    return subscription;
  }

  /**
   * Enables `for await ... of observable`, buffering up to 64 values.
   */
  async *[Symbol.asyncIterator](): AsyncIterator<T> { yield* pull(this); }

  /**
   * Converts this Observable into an AsyncGenerator with backpressure control.
   *
   * @param opts.strategy.highWaterMark - Max items to buffer (default: 64)
   * @param opts.throwError - Throw stream errors instead of yielding them (default: true)
   */
  pull(opts?: PullOptions<T> & { throwError?: true }): AsyncGenerator<T>;
  pull(opts: PullOptions<T> & { throwError: false }): AsyncGenerator<T | ObservableError>;
  pull(opts?: PullOptions<T>): AsyncGenerator<T | ObservableError> {
    return pull(this, opts);
  }

  static readonly from: typeof from = from;
  static readonly of: typeof of = of;
  static readonly pull: typeof pull = pull;

  get [Symbol.toStringTag](): "Observable" { return "Observable"; }
}

/**
 * Subscribes `actor` to any source {@link from} accepts.
 *
 * @example
 * ```ts
 * const values = keep<number>();
 * subscribe([1, 2, 3], values);
 * values.values; // [1, 2, 3]
 * ```
 */
export function subscribe<T>(source: ObservableInput<T>, actor: Actor<T>, opts?: SubscribeOptions): Subscription {
  return from(source).subscribe(actor, opts);
}

function EMPTY(subscriber: Subscriber<never>) { subscriber.complete(); }

/**
 * Creates an Observable that synchronously emits the given values then completes.
 *
 * @example
 * ```ts
 * of(1, 2, 3).subscribe(actor({
 *   next: x => console.log(x),
 *   complete: () => console.log('Done!')
 * }));
 * // 1, 2, 3, Done!
 * ```
 */
export function of<T>(...items: T[]): Observable<T> {
  if (items.length === 0) return new Observable<T>(EMPTY);

  return new Observable<T>(subscriber => {
    for (const item of items) {
      subscriber.next(item);
      if (subscriber.closed) return;
    }
    subscriber.complete();
  });
}

/** An Observable that completes as soon as it is subscribed. */
export function completed<T = never>(): Observable<T> {
  return new Observable<T>(EMPTY);
}

/** An Observable that errors with `error` as soon as it is subscribed. */
export function faulted<T = never>(error: unknown): Observable<T> {
  return new Observable<T>(subscriber => subscriber.error(error));
}

/** An Observable that never emits and never terminates. */
export function never<T = never>(): Observable<T> {
  return new Observable<T>(() => voidTeardown);
}

/**
 * Converts an array, iterable, async iterable, promise, or interop object to
 * an Observable.
 *
 * - Observables of this library are returned unchanged.
 * - Arrays and array-likes emit every element synchronously, then complete.
 * - Iterables are iterated synchronously; an unsubscribing actor closes the
 *   iterator.
 * - Promises emit their resolved value then complete, or error.
 * - Async iterables emit as values arrive; unsubscribing calls `return()`.
 * - Objects with `[Symbol.observable]()` delegate to what it returns.
 *
 * @throws {InvalidObservableError} When `input` is none of the above.
 *
 * @example
 * ```ts
 * from(Promise.resolve("result")).subscribe(actor({
 *   next: val => console.log(val) // "result"
 * }));
 * ```
 */
export function from<T>(input: ObservableInput<T>): Observable<T> {
  if (input === null || input === undefined) {
    throw new InvalidObservableError(input, 'cannot convert undefined or null to Observable');
  }

  if (isObservable(input)) return input;

  // Interop object with @@observable
  if (hasInterop(input)) {
    const protocol = input[Symbol.observable]();
    if (!isProtocol<T>(protocol)) {
      throw new InvalidObservableError(protocol, 'object returned from [Symbol.observable]() does not implement subscribe');
    }
    if (isObservable(protocol)) return protocol;
    return fromProtocol(protocol);
  }

  if (isArrayLike(input)) {
    const arr = input;
    if (arr.length === 0) return new Observable<T>(EMPTY);

    return new Observable<T>(subscriber => {
      for (let i = 0, len = arr.length; i < len; i++) {
        subscriber.next(arr[i]);
        if (subscriber.closed) return;
      }
      subscriber.complete();
    });
  }

  if (isPromiseLike(input)) {
    const promise = input;
    return new Observable<T>(subscriber => {
      promise.then(
        value => settle(() => {
          subscriber.next(value);
          subscriber.complete();
        }),
        err => settle(() => subscriber.error(err)),
      );
    });
  }

  if (isIterable(input)) {
    const iterable = input;
    return new Observable<T>(subscriber => {
      const iterator = iterable[Symbol.iterator]();

      try {
        for (let step = iterator.next(); !step.done; step = iterator.next()) {
          subscriber.next(step.value);

          // Actor left mid-iteration
          if (subscriber.closed) {
            iterator.return?.();
            return;
          }
        }
      } catch (err) {
        if (isContractViolation(err)) {
          iterator.return?.();
          throw err;
        }
        subscriber.error(err);
        return;
      }

      subscriber.complete();
    });
  }

  if (isAsyncIterable(input)) {
    const iterable = input;
    return new Observable<T>(subscriber => {
      const iterator = iterable[Symbol.asyncIterator]();

      const drain = async () => {
        for (let step = await iterator.next(); !step.done; step = await iterator.next()) {
          if (subscriber.closed) return;
          subscriber.next(step.value);
          if (subscriber.closed) return;
        }
        subscriber.complete();
      };

      drain().catch(err => {
        if (isContractViolation(err)) reportError(err);
        else subscriber.error(err);
      });

      return () => {
        void iterator.return?.()?.then(undefined, reportError);
      };
    });
  }

  if (isProtocol<T>(input)) return fromProtocol(input);

  throw new InvalidObservableError(input, 'input is not an Observable, Iterable, AsyncIterable, or Promise');
}

function fromProtocol<T>(protocol: ObservableProtocol<T>): Observable<T> {
  return new Observable<T>(subscriber => {
    const sink: SpecObserver<T> = {
      next: value => subscriber.next(value),
      error: err => subscriber.error(err),
      complete: () => subscriber.complete(),
    };
    const sub = protocol.subscribe(sink);
    return () => sub.unsubscribe();
  });
}

/** Runs a delivery outside any caller that could receive its failure. */
function settle(deliver: () => void): void {
  try {
    deliver();
  } catch (err) {
    reportError(err);
  }
}

export interface PullOptions<T> {
  strategy?: QueuingStrategy<T | ObservableError>;
  throwError?: boolean;
}

/**
 * Converts an Observable into an AsyncGenerator with backpressure control.
 *
 * Observable → ReadableStream (for buffering) → AsyncGenerator
 *
 * Errors are wrapped in `ObservableError` objects and sent through the value
 * channel, so every value emitted before an error is yielded before the error
 * is thrown. With `throwError: false` the error is yielded instead.
 *
 * @param observable - Source to pull values from
 * @param opts.strategy.highWaterMark - Buffer size before backpressure (default: 64)
 *
 * @example
 * ```ts
 * for await (const n of pull(numbers, { strategy: { highWaterMark: 5 } })) {
 *   await slowOperation(n);
 * }
 * ```
 */
export function pull<T>(
  observable: SpecObservable<T>,
  opts?: PullOptions<T> & { throwError?: true },
): AsyncGenerator<T>;
export function pull<T>(
  observable: SpecObservable<T>,
  opts: PullOptions<T> & { throwError: false },
): AsyncGenerator<T | ObservableError>;
export function pull<T>(
  observable: SpecObservable<T>,
  opts?: PullOptions<T>,
): AsyncGenerator<T | ObservableError>;
export async function* pull<T>(
  observable: SpecObservable<T>,
  { strategy = { highWaterMark: 64 }, throwError = true }: PullOptions<T> = {},
): AsyncGenerator<T | ObservableError> {
  const source = from(observable);
  let sub: Subscription | null = null;

  const stream = new ReadableStream<T | ObservableError>({
    start: ctrl => {
      sub = source.subscribe({
        next: v => ctrl.enqueue(v),

        // Wrapped as a value so values emitted before the error drain first
        error: e => { ctrl.enqueue(ObservableError.from(e, "observable:pull")); ctrl.close(); },

        complete: () => ctrl.close(),
      });
    },

    cancel: () => { sub?.unsubscribe(); sub = null },
  }, strategy);

  const reader = stream.getReader();

  try {
    while (true) {
      const { value, done } = await reader.read();
      if (done) break;
      if (throwError && value instanceof ObservableError) throw value;
      yield value;
    }
  } finally {
    reader.releaseLock();
    await stream.cancel();
  }
}

function isObservable<T>(value: ObservableInput<T>): value is Observable<T> {
  return value instanceof Observable;
}

function isProtocol<T>(value: unknown): value is ObservableProtocol<T> {
  return typeof value === "object" && value !== null &&
    "subscribe" in value && typeof value.subscribe === "function";
}

function hasInterop<T>(value: ObservableInput<T>): value is SpecObservable<T> {
  return typeof Reflect.get(Object(value), Symbol.observable) === "function";
}

function isArrayLike<T>(value: ObservableInput<T>): value is ArrayLike<T> {
  return typeof value === "object" && value !== null &&
    "length" in value && typeof value.length === "number";
}

function isPromiseLike<T>(value: ObservableInput<T>): value is PromiseLike<T> {
  return typeof Reflect.get(Object(value), "then") === "function";
}

function isIterable<T>(value: ObservableInput<T>): value is Iterable<T> {
  return typeof Reflect.get(Object(value), Symbol.iterator) === "function";
}

function isAsyncIterable<T>(value: ObservableInput<T>): value is AsyncIterable<T> {
  return typeof Reflect.get(Object(value), Symbol.asyncIterator) === "function";
}
