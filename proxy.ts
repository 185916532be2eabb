// @filename: proxy.ts
/**
 * The composition engine behind every operator.
 *
 * A **proxy descriptor** is a recipe with up to two wrapping functions:
 *
 * - `actor` wraps the downstream subscriber into the actor subscribed upstream.
 *   Value-transforming operators (map, filter, scan...) are only this.
 * - `source` wraps the upstream Observable into one that runs extra machinery
 *   (workers, timers, inner subscriptions) before or while delivering.
 *
 * Applying a descriptor creates no per-subscription state. Each subscription
 * then runs two steps, in order:
 *
 * 1. wrap the downstream subscriber (when `actor` is defined);
 * 2. subscribe the (possibly wrapped) source with the (possibly wrapped) actor.
 *
 * Values travel through every wrapped actor of a chain in one call stack; no
 * intermediate sequence is ever materialized.
 *
 * @example
 * ```ts
 * const double = operator<number, number>({
 *   name: "double",
 *   actor: downstream => ({
 *     next: value => downstream.next(value * 2),
 *     error: err => downstream.error(err),
 *     complete: () => downstream.complete(),
 *   }),
 * });
 *
 * double(of(1, 2, 3)).subscribe(keep()); // 2, 4, 6
 * ```
 *
 * @module
 */
import type { Actor } from "./_types.ts";
import type { ElementType } from "./contract.ts";
import type { Operator } from "./helpers/_types.ts";
import type { ObservableInput, Subscriber } from "./observable.ts";

import { assertAssignable } from "./contract.ts";
import { Observable, from } from "./observable.ts";
import { compose, isDisposable } from "./subscription.ts";

interface ProxyTypes<T, R> {
  /** Name used in contract violation messages and operator errors. */
  readonly name: string;

  /** Element type this stage accepts; compared with the upstream's declared type. */
  readonly input?: ElementType<T>;

  /** Element type of the resulting Observable. */
  readonly output?: ElementType<R>;
}

/**
 * A descriptor that wraps the downstream actor, and optionally the source.
 *
 * @remarks
 * An actor returned by `actor` that is `Disposable` is disposed when the
 * subscription closes, before the upstream subscription is.
 */
export interface ActorProxy<T, R> extends ProxyTypes<T, R> {
  readonly actor: (downstream: Subscriber<R>) => Actor<T>;
  readonly source?: (source: Observable<T>) => Observable<T>;
}

/** A descriptor that only wraps the source. */
export interface SourceProxy<T, R> extends ProxyTypes<T, R> {
  readonly actor?: undefined;
  readonly source: (source: Observable<T>) => Observable<R>;
}

export type ProxyDescriptor<T, R> = ActorProxy<T, R> | SourceProxy<T, R>;

/**
 * Applies a descriptor to a source.
 *
 * @throws {InconsistentDataTypeError} When the source and the descriptor
 * declare different element types.
 */
export function proxy<T, R>(source: ObservableInput<T>, descriptor: ProxyDescriptor<T, R>): Observable<R> {
  const upstream = from(source);
  const { name, input, output } = descriptor;
  assertAssignable(upstream.type, input, name);

  if (descriptor.actor === undefined) {
    const proxied = descriptor.source(upstream);
    if (!output) return proxied;
    assertAssignable(proxied.type, output, name);

    return new Observable<R>(
      subscriber => proxied.subscribe(subscriber, { signal: subscriber.signal }),
      { type: output },
    );
  }

  const wrapActor = descriptor.actor;
  const wrapped = descriptor.source ? descriptor.source(upstream) : upstream;

  return new Observable<R>(subscriber => {
    const actor = wrapActor(subscriber);
    const subscription = wrapped.subscribe(actor, { signal: subscriber.signal });
    return isDisposable(actor) ? compose(actor, subscription) : subscription;
  }, { type: output });
}

/**
 * Turns a descriptor into an {@link Operator}.
 *
 * @example
 * ```ts
 * const evens = operator<number, number>({
 *   name: "evens",
 *   actor: downstream => ({
 *     next: value => { if (value % 2 === 0) downstream.next(value); },
 *     error: err => downstream.error(err),
 *     complete: () => downstream.complete(),
 *   }),
 * });
 * ```
 */
export function operator<T, R>(descriptor: ProxyDescriptor<T, R>): Operator<T, R> {
  return source => proxy(source, descriptor);
}
