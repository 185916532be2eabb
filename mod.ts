/**
 * # Push-based reactive streams
 *
 * An Observable is a source of values over time. Nothing runs until an
 * **actor** subscribes; the source then pushes `next` values, and at most one
 * terminal `error` or `complete`, to that actor.
 *
 * ```ts
 * import { of, keep, pipe, map, filter } from "./mod.ts";
 *
 * const result = keep<number>();
 *
 * pipe(
 *   of(1, 2, 3, 4),
 *   filter(n => n % 2 === 0),
 *   map(n => n * 10)
 * ).subscribe(result);
 *
 * result.values;    // [20, 40]
 * result.completed; // true
 * ```
 *
 * ## Actors
 *
 * Anything with `next`, `error` or `complete` methods can subscribe. An actor
 * with a single handler only receives that event; classes can declare their
 * kind and element type explicitly:
 *
 * ```ts
 * class Printer extends NextActor<string> {
 *   constructor() { super(Types.string); }
 *   next(line: string) { console.log(line); }
 * }
 *
 * of('a', 'b').subscribe(new Printer());
 * ```
 *
 * ## Element types
 *
 * Sources, operators and actors may declare an element type. Mismatches are
 * contract violations: they throw `InconsistentDataTypeError` when the
 * pipeline is wired, or when a value that breaks an actor's type is delivered.
 * Contract violations are never turned into stream errors.
 *
 * ```ts
 * const numbers = new Observable<number>(subscriber => {
 *   subscriber.next(1);
 *   subscriber.complete();
 * }, { type: Types.number });
 *
 * numbers.subscribe(keep(Types.string)); // throws InconsistentDataTypeError
 * ```
 *
 * ## Cancellation
 *
 * `subscribe()` returns a `Subscription`. Unsubscribing, or aborting the
 * `signal` passed to `subscribe()`, stops delivery and runs the source's
 * teardown exactly once. Subscriptions are `Disposable`:
 *
 * ```ts
 * {
 *   using sub = ticker.subscribe(value => console.log(value));
 * } // unsubscribed here
 * ```
 *
 * ## Multicasting
 *
 * A `Subject` is both an Observable and an actor. Variants decide what late
 * subscribers see first: `RecentSubject` (latest value), `BehaviorSubject`
 * (latest value, with an initial one) and `ReplaySubject` (the last `n`).
 *
 * ## Scheduling
 *
 * Delivery is synchronous unless an operator moves it: `delay(ms)` waits `ms`
 * before each event, `async()` hands every event to a microtask worker. Both
 * cancel their worker before they unsubscribe from their source.
 *
 * ## Async iteration
 *
 * ```ts
 * for await (const value of pipe(source, take(3))) {
 *   console.log(value);
 * }
 * ```
 *
 * @module
 */
export * from "./observable.ts";
export * from "./error.ts";
export * from "./actor.ts";
export * from "./contract.ts";
export * from "./subscription.ts";
export * from "./subject.ts";
export * from "./channel.ts";
export * from "./proxy.ts";
export * from "./helpers/mod.ts";

export type * from "./_types.ts";
