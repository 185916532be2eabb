// @filename: _types.ts
import type { SpecSubscription, SpecObserver } from "./_spec.ts";
import type { ActorTraitSpec } from "./contract.ts";
import { actorTrait } from "./contract.ts";
import { Symbol } from "./symbol.ts";

/**
 * A receiver of `next`, `error` and `complete` events.
 *
 * An actor accepts a subset of the three events. Which subset is decided once,
 * when the actor is subscribed: an explicit `[actorTrait]` declaration wins,
 * otherwise an object with a single handler accepts only that event and any
 * other object accepts all three.
 *
 * @typeParam T - Type of values this actor accepts.
 *
 * @example
 * ```ts
 * const logger: Actor<number> = {
 *   start(subscription) {
 *     console.log('Subscribed, closed:', subscription.closed);
 *   },
 *   next(value) {
 *     console.log('Value:', value);
 *   },
 *   complete() {
 *     console.log('Done');
 *   }
 * };
 * ```
 */
export interface Actor<T> extends SpecObserver<T> {
  /**
   * Called before the source starts delivering, with the handle of the new
   * subscription. Unsubscribing here prevents the source from running.
   */
  start?(subscription: Subscription): void;

  /** Declared capability and element type, checked at wiring time. */
  readonly [actorTrait]?: ActorTraitSpec<T>;
}

/**
 * Handle to an active delivery relationship.
 *
 * Extends the minimal SpecSubscription with:
 * 1. A `closed` property to check subscription state
 * 2. Support for `using` blocks via Symbol.dispose
 * 3. Support for `await using` blocks via Symbol.asyncDispose
 *
 * Unsubscribing is idempotent: a closed subscription ignores further calls.
 *
 * @example
 * ```ts
 * {
 *   using sub = source.subscribe(keep<number>());
 *   // ...
 * } // Unsubscribed here
 * ```
 */
export interface Subscription extends SpecSubscription, Disposable, AsyncDisposable {
  /**
   * True once the subscription was unsubscribed, or its actor received a
   * terminal event. A closed subscription never reopens.
   */
  readonly closed: boolean;

  [Symbol.dispose](): void;

  [Symbol.asyncDispose](): Promise<void>;

  readonly [Symbol.toStringTag]: "Subscription";
}

export type * from "./_spec.ts";
