// @filename: subscription.ts
/**
 * Teardown and Subscription protocol.
 *
 * Every `subscribe` call hands back a {@link Subscription}. What a producer
 * returns from its subscribe behavior is a {@link Teardown}: the resource to
 * release once the subscription closes, whether that happens through
 * `unsubscribe()`, an aborted signal, or a terminal event.
 *
 * @example
 * ```ts
 * const sub = compose(
 *   () => clearInterval(id),
 *   upstream,
 *   worker, // anything with [Symbol.dispose]
 * );
 *
 * sub.unsubscribe(); // clears the interval, then upstream, then worker
 * sub.unsubscribe(); // no-op
 * ```
 *
 * @module
 */
import type { SpecSubscription } from "./_spec.ts";
import type { Subscription } from "./_types.ts";
import { reportError } from "./error.ts";
import { Symbol } from "./symbol.ts";

/**
 * Anything a subscribe behavior may return to describe its cleanup:
 * a function, an `{ unsubscribe() }` object, a `Disposable`, an
 * `AsyncDisposable`, or nothing.
 */
export type Teardown = (() => void) | SpecSubscription | AsyncDisposable | Disposable | null | undefined | void;

/**
 * Internal state associated with each Subscription.
 * Kept in a WeakMap so the public object carries no internals.
 */
export interface SubscriptionState {
  /** True once subscription is closed via unsubscribe, error, or complete */
  closed: boolean;

  /** Function or object returned by the subscribe behavior */
  cleanup: Teardown;

  /** Detaches the listener registered on an external AbortSignal */
  removeAbortHandler: (() => void) | null;

  /** Created on demand for `Subscriber.signal`; aborted after cleanup */
  controller: AbortController | null;
}

/** Central registry of subscription state. */
export const SubscriptionStateMap = new WeakMap<Subscription, SubscriptionState>();

export interface SubscribeOptions {
  /** Closes the subscription when aborted. */
  signal?: AbortSignal;
}

/**
 * Creates a new open Subscription.
 *
 * If `opts.signal` aborts, the subscription closes. A signal that is already
 * aborted closes it before it is returned.
 *
 * @internal
 */
export function createSubscription(opts?: SubscribeOptions | null): Subscription {
  const state: SubscriptionState = {
    closed: false,
    cleanup: null,
    removeAbortHandler: null,
    controller: null,
  };

  const subscription: Subscription = {
    get [Symbol.toStringTag](): "Subscription" { return "Subscription" as const; },
    get closed() { return state.closed; },
    unsubscribe(): void { closeSubscription(this, state); },
    [Symbol.dispose]() {
      this.unsubscribe();
    },
    [Symbol.asyncDispose]() {
      return Promise.resolve(this.unsubscribe());
    }
  };

  SubscriptionStateMap.set(subscription, state);

  const signal = opts?.signal;
  if (signal) {
    if (signal.aborted) {
      closeSubscription(subscription, state);
      return subscription;
    }

    const abortHandler = () => subscription.unsubscribe();
    signal.addEventListener("abort", abortHandler, { once: true });
    state.removeAbortHandler = () => signal.removeEventListener("abort", abortHandler);
  }

  return subscription;
}

/**
 * Closes a subscription: marks it closed, detaches its abort listener, runs its
 * teardown and finally aborts the signal handed to its producer.
 *
 * Calling it on a closed subscription does nothing.
 *
 * @internal
 */
export function closeSubscription(subscription: Subscription, stateMap?: SubscriptionState | null): void {
  const state = stateMap ?? SubscriptionStateMap.get(subscription);
  if (!state || state.closed) return;

  state.closed = true;

  const cleanup = state.cleanup;
  const removeAbortHandler = state.removeAbortHandler;
  const controller = state.controller;

  state.cleanup = null;
  state.removeAbortHandler = null;

  removeAbortHandler?.();

  try {
    cleanupSubscription(cleanup);
  } finally {
    // Upstreams subscribed with the producer's signal stop last
    controller?.abort();
  }
}

/**
 * Runs one teardown. Failures are reported to the host and never interrupt
 * the caller.
 *
 * @internal
 */
export function cleanupSubscription(cleanup: Teardown): void {
  const teardown: unknown = cleanup;
  try {
    if (isCallable(teardown)) teardown();
    else if (isUnsubscribable(teardown)) teardown.unsubscribe();
    else if (isDisposable(teardown)) teardown[Symbol.dispose]();
    else if (isAsyncDisposable(teardown)) {
      teardown[Symbol.asyncDispose]().then(undefined, reportError);
    }
  } catch (err) {
    reportError(err);
  }
}

/** Returns whether a value is something {@link cleanupSubscription} can run. */
export function isTeardown(value: unknown): value is Teardown {
  return value === null || value === undefined ||
    isCallable(value) || isUnsubscribable(value) ||
    isDisposable(value) || isAsyncDisposable(value);
}

/**
 * Disposes a handle. Repeatable: subscriptions ignore every call after the
 * first.
 *
 * @example
 * ```ts
 * const sub = source.subscribe(keep<number>());
 * unsubscribe(sub);
 * unsubscribe(sub); // no-op
 * ```
 */
export function unsubscribe(subscription: Teardown): void {
  cleanupSubscription(subscription);
}

/**
 * Builds a subscription that disposes every child, in the order supplied, the
 * first time it is disposed. A failing child is reported and the remaining
 * children still run.
 */
export function compose(...teardowns: Teardown[]): Subscription {
  const subscription = createSubscription();
  const state = SubscriptionStateMap.get(subscription);
  if (state) {
    state.cleanup = () => {
      for (const teardown of teardowns) cleanupSubscription(teardown);
      teardowns.length = 0;
    };
  }
  return subscription;
}

/** The teardown that does nothing. */
export function voidTeardown(): void { }

/** An already closed subscription, for sources that never need cancelling. */
export const VOID_SUBSCRIPTION: Subscription = Object.freeze({
  get [Symbol.toStringTag](): "Subscription" { return "Subscription" as const; },
  get closed() { return true; },
  unsubscribe: voidTeardown,
  [Symbol.dispose]: voidTeardown,
  [Symbol.asyncDispose]() { return Promise.resolve(); },
});

/**
 * Returns the AbortSignal that aborts once `subscription` closes.
 *
 * @internal
 */
export function signalOf(subscription: Subscription, stateMap?: SubscriptionState | null): AbortSignal {
  const state = stateMap ?? SubscriptionStateMap.get(subscription);
  if (!state || state.closed) return AbortSignal.abort();
  state.controller ??= new AbortController();
  return state.controller.signal;
}

function isCallable(value: unknown): value is () => unknown {
  return typeof value === "function";
}

function isUnsubscribable(value: unknown): value is SpecSubscription {
  return typeof value === "object" && value !== null &&
    "unsubscribe" in value && typeof value.unsubscribe === "function";
}

export function isDisposable(value: unknown): value is Disposable {
  return typeof value === "object" && value !== null &&
    typeof Reflect.get(value, Symbol.dispose) === "function";
}

function isAsyncDisposable(value: unknown): value is AsyncDisposable {
  return typeof value === "object" && value !== null &&
    typeof Reflect.get(value, Symbol.asyncDispose) === "function";
}
