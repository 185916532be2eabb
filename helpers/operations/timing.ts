import type { Operator } from "../_types.ts";
import type { Subscription } from "../../_types.ts";
import type { Subscriber } from "../../observable.ts";

import { setTimeout as sleep } from "node:timers/promises";

import { Channel } from "../../channel.ts";
import { reportError } from "../../error.ts";
import { Observable } from "../../observable.ts";
import { operator } from "../../proxy.ts";

/**
 * @module operations/timing
 *
 * Operators that move delivery off the producer's call stack. Both run one
 * worker per subscription that drains a private {@link Channel} of events:
 *
 * ```
 * source ──next/error/complete──▶ channel ──worker──▶ downstream
 * ```
 *
 * Unsubscribing raises a cancellation flag, closes the channel (waking a
 * waiting worker) and only then unsubscribes from the source.
 */

type Message<T> =
  | { readonly kind: "next"; readonly value: T }
  | { readonly kind: "error"; readonly error: unknown }
  | { readonly kind: "complete" };

/**
 * Waits `ms` milliseconds before presenting each event.
 *
 * Events queue up in arrival order; the worker takes one, sleeps `ms`, then
 * forwards it. A burst of `n` events is therefore spread over `n * ms`.
 * Errors and completion wait their turn like values. The source is never held
 * back.
 *
 * @example
 * ```ts
 * pipe(of(1, 2, 3), delay(1000));
 * // 1 after one second, 2 after two, 3 after three, complete after four
 * ```
 *
 * ## Practical Use Case
 *
 * Use `delay` to simulate network latency in tests, or to pace a burst of
 * updates so each one is visible before the next lands.
 *
 * @param ms - The delay duration in milliseconds
 */
export function delay<T>(ms: number): Operator<T, T> {
  return operator<T, T>({
    name: 'operator:delay',
    source: source => new Observable<T>(subscriber => {
      const channel = new Channel<Message<T>>();
      const sleeping = new AbortController();
      let cancelled = false;

      const drain = async () => {
        for await (const message of channel) {
          await sleep(ms, undefined, { signal: sleeping.signal });
          if (cancelled || deliver(subscriber, message)) return;
        }
      };
      drain().catch(err => reportUnlessAborted(err, cancelled));

      const upstream = source.subscribe({
        next: value => { channel.offer({ kind: "next", value }); },
        error: err => { channel.offer({ kind: "error", error: err }); },
        complete: () => { channel.offer({ kind: "complete" }); },
      });

      return () => {
        cancelled = true;
        channel.close();
        sleeping.abort();
        upstream.unsubscribe();
      };
    }),
  });
}

/**
 * Hands each event over to an asynchronous worker through a one-slot buffer.
 *
 * Subscribing to the source is itself scheduled on the microtask queue, and
 * every event reaches downstream on a later microtask than the one that
 * produced it. While the slot is full, further events from the source queue up
 * behind it, in order.
 *
 * @example
 * ```ts
 * const seen: number[] = [];
 * pipe(of(1, 2), async()).subscribe(value => seen.push(value));
 * seen; // [], the values arrive on later microtasks
 * ```
 *
 * ## Practical Use Case
 *
 * Use `async` to stop a synchronous source from running inside the caller's
 * `subscribe()`, for example to let the caller store the subscription before
 * the first value arrives.
 */
export function async<T>(): Operator<T, T> {
  return operator<T, T>({
    name: 'operator:async',
    source: source => new Observable<T>(subscriber => {
      const channel = new Channel<Message<T>>(1);
      let cancelled = false;
      let upstream: Subscription | null = null;

      const drain = async () => {
        for await (const message of channel) {
          if (cancelled || deliver(subscriber, message)) return;
        }
      };
      drain().catch(err => reportUnlessAborted(err, cancelled));

      queueMicrotask(() => {
        if (cancelled) return;
        try {
          upstream = source.subscribe({
            next: value => { void channel.put({ kind: "next", value }); },
            error: err => { void channel.put({ kind: "error", error: err }); },
            complete: () => { void channel.put({ kind: "complete" }); },
          });
        } catch (err) {
          reportError(err);
        }
      });

      return () => {
        cancelled = true;
        channel.close();
        upstream?.unsubscribe();
      };
    }),
  });
}

/**
 * Presents one event downstream.
 *
 * @returns `true` when the worker is done
 */
function deliver<T>(subscriber: Subscriber<T>, message: Message<T>): boolean {
  switch (message.kind) {
    case "next":
      subscriber.next(message.value);
      return subscriber.closed;
    case "error":
      subscriber.error(message.error);
      return true;
    case "complete":
      subscriber.complete();
      return true;
  }
}

/** A pending sleep aborted by unsubscribing is how a worker stops. */
function reportUnlessAborted(err: unknown, cancelled: boolean): void {
  if (cancelled && err instanceof Error && err.name === "AbortError") return;
  reportError(err);
}
