import type { Operator } from "../_types.ts";
import type { Subscription } from "../../_types.ts";
import type { Subject, SubjectFactory } from "../../subject.ts";

import { Observable } from "../../observable.ts";
import { operator } from "../../proxy.ts";
import { ReplaySubject, subjectFactory } from "../../subject.ts";

/**
 * @module operations/multicast
 *
 * Operators that let many subscribers share one subscription to a source.
 */

export interface ShareOptions<T> {
  /**
   * Creates the subject that fans the source out for one connection.
   * @defaultValue a plain {@link Subject}
   */
  connector?: SubjectFactory<T>;

  /**
   * Disconnect from the source, and forget the subject, when the last
   * subscriber leaves or the source ends.
   * @defaultValue true
   */
  resetOnRefCountZero?: boolean;
}

/**
 * Shares one subscription to the source among every current subscriber.
 *
 * The first subscriber connects the source through a subject from
 * `connector`; later subscribers join that subject. When the last one leaves,
 * the source is unsubscribed, and the next subscriber starts a fresh
 * connection.
 *
 * @example
 * ```ts
 * const ticks = pipe(expensiveSource, share());
 *
 * ticks.subscribe(a); // connects
 * ticks.subscribe(b); // joins, no second connection
 * ```
 */
export function share<T>(options: ShareOptions<T> = {}): Operator<T, T> {
  const { connector = subjectFactory<T>(), resetOnRefCountZero = true } = options;

  return operator<T, T>({
    name: 'operator:share',
    source: source => {
      let subject: Subject<T> | null = null;
      let connection: Subscription | null = null;
      let refCount = 0;

      return new Observable<T>(subscriber => {
        refCount++;

        subject ??= connector();
        const current = subject;
        const inner = current.subscribe(subscriber);

        if (!connection) connection = source.subscribe(current);

        return () => {
          inner.unsubscribe();
          refCount--;
          if (refCount > 0 || !resetOnRefCountZero) return;

          const active = connection;
          connection = null;
          subject = null;
          active?.unsubscribe();
        };
      }, { type: source.type });
    },
  });
}

/**
 * Shares the source like {@link share}, and replays the last `count` values to
 * every subscriber that joins later, even after the source has ended.
 *
 * The connection stays open once made.
 *
 * @example
 * ```ts
 * const config = pipe(loadConfig(), shareReplay(1));
 *
 * config.subscribe(a); // loads
 * config.subscribe(b); // gets the loaded value, no second load
 * ```
 */
export function shareReplay<T>(count: number = Infinity): Operator<T, T> {
  return share<T>({
    connector: () => new ReplaySubject<T>(count),
    resetOnRefCountZero: false,
  });
}
