// @filename: subject.ts
/**
 * Subjects are both ends of a stream: an {@link Observable} you subscribe to,
 * and an {@link Actor} you push events into. Every event pushed is delivered
 * to every actor registered at that moment.
 *
 * ```ts
 * const subject = new Subject<number>();
 *
 * subject.subscribe(value => console.log('A', value));
 * subject.next(1);                                      // A 1
 *
 * subject.subscribe(value => console.log('B', value));
 * subject.next(2);                                      // A 2, B 2
 *
 * subject.complete();                                   // both complete
 * ```
 *
 * Variants differ in what a late joiner gets before live events:
 *
 * | Subject             | On subscribe                                |
 * | ------------------- | ------------------------------------------- |
 * | `Subject`           | nothing                                     |
 * | `RecentSubject`     | the latest value, if any                    |
 * | `BehaviorSubject`   | the latest value, starting with an initial  |
 * | `ReplaySubject(n)`  | the last `n` values                         |
 *
 * Once a subject has errored or completed, further events are ignored and
 * every new subscriber receives that terminal event straight away (after the
 * replayed window, for `ReplaySubject`).
 *
 * @module
 */
import type { Actor } from "./_types.ts";
import type { ActorTraitSpec } from "./contract.ts";
import type { ObservableOptions, Subscriber } from "./observable.ts";
import type { Queue } from "./queue.ts";

import { actorTrait } from "./contract.ts";
import { Observable } from "./observable.ts";
import { createQueue, dequeue, enqueue, isFull, toArray } from "./queue.ts";

type Terminal =
  | { readonly kind: "error"; readonly error: unknown }
  | { readonly kind: "complete" };

/** Creates a fresh subject, e.g. one per connection of a shared source. */
export type SubjectFactory<T> = () => Subject<T>;

/**
 * A multicast stream without memory.
 *
 * @typeParam T - The type of values the subject carries.
 */
export class Subject<T> extends Observable<T> implements Actor<T> {
  /** Registered subscribers, in subscription order */
  #subscribers = new Set<Subscriber<T>>();
  /** Set by the first error or complete */
  #terminal: Terminal | null = null;

  /** @param opts.type - Declared element type, checked against subscribers and sources */
  constructor(opts?: ObservableOptions<T>) {
    super(subscriber => {
      this.onJoin(subscriber, this.#terminal !== null);
      if (subscriber.closed) return;

      const terminal = this.#terminal;
      if (terminal) {
        finish(subscriber, terminal);
        return;
      }

      this.#subscribers.add(subscriber);
      return () => {
        this.#subscribers.delete(subscriber);
      };
    }, opts);
  }

  /** Lets typed sources check their element type against this subject. */
  get [actorTrait](): ActorTraitSpec<T> | undefined {
    return this.type ? { type: this.type } : undefined;
  }

  /** Whether the subject has errored or completed. */
  get closed(): boolean {
    return this.#terminal !== null;
  }

  /** Number of registered subscribers. */
  get observers(): number {
    return this.#subscribers.size;
  }

  /** Delivers `value` to every subscriber registered right now. */
  next(value: T): void {
    if (this.#terminal) return;
    for (const subscriber of [...this.#subscribers]) {
      subscriber.next(value);
    }
  }

  /** Delivers `err` to every subscriber and remembers it for late joiners. */
  error(err: unknown): void {
    this.#end({ kind: "error", error: err });
  }

  /** Completes every subscriber; late joiners complete on subscribe. */
  complete(): void {
    this.#end({ kind: "complete" });
  }

  /** A new, unrelated subject of the same kind and element type. */
  similar(): Subject<T> {
    return new Subject<T>({ type: this.type });
  }

  /**
   * Runs before a subscriber is registered. `terminated` tells whether the
   * subject has already ended.
   */
  protected onJoin(_subscriber: Subscriber<T>, _terminated: boolean): void { }

  #end(terminal: Terminal): void {
    if (this.#terminal) return;
    this.#terminal = terminal;

    const subscribers = [...this.#subscribers];
    this.#subscribers.clear();
    for (const subscriber of subscribers) finish(subscriber, terminal);
  }
}

/**
 * A subject that remembers its latest value and hands it to each new
 * subscriber before live events.
 *
 * @example
 * ```ts
 * const subject = new RecentSubject<number>();
 * const late = keep<number>();
 *
 * subject.next(0);
 * subject.next(1);
 * subject.subscribe(late);
 * subject.next(2);
 *
 * late.values; // [1, 2]
 * ```
 */
export class RecentSubject<T> extends Subject<T> {
  /** Boxed, so an `undefined` value still counts as one */
  protected latest: { value: T } | null = null;

  /** The latest value, or `undefined` before the first one. */
  get value(): T | undefined {
    return this.latest?.value;
  }

  override next(value: T): void {
    if (this.closed) return;
    this.latest = { value };
    super.next(value);
  }

  override similar(): RecentSubject<T> {
    return new RecentSubject<T>({ type: this.type });
  }

  protected override onJoin(subscriber: Subscriber<T>, terminated: boolean): void {
    const latest = this.latest;
    if (latest && !terminated) subscriber.next(latest.value);
  }
}

/**
 * A {@link RecentSubject} that starts out holding `initial`.
 *
 * @example
 * ```ts
 * const theme = new BehaviorSubject('light');
 * theme.subscribe(value => console.log(value)); // light
 * theme.next('dark');                           // dark
 * theme.value;                                  // 'dark'
 * ```
 */
export class BehaviorSubject<T> extends RecentSubject<T> {
  #initial: T;

  constructor(initial: T, opts?: ObservableOptions<T>) {
    super(opts);
    this.#initial = initial;
    this.next(initial);
  }

  override get value(): T {
    const latest = this.latest;
    return latest ? latest.value : this.#initial;
  }

  override similar(): BehaviorSubject<T> {
    return new BehaviorSubject<T>(this.#initial, { type: this.type });
  }
}

/**
 * A subject that replays up to `count` of its latest values to each new
 * subscriber, even after it has ended.
 *
 * @example
 * ```ts
 * const subject = new ReplaySubject<number>(2);
 * subject.next(1);
 * subject.next(2);
 * subject.next(3);
 *
 * const late = keep<number>();
 * subject.subscribe(late);
 * late.values; // [2, 3]
 * ```
 */
export class ReplaySubject<T> extends Subject<T> {
  readonly #window: Queue<T>;
  readonly #count: number;

  /**
   * @param count - Values kept for replay (default: 1)
   *
   * @throws {RangeError} When `count` is not a positive integer or `Infinity`.
   */
  constructor(count: number = 1, opts?: ObservableOptions<T>) {
    super(opts);
    this.#count = count;
    this.#window = createQueue<T>(count);
  }

  override next(value: T): void {
    if (this.closed) return;
    if (isFull(this.#window)) dequeue(this.#window);
    enqueue(this.#window, value);
    super.next(value);
  }

  override similar(): ReplaySubject<T> {
    return new ReplaySubject<T>(this.#count, { type: this.type });
  }

  protected override onJoin(subscriber: Subscriber<T>): void {
    for (const value of toArray(this.#window)) {
      if (subscriber.closed) return;
      subscriber.next(value);
    }
  }
}

/** Factory for plain subjects. */
export function subjectFactory<T>(opts?: ObservableOptions<T>): SubjectFactory<T> {
  return () => new Subject<T>(opts);
}

/** Factory for {@link RecentSubject}s. */
export function recentSubjectFactory<T>(opts?: ObservableOptions<T>): SubjectFactory<T> {
  return () => new RecentSubject<T>(opts);
}

/** Factory for {@link ReplaySubject}s keeping `count` values. */
export function replaySubjectFactory<T>(count: number, opts?: ObservableOptions<T>): SubjectFactory<T> {
  return () => new ReplaySubject<T>(count, opts);
}

function finish<T>(subscriber: Subscriber<T>, terminal: Terminal): void {
  if (terminal.kind === "error") subscriber.error(terminal.error);
  else subscriber.complete();
}
