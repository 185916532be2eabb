// @filename: actor.ts
/**
 * The Actor core: event-delivery primitives and stock actors.
 *
 * `next`, `error` and `complete` are the only three ways an event reaches an
 * actor. Inside a subscribe behavior they are methods of the
 * {@link Subscriber}; outside one (custom sources, recording harnesses) the
 * free functions below classify the actor on every call and enforce the same
 * contract.
 *
 * Actors come in four capabilities: `base` accepts all three events, the
 * others accept exactly one. Extend {@link BaseActor}, {@link NextActor},
 * {@link ErrorActor} or {@link CompletionActor} to declare one, or pass a
 * plain object and let its handlers decide.
 *
 * @example
 * ```ts
 * class Printer extends NextActor<string> {
 *   constructor() { super(Types.string); }
 *   next(line: string) { console.log(line); }
 * }
 *
 * of("a", "b").subscribe(new Printer());
 * next(new Printer(), 42); // throws InconsistentDataTypeError, prints nothing
 * ```
 *
 * @module
 */
import type { Actor } from "./_types.ts";
import type { ActorTraitSpec, ElementType } from "./contract.ts";

import { accepts, actorTrait, assertElement, classify } from "./contract.ts";
import { InvalidActorError } from "./error.ts";
import { Subscriber } from "./observable.ts";

/**
 * Delivers `value` to `actor`.
 *
 * @throws {InvalidActorError} When `actor` is not an actor.
 * @throws {InconsistentDataTypeError} When `value` does not satisfy the
 * actor's declared element type. Nothing is delivered.
 */
export function next<T>(actor: Actor<T>, value: T): void {
  if (actor instanceof Subscriber) return actor.next(value);

  const contract = classify(actor);
  if (contract.kind === "invalid") throw new InvalidActorError(actor, contract.reason);
  if (contract.type) assertElement(contract.type, value, "next");
  if (accepts(contract.kind, "next")) actor.next?.(value);
}

/**
 * Delivers the terminal error to `actor`. Ignored by actors that do not accept
 * errors.
 *
 * @throws {InvalidActorError} When `actor` is not an actor.
 */
export function error<T>(actor: Actor<T>, err: unknown): void {
  if (actor instanceof Subscriber) return actor.error(err);

  const contract = classify(actor);
  if (contract.kind === "invalid") throw new InvalidActorError(actor, contract.reason);
  if (accepts(contract.kind, "error")) actor.error?.(err);
}

/**
 * Delivers the terminal completion to `actor`. Ignored by actors that do not
 * accept completion.
 *
 * @throws {InvalidActorError} When `actor` is not an actor.
 */
export function complete<T>(actor: Actor<T>): void {
  if (actor instanceof Subscriber) return actor.complete();

  const contract = classify(actor);
  if (contract.kind === "invalid") throw new InvalidActorError(actor, contract.reason);
  if (accepts(contract.kind, "complete")) actor.complete?.();
}

/**
 * Accepts all three events.
 *
 * @typeParam T - Type of values this actor accepts.
 */
export abstract class BaseActor<T> implements Actor<T> {
  readonly [actorTrait]: ActorTraitSpec<T>;

  /** @param type - Declared element type, checked on every delivered value */
  constructor(type?: ElementType<T>) {
    this[actorTrait] = { kind: "base", type };
  }

  abstract next(value: T): void;
  abstract error(err: unknown): void;
  abstract complete(): void;
}

/** Accepts only `next`; terminal events are ignored. */
export abstract class NextActor<T> implements Actor<T> {
  readonly [actorTrait]: ActorTraitSpec<T>;

  constructor(type?: ElementType<T>) {
    this[actorTrait] = { kind: "next", type };
  }

  abstract next(value: T): void;
}

/** Accepts only `error`. */
export abstract class ErrorActor<T = unknown> implements Actor<T> {
  readonly [actorTrait]: ActorTraitSpec<T>;

  constructor(type?: ElementType<T>) {
    this[actorTrait] = { kind: "error", type };
  }

  abstract error(err: unknown): void;
}

/** Accepts only `complete`. */
export abstract class CompletionActor<T = unknown> implements Actor<T> {
  readonly [actorTrait]: ActorTraitSpec<T>;

  constructor(type?: ElementType<T>) {
    this[actorTrait] = { kind: "completion", type };
  }

  abstract complete(): void;
}

/** Handlers for {@link actor}. Every one is optional. */
export interface ActorHandlers<T> {
  next?(value: T): void;
  error?(err: unknown): void;
  complete?(): void;
}

/**
 * Builds an actor from callbacks. The capability follows from the callbacks
 * given: a single one accepts only that event.
 *
 * @example
 * ```ts
 * of(1, 2, 3).subscribe(actor({
 *   next: value => console.log(value),
 *   complete: () => console.log('done'),
 * }));
 * ```
 */
export function actor<T>(handlers: ActorHandlers<T>, opts?: { type?: ElementType<T> }): Actor<T> {
  const lambda: Actor<T> = {};
  const { next, error, complete } = handlers;
  if (next) lambda.next = next.bind(handlers);
  if (error) lambda.error = error.bind(handlers);
  if (complete) lambda.complete = complete.bind(handlers);
  if (opts?.type) return { ...lambda, [actorTrait]: { type: opts.type } };
  return lambda;
}

/**
 * Collects every value it receives, and how the stream ended.
 *
 * @example
 * ```ts
 * const values = keep<number>();
 * of(1, 2, 3).subscribe(values);
 * values.values;    // [1, 2, 3]
 * values.completed; // true
 * ```
 */
export class KeepActor<T> extends BaseActor<T> {
  readonly values: T[] = [];
  completed = false;
  errored = false;
  reason: unknown = undefined;

  next(value: T): void {
    this.values.push(value);
  }

  error(err: unknown): void {
    this.errored = true;
    this.reason = err;
  }

  complete(): void {
    this.completed = true;
  }
}

/** Creates a {@link KeepActor}. */
export function keep<T>(type?: ElementType<T>): KeepActor<T> {
  return new KeepActor<T>(type);
}

/** Accepts every event and does nothing with it. */
export class VoidActor<T = unknown> extends BaseActor<T> {
  next(_value: T): void { }
  error(_err: unknown): void { }
  complete(): void { }
}

/** Creates a {@link VoidActor}. */
export function voidActor<T = unknown>(type?: ElementType<T>): VoidActor<T> {
  return new VoidActor<T>(type);
}
