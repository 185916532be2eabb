import { BaseActor } from "../../actor.ts";
import type { ElementType } from "../../contract.ts";

export type RecordedEvent<T> =
  | { readonly kind: "next"; readonly value: T; readonly at: number }
  | { readonly kind: "error"; readonly error: unknown; readonly at: number }
  | { readonly kind: "complete"; readonly at: number };

/**
 * Records every event it receives, in order, with the milliseconds elapsed
 * since it was created.
 */
export class Recorder<T> extends BaseActor<T> {
  readonly events: RecordedEvent<T>[] = [];

  readonly #createdAt = performance.now();
  #settle: () => void = () => { };

  /** Resolves on the first error or completion. */
  readonly done: Promise<void> = new Promise<void>(resolve => {
    this.#settle = resolve;
  });

  constructor(type?: ElementType<T>) {
    super(type);
  }

  next(value: T): void {
    this.events.push({ kind: "next", value, at: this.#elapsed() });
  }

  error(error: unknown): void {
    this.events.push({ kind: "error", error, at: this.#elapsed() });
    this.#settle();
  }

  complete(): void {
    this.events.push({ kind: "complete", at: this.#elapsed() });
    this.#settle();
  }

  get values(): T[] {
    return this.events.flatMap(event => event.kind === "next" ? [event.value] : []);
  }

  /** Event kinds in arrival order, e.g. `["next", "next", "complete"]`. */
  get kinds(): string[] {
    return this.events.map(event => event.kind);
  }

  #elapsed(): number {
    return performance.now() - this.#createdAt;
  }
}

/** Resolves after the current macrotask, once pending microtasks have run. */
export function tick(ms = 0): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
