// @filename: contract.ts
/**
 * The Type-Contract Layer.
 *
 * Decides, once per subscription, whether a candidate sink can act as an actor,
 * which of the three events it accepts and which element type it declares.
 * Element types are runtime values backed by zod schemas, so a declared type can
 * be compared at wiring time and checked against delivered values.
 *
 * @example
 * ```ts
 * classify({ next: console.log });
 * // { kind: "next" }
 *
 * classify(42);
 * // { kind: "invalid", reason: "actor must be an object" }
 *
 * const numbers = keep(Types.number);
 * classify(numbers);
 * // { kind: "base", type: Types.number }
 * ```
 *
 * @module
 */
import { z } from "zod";
import { InconsistentDataTypeError, describeValue } from "./error.ts";

/** The event subsets an actor may accept. */
export type ActorKind = "base" | "next" | "error" | "completion";

/**
 * A named runtime element type.
 *
 * @typeParam T - The static type the schema validates.
 */
export interface ElementType<T> {
  readonly name: string;
  readonly schema: z.ZodType<T>;
}

/**
 * What an actor states about itself through {@link actorTrait}. Without a
 * `kind`, the capability is still read from the handlers the actor carries.
 */
export interface ActorTraitSpec<T> {
  readonly kind?: ActorKind;
  readonly type?: ElementType<T>;
}

/** Result of {@link classify}. */
export type ActorContract =
  | { readonly kind: "invalid"; readonly reason: string }
  | { readonly kind: ActorKind; readonly type?: ElementType<unknown> };

/**
 * Key under which an actor declares its capability and element type.
 * Actors without it are classified from the handlers they carry.
 */
export const actorTrait: unique symbol = Symbol("actorTrait");

export function elementType<T>(name: string, schema: z.ZodType<T>): ElementType<T> {
  return Object.freeze({ name, schema });
}

/** Stock element types. `any` accepts every value and every upstream type. */
export const Types = {
  any: elementType<unknown>("any", z.unknown()),
  number: elementType("number", z.number()),
  string: elementType("string", z.string()),
  boolean: elementType("boolean", z.boolean()),
  bigint: elementType("bigint", z.bigint()),
} as const;

const HANDLERS = ["next", "error", "complete"] as const;
type Handler = typeof HANDLERS[number];

const REQUIRED: Record<ActorKind, readonly Handler[]> = {
  base: HANDLERS,
  next: ["next"],
  error: ["error"],
  completion: ["complete"],
};

const SINGLE: Record<Handler, ActorKind> = {
  next: "next",
  error: "error",
  complete: "completion",
};

function isActorKind(value: unknown): value is ActorKind {
  return value === "base" || value === "next" || value === "error" || value === "completion";
}

function isElementType(value: unknown): value is ElementType<unknown> {
  return typeof value === "object" && value !== null &&
    "name" in value && typeof value.name === "string" &&
    "schema" in value && value.schema instanceof z.ZodType;
}

/**
 * Classifies a candidate sink.
 *
 * @remarks
 * - `null`, primitives, functions, and objects whose `next`, `error`,
 *   `complete` or `start` member is present but not a function are `invalid`.
 * - A kind declared through {@link actorTrait} wins; the handlers it requires
 *   must be present.
 * - Otherwise, an object with exactly one handler accepts only that event, an
 *   object with two or three accepts all three (missing handlers ignore their
 *   event), and an object with none is `invalid`.
 */
export function classify(candidate: unknown): ActorContract {
  if (candidate === null || typeof candidate !== "object") {
    return { kind: "invalid", reason: "actor must be an object" };
  }

  const present: Handler[] = [];
  for (const name of [...HANDLERS, "start"] as const) {
    const handler: unknown = Reflect.get(candidate, name);
    if (handler === undefined) continue;
    if (typeof handler !== "function") {
      return { kind: "invalid", reason: `${name} must be a function` };
    }
    if (name !== "start") present.push(name);
  }

  const structural: ActorKind = present.length === 1 ? SINGLE[present[0]] : "base";

  const trait: unknown = Reflect.get(candidate, actorTrait);
  if (trait === undefined) {
    if (present.length === 0) {
      return { kind: "invalid", reason: "actor must implement next, error or complete" };
    }
    return { kind: structural };
  }
  if (typeof trait !== "object" || trait === null) {
    return { kind: "invalid", reason: "declared actor trait must be an object" };
  }

  let kind = structural;
  const declared = "kind" in trait ? trait.kind : undefined;
  if (declared !== undefined) {
    if (!isActorKind(declared)) {
      return { kind: "invalid", reason: `unknown actor kind ${String(declared)}` };
    }
    const missing = REQUIRED[declared].filter(name => !present.includes(name));
    if (missing.length > 0) {
      return { kind: "invalid", reason: `missing ${missing.join(", ")} implementation` };
    }
    kind = declared;
  }

  const type = "type" in trait ? trait.type : undefined;
  if (type === undefined) return { kind };
  if (!isElementType(type)) {
    return { kind: "invalid", reason: "declared element type is not an ElementType" };
  }
  return { kind, type };
}

/**
 * Wiring-time check between the element type a producer declares and the one a
 * receiver declares. Undeclared types are unchecked; `any` receives everything.
 *
 * @throws {InconsistentDataTypeError} When both are declared and differ.
 */
export function assertAssignable(
  produced: ElementType<unknown> | undefined,
  accepted: ElementType<unknown> | undefined,
  where?: string,
): void {
  if (!produced || !accepted) return;
  if (accepted.name === Types.any.name) return;
  if (produced.name !== accepted.name) {
    throw new InconsistentDataTypeError(accepted.name, produced.name, where);
  }
}

/**
 * Per-value check, run before the receiving handler has any side effect.
 *
 * @throws {InconsistentDataTypeError} When the value does not satisfy the schema.
 */
export function assertElement<T>(type: ElementType<T>, value: unknown, where?: string): asserts value is T {
  if (!type.schema.safeParse(value).success) {
    throw new InconsistentDataTypeError(type.name, typeName(value), where);
  }
}

function typeName(value: unknown): string {
  if (value === null) return "null";
  if (typeof value === "object") return describeValue(value).replace(/^Object of type /, "");
  return typeof value;
}

/** A classification that accepted the candidate. */
export type ValidContract = Exclude<ActorContract, { readonly kind: "invalid" }>;

/** Whether an actor of `kind` receives `event`. */
export function accepts(kind: ActorKind, event: "next" | "error" | "complete"): boolean {
  return kind === "base" || SINGLE[event] === kind;
}
