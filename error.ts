// @filename: error.ts
/**
 * The two failure categories of the engine.
 *
 * 1. **Stream-level errors** travel as the terminal `error` event. When a user
 *    callback inside an operator fails, the failure is wrapped in an
 *    {@link ObservableError} that remembers the operator and the value being
 *    processed.
 * 2. **Contract violations** ({@link ContractViolationError}) are wiring
 *    defects: an object that is not an actor, or a value whose runtime type does
 *    not match the declared element type. They are thrown at the point of
 *    violation and never delivered as stream errors.
 *
 * @module
 */

/**
 * Represents an error raised while a pipeline stage processed a value.
 *
 * @remarks
 * Extends `AggregateError` so that several underlying failures can be carried
 * together, while `operator` and `value` keep the context in which the first
 * one happened.
 */
export class ObservableError extends AggregateError {
  /** The operator where the error occurred */
  readonly operator?: string;

  /** The value being processed when the error occurred */
  readonly value?: unknown;

  /**
   * @param errors - The error(s) that caused this error
   * @param message - The error message
   * @param options - Additional error context
   */
  constructor(
    errors: unknown,
    message: string,
    options?: {
      operator?: string;
      value?: unknown;
      cause?: unknown;
    }
  ) {
    const errorArray: unknown[] = Array.isArray(errors) ? errors : [errors];
    const normalizedErrors = errorArray.map(err =>
      err instanceof Error ? err : new Error(String(err))
    );

    super(normalizedErrors, message, { cause: options?.cause });
    this.name = 'ObservableError';
    this.operator = options?.operator;
    this.value = options?.value;
  }

  /**
   * Returns a string representation of the error including the operator
   * and value context if available.
   */
  override toString(): string {
    let result = `${this.name}: ${this.message}`;

    if (this.operator) {
      result += `\n  in operator: ${this.operator}`;
    }

    if (this.value !== undefined) {
      const valueStr = typeof this.value === 'object'
        ? JSON.stringify(this.value).slice(0, 100)
        : String(this.value);

      result += `\n  processing value: ${valueStr}`;
    }

    if (this.errors.length > 0) {
      result += '\n  with errors:';
      this.errors.forEach((err, i) => {
        result += `\n    ${i + 1}) ${err}`;
      });
    }

    return result;
  }

  /**
   * Wraps any failure raised by a user callback inside an operator.
   *
   * An `ObservableError` that already names its operator is returned as is,
   * so an error keeps the context of the stage where it first happened.
   *
   * @param error - The original error
   * @param operator - The operator name
   * @param value - The value being processed
   */
  static from(
    error: unknown,
    operator?: string,
    value?: unknown
  ): ObservableError {
    if (error instanceof ObservableError) {
      if (!error.operator && operator) {
        return new ObservableError(
          error.errors,
          error.message,
          {
            operator,
            value: error.value ?? value,
            cause: error.cause
          }
        );
      }
      return error;
    }

    return new ObservableError(
      error,
      error instanceof Error ? error.message : String(error),
      { operator, value, cause: error }
    );
  }
}

/**
 * Base class of every wiring defect detected by the Type-Contract Layer.
 *
 * @remarks
 * It is a `TypeError` because the defect is always a mismatch between what a
 * stage declares and what it is handed. Every `catch` in the engine rethrows
 * it instead of turning it into an `error` event.
 */
export class ContractViolationError extends TypeError {
  constructor(message: string) {
    super(message);
    this.name = 'ContractViolationError';
  }
}

/** Raised when an object that cannot act as an actor is used as one. */
export class InvalidActorError extends ContractViolationError {
  readonly actor: unknown;
  readonly reason: string;

  constructor(actor: unknown, reason: string) {
    super(
      `${describeValue(actor)} is not a valid actor: ${reason}. ` +
      `Pass an object with next/error/complete functions or extend one of ` +
      `BaseActor, NextActor, ErrorActor or CompletionActor.`
    );
    this.name = 'InvalidActorError';
    this.actor = actor;
    this.reason = reason;
  }
}

/** Raised when a delivered or declared element type does not match the receiver's. */
export class InconsistentDataTypeError extends ContractViolationError {
  readonly expected: string;
  readonly actual: string;

  constructor(expected: string, actual: string, where?: string) {
    super(
      `${where ? `${where}: ` : ''}expects data to be of type ${expected}, ` +
      `but data of type ${actual} has been found.`
    );
    this.name = 'InconsistentDataTypeError';
    this.expected = expected;
    this.actual = actual;
  }
}

/** Raised when a value handed to the engine as a source cannot be subscribed to. */
export class InvalidObservableError extends ContractViolationError {
  readonly source: unknown;

  constructor(source: unknown, reason: string) {
    super(`${describeValue(source)} is not a valid observable: ${reason}.`);
    this.name = 'InvalidObservableError';
    this.source = source;
  }
}

export function isContractViolation(err: unknown): err is ContractViolationError {
  return err instanceof ContractViolationError;
}

/**
 * Reports a failure nobody can receive, with the same timing as an unhandled
 * promise rejection: logged now, rethrown on the microtask queue.
 */
export function reportError(err: unknown): void {
  console.error(err);
  queueMicrotask(() => { throw err; });
}

/** Short runtime description of a value, used in contract violation messages. */
export function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'object' || typeof value === 'function') {
    const name = value.constructor?.name;
    return name ? `Object of type ${name}` : 'Object';
  }
  return `Value of type ${typeof value}`;
}
