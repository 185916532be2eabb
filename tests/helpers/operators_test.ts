import { test, expect } from "vitest";

import { keep } from "../../actor.ts";
import { Types } from "../../contract.ts";
import { InconsistentDataTypeError, ObservableError } from "../../error.ts";
import { createOperator, createStatefulOperator } from "../../helpers/operators.ts";
import { pipe } from "../../helpers/pipe.ts";
import { Observable, faulted, of } from "../../observable.ts";

// Helper to collect all values from an observable
async function collectValues<T>(obs: Observable<T>): Promise<T[]> {
  const values: T[] = [];
  for await (const value of obs) {
    values.push(value);
  }
  return values;
}

const errorOnTwo = (errorMode?: "throw" | "ignore" | "manual") =>
  createOperator<number, number>({
    name: 'errorOnTwo',
    errorMode,
    transform(chunk, downstream) {
      if (chunk === 2) {
        throw new Error('Cannot process 2');
      }
      downstream.next(chunk);
    }
  });

// -----------------------------------------------------------------------------
// createOperator() tests
// -----------------------------------------------------------------------------

test("createOperator creates a working transform operator", async () => {
  const double = createOperator<number, number>({
    name: 'double',
    transform(chunk, downstream) {
      downstream.next(chunk * 2);
    }
  });

  const values = await collectValues(pipe(of(1, 2, 3), double));
  expect(values).toEqual([2, 4, 6]);
});

test("a failing transform ends the stream with an ObservableError", () => {
  const result = keep<number>();
  pipe(of(1, 2, 3), errorOnTwo()).subscribe(result);

  expect(result.values).toEqual([1]);
  expect(result.errored).toBe(true);

  const failure = result.reason;
  expect(failure).toBeInstanceOf(ObservableError);
  if (failure instanceof ObservableError) {
    expect(failure.message).toBe('Cannot process 2');
    expect(failure.operator).toBe('operator:errorOnTwo');
    expect(failure.value).toBe(2);
    expect(failure.errors).toHaveLength(1);
  }
});

test("errorMode ignore skips the failing value", () => {
  const result = keep<number>();
  pipe(of(1, 2, 3), errorOnTwo("ignore")).subscribe(result);

  expect(result.values).toEqual([1, 3]);
  expect(result.completed).toBe(true);
});

test("errorMode manual ends the stream with the raw exception", () => {
  const result = keep<number>();
  pipe(of(1, 2, 3), errorOnTwo("manual")).subscribe(result);

  expect(result.values).toEqual([1]);
  expect(result.reason).toBeInstanceOf(Error);
  expect(result.reason).not.toBeInstanceOf(ObservableError);
});

test("upstream errors are forwarded unchanged in every mode", () => {
  const failure = new Error("upstream");

  for (const mode of ["throw", "ignore", "manual"] as const) {
    const result = keep<number>();
    pipe(faulted<number>(failure), errorOnTwo(mode)).subscribe(result);
    expect(result.reason).toBe(failure);
  }
});

test("contract violations escape even in ignore mode", () => {
  const stringify = createOperator<number, unknown>({
    name: 'stringify',
    errorMode: 'ignore',
    transform(chunk, downstream) {
      downstream.next(String(chunk));
    }
  });

  const numbers = keep<unknown>(Types.number);
  expect(() => pipe(of(1), stringify).subscribe(numbers)).toThrow(InconsistentDataTypeError);
  expect(numbers.values).toEqual([]);
});

// -----------------------------------------------------------------------------
// createStatefulOperator() tests
// -----------------------------------------------------------------------------

test("createStatefulOperator maintains state across transforms", async () => {
  const runningSum = createStatefulOperator<number, number, { sum: number }>({
    name: 'runningSum',
    createState: () => ({ sum: 0 }),
    transform(chunk, state, downstream) {
      state.sum += chunk;
      downstream.next(state.sum);
    }
  });

  const values = await collectValues(pipe(of(1, 2, 3, 4), runningSum));
  expect(values).toEqual([1, 3, 6, 10]);
});

test("flush can emit final values before completion", () => {
  const total = createStatefulOperator<number, number, { sum: number }>({
    name: 'total',
    createState: () => ({ sum: 0 }),
    transform(chunk, state) {
      state.sum += chunk;
    },
    flush(state, downstream) {
      downstream.next(state.sum);
    }
  });

  const result = keep<number>();
  pipe(of(1, 2, 3), total).subscribe(result);

  expect(result.values).toEqual([6]);
  expect(result.completed).toBe(true);
});

test("start runs per subscription and cancel runs once at the end", () => {
  const events: string[] = [];
  const counted = createStatefulOperator<number, number, { seen: number }>({
    name: 'counted',
    createState: () => ({ seen: 0 }),
    start() {
      events.push('start');
    },
    transform(chunk, state, downstream) {
      state.seen++;
      downstream.next(chunk);
    },
    cancel(state) {
      events.push(`cancel after ${state.seen}`);
    }
  });

  const source = pipe(of(1, 2), counted);
  source.subscribe(keep());
  source.subscribe(keep()).unsubscribe();

  expect(events).toEqual(['start', 'cancel after 2', 'start', 'cancel after 2']);
});
