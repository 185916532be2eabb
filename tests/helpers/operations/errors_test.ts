import { test, expect } from "vitest";

import { keep } from "../../../actor.ts";
import { ObservableError } from "../../../error.ts";
import { pipe } from "../../../helpers/pipe.ts";
import { catchError, errorIfEmpty, ignoreErrors } from "../../../helpers/operations/errors.ts";
import { Observable, completed, faulted, of } from "../../../observable.ts";

function failsAfter<T>(values: T[], failure: unknown): Observable<T> {
  return new Observable<T>(subscriber => {
    for (const value of values) subscriber.next(value);
    subscriber.error(failure);
  });
}

// -----------------------------------------------------------------------------
// ignoreErrors
// -----------------------------------------------------------------------------

test("ignoreErrors completes instead of erroring", () => {
  const result = keep<number>();
  pipe(failsAfter([1, 2], new Error("reset")), ignoreErrors()).subscribe(result);

  expect(result.values).toEqual([1, 2]);
  expect(result.completed).toBe(true);
  expect(result.errored).toBe(false);
});

test("ignoreErrors passes a normal completion through", () => {
  const result = keep<number>();
  pipe(of(1), ignoreErrors()).subscribe(result);

  expect(result.values).toEqual([1]);
  expect(result.completed).toBe(true);
});

// -----------------------------------------------------------------------------
// catchError
// -----------------------------------------------------------------------------

test("catchError switches to the fallback after the values already seen", () => {
  const result = keep<number>();
  pipe(
    failsAfter([1, 2], new Error("offline")),
    catchError(() => of(99)),
  ).subscribe(result);

  expect(result.values).toEqual([1, 2, 99]);
  expect(result.completed).toBe(true);
});

test("catchError hands the error to the selector", () => {
  const failure = new Error("offline");
  const seen: unknown[] = [];

  pipe(
    faulted<number>(failure),
    catchError(err => {
      seen.push(err);
      return [0];
    }),
  ).subscribe(keep());

  expect(seen).toEqual([failure]);
});

test("catchError can resubscribe to the source", () => {
  let attempts = 0;
  const flaky = new Observable<number>(subscriber => {
    attempts++;
    if (attempts === 1) subscriber.error(new Error("first attempt"));
    else {
      subscriber.next(attempts);
      subscriber.complete();
    }
  });

  const result = keep<number>();
  pipe(flaky, catchError((_, caught) => caught)).subscribe(result);

  expect(result.values).toEqual([2]);
  expect(attempts).toBe(2);
});

test("a throwing selector ends the stream with an ObservableError", () => {
  const original = new Error("original");
  const result = keep<number>();

  pipe(
    faulted<number>(original),
    catchError((): Observable<number> => {
      throw new Error("selector failed");
    }),
  ).subscribe(result);

  expect(result.reason).toBeInstanceOf(ObservableError);
  if (result.reason instanceof ObservableError) {
    expect(result.reason.message).toBe("selector failed");
    expect(result.reason.operator).toBe("operator:catchError");
    expect(result.reason.value).toBe(original);
  }
});

test("unsubscribing stops the fallback too", () => {
  let fallbackTornDown = false;
  const fallback = new Observable<number>(() => () => { fallbackTornDown = true; });

  const sub = pipe(faulted<number>(new Error("x")), catchError(() => fallback)).subscribe(keep());
  sub.unsubscribe();

  expect(fallbackTornDown).toBe(true);
});

// -----------------------------------------------------------------------------
// errorIfEmpty
// -----------------------------------------------------------------------------

test("errorIfEmpty errors on an empty source", () => {
  const result = keep<number>();
  pipe(completed<number>(), errorIfEmpty(() => new Error("no results"))).subscribe(result);

  expect(result.completed).toBe(false);
  expect(result.reason).toEqual(new Error("no results"));
});

test("errorIfEmpty passes values through", () => {
  const result = keep<number>();
  pipe(of(1), errorIfEmpty()).subscribe(result);

  expect(result.values).toEqual([1]);
  expect(result.completed).toBe(true);
});

test("errorIfEmpty has a default error", () => {
  const result = keep<number>();
  pipe(completed<number>(), errorIfEmpty()).subscribe(result);

  expect(result.reason).toEqual(new Error("Source is empty"));
});
