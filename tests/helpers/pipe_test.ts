/**
 * Tests for pipe()
 *
 * - No operators (the source itself)
 * - Left-to-right application
 * - Completion and error propagation
 * - One call stack per value across the whole chain
 * - The twelve-operator limit
 */
import { test, expect } from "vitest";

import { keep } from "../../actor.ts";
import { pipe } from "../../helpers/pipe.ts";
import { filter, map, scan, take, tap } from "../../helpers/operations/core.ts";
import { Observable, of } from "../../observable.ts";

// -----------------------------------------------------------------------------
// pipe() Function Tests
// -----------------------------------------------------------------------------

test("pipe with no operators returns the source", () => {
  const source = of(1, 2, 3);
  expect(pipe(source)).toBe(source);
});

test("pipe converts the source first", () => {
  const result = keep<number>();
  pipe([1, 2, 3], map(n => n * 10)).subscribe(result);

  expect(result.values).toEqual([10, 20, 30]);
});

test("pipe applies operators left to right", () => {
  const result = keep<number>();
  pipe(
    of(1, 2, 3, 4),
    map(n => n * 2),
    filter(n => n > 4),
    take(1),
  ).subscribe(result);

  expect(result.values).toEqual([6]);
  expect(result.completed).toBe(true);
});

test("pipe preserves errors", () => {
  const failure = new Error("upstream");
  const source = new Observable<number>(subscriber => {
    subscriber.next(1);
    subscriber.error(failure);
  });

  const result = keep<number>();
  pipe(source, map(n => n + 1), filter(() => true)).subscribe(result);

  expect(result.values).toEqual([2]);
  expect(result.reason).toBe(failure);
});

test("each value travels through the whole chain before the next one", () => {
  const log: string[] = [];
  pipe(
    of(1, 2),
    tap(n => log.push(`a${n}`)),
    tap(n => log.push(`b${n}`)),
  ).subscribe(keep());

  expect(log).toEqual(["a1", "b1", "a2", "b2"]);
});

test("pipe with a stateful operator keeps state per subscription", () => {
  const sums = pipe(of(1, 2, 3), scan((acc: number, n: number) => acc + n, 0));

  const first = keep<number>();
  const second = keep<number>();
  sums.subscribe(first);
  sums.subscribe(second);

  expect(first.values).toEqual([1, 3, 6]);
  expect(second.values).toEqual([1, 3, 6]);
});

test("maximum operator count in pipe (12 operators)", () => {
  const inc = map((n: number) => n + 1);
  const result = keep<number>();

  pipe(of(0), inc, inc, inc, inc, inc, inc, inc, inc, inc, inc, inc, inc).subscribe(result);
  expect(result.values).toEqual([12]);

  const thirteen = Array.from({ length: 13 }, () => inc);
  expect(() => Reflect.apply(pipe, undefined, [of(0), ...thirteen])).toThrow(
    new RangeError("pipe: Too many operators (maximum 12)."),
  );
});
