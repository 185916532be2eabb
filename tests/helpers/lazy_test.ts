import { test, expect } from "vitest";
import { z } from "zod";

import { keep } from "../../actor.ts";
import { elementType, Types } from "../../contract.ts";
import { InconsistentDataTypeError } from "../../error.ts";
import { lazy } from "../../helpers/lazy.ts";
import { Observable, of } from "../../observable.ts";
import { Subject } from "../../subject.ts";

test("subscribers wait until the source is set", () => {
  const prices = lazy<number>();
  const early = keep<number>();
  prices.subscribe(early);

  expect(prices.ready).toBe(false);
  expect(early.values).toEqual([]);

  prices.set(of(1, 2));

  expect(prices.ready).toBe(true);
  expect(early.values).toEqual([1, 2]);
  expect(early.completed).toBe(true);
});

test("later subscribers subscribe to the source directly", () => {
  const prices = lazy<number>();
  prices.set([3, 4]);

  const late = keep<number>();
  prices.subscribe(late);

  expect(late.values).toEqual([3, 4]);
  expect(late.completed).toBe(true);
});

test("every subscriber follows a live source", () => {
  const feed = new Subject<string>();
  const names = lazy<string>();

  const a = keep<string>();
  const b = keep<string>();
  names.subscribe(a);
  names.set(feed);
  names.subscribe(b);
  feed.next("x");

  expect(a.values).toEqual(["x"]);
  expect(b.values).toEqual(["x"]);
  expect(feed.observers).toBe(2);
});

test("a subscriber that left before the source arrived gets nothing", () => {
  const prices = lazy<number>();
  const gone = keep<number>();
  prices.subscribe(gone).unsubscribe();

  prices.set(of(1));
  expect(gone.values).toEqual([]);
});

test("the source can only be set once", () => {
  const prices = lazy<number>();
  prices.set(of(1));

  expect(() => prices.set(of(2))).toThrow(new Error("LazyObservable source is already set"));
});

test("the source must match the declared element type", () => {
  const label = elementType("label", z.string());
  const labels = new Observable<string>(subscriber => subscriber.complete(), { type: label });
  const strings = lazy<string>({ type: Types.string });

  expect(() => strings.set(labels)).toThrow(new InconsistentDataTypeError("string", "label", "lazy"));
  expect(strings.ready).toBe(false);
});
