import { test, expect } from "vitest";
import { z } from "zod";

import { keep } from "../actor.ts";
import { elementType, Types } from "../contract.ts";
import { InconsistentDataTypeError } from "../error.ts";
import { Observable, of } from "../observable.ts";
import {
  BehaviorSubject,
  RecentSubject,
  ReplaySubject,
  Subject,
  recentSubjectFactory,
} from "../subject.ts";

// -----------------------------------------------------------------------------
// Subject
// -----------------------------------------------------------------------------

test("every registered actor receives each value, in subscription order", () => {
  const subject = new Subject<number>();
  const log: string[] = [];

  subject.subscribe(value => log.push(`a${value}`));
  subject.subscribe(value => log.push(`b${value}`));
  subject.next(1);
  subject.next(2);

  expect(log).toEqual(["a1", "b1", "a2", "b2"]);
  expect(subject.observers).toBe(2);
});

test("a late subscriber only sees later values", () => {
  const subject = new Subject<number>();
  const early = keep<number>();
  const late = keep<number>();

  subject.subscribe(early);
  subject.next(1);
  subject.subscribe(late);
  subject.next(2);

  expect(early.values).toEqual([1, 2]);
  expect(late.values).toEqual([2]);
});

test("unsubscribing removes only that actor", () => {
  const subject = new Subject<number>();
  const stays = keep<number>();
  const leaves = keep<number>();

  subject.subscribe(stays);
  const sub = subject.subscribe(leaves);
  subject.next(1);
  sub.unsubscribe();
  subject.next(2);

  expect(stays.values).toEqual([1, 2]);
  expect(leaves.values).toEqual([1]);
  expect(subject.observers).toBe(1);
});

test("an actor subscribed during an emission waits for the next value", () => {
  const subject = new Subject<number>();
  const joiner = keep<number>();

  subject.subscribe({
    next(value) {
      if (value === 1) subject.subscribe(joiner);
    },
  });
  subject.next(1);
  subject.next(2);

  expect(joiner.values).toEqual([2]);
});

test("events after a terminal event are ignored", () => {
  const subject = new Subject<number>();
  const result = keep<number>();
  subject.subscribe(result);

  subject.complete();
  subject.next(1);
  subject.error(new Error("too late"));

  expect(subject.closed).toBe(true);
  expect(result.values).toEqual([]);
  expect(result.completed).toBe(true);
  expect(result.errored).toBe(false);
  expect(subject.observers).toBe(0);
});

test("late joiners receive the terminal event straight away", () => {
  const failure = new Error("closed");
  const failed = new Subject<number>();
  failed.error(failure);

  const afterError = keep<number>();
  const sub = failed.subscribe(afterError);
  expect(afterError.reason).toBe(failure);
  expect(sub.closed).toBe(true);

  const done = new Subject<number>();
  done.complete();
  const afterComplete = keep<number>();
  done.subscribe(afterComplete);
  expect(afterComplete.completed).toBe(true);
});

test("a subject can subscribe to a source", () => {
  const subject = new Subject<number>();
  const a = keep<number>();
  const b = keep<number>();
  subject.subscribe(a);
  subject.subscribe(b);

  of(1, 2).subscribe(subject);

  expect(a.values).toEqual([1, 2]);
  expect(b.values).toEqual([1, 2]);
  expect(b.completed).toBe(true);
});

test("a typed subject refuses sources declaring another type", () => {
  const celsius = elementType("celsius", z.number());
  const readings = new Observable<number>(subscriber => subscriber.complete(), { type: celsius });
  const numbers = new Subject<number>({ type: Types.number });

  expect(() => readings.subscribe(numbers)).toThrow(
    new InconsistentDataTypeError("number", "celsius", "subscribe"),
  );
});

test("similar creates an unrelated subject of the same kind", () => {
  const replay = new ReplaySubject<number>(2);
  replay.next(1);

  const copy = replay.similar();
  const result = keep<number>();
  copy.subscribe(result);

  expect(copy).toBeInstanceOf(ReplaySubject);
  expect(copy).not.toBe(replay);
  expect(result.values).toEqual([]);
});

// -----------------------------------------------------------------------------
// RecentSubject
// -----------------------------------------------------------------------------

test("RecentSubject hands its latest value to each new actor", () => {
  const subject = new RecentSubject<number>();
  const actor1 = keep<number>();
  const actor2 = keep<number>();
  const actor3 = keep<number>();

  const sub1 = subject.subscribe(actor1);
  subject.next(0);
  subject.next(1);

  subject.subscribe(actor2);
  subject.next(3);
  subject.next(4);

  sub1.unsubscribe();
  subject.next(5);
  subject.next(6);

  expect(actor1.values).toEqual([0, 1, 3, 4]);
  expect(actor2.values).toEqual([1, 3, 4, 5, 6]);
  expect(subject.value).toBe(6);

  const failure = new Error("feed lost");
  subject.error(failure);
  subject.subscribe(actor3);

  expect(actor2.reason).toBe(failure);
  expect(actor3.reason).toBe(failure);
  expect(actor3.values).toEqual([]);
});

test("RecentSubject starts without a value", () => {
  const subject = new RecentSubject<string>();
  const result = keep<string>();
  subject.subscribe(result);

  expect(subject.value).toBeUndefined();
  expect(result.values).toEqual([]);
});

test("recentSubjectFactory creates independent subjects", () => {
  const create = recentSubjectFactory<number>();
  const first = create();
  const second = create();
  first.next(1);

  expect(first).toBeInstanceOf(RecentSubject);
  expect(second).not.toBe(first);
  const result = keep<number>();
  second.subscribe(result);
  expect(result.values).toEqual([]);
});

// -----------------------------------------------------------------------------
// BehaviorSubject
// -----------------------------------------------------------------------------

test("BehaviorSubject starts with its initial value", () => {
  const theme = new BehaviorSubject("light");
  const seen = keep<string>();

  theme.subscribe(seen);
  theme.next("dark");

  expect(seen.values).toEqual(["light", "dark"]);
  expect(theme.value).toBe("dark");
});

test("BehaviorSubject treats undefined as a value", () => {
  const subject = new BehaviorSubject<number | undefined>(undefined);
  const seen = keep<number | undefined>();
  subject.subscribe(seen);

  expect(seen.values).toEqual([undefined]);
  expect(subject.value).toBeUndefined();
});

// -----------------------------------------------------------------------------
// ReplaySubject
// -----------------------------------------------------------------------------

test("ReplaySubject replays its window to late joiners", () => {
  const subject = new ReplaySubject<number>(2);
  subject.next(1);
  subject.next(2);
  subject.next(3);

  const late = keep<number>();
  subject.subscribe(late);
  subject.next(4);

  expect(late.values).toEqual([2, 3, 4]);
});

test("ReplaySubject replays its window even after completing", () => {
  const subject = new ReplaySubject<number>(2);
  subject.next(1);
  subject.next(2);
  subject.complete();

  const late = keep<number>();
  subject.subscribe(late);

  expect(late.values).toEqual([1, 2]);
  expect(late.completed).toBe(true);
});

test("ReplaySubject rejects an invalid window", () => {
  expect(() => new ReplaySubject<number>(0)).toThrow(
    new RangeError("Queue capacity must be a positive integer or Infinity, got 0"),
  );
});
