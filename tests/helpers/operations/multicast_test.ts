import { test, expect } from "vitest";

import { keep } from "../../../actor.ts";
import { share, shareReplay } from "../../../helpers/operations/multicast.ts";
import { pipe } from "../../../helpers/pipe.ts";
import { Observable } from "../../../observable.ts";
import { Subject, replaySubjectFactory } from "../../../subject.ts";

/** A hot source that counts how often it was connected. */
function connectable() {
  const trigger = new Subject<number>();
  const stats = { connections: 0 };
  const source = new Observable<number>(subscriber => {
    stats.connections++;
    return trigger.subscribe(subscriber);
  });
  return { trigger, stats, source };
}

/** A cold source that emits `values` synchronously on every subscription. */
function counted(values: number[]) {
  const stats = { connections: 0 };
  const source = new Observable<number>(subscriber => {
    stats.connections++;
    for (const value of values) subscriber.next(value);
    subscriber.complete();
  });
  return { stats, source };
}

// -----------------------------------------------------------------------------
// share
// -----------------------------------------------------------------------------

test("share connects once for every concurrent subscriber", () => {
  const { trigger, stats, source } = connectable();
  const shared = pipe(source, share());

  const a = keep<number>();
  const b = keep<number>();
  shared.subscribe(a);
  shared.subscribe(b);
  trigger.next(1);

  expect(stats.connections).toBe(1);
  expect(a.values).toEqual([1]);
  expect(b.values).toEqual([1]);
});

test("share disconnects when the last subscriber leaves", () => {
  const { trigger, stats, source } = connectable();
  const shared = pipe(source, share());

  const first = shared.subscribe(keep());
  const second = shared.subscribe(keep());

  first.unsubscribe();
  expect(trigger.observers).toBe(1);

  second.unsubscribe();
  expect(trigger.observers).toBe(0);

  shared.subscribe(keep());
  expect(stats.connections).toBe(2);
});

test("share without reset keeps the connection open", () => {
  const { trigger, stats, source } = connectable();
  const shared = pipe(source, share({ resetOnRefCountZero: false }));

  shared.subscribe(keep()).unsubscribe();
  expect(trigger.observers).toBe(1);

  const late = keep<number>();
  shared.subscribe(late);
  trigger.next(5);

  expect(stats.connections).toBe(1);
  expect(late.values).toEqual([5]);
});

test("share starts a fresh connection after the source completed", () => {
  const { stats, source } = counted([1, 2]);
  const shared = pipe(source, share());

  const a = keep<number>();
  const b = keep<number>();
  shared.subscribe(a);
  shared.subscribe(b);

  expect(a.values).toEqual([1, 2]);
  expect(b.values).toEqual([1, 2]);
  expect(stats.connections).toBe(2);
});

test("share uses the connector for each connection", () => {
  const { trigger, source } = connectable();
  const shared = pipe(source, share({ connector: replaySubjectFactory<number>(2) }));

  shared.subscribe(keep());
  trigger.next(1);
  trigger.next(2);
  trigger.next(3);

  const late = keep<number>();
  shared.subscribe(late);
  expect(late.values).toEqual([2, 3]);
});

// -----------------------------------------------------------------------------
// shareReplay
// -----------------------------------------------------------------------------

test("shareReplay replays to late subscribers after the source ended", () => {
  const { stats, source } = counted([1, 2, 3]);
  const shared = pipe(source, shareReplay(1));

  const first = keep<number>();
  shared.subscribe(first);

  const late = keep<number>();
  shared.subscribe(late);

  expect(first.values).toEqual([1, 2, 3]);
  expect(late.values).toEqual([3]);
  expect(late.completed).toBe(true);
  expect(stats.connections).toBe(1);
});

test("shareReplay keeps every value by default", () => {
  const { source } = counted([1, 2, 3]);
  const shared = pipe(source, shareReplay());

  shared.subscribe(keep());
  const late = keep<number>();
  shared.subscribe(late);

  expect(late.values).toEqual([1, 2, 3]);
});
