import { test, expect } from "vitest";

import {
  compose,
  createSubscription,
  isTeardown,
  unsubscribe,
  VOID_SUBSCRIPTION,
} from "../subscription.ts";
import { Symbol } from "../symbol.ts";

test("compose disposes children in the order supplied, once", () => {
  const calls: string[] = [];
  const sub = compose(
    () => calls.push("fn"),
    { unsubscribe: () => calls.push("unsub") },
    { [Symbol.dispose]: () => calls.push("dispose") },
    null,
  );

  expect(sub.closed).toBe(false);
  sub.unsubscribe();
  sub.unsubscribe();

  expect(calls).toEqual(["fn", "unsub", "dispose"]);
  expect(sub.closed).toBe(true);
});

test("composed async disposables are started", async () => {
  let disposed = false;
  const sub = compose({
    [Symbol.asyncDispose]: async () => { disposed = true; },
  });

  await sub[Symbol.asyncDispose]();
  expect(disposed).toBe(true);
});

test("an aborted signal closes the subscription", () => {
  const controller = new AbortController();
  const sub = createSubscription({ signal: controller.signal });

  expect(sub.closed).toBe(false);
  controller.abort();
  expect(sub.closed).toBe(true);
});

test("a signal that is already aborted closes it before it is returned", () => {
  const sub = createSubscription({ signal: AbortSignal.abort() });
  expect(sub.closed).toBe(true);
});

test("subscriptions are Disposable", () => {
  const calls: string[] = [];
  {
    using _sub = compose(() => calls.push("released"));
  }
  expect(calls).toEqual(["released"]);
});

test("unsubscribe accepts any teardown", () => {
  const calls: string[] = [];
  unsubscribe(() => calls.push("fn"));
  unsubscribe({ unsubscribe: () => calls.push("unsub") });
  unsubscribe(undefined);

  expect(calls).toEqual(["fn", "unsub"]);
});

test("isTeardown recognizes every teardown shape", () => {
  expect(isTeardown(() => { })).toBe(true);
  expect(isTeardown({ unsubscribe() { } })).toBe(true);
  expect(isTeardown({ [Symbol.dispose]() { } })).toBe(true);
  expect(isTeardown(null)).toBe(true);
  expect(isTeardown(undefined)).toBe(true);
  expect(isTeardown(42)).toBe(false);
  expect(isTeardown({ unsubscribe: true })).toBe(false);
});

test("VOID_SUBSCRIPTION is always closed", () => {
  expect(VOID_SUBSCRIPTION.closed).toBe(true);
  VOID_SUBSCRIPTION.unsubscribe();
  expect(String(VOID_SUBSCRIPTION)).toBe("[object Subscription]");
});
