import { test, expect } from "vitest";

import {
  clear,
  createQueue,
  dequeue,
  enqueue,
  forEach,
  isEmpty,
  isFull,
  toArray,
} from "../queue.ts";

test("queue hands items back in insertion order", () => {
  const queue = createQueue<string>(5);
  enqueue(queue, "a");
  enqueue(queue, "b");
  enqueue(queue, "c");

  expect(toArray(queue)).toEqual(["a", "b", "c"]);
  expect(dequeue(queue)).toBe("a");
  expect(dequeue(queue)).toBe("b");
  expect(dequeue(queue)).toBe("c");
  expect(dequeue(queue)).toBeUndefined();
  expect(isEmpty(queue)).toBe(true);
});

test("unbounded queue grows past its first allocation after wrapping", () => {
  const queue = createQueue<number>(Infinity);
  for (let i = 0; i < 10; i++) enqueue(queue, i);
  for (let i = 0; i < 5; i++) dequeue(queue);
  for (let i = 10; i < 30; i++) enqueue(queue, i);

  expect(queue.size).toBe(25);
  expect(toArray(queue)).toEqual(Array.from({ length: 25 }, (_, i) => i + 5));
  expect(isFull(queue)).toBe(false);
  expect(queue.capacity).toBe(Infinity);
});

test("bounded queue refuses items beyond its capacity", () => {
  const queue = createQueue<number>(2);
  enqueue(queue, 1);
  enqueue(queue, 2);

  expect(isFull(queue)).toBe(true);
  expect(() => enqueue(queue, 3)).toThrow("Queue overflow: cannot add item, capacity 2 reached");
  expect(toArray(queue)).toEqual([1, 2]);
});

test("queue capacity must be a positive integer or Infinity", () => {
  expect(() => createQueue(0)).toThrow(RangeError);
  expect(() => createQueue(1.5)).toThrow(RangeError);
});

test("forEach visits items front first without removing them", () => {
  const queue = createQueue<string>(3);
  enqueue(queue, "x");
  enqueue(queue, "y");
  dequeue(queue);
  enqueue(queue, "z");
  enqueue(queue, "w");

  const seen: [string, number][] = [];
  forEach(queue, (item, index) => seen.push([item, index]));

  expect(seen).toEqual([["y", 0], ["z", 1], ["w", 2]]);
  expect(queue.size).toBe(3);
});

test("clear empties the queue", () => {
  const queue = createQueue<number>();
  enqueue(queue, 1);
  enqueue(queue, 2);
  clear(queue);

  expect(queue.size).toBe(0);
  expect(toArray(queue)).toEqual([]);
  enqueue(queue, 3);
  expect(dequeue(queue)).toBe(3);
});
