/**
 * A FIFO queue on a circular buffer.
 *
 * Items leave in the order they were added. The backing array starts small and
 * doubles whenever it fills up, until it reaches the queue's `capacity`;
 * `Infinity` makes the queue unbounded.
 *
 * @example
 * ```ts
 * import { createQueue, enqueue, dequeue, toArray } from './queue.ts';
 *
 * const tasks = createQueue<string>(100);
 * enqueue(tasks, 'first');
 * enqueue(tasks, 'second');
 *
 * toArray(tasks); // ['first', 'second']
 * dequeue(tasks); // 'first'
 * dequeue(tasks); // 'second'
 * dequeue(tasks); // undefined
 * ```
 *
 * @module
 */

///////////////////////
// Core Data Types   //
///////////////////////

/**
 * Queue state. Plain data: every operation is a function taking the queue.
 */
export interface Queue<T> {
  /** Backing array; its length is the current allocation */
  items: T[];
  /** Index of the front element (next to dequeue) */
  head: number;
  /** Index where the next element goes */
  tail: number;
  /** Number of elements in the queue */
  size: number;
  /** Most elements the queue may hold */
  capacity: number;
}

/** Allocation of a new queue's backing array. */
const INITIAL_ALLOCATION = 16;

////////////////////////////
// Factory & Core Setup   //
////////////////////////////

/**
 * Creates an empty queue.
 *
 * @param capacity - Most elements held at once (default: 1000). `Infinity`
 * means unbounded.
 *
 * @throws {RangeError} When `capacity` is not a positive integer or `Infinity`.
 */
export function createQueue<T>(capacity: number = 1000): Queue<T> {
  if (capacity !== Infinity && (!Number.isInteger(capacity) || capacity < 1)) {
    throw new RangeError(`Queue capacity must be a positive integer or Infinity, got ${capacity}`);
  }

  return {
    items: new Array<T>(Math.min(capacity, INITIAL_ALLOCATION)),
    head: 0,
    tail: 0,
    size: 0,
    capacity
  };
}

/////////////////////////
// Core Queue Operations //
/////////////////////////

/**
 * Adds an item at the back.
 *
 * @throws {Error} When the queue already holds `capacity` items.
 */
export function enqueue<T>(queue: Queue<T>, item: T): void {
  if (isFull(queue)) {
    throw new Error(`Queue overflow: cannot add item, capacity ${queue.capacity} reached`);
  }

  if (queue.size === queue.items.length) grow(queue);

  queue.items[queue.tail] = item;
  queue.tail = (queue.tail + 1) % queue.items.length;
  queue.size++;
}

/**
 * Removes and returns the front item, or `undefined` when the queue is empty.
 */
export function dequeue<T>(queue: Queue<T>): T | undefined {
  if (isEmpty(queue)) {
    return undefined;
  }

  const item = queue.items[queue.head];
  delete queue.items[queue.head]; // release the reference
  queue.head = (queue.head + 1) % queue.items.length;
  queue.size--;

  return item;
}

////////////////////////////////
// Utility & Status Functions //
////////////////////////////////

export function isEmpty<T>(queue: Queue<T>): boolean {
  return queue.size === 0;
}

export function isFull<T>(queue: Queue<T>): boolean {
  return queue.size >= queue.capacity;
}

/////////////////////////////
// Advanced Utility Functions //
/////////////////////////////

/** Removes every item and shrinks the allocation back to its initial size. */
export function clear<T>(queue: Queue<T>): void {
  queue.items = new Array<T>(Math.min(queue.capacity, INITIAL_ALLOCATION));
  queue.head = 0;
  queue.tail = 0;
  queue.size = 0;
}

/** Copies the items, front first. */
export function toArray<T>(queue: Queue<T>): T[] {
  const result: T[] = [];
  forEach(queue, item => result.push(item));
  return result;
}

/** Visits every item, front first, without removing any. */
export function forEach<T>(queue: Queue<T>, callback: (item: T, index: number) => void): void {
  const items = queue.items;
  for (let i = 0; i < queue.size; i++) {
    const index = (queue.head + i) % items.length;
    callback(items[index], i);
  }
}

/** Doubles the allocation (up to `capacity`), unrolling the items to index 0. */
function grow<T>(queue: Queue<T>): void {
  const length = queue.items.length;
  const next = new Array<T>(Math.min(queue.capacity, Math.max(1, length * 2)));

  for (let i = 0; i < queue.size; i++) {
    next[i] = queue.items[(queue.head + i) % length];
  }

  queue.items = next;
  queue.head = 0;
  queue.tail = queue.size % next.length;
}
