// @filename: channel.ts
/**
 * A FIFO hand-off between a producer and one asynchronous consumer.
 *
 * A channel buffers up to `capacity` values. `offer()` never waits: it returns
 * `false` when the buffer is full. `put()` waits for a free slot instead;
 * senders that arrive while the buffer is full are parked, in arrival order,
 * and admitted one by one as the consumer takes values.
 *
 * Closing wakes a waiting consumer and turns away parked and future senders.
 * Values already buffered can still be taken.
 *
 * @example
 * ```ts
 * const channel = new Channel<number>(1);
 *
 * channel.offer(1);  // true
 * channel.offer(2);  // false, the buffer is full
 * channel.put(2);    // parked until 1 is taken
 * channel.close();   // parked `put(2)` resolves to false
 *
 * for await (const value of channel) console.log(value); // 1
 * ```
 *
 * @module
 */
import type { Queue } from "./queue.ts";
import { createQueue, dequeue, enqueue, isEmpty, isFull } from "./queue.ts";

interface ParkedSender<T> {
  value: T;
  resolve: (accepted: boolean) => void;
}

type Receiver<T> = (result: IteratorResult<T, undefined>) => void;

const DONE: IteratorReturnResult<undefined> = { done: true, value: undefined };

export class Channel<T> implements AsyncIterable<T> {
  #buffer: Queue<T>;
  #senders: Queue<ParkedSender<T>> = createQueue(Infinity);
  #receivers: Queue<Receiver<T>> = createQueue(Infinity);
  #closed = false;

  /**
   * @param capacity - Buffered values (default: unbounded)
   *
   * @throws {RangeError} When `capacity` is not a positive integer or `Infinity`.
   */
  constructor(capacity: number = Infinity) {
    this.#buffer = createQueue<T>(capacity);
  }

  /** Whether `close()` has been called. */
  get closed(): boolean {
    return this.#closed;
  }

  /** Buffered values, not counting parked senders. */
  get size(): number {
    return this.#buffer.size;
  }

  /** Senders waiting for a free slot. */
  get parked(): number {
    return this.#senders.size;
  }

  /**
   * Adds a value if there is room for it.
   *
   * @returns `false` when the channel is closed or full
   */
  offer(value: T): boolean {
    if (this.#closed) return false;

    const receiver = dequeue(this.#receivers);
    if (receiver) {
      receiver({ done: false, value });
      return true;
    }

    if (isFull(this.#buffer)) return false;
    enqueue(this.#buffer, value);
    return true;
  }

  /**
   * Adds a value, waiting behind earlier parked senders while the channel is
   * full. Never rejects.
   *
   * @returns Resolves `true` once the value is buffered, `false` if the
   * channel closed first
   */
  put(value: T): Promise<boolean> {
    if (this.#closed) return Promise.resolve(false);
    if (isEmpty(this.#senders) && this.offer(value)) return Promise.resolve(true);

    return new Promise<boolean>(resolve => {
      enqueue(this.#senders, { value, resolve });
    });
  }

  /**
   * Takes the next value, waiting for one when the buffer is empty.
   *
   * @returns `{ done: true }` once the channel is closed and drained
   */
  take(): Promise<IteratorResult<T, undefined>> {
    if (!isEmpty(this.#buffer)) {
      const value = this.#buffer.items[this.#buffer.head];
      dequeue(this.#buffer);
      this.#admit();
      return Promise.resolve({ done: false, value });
    }

    if (this.#closed) return Promise.resolve(DONE);

    return new Promise<IteratorResult<T, undefined>>(resolve => {
      enqueue(this.#receivers, resolve);
    });
  }

  /**
   * Closes the channel. Waiting consumers get `{ done: true }` and parked
   * senders resolve `false`. Repeat calls do nothing.
   */
  close(): void {
    if (this.#closed) return;
    this.#closed = true;

    for (let sender = dequeue(this.#senders); sender; sender = dequeue(this.#senders)) {
      sender.resolve(false);
    }

    for (let receiver = dequeue(this.#receivers); receiver; receiver = dequeue(this.#receivers)) {
      receiver(DONE);
    }
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    while (true) {
      const result = await this.take();
      if (result.done) return;
      yield result.value;
    }
  }

  /** Moves the oldest parked sender into the buffer. */
  #admit(): void {
    if (isFull(this.#buffer)) return;
    const sender = dequeue(this.#senders);
    if (!sender) return;

    enqueue(this.#buffer, sender.value);
    sender.resolve(true);
  }
}
