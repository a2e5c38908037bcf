// @filename: buffer.ts
/**
 * The push/pull primitive that sits between a callback-driven producer and a
 * single `for await` consumer.
 *
 * Producers call {@link AsyncBuffer.push} whenever they like, as often as they
 * like, and never wait. The consumer calls {@link AsyncBuffer.next} and gets
 * the oldest pending element, or suspends until one arrives. Closing the
 * buffer lets the consumer drain what is left and then ends the sequence.
 *
 * ```
 * producer ──push──▶ [ e1 e2 e3 ] ──next──▶ consumer
 *                      ▲
 *                   close() ⇒ drain, then { done: true } forever
 * ```
 *
 * @example
 * ```ts
 * import { AsyncBuffer } from './buffer.ts';
 *
 * const buffer = new AsyncBuffer<string>();
 * emitter.on('line', line => buffer.push(line));
 * emitter.on('end', () => buffer.close());
 *
 * for await (const line of buffer) {
 *   console.log(line);
 * }
 * ```
 *
 * @module
 */

import type { Queue } from "./queue.ts";

import { createQueue, enqueue, dequeue, clear, getSize, isEmpty } from "./queue.ts";
import { Symbol } from "./symbol.ts";

/** Resumes a suspended `next()` call. */
type Waiter<T> = (result: IteratorResult<T, undefined>) => void;

/** The terminal result; shared since it carries no state. */
const DONE: IteratorReturnResult<undefined> = Object.freeze({ done: true, value: undefined });

/**
 * An unbounded, ordered, single-consumer async buffer.
 *
 * Elements come out in exactly the order `push()` was called. JavaScript runs
 * every callback to completion, so pushes from timers, I/O callbacks and
 * microtasks are already serialized by the event loop and that order is the
 * one the consumer observes.
 *
 * Closure is sticky: pushes after {@link close} are dropped, pending elements
 * are still delivered, and once drained every `next()` resolves
 * `{ done: true }`.
 *
 * Only one consumer is supported. Overlapping `next()` calls are not part of
 * the contract; they are served in call order.
 *
 * @typeParam T - Type of buffered elements.
 */
export class AsyncBuffer<T> implements AsyncIterable<T> {
  /** Pending elements, stored as ready-made results. */
  #items: Queue<IteratorYieldResult<T>>;
  /** Suspended `next()` calls; empty whenever `#items` is not. */
  #waiters: Queue<Waiter<T>> = createQueue<Waiter<T>>(1);
  #closed = false;

  /**
   * @param capacity - Initial slot count of the backing queue. The buffer is
   *   unbounded either way; this only sizes the first allocation.
   */
  constructor(capacity?: number) {
    this.#items = createQueue<IteratorYieldResult<T>>(capacity);
  }

  /** Number of elements waiting to be pulled. */
  get size(): number {
    return getSize(this.#items);
  }

  /** Whether {@link close} has been called. */
  get closed(): boolean {
    return this.#closed;
  }

  /** Whether a consumer is currently suspended in {@link next}. */
  get waiting(): boolean {
    return !isEmpty(this.#waiters);
  }

  /**
   * Hands an element to the suspended consumer, or queues it.
   *
   * Never blocks and never throws. After {@link close} this is a no-op.
   */
  push(value: T): void {
    if (this.#closed) return;

    const result: IteratorYieldResult<T> = { done: false, value };
    const waiter = dequeue(this.#waiters);
    if (waiter) waiter(result);
    else enqueue(this.#items, result);
  }

  /**
   * Marks the buffer closed. Pending elements stay deliverable; a suspended
   * consumer (which implies nothing is pending) is resumed with `done`.
   * Idempotent.
   */
  close(): void {
    if (this.#closed) return;
    this.#closed = true;

    let waiter = dequeue(this.#waiters);
    while (waiter) {
      waiter(DONE);
      waiter = dequeue(this.#waiters);
    }
  }

  /**
   * Closes the buffer and discards anything still pending.
   */
  dispose(): void {
    this.close();
    clear(this.#items);
  }

  /**
   * Pulls the oldest element.
   *
   * Resolves immediately when something is pending or the buffer is closed;
   * otherwise suspends until the next {@link push} or {@link close}.
   */
  next(): Promise<IteratorResult<T, undefined>> {
    const result = dequeue(this.#items);
    if (result) return Promise.resolve(result);
    if (this.#closed) return Promise.resolve(DONE);

    return new Promise<IteratorResult<T, undefined>>(resolve => {
      enqueue(this.#waiters, resolve);
    });
  }

  /**
   * Iterates the buffer. Leaving the loop early (`break`, `throw`) disposes
   * the buffer.
   */
  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.next(),
      return: () => {
        this.dispose();
        return Promise.resolve(DONE);
      },
    };
  }

  /** Alias for {@link dispose}, for `using` blocks. */
  [Symbol.dispose](): void {
    this.dispose();
  }

  get [Symbol.toStringTag](): string {
    return "AsyncBuffer";
  }
}
