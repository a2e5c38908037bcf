// @filename: queue.ts
/**
 * An unbounded FIFO queue backed by a circular buffer.
 *
 * `Array.prototype.shift()` is O(n); this queue keeps a head and tail index
 * over a fixed slot array instead, and doubles the slot array when it runs
 * out of room. Enqueue is O(1) amortized and dequeue is O(1).
 *
 * @example
 * ```ts
 * import { createQueue, enqueue, dequeue } from './queue.ts';
 *
 * const pending = createQueue<string>(4);
 * enqueue(pending, 'tick');
 * enqueue(pending, 'tock');
 *
 * dequeue(pending);  // 'tick'
 * dequeue(pending);  // 'tock'
 * dequeue(pending);  // undefined
 * ```
 *
 * @module
 */

///////////////////////
// Core Data Types   //
///////////////////////

/**
 * Circular buffer state. Treat it as opaque and go through the functions in
 * this module.
 *
 * @typeParam T - The type of elements stored in the queue
 */
export interface Queue<T> {
  /** Slot array; vacated slots hold `undefined` */
  items: Array<T | undefined>;
  /** Index of the front element (next to dequeue) */
  head: number;
  /** Index where the next element will be written */
  tail: number;
  /** Current number of elements */
  size: number;
  /** Current number of slots; grows on demand */
  capacity: number;
}

////////////////////////////
// Factory & Core Setup   //
////////////////////////////

/**
 * Creates a new empty queue.
 *
 * @param capacity - Initial number of slots. The queue grows past it as needed.
 *
 * @example
 * ```ts
 * const notifications = createQueue<Notification>();
 * const waiters = createQueue<() => void>(1);
 * ```
 */
export function createQueue<T>(capacity: number = 16): Queue<T> {
  const slots = Math.max(1, Math.floor(capacity));
  return {
    items: new Array<T | undefined>(slots),
    head: 0,
    tail: 0,
    size: 0,
    capacity: slots,
  };
}

/**
 * Doubles the slot array, copying elements so the front lands on index 0.
 */
function grow<T>(queue: Queue<T>): void {
  const next = new Array<T | undefined>(queue.capacity * 2);
  for (let i = 0; i < queue.size; i++) {
    next[i] = queue.items[(queue.head + i) % queue.capacity];
  }

  queue.items = next;
  queue.head = 0;
  queue.tail = queue.size;
  queue.capacity = next.length;
}

///////////////////////////
// Core Queue Operations //
///////////////////////////

/**
 * Adds an element to the back of the queue. Never fails; a full queue grows.
 *
 * @example
 * ```ts
 * enqueue(queue, { name: 'tick', payload: { n: 1 } });
 * ```
 */
export function enqueue<T>(queue: Queue<T>, item: T): void {
  if (queue.size === queue.capacity) grow(queue);

  queue.items[queue.tail] = item;
  queue.tail = (queue.tail + 1) % queue.capacity;
  queue.size++;
}

/**
 * Removes and returns the front element.
 *
 * @returns The front element, or `undefined` if the queue is empty
 */
export function dequeue<T>(queue: Queue<T>): T | undefined {
  if (queue.size === 0) return undefined;

  const item = queue.items[queue.head];
  queue.items[queue.head] = undefined;  // release the reference
  queue.head = (queue.head + 1) % queue.capacity;
  queue.size--;

  return item;
}

////////////////////////////////
// Utility & Status Functions //
////////////////////////////////

/** Whether the queue holds no elements. */
export function isEmpty<T>(queue: Queue<T>): boolean {
  return queue.size === 0;
}

/** Number of elements currently queued. */
export function getSize<T>(queue: Queue<T>): number {
  return queue.size;
}

/**
 * Drops every element, keeping the current capacity.
 *
 * Truncating and restoring `length` releases all references at once instead
 * of dequeuing one by one.
 */
export function clear<T>(queue: Queue<T>): void {
  queue.items.length = 0;
  queue.items.length = queue.capacity;

  queue.head = 0;
  queue.tail = 0;
  queue.size = 0;
}
