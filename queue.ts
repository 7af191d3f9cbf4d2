/**
 * An unbounded FIFO queue backed by a growable circular buffer.
 *
 * Every operation except growth runs in O(1). When the buffer fills up it
 * doubles and re-lays the items out front to back, so a queue created with a
 * small capacity hint still accepts any number of items. The hint only sizes
 * the first allocation.
 *
 * This is the buffer an {@link EventSubject} parks values in while no
 * consumer is attached.
 *
 * @example
 * ```ts
 * import { createQueue, enqueue, dequeue, discard, clear } from './queue.ts';
 *
 * const backlog = createQueue<string>(2);   // room for 2 before it grows
 * enqueue(backlog, 'order-123');
 * enqueue(backlog, 'order-124');
 * enqueue(backlog, 'order-125');             // grows to 4 slots
 *
 * console.log(dequeue(backlog));             // 'order-123' (removes and returns)
 * discard(backlog, 1);                       // drops 'order-124'
 *
 * clear(backlog);                            // empty the queue instantly
 * ```
 *
 * @module
 */

///////////////////////
// Core Data Types   //
///////////////////////

/**
 * Represents a growable circular buffer used for FIFO operations.
 *
 * @template T - The type of elements stored in the queue
 */
export interface Queue<T> {
  /** The backing array; slots outside `[head, head + size)` are `undefined` */
  items: (T | undefined)[];
  /** Index pointing to the front element (next to dequeue) */
  head: number;
  /** Index pointing to where the next element will be added */
  tail: number;
  /** Current number of elements in the queue */
  size: number;
  /** Current number of slots in the backing array */
  capacity: number;
}

/** Number of slots a queue starts with when no hint is given. */
export const DEFAULT_CAPACITY_HINT = 16;

////////////////////////////
// Factory & Core Setup   //
////////////////////////////

/**
 * Creates a new empty queue.
 *
 * @param capacityHint - Slots to preallocate; the queue grows past it on demand
 *
 * @example
 * ```ts
 * const messages = createQueue<string>(64);   // expecting bursts of ~64
 * const numbers = createQueue<number>();      // uses the default hint
 * ```
 */
export function createQueue<T>(capacityHint: number = DEFAULT_CAPACITY_HINT): Queue<T> {
  const capacity = Math.max(1, Math.floor(capacityHint));
  return {
    items: new Array<T | undefined>(capacity).fill(undefined),
    head: 0,
    tail: 0,
    size: 0,
    capacity,
  };
}

/////////////////////////////
// Core Queue Operations   //
/////////////////////////////

/**
 * Adds an element to the back of the queue. Never fails; a full buffer is
 * doubled first.
 *
 * @example
 * ```ts
 * enqueue(userQueue, { id: 123, name: 'Alice' });
 * enqueue(userQueue, { id: 124, name: 'Bob' });
 * ```
 */
export function enqueue<T>(queue: Queue<T>, item: T): void {
  if (queue.size === queue.capacity) {
    grow(queue);
  }

  queue.items[queue.tail] = item;
  queue.tail = (queue.tail + 1) % queue.capacity;  // wrap around using modulo
  queue.size++;
}

/**
 * Removes and returns the front element from the queue.
 *
 * @returns The front element, or undefined if queue is empty
 *
 * @example
 * ```ts
 * const next = dequeue(taskQueue);
 * if (next !== undefined) {
 *   console.log('Processing:', next);
 * }
 * ```
 */
export function dequeue<T>(queue: Queue<T>): T | undefined {
  if (queue.size === 0) {
    return undefined;
  }

  const item = queue.items[queue.head];
  queue.items[queue.head] = undefined;                  // help garbage collector
  queue.head = (queue.head + 1) % queue.capacity;
  queue.size--;

  return item;
}

////////////////////////////////
// Utility & Status Functions //
////////////////////////////////

/**
 * Checks if the queue contains no elements.
 */
export function isEmpty<T>(queue: Queue<T>): boolean {
  return queue.size === 0;
}

/**
 * Returns the current number of elements in the queue.
 */
export function getSize<T>(queue: Queue<T>): number {
  return queue.size;
}

/**
 * Drops up to `count` elements from the front of the queue.
 *
 * @returns How many elements were actually dropped
 *
 * @example
 * ```ts
 * // forget the three oldest messages, keep anything newer
 * discard(messages, 3);
 * ```
 */
export function discard<T>(queue: Queue<T>, count: number): number {
  const n = Math.min(Math.max(0, count), queue.size);
  for (let i = 0; i < n; i++) {
    queue.items[queue.head] = undefined;
    queue.head = (queue.head + 1) % queue.capacity;
  }
  queue.size -= n;
  return n;
}

/**
 * Empties the queue, releasing every reference it holds. The backing array
 * keeps its current capacity.
 */
export function clear<T>(queue: Queue<T>): void {
  queue.items.fill(undefined);
  queue.head = 0;
  queue.tail = 0;
  queue.size = 0;
}

/////////////////////////////
// Internal                //
/////////////////////////////

/**
 * Doubles the backing array, moving items so the front sits at index 0.
 * @internal
 */
function grow<T>(queue: Queue<T>): void {
  const capacity = queue.capacity * 2;
  const items = new Array<T | undefined>(capacity).fill(undefined);
  for (let i = 0; i < queue.size; i++) {
    items[i] = queue.items[(queue.head + i) % queue.capacity];
  }

  queue.items = items;
  queue.head = 0;
  queue.tail = queue.size;
  queue.capacity = capacity;
}
