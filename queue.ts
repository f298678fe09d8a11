/**
 * An unbounded FIFO queue built on a circular buffer that doubles its
 * capacity whenever it fills up. Every subscriber's delivery queue sits on one
 * of these, so enqueue and dequeue stay O(1) (amortised) no matter how far a
 * slow subscriber falls behind, without the cost of `Array.shift()`.
 *
 * @example
 * ```ts
 * import { createQueue, enqueue, dequeue, getSize } from './queue.ts';
 *
 * const backlog = createQueue<string>(4);
 * enqueue(backlog, 'saved');
 * enqueue(backlog, 'renamed');
 *
 * dequeue(backlog);   // 'saved'
 * getSize(backlog);   // 1
 * ```
 *
 * @module
 */

///////////////////////
// Core Data Types   //
///////////////////////

/**
 * One occupied slot. Values are boxed so that `undefined` (the payload of a
 * zero-payload event) is distinguishable from an empty slot.
 */
interface Slot<T> {
  readonly value: T;
}

/**
 * Represents a growable circular buffer queue.
 *
 * @template T - The type of elements stored in the queue
 */
export interface Queue<T> {
  /** The backing array; empty slots hold `undefined` */
  items: Array<Slot<T> | undefined>;
  /** Index of the front element (next to dequeue) */
  head: number;
  /** Index where the next element will be written */
  tail: number;
  /** Current number of elements in the queue */
  size: number;
  /** Current length of the backing array */
  capacity: number;
}

////////////////////////////
// Factory & Core Setup   //
////////////////////////////

/**
 * Creates a new empty queue.
 *
 * @param initialCapacity - Slots allocated up front; the queue grows past this
 * on demand (default: 16)
 *
 * @example
 * ```ts
 * const numbers = createQueue<number>();
 * const bursts = createQueue<Uint8Array>(1024);  // expecting big bursts
 * ```
 */
export function createQueue<T>(initialCapacity: number = 16): Queue<T> {
  const capacity = Math.max(1, Math.floor(initialCapacity));
  return {
    items: new Array<Slot<T> | undefined>(capacity),
    head: 0,
    tail: 0,
    size: 0,
    capacity
  };
}

///////////////////////////
// Core Queue Operations //
///////////////////////////

/**
 * Adds an element to the back of the queue. When the backing array is full it
 * is reallocated at twice the size, with the elements laid out from index 0 in
 * FIFO order.
 *
 * @example
 * ```ts
 * enqueue(jobs, { id: 1 });
 * enqueue(jobs, { id: 2 });
 * ```
 */
export function enqueue<T>(queue: Queue<T>, item: T): void {
  if (queue.size === queue.capacity) {
    grow(queue);
  }

  queue.items[queue.tail] = { value: item };
  queue.tail = (queue.tail + 1) % queue.capacity;  // wrap around
  queue.size++;
}

/**
 * Removes and returns the front element.
 *
 * @throws {RangeError} If the queue is empty. Check {@link isEmpty} first.
 */
export function dequeue<T>(queue: Queue<T>): T {
  const slot = queue.items[queue.head];
  if (queue.size === 0 || slot === undefined) {
    throw new RangeError("Queue underflow: cannot dequeue from an empty queue");
  }

  queue.items[queue.head] = undefined;              // release the reference
  queue.head = (queue.head + 1) % queue.capacity;
  queue.size--;

  return slot.value;
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
 * Empties the queue, dropping every held reference at once. The current
 * capacity is kept.
 */
export function clear<T>(queue: Queue<T>): void {
  queue.items.length = 0;
  queue.items.length = queue.capacity;

  queue.head = 0;
  queue.tail = 0;
  queue.size = 0;
}

/**
 * Copies the queue's elements, front to back, into a new array. O(n); meant
 * for inspection and tests, not the hot path.
 */
export function toArray<T>(queue: Queue<T>): T[] {
  const result: T[] = [];
  for (let i = 0; i < queue.size; i++) {
    const slot = queue.items[(queue.head + i) % queue.capacity];
    if (slot !== undefined) result.push(slot.value);
  }
  return result;
}

function grow<T>(queue: Queue<T>): void {
  const capacity = queue.capacity * 2;
  const items = new Array<Slot<T> | undefined>(capacity);
  for (let i = 0; i < queue.size; i++) {
    items[i] = queue.items[(queue.head + i) % queue.capacity];
  }

  queue.items = items;
  queue.head = 0;
  queue.tail = queue.size;
  queue.capacity = capacity;
}
