import type { Deque } from "../deque.js";

const INITIAL_CAPACITY = 8;

/**
 * Growable ring buffer. Capacity doubles when full and never shrinks, so a
 * deque reused across calls stops allocating once it has seen its peak size.
 * Items may not be `undefined`, which marks a free slot.
 */
export class RingDeque<T extends {}> implements Deque<T> {
  private data: Array<T | undefined>;
  private head = 0;
  private length = 0;

  constructor(initialCapacity: number = INITIAL_CAPACITY) {
    this.data = new Array<T | undefined>(Math.max(1, initialCapacity));
  }

  get size(): number {
    return this.length;
  }

  pushBack(item: T): void {
    if (this.length === this.data.length) this.grow();
    this.data[(this.head + this.length) % this.data.length] = item;
    this.length++;
  }

  popFront(): T | undefined {
    if (this.length === 0) return undefined;
    const item = this.data[this.head];
    this.data[this.head] = undefined;
    this.head = (this.head + 1) % this.data.length;
    this.length--;
    return item;
  }

  peekFront(): T | undefined {
    return this.length ? this.data[this.head] : undefined;
  }

  clear(): void {
    this.data.fill(undefined);
    this.head = 0;
    this.length = 0;
  }

  *[Symbol.iterator](): Iterator<T> {
    for (let i = 0; i < this.length; i++) {
      const item = this.data[(this.head + i) % this.data.length];
      if (item !== undefined) yield item;
    }
  }

  private grow(): void {
    const next = new Array<T | undefined>(this.data.length * 2);
    for (let i = 0; i < this.length; i++) {
      next[i] = this.data[(this.head + i) % this.data.length];
    }
    this.data = next;
    this.head = 0;
  }
}
