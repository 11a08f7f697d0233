/**
 * Double-ended queue contract used for the matcher's pending n-gram starts.
 * Iteration runs front (oldest) to back (newest).
 */
export interface Deque<T> extends Iterable<T> {
  readonly size: number;
  pushBack(item: T): void;
  popFront(): T | undefined;
  peekFront(): T | undefined;
  clear(): void;
}
