import type { DictionaryStats } from "./types.js";

/**
 * Immutable set of byte strings built from a newline-separated corpus.
 *
 * Contract notes:
 * - equality is byte equality, no normalization of any kind
 * - nothing can be added or removed once the constructor returns
 * - `containsRange` must not retain or copy into the set the bytes it is given
 */
export interface Dictionary {
  readonly size: number;

  contains(bytes: Uint8Array): boolean;
  /** Membership of `bytes[start, end)` without slicing it out first. */
  containsRange(bytes: Uint8Array, start: number, end: number): boolean;

  /** Unique entries, in no particular order. */
  entries(): Iterable<Uint8Array>;

  getStats(): DictionaryStats;
}
