import type { Dictionary } from "../dictionary.js";
import type { Matcher } from "../matcher.js";
import type { MatchSpan } from "../types.js";
import { SPACE } from "./lines.js";
import { RingDeque } from "./ringDeque.js";

/**
 * Unsigned 32-bit conversion, then 0 -> 1. `2.5` is 2, `NaN` is 1 and `-1`
 * wraps to 4294967295 (effectively unbounded).
 */
export function normalizeNgramSize(maxNgramSize: number): number {
  const n = maxNgramSize >>> 0;
  return n === 0 ? 1 : n;
}

/**
 * Scans the query once, splitting on single space bytes only (two spaces in a
 * row make an empty word). The deque holds the start offsets of the last
 * `maxNgramSize` words. At every word end P each held start S, oldest first,
 * is tested as `query[S, P)`, so for a fixed end the longest n-gram comes
 * first and hits are reported in exactly that order.
 */
export class SlidingWindowMatcher implements Matcher {
  constructor(private readonly dictionary: Dictionary) {}

  findAllMatches(query: Uint8Array, maxNgramSize: number): MatchSpan[] {
    const windowSize = normalizeNgramSize(maxNgramSize);
    const out: MatchSpan[] = [];
    const starts = new RingDeque<number>(Math.min(windowSize, 64));
    const end = query.length;

    starts.pushBack(0);
    let from = 0;

    while (true) {
      let p = query.indexOf(SPACE, from);
      if (p === -1) p = end;

      for (const s of starts) {
        if (this.dictionary.containsRange(query, s, p)) out.push({ start: s, end: p });
      }

      if (starts.size === windowSize) starts.popFront();
      if (p === end) break;

      from = p + 1;
      starts.pushBack(from);
    }

    return out;
  }

  contains(query: Uint8Array): boolean {
    return this.dictionary.contains(query);
  }
}
