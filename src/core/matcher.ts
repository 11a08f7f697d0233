import type { MatchSpan } from "./types.js";

/**
 * Finds dictionary entries inside a query.
 *
 * Spans are returned in discovery order and point into the query that was
 * passed in; the same text found at two positions is reported twice.
 */
export interface Matcher {
  findAllMatches(query: Uint8Array, maxNgramSize: number): MatchSpan[];
  /** Whole-query membership, no tokenization. */
  contains(query: Uint8Array): boolean;
}
