/** Shared core types used by module contracts. */

/** Caller input: raw bytes, or text that is encoded to UTF-8 first. */
export type TextInput = Uint8Array | string;

/** Half-open byte range `[start, end)` into the buffer it was produced from. */
export interface MatchSpan {
  start: number;
  end: number;
}

export interface DictionaryStats {
  /** unique entries after deduplication */
  entryCount: number;
  /** size of the owned corpus copy */
  corpusBytes: number;
}

/**
 * - `buffer`: entries are views into one owned corpus buffer
 * - `string`: entries are independently owned keys
 */
export type DictionaryStrategy = "buffer" | "string";

export const DICTIONARY_STRATEGIES: readonly DictionaryStrategy[] = ["buffer", "string"];

export function isDictionaryStrategy(v: unknown): v is DictionaryStrategy {
  return v === "buffer" || v === "string";
}
