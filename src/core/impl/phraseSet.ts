import type { Dictionary } from "../dictionary.js";
import type { Matcher } from "../matcher.js";
import type { DictionaryStats, DictionaryStrategy, MatchSpan, TextInput } from "../types.js";
import { decodeSpan, toBytes } from "../encoding.js";
import { BufferDictionary } from "./bufferDictionary.js";
import { StringDictionary } from "./stringDictionary.js";
import { SlidingWindowMatcher } from "./slidingWindowMatcher.js";

export interface PhraseSetOptions {
  /** defaults to `buffer` */
  strategy?: DictionaryStrategy;
}

export function createDictionary(corpus: Uint8Array, strategy: DictionaryStrategy = "buffer"): Dictionary {
  switch (strategy) {
    case "buffer":
      return new BufferDictionary(corpus);
    case "string":
      return new StringDictionary(corpus);
  }
}

/**
 * Dictionary plus matcher behind one handle: build once from a corpus, then
 * query it any number of times. Every method accepts bytes or text.
 */
export class PhraseSet {
  private readonly dictionary: Dictionary;
  private readonly matcher: Matcher;

  constructor(corpus: TextInput, options?: PhraseSetOptions) {
    this.dictionary = createDictionary(toBytes(corpus), options?.strategy);
    this.matcher = new SlidingWindowMatcher(this.dictionary);
  }

  get size(): number {
    return this.dictionary.size;
  }

  getStats(): DictionaryStats {
    return this.dictionary.getStats();
  }

  contains(needle: TextInput): boolean {
    return this.matcher.contains(toBytes(needle));
  }

  /** Offsets are into the UTF-8 bytes of `haystack`. */
  findAllSpans(haystack: TextInput, maxNgramSize: number): MatchSpan[] {
    return this.matcher.findAllMatches(toBytes(haystack), maxNgramSize);
  }

  findAllMatches(haystack: TextInput, maxNgramSize: number): string[] {
    const bytes = toBytes(haystack);
    return this.matcher.findAllMatches(bytes, maxNgramSize).map((span) => decodeSpan(bytes, span));
  }
}
