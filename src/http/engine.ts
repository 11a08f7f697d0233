import { PhraseSet, decodeSpan, toBytes, type DictionaryStats, type DictionaryStrategy, type MatchSpan, type TextInput } from "../core/index.js";

export interface MatchQuery {
  input: TextInput;
  maxNgramSize: number;
  withOffsets: boolean;
}

export interface MatchResponse {
  matches: string[];
  spans?: MatchSpan[];
}

export interface Engine {
  contains(input: TextInput): boolean;
  match(q: MatchQuery): MatchResponse;
  stats(): DictionaryStats;
}

export interface EngineOptions {
  strategy?: DictionaryStrategy;
}

const BASE64_RE = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * Raw-bytes request field. Strict: `Buffer.from(s, "base64")` alone would
 * silently skip characters outside the alphabet.
 */
export function decodeBytesField(field: string): Uint8Array {
  if (!BASE64_RE.test(field)) {
    throw new Error("invalid base64");
  }
  return Buffer.from(field, "base64");
}

export function createInMemoryEngine(corpus: TextInput = "", opts: EngineOptions = {}): Engine {
  const set = new PhraseSet(corpus, { strategy: opts.strategy });

  return {
    contains(input) {
      return set.contains(input);
    },
    match(q) {
      if (!q.withOffsets) {
        return { matches: set.findAllMatches(q.input, q.maxNgramSize) };
      }
      // encode once so the offsets and the decoded strings share one buffer
      const bytes = toBytes(q.input);
      const spans = set.findAllSpans(bytes, q.maxNgramSize);
      return { matches: spans.map((s) => decodeSpan(bytes, s)), spans };
    },
    stats() {
      return set.getStats();
    },
  };
}
