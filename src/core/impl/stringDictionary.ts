import type { Dictionary } from "../dictionary.js";
import type { DictionaryStats } from "../types.js";
import { assertRange, splitLines } from "./lines.js";

/**
 * One char per byte. Two keys are equal exactly when their bytes are, which
 * lets a plain `Set<string>` stand in for a byte-keyed set.
 */
function binaryKey(bytes: Uint8Array, start: number, end: number): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("latin1", start, end);
}

/**
 * Copy-based dictionary: every entry is its own string, and every lookup
 * builds a key for the range it tests. Same answers as `BufferDictionary`.
 */
export class StringDictionary implements Dictionary {
  private readonly set = new Set<string>();
  private readonly corpusBytes: number;

  constructor(corpus: Uint8Array) {
    this.corpusBytes = corpus.length;
    splitLines(corpus, (start, end) => {
      this.set.add(binaryKey(corpus, start, end));
    });
  }

  get size(): number {
    return this.set.size;
  }

  contains(bytes: Uint8Array): boolean {
    return this.set.has(binaryKey(bytes, 0, bytes.length));
  }

  containsRange(bytes: Uint8Array, start: number, end: number): boolean {
    assertRange(bytes, start, end);
    return this.set.has(binaryKey(bytes, start, end));
  }

  *entries(): Iterable<Uint8Array> {
    for (const key of this.set) yield Buffer.from(key, "latin1");
  }

  getStats(): DictionaryStats {
    return { entryCount: this.set.size, corpusBytes: this.corpusBytes };
  }
}
