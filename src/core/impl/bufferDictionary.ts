import type { Dictionary } from "../dictionary.js";
import type { DictionaryStats } from "../types.js";
import { NEWLINE, assertRange, countByte, splitLines } from "./lines.js";

const FNV_OFFSET_BASIS = 2166136261;
const FNV_PRIME = 16777619;

/** 32-bit FNV-1a over `bytes[start, end)`; depends on content only, never on the view. */
export function fnv1a(bytes: Uint8Array, start: number, end: number): number {
  let h = FNV_OFFSET_BASIS;
  for (let i = start; i < end; i++) {
    h ^= bytes[i] ?? 0;
    h = Math.imul(h, FNV_PRIME);
  }
  return h >>> 0;
}

function nextPowerOf2(n: number): number {
  let p = 1;
  while (p < n) p <<= 1;
  return p;
}

/**
 * Zero-copy dictionary.
 *
 * Data structure:
 * - `mem`: private copy of the corpus, the only place entry bytes live
 * - entry i is `mem[starts[i], starts[i] + lengths[i])`
 * - chained hash table: `buckets[hash & mask]` -> first entry, `chains[i]` -> next
 *
 * The table is sized once from the newline count and never rehashed.
 * Lookups over a caller's buffer hash and compare in place.
 */
export class BufferDictionary implements Dictionary {
  private readonly mem: Uint8Array;
  private readonly starts: Uint32Array;
  private readonly lengths: Uint32Array;
  private readonly hashes: Uint32Array;
  private readonly chains: Int32Array;
  private readonly buckets: Int32Array;
  private readonly mask: number;
  private count = 0;

  constructor(corpus: Uint8Array) {
    // copy: the caller may reuse or mutate its buffer afterwards
    this.mem = new Uint8Array(corpus);

    const capacity = countByte(this.mem, NEWLINE) + 1;
    const tableSize = nextPowerOf2(capacity);
    this.mask = tableSize - 1;
    this.buckets = new Int32Array(tableSize).fill(-1);
    this.starts = new Uint32Array(capacity);
    this.lengths = new Uint32Array(capacity);
    this.hashes = new Uint32Array(capacity);
    this.chains = new Int32Array(capacity).fill(-1);

    splitLines(this.mem, (start, end) => this.insert(start, end));
  }

  get size(): number {
    return this.count;
  }

  contains(bytes: Uint8Array): boolean {
    return this.containsRange(bytes, 0, bytes.length);
  }

  containsRange(bytes: Uint8Array, start: number, end: number): boolean {
    assertRange(bytes, start, end);
    return this.find(bytes, start, end, fnv1a(bytes, start, end)) !== -1;
  }

  *entries(): Iterable<Uint8Array> {
    for (let i = 0; i < this.count; i++) {
      const off = this.starts[i] ?? 0;
      yield this.mem.subarray(off, off + (this.lengths[i] ?? 0));
    }
  }

  getStats(): DictionaryStats {
    return { entryCount: this.count, corpusBytes: this.mem.length };
  }

  private insert(start: number, end: number): void {
    const hash = fnv1a(this.mem, start, end);
    if (this.find(this.mem, start, end, hash) !== -1) return;

    const idx = this.count++;
    const slot = hash & this.mask;
    this.starts[idx] = start;
    this.lengths[idx] = end - start;
    this.hashes[idx] = hash;
    this.chains[idx] = this.buckets[slot] ?? -1;
    this.buckets[slot] = idx;
  }

  private find(bytes: Uint8Array, start: number, end: number, hash: number): number {
    let idx = this.buckets[hash & this.mask] ?? -1;
    while (idx !== -1) {
      if (this.hashes[idx] === hash && this.entryEquals(idx, bytes, start, end)) return idx;
      idx = this.chains[idx] ?? -1;
    }
    return -1;
  }

  private entryEquals(idx: number, bytes: Uint8Array, start: number, end: number): boolean {
    const length = this.lengths[idx] ?? 0;
    if (length !== end - start) return false;

    const off = this.starts[idx] ?? 0;
    for (let i = 0; i < length; i++) {
      if (this.mem[off + i] !== bytes[start + i]) return false;
    }
    return true;
  }
}
