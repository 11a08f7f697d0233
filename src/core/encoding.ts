import type { MatchSpan, TextInput } from "./types.js";

const encoder = new TextEncoder();
// keep a leading U+FEFF: it is part of the matched bytes
const decoder = new TextDecoder("utf-8", { ignoreBOM: true });

export const EMPTY_BYTES = new Uint8Array(0);

/** True when `s` has no unpaired UTF-16 surrogate, i.e. it has a UTF-8 encoding. */
export function isWellFormedText(s: string): boolean {
  for (let i = 0; i < s.length; i++) {
    const c = s.charCodeAt(i);
    if (c < 0xd800 || c > 0xdfff) continue;
    if (c > 0xdbff) return false;
    const next = s.charCodeAt(i + 1);
    if (!(next >= 0xdc00 && next <= 0xdfff)) return false;
    i++;
  }
  return true;
}

/**
 * Bytes are passed through untouched. Text is UTF-8 encoded; text with no
 * UTF-8 form becomes the empty input rather than an error.
 */
export function toBytes(input: TextInput): Uint8Array {
  if (typeof input !== "string") return input;
  if (!isWellFormedText(input)) return EMPTY_BYTES;
  return encoder.encode(input);
}

/** Fresh string for `bytes[span)`; invalid sequences decode to U+FFFD. */
export function decodeSpan(bytes: Uint8Array, span: MatchSpan): string {
  return decoder.decode(bytes.subarray(span.start, span.end));
}
