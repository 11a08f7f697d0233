export const NEWLINE = 0x0a;
export const SPACE = 0x20;

export function countByte(bytes: Uint8Array, byte: number): number {
  let n = 0;
  let i = bytes.indexOf(byte);
  while (i !== -1) {
    n++;
    i = bytes.indexOf(byte, i + 1);
  }
  return n;
}

/**
 * Calls `visit(start, end)` for every newline-terminated run of `bytes`,
 * empty runs included, then once more for the run after the last newline
 * only when that run is non-empty. So `"a\n\nb"` visits `a`, `""`, `b` while
 * `"a\nb\n"` visits just `a`, `b`.
 */
export function splitLines(bytes: Uint8Array, visit: (start: number, end: number) => void): void {
  let start = 0;
  let nl = bytes.indexOf(NEWLINE);
  while (nl !== -1) {
    visit(start, nl);
    start = nl + 1;
    nl = bytes.indexOf(NEWLINE, start);
  }
  if (start < bytes.length) visit(start, bytes.length);
}

export function assertRange(bytes: Uint8Array, start: number, end: number): void {
  if (!(start >= 0 && start <= end && end <= bytes.length)) {
    throw new RangeError(`range [${start}, ${end}) outside buffer of ${bytes.length} bytes`);
  }
}
