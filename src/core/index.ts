export * from "./types.js";
export type { Dictionary } from "./dictionary.js";
export type { Matcher } from "./matcher.js";
export type { Deque } from "./deque.js";
export { toBytes, decodeSpan, isWellFormedText, EMPTY_BYTES } from "./encoding.js";
export * from "./impl/index.js";
