export { BufferDictionary, fnv1a } from "./bufferDictionary.js";
export { StringDictionary } from "./stringDictionary.js";
export { SlidingWindowMatcher, normalizeNgramSize } from "./slidingWindowMatcher.js";
export { RingDeque } from "./ringDeque.js";
export { PhraseSet, createDictionary, type PhraseSetOptions } from "./phraseSet.js";
export { splitLines, countByte } from "./lines.js";
