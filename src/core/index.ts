export * from "./types.js";
export * from "./errors.js";
export * from "./indexFormat.js";
export type { BooleanIndex } from "./invertedIndex.js";
export type { QueryToken, QueryTokenKind, QueryTokenizer } from "./tokenizer.js";
export type { Heap } from "./heap.js";
export * from "./impl/index.js";
