/** Shared core types used by module contracts. */

/** 0-based, contiguous document number; stored as u32 on disk. */
export type DocId = number;
export type Term = string;

/** One `(doc id, term)` pair from the token stream. */
export interface TokenPair {
  docId: DocId;
  term: Term;
}

export interface DictEntry {
  term: Term;
  /** number of distinct documents containing the term */
  df: number;
  /** byte offset of the term's slice in the postings array */
  postingsOffset: number;
}

/** Forward-table row. */
export interface DocInfo {
  url: string;
  title: string;
}

export interface IndexMeta {
  docCount: number;
  totalTokens: number;
  uniqueTerms: number;
  /** average term length in bytes over all tokens */
  avgTermLength: number;
  buildMillis: number;
}

/** Ascending, duplicate-free doc ids. */
export type PostingList = ArrayLike<DocId>;
