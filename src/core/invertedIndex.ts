import type { DictEntry, DocId, DocInfo, IndexMeta, PostingList, Term } from "./types.js";

/**
 * Read-only boolean inverted index: term -> sorted doc ids, doc id -> url/title.
 *
 * Contract notes:
 * - `getPostings` returns ascending, duplicate-free doc ids; an unknown term yields an empty list
 * - nothing mutates the index once it is constructed
 */
export interface BooleanIndex {
  getPostings(term: Term): PostingList;
  hasTerm(term: Term): boolean;

  getDocument(docId: DocId): DocInfo | undefined;
  /** every valid doc id, `0 .. docCount-1` */
  universe(): PostingList;

  entries(): readonly DictEntry[];
  getStats(): IndexMeta;
}
