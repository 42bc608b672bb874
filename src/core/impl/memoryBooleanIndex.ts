import type { BooleanIndex } from "../invertedIndex.js";
import { POSTING_BYTES, type IndexData } from "../indexFormat.js";
import type { DictEntry, DocId, DocInfo, IndexMeta, PostingList, Term } from "../types.js";

const EMPTY: PostingList = new Uint32Array(0);

/**
 * Loaded, immutable boolean index.
 *
 * Data structure:
 * - dictionary sorted by key bytes; binary search runs over the stored keys, so a
 *   term that is not valid UTF-8 keeps its place
 * - one flat Uint32Array of postings; lookups hand out subarray views, never copies
 * - universe `0..docCount-1` built once at construction
 */
export class MemoryBooleanIndex implements BooleanIndex {
  private readonly keys: readonly Buffer[];
  private readonly all: Uint32Array;

  constructor(private readonly data: IndexData) {
    this.keys = data.keys ?? data.dictionary.map((e) => Buffer.from(e.term, "utf8"));
    this.all = new Uint32Array(data.meta.docCount);
    for (let d = 0; d < this.all.length; d++) this.all[d] = d;
  }

  getPostings(term: Term): PostingList {
    const i = this.find(term);
    if (i < 0) return EMPTY;
    const e = this.data.dictionary[i];
    const from = e.postingsOffset / POSTING_BYTES;
    return this.data.postings.subarray(from, from + e.df);
  }

  hasTerm(term: Term): boolean {
    return this.find(term) >= 0;
  }

  getDocument(docId: DocId): DocInfo | undefined {
    return docId >= 0 && docId < this.data.documents.length ? this.data.documents[docId] : undefined;
  }

  universe(): PostingList {
    return this.all;
  }

  entries(): readonly DictEntry[] {
    return this.data.dictionary;
  }

  getStats(): IndexMeta {
    return { ...this.data.meta };
  }

  /** lower-bound binary search; index of the exact match or -1 */
  private find(term: Term): number {
    const key = Buffer.from(term, "utf8");
    let lo = 0;
    let hi = this.keys.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (Buffer.compare(this.keys[mid], key) < 0) lo = mid + 1;
      else hi = mid;
    }
    return lo < this.keys.length && this.keys[lo].equals(key) ? lo : -1;
  }
}
