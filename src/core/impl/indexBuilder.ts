import { IndexError } from "../errors.js";
import { MAX_TERM_BYTES, POSTING_BYTES, type IndexData } from "../indexFormat.js";
import type { DictEntry, DocId, Term } from "../types.js";
import { buildForwardTable } from "./documentMetadata.js";
import { toLowerAscii } from "./tokenStream.js";

export interface BuildOptions {
  /** companion urls, assigned to doc ids 0..N-1 in order */
  urls?: readonly string[];
}

type TermRun = { key: Buffer; docs: DocId[] };

/**
 * Accumulates `(doc id, term)` pairs and lays them out as dictionary + postings.
 *
 * Data structure:
 * - term -> doc ids in arrival order (duplicates included until `build()`)
 *
 * `build()` orders terms by UTF-8 bytes, then sorts and de-duplicates each run.
 */
export class IndexBuilder {
  private readonly runs = new Map<Term, TermRun>();
  private readonly startedAt = performance.now();
  private maxDoc = -1;
  private totalTokens = 0;
  private termBytes = 0;

  add(docId: DocId, rawTerm: Term): void {
    const term = toLowerAscii(rawTerm);
    let run = this.runs.get(term);
    if (!run) {
      const key = Buffer.from(term, "utf8");
      if (key.length > MAX_TERM_BYTES) {
        throw new IndexError("TERM_TOO_LONG", `${key.length} bytes (max ${MAX_TERM_BYTES}), doc ${docId}: ${term.slice(0, 64)}...`);
      }
      run = { key, docs: [] };
      this.runs.set(term, run);
    }
    run.docs.push(docId);

    if (docId > this.maxDoc) this.maxDoc = docId;
    this.totalTokens++;
    this.termBytes += run.key.length;
  }

  build(options: BuildOptions = {}): IndexData {
    if (this.totalTokens === 0) throw new IndexError("NO_TOKENS", "no tokens parsed from input");

    const terms = Array.from(this.runs.entries());
    terms.sort((a, b) => Buffer.compare(a[1].key, b[1].key));

    const dictionary: DictEntry[] = [];
    const keys: Buffer[] = [];
    const postings = new Uint32Array(this.totalTokens);
    let used = 0;

    for (const [term, run] of terms) {
      const postingsOffset = used * POSTING_BYTES;
      const docs = run.docs.sort((a, b) => a - b);

      let last = -1;
      for (const d of docs) {
        if (d === last) continue;
        postings[used++] = d;
        last = d;
      }
      dictionary.push({ term, df: used - postingsOffset / POSTING_BYTES, postingsOffset });
      keys.push(run.key);
    }

    const docCount = this.maxDoc + 1;
    const buildMillis = performance.now() - this.startedAt;

    return {
      meta: {
        docCount,
        totalTokens: this.totalTokens,
        uniqueTerms: dictionary.length,
        avgTermLength: this.termBytes / this.totalTokens,
        buildMillis,
      },
      dictionary,
      keys,
      postings: postings.slice(0, used),
      documents: buildForwardTable(docCount, options.urls),
    };
  }
}
