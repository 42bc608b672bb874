import type { BooleanIndex, DocId, QueryTiming } from "../core/index.js";

/** `docId` alone, or `docId<TAB>title<TAB>url`. */
export function formatResultLine(index: BooleanIndex, docId: DocId, onlyDocId: boolean): string | undefined {
  if (onlyDocId) return `${docId}\n`;
  const doc = index.getDocument(docId);
  if (!doc) return undefined;
  return `${docId}\t${doc.title}\t${doc.url}\n`;
}

/**
 * Per-query block for the report file:
 *
 *   QUERY<TAB>text
 *   HITS<TAB>n
 *   title<TAB>url      (at most `maxTitles` lines)
 *   <blank line>
 */
export function formatReportBlock(index: BooleanIndex, query: string, docIds: readonly DocId[], maxTitles: number): string {
  let out = `QUERY\t${query}\nHITS\t${docIds.length}\n`;
  let emitted = 0;
  for (const d of docIds) {
    if (emitted >= maxTitles) break;
    const doc = index.getDocument(d);
    if (!doc) continue;
    out += `${doc.title}\t${doc.url}\n`;
    emitted++;
  }
  return out + "\n";
}

export function formatReportError(query: string, message: string): string {
  return `QUERY\t${query}\nHITS\t0\nERROR\t${message}\n\n`;
}

export function formatSlowQueryTable(slowest: readonly QueryTiming[]): string {
  let out = `---- TOP ${slowest.length} slowest queries ----\n`;
  out += "rank\tms\tline\thits\tquery\n";
  slowest.forEach((t, i) => {
    out += `${i + 1}\t${t.millis.toFixed(3)}\t${t.lineNo}\t${t.hits}\t${t.query}\n`;
  });
  return out + `${"-".repeat(32)}\n`;
}
