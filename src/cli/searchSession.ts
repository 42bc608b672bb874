import { createInterface } from "node:readline";
import type { Readable } from "node:stream";

import { QueryError, SlowQueryLog, isSpace, type BooleanIndex, type BooleanQueryEngine, type DocId } from "../core/index.js";
import type { Logger } from "../logger.js";
import { formatReportBlock, formatReportError, formatResultLine } from "./report.js";
import type { TextSink } from "./sink.js";

export interface SearchOutputOptions {
  /** results printed per query; 0 prints all */
  k: number;
  /** size of the slow-query table */
  top: number;
  onlyDocId: boolean;
  /** false suppresses result lines on stdout */
  results: boolean;
  /** titles per query in the report file */
  topres: number;
}

export interface SearchSession {
  engine: BooleanQueryEngine;
  index: BooleanIndex;
  logger: Logger;
  out: TextSink;
  report?: TextSink;
  options: SearchOutputOptions;
}

function isBlank(line: string): boolean {
  for (let i = 0; i < line.length; i++) {
    if (!isSpace(line.charCodeAt(i))) return false;
  }
  return true;
}

/**
 * Runs every query line of `input` to completion, in order.
 *
 * Blank lines are skipped without a report block or timing record. A
 * malformed query logs one warning, counts as zero hits and does not stop
 * the session.
 */
export async function runQueries(input: Readable, session: SearchSession): Promise<SlowQueryLog> {
  const { engine, index, logger, out, report, options } = session;
  const slow = new SlowQueryLog(options.top);
  const rl = createInterface({ input, crlfDelay: Infinity });
  let lineNo = 0;

  for await (const line of rl) {
    lineNo++;
    if (isBlank(line)) continue;

    const started = performance.now();
    let docIds: DocId[];
    try {
      docIds = engine.execute(line);
    } catch (e) {
      if (!(e instanceof QueryError)) throw e;
      const millis = performance.now() - started;
      logger.warn({ line: lineNo, code: e.code, query: line }, `parse/eval error: ${e.message}`);
      slow.record({ millis, lineNo, query: line, hits: 0 });
      if (report) await report.write(formatReportError(line, e.message));
      continue;
    }
    const millis = performance.now() - started;

    slow.record({ millis, lineNo, query: line, hits: docIds.length });
    if (logger.isLevelEnabled("debug")) {
      logger.debug({ line: lineNo, rpn: engine.explain(line), hits: docIds.length, ms: millis }, "query");
    }

    if (report) await report.write(formatReportBlock(index, line, docIds, options.topres));

    if (!options.results) continue;
    let printed = 0;
    for (const d of docIds) {
      if (options.k && printed >= options.k) break;
      const text = formatResultLine(index, d, options.onlyDocId);
      if (text === undefined) continue;
      await out.write(text);
      printed++;
    }
  }

  return slow;
}
