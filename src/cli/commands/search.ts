/**
 * `bindex search` - boolean queries from stdin against a built index.
 */

import { open, type FileHandle } from "node:fs/promises";
import { Command } from "commander";

import {
  BooleanQueryEngine,
  BooleanQueryTokenizer,
  IndexError,
  MemoryBooleanIndex,
  loadIndexFile,
} from "../../core/index.js";
import type { Logger } from "../../logger.js";
import type { CliIo } from "../program.js";
import { parseCount } from "../options.js";
import { formatSlowQueryTable } from "../report.js";
import { runQueries } from "../searchSession.js";
import { fileSink, streamSink } from "../sink.js";

interface SearchCommandOptions {
  k: number;
  top: number;
  onlyDocid?: boolean;
  results: boolean;
  report?: string;
  topres: number;
}

export async function openIndex(path: string, logger: Logger): Promise<MemoryBooleanIndex> {
  const started = performance.now();
  const index = new MemoryBooleanIndex(await loadIndexFile(path));
  const meta = index.getStats();
  logger.info({ path, docs: meta.docCount, terms: index.entries().length, ms: performance.now() - started }, "index loaded");
  return index;
}

export function searchCommand(io: CliIo): Command {
  const { logger } = io;
  return new Command("search")
    .description("answer boolean queries (one per stdin line) against an index")
    .argument("<index>", "index file written by `build`")
    .option("--k <n>", "max results printed per query, 0 for all", parseCount, 0)
    .option("--top <n>", "size of the slowest-queries table", parseCount, 10)
    .option("--only-docid", "print doc ids only")
    .option("--no-results", "do not print results")
    .option("--report <path>", "write a per-query report file")
    .option("--topres <n>", "titles per query in the report file", parseCount, 50)
    .action(async (indexPath: string, opts: SearchCommandOptions) => {
      const index = await openIndex(indexPath, logger);
      const engine = new BooleanQueryEngine({ tokenizer: new BooleanQueryTokenizer(), index });

      let reportHandle: FileHandle | undefined;
      if (opts.report) {
        try {
          reportHandle = await open(opts.report, "w");
        } catch (e) {
          throw new IndexError("IO_ERROR", `cannot open report file: ${opts.report}`, { cause: e });
        }
      }

      try {
        const slow = await runQueries(io.stdin, {
          engine,
          index,
          logger,
          out: streamSink(io.stdout),
          report: reportHandle ? fileSink(reportHandle) : undefined,
          options: {
            k: opts.k,
            top: opts.top,
            onlyDocId: opts.onlyDocid ?? false,
            results: opts.results,
            topres: opts.topres,
          },
        });
        const slowest = slow.slowest();
        if (slowest.length) await streamSink(io.stderr).write(formatSlowQueryTable(slowest));
      } finally {
        await reportHandle?.close();
      }
    });
}
