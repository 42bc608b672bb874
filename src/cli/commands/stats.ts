import { Command } from "commander";

import type { CliIo } from "../program.js";
import { streamSink } from "../sink.js";
import { openIndex } from "./search.js";

export function statsCommand(io: CliIo): Command {
  return new Command("stats")
    .description("validate an index and print its build statistics")
    .argument("<index>", "index file written by `build`")
    .action(async (indexPath: string) => {
      const index = await openIndex(indexPath, io.logger);
      const meta = index.getStats();
      const postings = index.entries().reduce((n, e) => n + e.df, 0);
      await streamSink(io.stdout).write(
        [
          `Docs: ${meta.docCount}`,
          `Total tokens: ${meta.totalTokens}`,
          `Unique terms: ${meta.uniqueTerms}`,
          `Dictionary entries: ${index.entries().length}`,
          `Postings: ${postings}`,
          `Avg term length (bytes): ${meta.avgTermLength.toFixed(3)}`,
          `Indexing time (ms): ${meta.buildMillis.toFixed(3)}`,
          "",
        ].join("\n"),
      );
    });
}
