/**
 * `bindex build` - token stream in, binary index out.
 */

import { open, readFile, type FileHandle } from "node:fs/promises";
import { Command } from "commander";

import {
  DEFAULT_URL_KEY,
  IndexBuilder,
  IndexError,
  extractUrls,
  readTokenStream,
  writeIndexFile,
  type IndexMeta,
  type TokenStreamStats,
} from "../../core/index.js";
import type { Logger } from "../../logger.js";
import type { CliIo } from "../program.js";
import { streamSink, type TextSink } from "../sink.js";

export interface BuildParams {
  tokensPath: string;
  indexPath: string;
  documentsPath?: string;
  urlKey: string;
}

export interface BuildResult {
  meta: IndexMeta;
  bytes: number;
  stats: TokenStreamStats;
}

async function readUrls(path: string, key: string, logger: Logger): Promise<string[]> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (e) {
    throw new IndexError("IO_ERROR", `cannot open documents file: ${path}`, { cause: e });
  }
  const urls = extractUrls(text, key);
  if (!urls.length) logger.warn({ path, key }, "no urls found in documents file, using placeholder titles");
  return urls;
}

export async function runBuild(params: BuildParams, logger: Logger): Promise<BuildResult> {
  const builder = new IndexBuilder();
  const stats: TokenStreamStats = { lines: 0, skipped: 0 };

  let handle: FileHandle;
  try {
    handle = await open(params.tokensPath, "r");
  } catch (e) {
    throw new IndexError("IO_ERROR", `cannot open tokens file: ${params.tokensPath}`, { cause: e });
  }
  try {
    for await (const pair of readTokenStream(handle.createReadStream({ encoding: "utf8", autoClose: false }), stats)) {
      builder.add(pair.docId, pair.term);
    }
  } finally {
    await handle.close();
  }
  logger.debug({ lines: stats.lines, skipped: stats.skipped }, "token stream read");

  const urls = params.documentsPath ? await readUrls(params.documentsPath, params.urlKey, logger) : [];
  const data = builder.build({ urls });
  const bytes = await writeIndexFile(params.indexPath, data);

  logger.info({ path: params.indexPath, bytes, docs: data.meta.docCount, terms: data.meta.uniqueTerms }, "index written");
  return { meta: data.meta, bytes, stats };
}

export async function printBuildSummary(out: TextSink, indexPath: string, meta: IndexMeta): Promise<void> {
  const perMs = meta.buildMillis > 0 ? meta.totalTokens / meta.buildMillis : 0;
  await out.write(
    [
      `OK: wrote ${indexPath}`,
      `Docs: ${meta.docCount}`,
      `Total tokens: ${meta.totalTokens}`,
      `Unique terms: ${meta.uniqueTerms}`,
      `Avg term length (bytes): ${meta.avgTermLength.toFixed(3)}`,
      `Indexing time (ms): ${meta.buildMillis.toFixed(3)}`,
      `Tokens per ms: ${perMs.toFixed(3)} (~${Math.round(perMs * 1000)} tokens/s)`,
      `Time per document (ms/doc): ${(meta.buildMillis / meta.docCount).toFixed(6)}`,
      "",
    ].join("\n"),
  );
}

export function buildCommand(io: CliIo): Command {
  return new Command("build")
    .description("build a binary index from a token stream")
    .argument("<tokens>", "token stream: one `<doc-id> <term>` pair per line")
    .argument("<index>", "output index file")
    .argument("[documents]", "optional JSON-ish documents dump providing one url per doc id")
    .option("--url-key <key>", "key whose string values are the document urls", DEFAULT_URL_KEY)
    .action(async (tokensPath: string, indexPath: string, documentsPath: string | undefined, opts: { urlKey: string }) => {
      const { meta } = await runBuild({ tokensPath, indexPath, documentsPath, urlKey: opts.urlKey }, io.logger);
      await printBuildSummary(streamSink(io.stdout), indexPath, meta);
    });
}
