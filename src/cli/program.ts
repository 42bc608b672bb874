import type { Readable, Writable } from "node:stream";
import { Command } from "commander";

import { isIndexError } from "../core/index.js";
import type { Logger } from "../logger.js";
import { buildCommand } from "./commands/build.js";
import { searchCommand } from "./commands/search.js";
import { statsCommand } from "./commands/stats.js";

const VERSION = "0.1.0";

/** Streams and logger a command runs against; `main.ts` passes the process's own. */
export interface CliIo {
  stdin: Readable;
  stdout: Writable;
  stderr: Writable;
  logger: Logger;
}

export function createProgram(io: CliIo): Command {
  const program = new Command()
    .name("bindex")
    .description("boolean inverted-index builder and search engine")
    .version(VERSION, "-v, --version", "show version number")
    .option("--debug", "enable debug logging")
    .hook("preAction", (cmd) => {
      if (cmd.opts<{ debug?: boolean }>().debug) io.logger.level = "debug";
    });

  program.addCommand(buildCommand(io));
  program.addCommand(searchCommand(io));
  program.addCommand(statsCommand(io));
  return program;
}

/**
 * Parses `argv` (node-style, program path first) and runs the command.
 *
 * @returns exit status: 0, or 1 after an `IndexError` has been logged as fatal
 */
export async function run(argv: string[], io: CliIo): Promise<number> {
  try {
    await createProgram(io).parseAsync(argv);
    return 0;
  } catch (e) {
    if (!isIndexError(e)) throw e;
    io.logger.fatal({ code: e.code }, e.message);
    return 1;
  }
}
