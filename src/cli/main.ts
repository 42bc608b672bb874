#!/usr/bin/env node
/**
 * bindex CLI entry point.
 *
 * Commands:
 *   bindex build <tokens> <index> [documents]   - build a binary index
 *   bindex search <index> [options] < queries   - boolean retrieval
 *   bindex stats <index>                        - validate and describe an index
 */

import { createLogger } from "../logger.js";
import { run } from "./program.js";

process.exitCode = await run(process.argv, {
  stdin: process.stdin,
  stdout: process.stdout,
  stderr: process.stderr,
  logger: createLogger(),
});
