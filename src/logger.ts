/**
 * Structured logger.
 *
 * JSON lines on stderr (fd 2) so stdout carries nothing but query results and
 * build summaries.
 */

import { pino, destination as pinoDestination, type DestinationStream, type Level, type Logger } from "pino";

const LEVELS: readonly Level[] = ["fatal", "error", "warn", "info", "debug", "trace"];

/** `LOG_LEVEL` value to a pino level; unknown or missing means info. */
export function resolveLevel(raw: string | undefined): Level | "silent" {
  const v = raw?.trim().toLowerCase();
  if (v === "silent") return v;
  return LEVELS.find((l) => l === v) ?? "info";
}

export interface LoggerOptions {
  /** defaults to stderr */
  destination?: DestinationStream;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const { destination = pinoDestination(2) } = options;
  return pino({ name: "bindex", level: resolveLevel(process.env.LOG_LEVEL) }, destination);
}

export type { Logger };
