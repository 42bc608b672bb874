import { createInterface } from "node:readline";
import type { Readable } from "node:stream";

import type { TokenPair } from "../types.js";

/** Largest doc id whose `docId + 1` still fits the u32 document count. */
export const MAX_DOC_ID = 0xfffffffe;

export function isSpace(code: number): boolean {
  // space, \t \n \v \f \r
  return code === 32 || (code >= 9 && code <= 13);
}

function isDigit(code: number): boolean {
  return code >= 48 && code <= 57;
}

/** Folds `A`-`Z` only; every other character passes through. */
export function toLowerAscii(s: string): string {
  return s.replace(/[A-Z]+/g, (m) => m.toLowerCase());
}

/**
 * Parses `<doc-id><whitespace><term>`.
 * Returns undefined for blank or malformed lines; anything after the term is ignored.
 */
export function parseTokenLine(line: string): TokenPair | undefined {
  const n = line.length;
  let i = 0;

  while (i < n && isSpace(line.charCodeAt(i))) i++;
  if (i >= n) return undefined;

  const digitsStart = i;
  while (i < n && isDigit(line.charCodeAt(i))) i++;
  if (i === digitsStart) return undefined;

  // leading zeros are fine; long digit runs overflow the bound check either way
  const docId = Number(line.slice(digitsStart, i));
  if (docId > MAX_DOC_ID) return undefined;

  if (i >= n || !isSpace(line.charCodeAt(i))) return undefined;
  while (i < n && isSpace(line.charCodeAt(i))) i++;
  if (i >= n) return undefined;

  const termStart = i;
  while (i < n && !isSpace(line.charCodeAt(i))) i++;

  return { docId, term: line.slice(termStart, i) };
}

export interface TokenStreamStats {
  lines: number;
  skipped: number;
}

/**
 * Streams token pairs out of a token file, one line at a time.
 * Malformed lines are skipped and only counted in `stats`.
 */
export async function* readTokenStream(input: Readable, stats?: TokenStreamStats): AsyncGenerator<TokenPair> {
  const rl = createInterface({ input, crlfDelay: Infinity });
  for await (const line of rl) {
    if (stats) stats.lines++;
    const pair = parseTokenLine(line);
    if (!pair) {
      if (stats) stats.skipped++;
      continue;
    }
    yield pair;
  }
}
