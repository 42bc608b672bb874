import type { Term } from "./types.js";

export type QueryToken =
  | { kind: "TERM"; text: Term }
  | { kind: "AND" }
  | { kind: "OR" }
  | { kind: "NOT" }
  | { kind: "LPAREN" }
  | { kind: "RPAREN" };

export type QueryTokenKind = QueryToken["kind"];

/**
 * Turns one query line into boolean query tokens.
 *
 * Contract notes:
 * - deterministic, single left-to-right scan
 * - TERM text is already case-folded
 */
export interface QueryTokenizer {
  tokenize(line: string): QueryToken[];
}
