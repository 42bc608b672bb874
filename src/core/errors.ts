export type IndexErrorCode =
  | "IO_ERROR"
  | "BAD_MAGIC"
  | "UNSUPPORTED_VERSION"
  | "SECTION_NOT_FOUND"
  | "TRUNCATED"
  | "MISALIGNED_POSTINGS"
  | "POSTINGS_OUT_OF_RANGE"
  | "DICT_NOT_SORTED"
  | "FORWARD_META_MISMATCH"
  | "TERM_TOO_LONG"
  | "NO_TOKENS";

export type QueryErrorCode = "UNMATCHED_LPAREN" | "UNMATCHED_RPAREN" | "MISSING_OPERAND" | "BAD_EXPRESSION";

/**
 * Structural failure while building or loading an index.
 *
 * Always fatal: the index is either written completely or not served at all.
 */
export class IndexError extends Error {
  readonly code: IndexErrorCode;

  constructor(code: IndexErrorCode, detail: string, options?: { cause?: unknown }) {
    super(`${codeToTitle(code)}: ${detail}`, options);
    this.name = "IndexError";
    this.code = code;
  }
}

/** Malformed boolean query. Reported per query; the engine moves on to the next line. */
export class QueryError extends Error {
  readonly code: QueryErrorCode;

  constructor(code: QueryErrorCode, detail?: string) {
    super(detail ?? codeToTitle(code));
    this.name = "QueryError";
    this.code = code;
  }
}

export function codeToTitle(code: IndexErrorCode | QueryErrorCode): string {
  switch (code) {
    case "IO_ERROR":
      return "i/o error";
    case "BAD_MAGIC":
      return "bad magic";
    case "UNSUPPORTED_VERSION":
      return "unsupported version";
    case "SECTION_NOT_FOUND":
      return "section not found";
    case "TRUNCATED":
      return "truncated index";
    case "MISALIGNED_POSTINGS":
      return "misaligned postings";
    case "POSTINGS_OUT_OF_RANGE":
      return "postings out of range";
    case "DICT_NOT_SORTED":
      return "dictionary not sorted";
    case "FORWARD_META_MISMATCH":
      return "forward/meta mismatch";
    case "TERM_TOO_LONG":
      return "term too long";
    case "NO_TOKENS":
      return "no tokens";
    case "UNMATCHED_LPAREN":
      return "Unmatched '('";
    case "UNMATCHED_RPAREN":
      return "Unmatched ')'";
    case "MISSING_OPERAND":
      return "operator without operand";
    case "BAD_EXPRESSION":
      return "Bad expression";
  }
}

export function isIndexError(e: unknown): e is IndexError {
  return e instanceof IndexError;
}
