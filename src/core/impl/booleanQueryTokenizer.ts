import type { QueryToken, QueryTokenizer } from "../tokenizer.js";
import { isSpace, toLowerAscii } from "./tokenStream.js";

const AMP = 38; // &
const PIPE = 124; // |
const BANG = 33; // !
const LPAREN = 40;
const RPAREN = 41;

function isOperatorChar(code: number): boolean {
  return code === AMP || code === PIPE || code === BANG || code === LPAREN || code === RPAREN;
}

/**
 * Boolean query tokenizer:
 * - `(` `)` `!` are single-character tokens
 * - `&` / `&&` is AND, `|` / `||` is OR
 * - any other run of non-space, non-operator characters is a TERM, ASCII lower-cased
 */
export class BooleanQueryTokenizer implements QueryTokenizer {
  tokenize(line: string): QueryToken[] {
    const out: QueryToken[] = [];
    const n = line.length;
    let i = 0;

    while (i < n) {
      const c = line.charCodeAt(i);
      if (isSpace(c)) {
        i++;
        continue;
      }

      switch (c) {
        case LPAREN:
          out.push({ kind: "LPAREN" });
          i++;
          continue;
        case RPAREN:
          out.push({ kind: "RPAREN" });
          i++;
          continue;
        case BANG:
          out.push({ kind: "NOT" });
          i++;
          continue;
        case AMP:
        case PIPE:
          out.push(c === AMP ? { kind: "AND" } : { kind: "OR" });
          i += i + 1 < n && line.charCodeAt(i + 1) === c ? 2 : 1;
          continue;
      }

      const start = i;
      while (i < n) {
        const t = line.charCodeAt(i);
        if (isSpace(t) || isOperatorChar(t)) break;
        i++;
      }
      out.push({ kind: "TERM", text: toLowerAscii(line.slice(start, i)) });
    }

    return out;
  }
}
