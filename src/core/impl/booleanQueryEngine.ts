import { QueryError } from "../errors.js";
import type { BooleanIndex } from "../invertedIndex.js";
import type { QueryToken, QueryTokenizer } from "../tokenizer.js";
import type { DocId, PostingList } from "../types.js";
import { complement, intersect, union } from "./postingsAlgebra.js";
import { formatToken, insertImplicitAnd, toRpn } from "./queryParser.js";

export interface EngineDeps {
  tokenizer: QueryTokenizer;
  index: BooleanIndex;
}

/**
 * Evaluates boolean queries against a loaded index.
 *
 * Holds no per-query state: every `execute()` works on its own token list and
 * operand stack, so one engine can serve any number of independent queries.
 */
export class BooleanQueryEngine {
  constructor(private readonly deps: EngineDeps) {}

  /**
   * Matching doc ids, ascending.
   * @throws QueryError on unbalanced parentheses or operators missing operands
   */
  execute(query: string): DocId[] {
    const tokens = this.parse(query);
    if (!tokens) return [];
    return Array.from(this.evaluate(toRpn(tokens)));
  }

  /** Postfix form of the query, space separated; empty when the query has no term. */
  explain(query: string): string {
    const tokens = this.parse(query);
    if (!tokens) return "";
    return toRpn(tokens).map(formatToken).join(" ");
  }

  /** Infix tokens with implicit ANDs, or undefined when there is no term to look up. */
  private parse(query: string): QueryToken[] | undefined {
    const tokens = insertImplicitAnd(this.deps.tokenizer.tokenize(query));
    return tokens.some((t) => t.kind === "TERM") ? tokens : undefined;
  }

  private evaluate(rpn: readonly QueryToken[]): PostingList {
    const { index } = this.deps;
    const stack: PostingList[] = [];

    for (const tok of rpn) {
      switch (tok.kind) {
        case "TERM":
          stack.push(index.getPostings(tok.text));
          break;

        case "NOT": {
          const a = stack.pop();
          if (!a) throw new QueryError("MISSING_OPERAND", "NOT without operand");
          stack.push(complement(index.universe(), a));
          break;
        }

        case "AND":
        case "OR": {
          const b = stack.pop();
          const a = stack.pop();
          if (!a || !b) throw new QueryError("MISSING_OPERAND", "Binary operator without 2 operands");
          stack.push(tok.kind === "AND" ? intersect(a, b) : union(a, b));
          break;
        }

        default:
          throw new QueryError("BAD_EXPRESSION", `Unexpected token in RPN: ${formatToken(tok)}`);
      }
    }

    const result = stack.pop();
    if (!result || stack.length) throw new QueryError("BAD_EXPRESSION");
    return result;
  }
}
