import { QueryError } from "../errors.js";
import type { QueryToken, QueryTokenKind } from "../tokenizer.js";

type OperatorKind = "AND" | "OR" | "NOT";
type StackToken = Extract<QueryToken, { kind: OperatorKind | "LPAREN" }>;

/** Binding strength; higher binds tighter. */
export const PRECEDENCE: Readonly<Record<OperatorKind, number>> = {
  NOT: 3,
  AND: 2,
  OR: 1,
};

function isRightAssoc(kind: OperatorKind): boolean {
  return kind === "NOT";
}

function isOperandLike(kind: QueryTokenKind): boolean {
  return kind === "TERM" || kind === "RPAREN";
}

function startsOperand(kind: QueryTokenKind): boolean {
  return kind === "TERM" || kind === "LPAREN" || kind === "NOT";
}

const AND: QueryToken = { kind: "AND" };

/** `a b` -> `a AND b`, `a (b)` -> `a AND (b)`, `a !b` -> `a AND !b`, `(a) b` -> `(a) AND b`. */
export function insertImplicitAnd(tokens: readonly QueryToken[]): QueryToken[] {
  const out: QueryToken[] = [];
  for (const tok of tokens) {
    const prev = out.length ? out[out.length - 1] : undefined;
    if (prev && isOperandLike(prev.kind) && startsOperand(tok.kind)) out.push(AND);
    out.push(tok);
  }
  return out;
}

/**
 * Shunting-yard conversion to postfix.
 *
 * Only parenthesis balance is checked here; operator arity errors surface
 * when the RPN is evaluated.
 */
export function toRpn(tokens: readonly QueryToken[]): QueryToken[] {
  const rpn: QueryToken[] = [];
  const ops: StackToken[] = [];

  for (const tok of tokens) {
    switch (tok.kind) {
      case "TERM":
        rpn.push(tok);
        break;

      case "LPAREN":
        ops.push(tok);
        break;

      case "RPAREN": {
        let top = ops.pop();
        while (top && top.kind !== "LPAREN") {
          rpn.push(top);
          top = ops.pop();
        }
        if (!top) throw new QueryError("UNMATCHED_RPAREN");
        break;
      }

      case "AND":
      case "OR":
      case "NOT": {
        const p = PRECEDENCE[tok.kind];
        while (ops.length) {
          const top = ops[ops.length - 1];
          if (top.kind === "LPAREN") break;
          const p2 = PRECEDENCE[top.kind];
          if (p2 > p || (p2 === p && !isRightAssoc(tok.kind))) {
            rpn.push(top);
            ops.pop();
          } else {
            break;
          }
        }
        ops.push(tok);
        break;
      }
    }
  }

  for (let top = ops.pop(); top; top = ops.pop()) {
    if (top.kind === "LPAREN") throw new QueryError("UNMATCHED_LPAREN");
    rpn.push(top);
  }
  return rpn;
}

export function formatToken(tok: QueryToken): string {
  switch (tok.kind) {
    case "TERM":
      return tok.text;
    case "AND":
      return "&";
    case "OR":
      return "|";
    case "NOT":
      return "!";
    case "LPAREN":
      return "(";
    case "RPAREN":
      return ")";
  }
}
