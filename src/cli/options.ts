import { InvalidArgumentError } from "commander";

/** Commander option parser for counts and limits: a plain non-negative integer. */
export function parseCount(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError("must be a non-negative integer");
  }
  const n = Number(value.trim());
  if (!Number.isSafeInteger(n)) {
    throw new InvalidArgumentError("too large");
  }
  return n;
}
