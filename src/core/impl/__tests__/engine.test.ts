import { describe, expect, it } from "vitest";
import { QueryError } from "../../errors.js";
import { BooleanQueryEngine, BooleanQueryTokenizer, MemoryBooleanIndex } from "../../index.js";
import { buildPets } from "./fixtures.js";

function petsEngine(): BooleanQueryEngine {
  return new BooleanQueryEngine({
    tokenizer: new BooleanQueryTokenizer(),
    index: new MemoryBooleanIndex(buildPets()),
  });
}

function failure(engine: BooleanQueryEngine, query: string): QueryError | undefined {
  try {
    engine.execute(query);
  } catch (e) {
    if (e instanceof QueryError) return e;
    throw e;
  }
  return undefined;
}

describe("BooleanQueryEngine", () => {
  it("answers term, AND, NOT and OR queries", () => {
    const engine = petsEngine();
    expect(engine.execute("dog")).toEqual([0, 1]);
    expect(engine.execute("cat & dog")).toEqual([0]);
    expect(engine.execute("!dog")).toEqual([2]);
    expect(engine.execute("cat | bird")).toEqual([0, 2]);
  });

  it("treats juxtaposition as AND", () => {
    const engine = petsEngine();
    expect(engine.execute("cat dog")).toEqual(engine.execute("cat && dog"));
    expect(engine.execute("dog !cat")).toEqual([1]);
  });

  it("evaluates AND before OR", () => {
    const engine = petsEngine();
    expect(engine.execute("dog | cat & bird")).toEqual([0, 1]);
    expect(engine.execute("(dog | cat) & bird")).toEqual([]);
  });

  it("folds query case and accepts operators without spaces", () => {
    const engine = petsEngine();
    expect(engine.execute("CAT")).toEqual([0]);
    expect(engine.execute("cat&&dog")).toEqual([0]);
    expect(engine.execute("cat||bird")).toEqual([0, 2]);
    expect(engine.execute("!!dog")).toEqual([0, 1]);
  });

  it("returns an empty set for unknown terms", () => {
    const engine = petsEngine();
    expect(engine.execute("unicorn")).toEqual([]);
    expect(engine.execute("unicorn | cat")).toEqual([0]);
    expect(engine.execute("!unicorn")).toEqual([0, 1, 2]);
  });

  it("short-circuits queries without terms", () => {
    const engine = petsEngine();
    expect(engine.execute("!")).toEqual([]);
    expect(engine.execute("()")).toEqual([]);
    expect(engine.execute(")")).toEqual([]);
  });

  it("reports malformed queries", () => {
    const engine = petsEngine();
    expect(failure(engine, "(cat")?.code).toBe("UNMATCHED_LPAREN");
    expect(failure(engine, "cat)")?.code).toBe("UNMATCHED_RPAREN");
    expect(failure(engine, "cat &")?.code).toBe("MISSING_OPERAND");
    expect(failure(engine, "& cat")?.message).toBe("Binary operator without 2 operands");
    expect(failure(engine, "cat !")?.code).toBe("MISSING_OPERAND");
  });

  it("explains the postfix form", () => {
    const engine = petsEngine();
    expect(engine.explain("cat | Dog bird")).toBe("cat dog bird & |");
    expect(engine.explain("!")).toBe("");
  });

  it("returns results that callers may keep", () => {
    const engine = petsEngine();
    const first = engine.execute("dog");
    first.push(99);
    expect(engine.execute("dog")).toEqual([0, 1]);
  });
});
