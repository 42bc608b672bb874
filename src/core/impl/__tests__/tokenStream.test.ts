import { Readable } from "node:stream";
import { describe, expect, it } from "vitest";
import { parseTokenLine, readTokenStream, toLowerAscii, type TokenStreamStats } from "../tokenStream.js";

describe("parseTokenLine", () => {
  it("reads a doc id and the following term", () => {
    expect(parseTokenLine("12 hello")).toEqual({ docId: 12, term: "hello" });
    expect(parseTokenLine("  7\tWorld extra")).toEqual({ docId: 7, term: "World" });
    expect(parseTokenLine("007 x")).toEqual({ docId: 7, term: "x" });
  });

  it("skips blank and malformed lines", () => {
    expect(parseTokenLine("")).toBeUndefined();
    expect(parseTokenLine("   ")).toBeUndefined();
    expect(parseTokenLine("abc")).toBeUndefined();
    expect(parseTokenLine("12")).toBeUndefined();
    expect(parseTokenLine("12   ")).toBeUndefined();
    expect(parseTokenLine("12hello")).toBeUndefined();
    expect(parseTokenLine("-1 x")).toBeUndefined();
  });

  it("rejects doc ids that do not fit a u32 document count", () => {
    expect(parseTokenLine("4294967294 x")).toEqual({ docId: 4294967294, term: "x" });
    expect(parseTokenLine("4294967295 x")).toBeUndefined();
    expect(parseTokenLine("99999999999999999999999 x")).toBeUndefined();
  });
});

describe("toLowerAscii", () => {
  it("folds A-Z only", () => {
    expect(toLowerAscii("HeLLo ÄÖ Ω")).toBe("hello ÄÖ Ω");
  });
});

describe("readTokenStream", () => {
  it("yields parsed pairs and counts skipped lines", async () => {
    const stats: TokenStreamStats = { lines: 0, skipped: 0 };
    const pairs = [];
    for await (const p of readTokenStream(Readable.from(["0 a\nbad\n1 b\r\n", "\n2 c"]), stats)) pairs.push(p);
    expect(pairs).toEqual([
      { docId: 0, term: "a" },
      { docId: 1, term: "b" },
      { docId: 2, term: "c" },
    ]);
    expect(stats).toEqual({ lines: 5, skipped: 2 });
  });
});
