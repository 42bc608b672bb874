import { Readable } from "node:stream";
import { describe, expect, it } from "vitest";

import { BooleanQueryEngine, BooleanQueryTokenizer, IndexBuilder, MemoryBooleanIndex } from "../../core/index.js";
import { createLogger } from "../../logger.js";
import { runQueries, type SearchOutputOptions } from "../searchSession.js";
import type { TextSink } from "../sink.js";

const CAT_URL = "https://en.wikipedia.org/wiki/Cat_(animal)";
const DOG_URL = "https://example.org/pets/Dog%20Days";

const DEFAULTS: SearchOutputOptions = { k: 0, top: 10, onlyDocId: false, results: true, topres: 50 };

function collector(): { sink: TextSink; text: () => string } {
  const chunks: string[] = [];
  return {
    sink: {
      async write(t) {
        chunks.push(t);
      },
    },
    text: () => chunks.join(""),
  };
}

function setup(input: string, options: Partial<SearchOutputOptions> = {}) {
  const b = new IndexBuilder();
  b.add(0, "cat");
  b.add(0, "dog");
  b.add(1, "dog");
  b.add(2, "bird");
  const index = new MemoryBooleanIndex(b.build({ urls: [CAT_URL, DOG_URL] }));
  const engine = new BooleanQueryEngine({ tokenizer: new BooleanQueryTokenizer(), index });

  const logs: Array<Record<string, unknown>> = [];
  const logger = createLogger({ destination: { write: (msg: string) => logs.push(JSON.parse(msg)) } });
  const out = collector();
  const report = collector();

  const run = () =>
    runQueries(Readable.from([input]), {
      engine,
      index,
      logger,
      out: out.sink,
      report: report.sink,
      options: { ...DEFAULTS, ...options },
    });
  return { run, out, report, logs };
}

describe("runQueries", () => {
  it("prints results, writes report blocks and warns on malformed queries", async () => {
    const { run, out, report, logs } = setup("dog\n\ncat & dog\n(cat\n");
    const slow = await run();

    expect(out.text()).toBe(
      `0\tCat (animal)\t${CAT_URL}\n` + `1\tDog Days\t${DOG_URL}\n` + `0\tCat (animal)\t${CAT_URL}\n`,
    );
    expect(report.text()).toBe(
      `QUERY\tdog\nHITS\t2\nCat (animal)\t${CAT_URL}\nDog Days\t${DOG_URL}\n\n` +
        `QUERY\tcat & dog\nHITS\t1\nCat (animal)\t${CAT_URL}\n\n` +
        `QUERY\t(cat\nHITS\t0\nERROR\tUnmatched '('\n\n`,
    );

    expect(logs).toHaveLength(1);
    expect(logs[0]).toMatchObject({
      level: 40,
      line: 4,
      code: "UNMATCHED_LPAREN",
      query: "(cat",
      msg: "parse/eval error: Unmatched '('",
    });

    expect(slow.count()).toBe(3);
    expect(slow.slowest().map((t) => t.lineNo).sort()).toEqual([1, 3, 4]);
    expect(slow.slowest().find((t) => t.lineNo === 4)?.hits).toBe(0);
  });

  it("skips blank lines entirely", async () => {
    const { run, out, report } = setup("   \n\t\n");
    const slow = await run();
    expect(slow.count()).toBe(0);
    expect(out.text()).toBe("");
    expect(report.text()).toBe("");
  });

  it("caps printed results per query", async () => {
    const { run, out } = setup("dog\n!cat\n", { k: 1, onlyDocId: true });
    await run();
    expect(out.text()).toBe("0\n1\n");
  });

  it("prints nothing when results are suppressed but still reports", async () => {
    const { run, out, report } = setup("dog\n", { results: false, topres: 1 });
    await run();
    expect(out.text()).toBe("");
    expect(report.text()).toBe(`QUERY\tdog\nHITS\t2\nCat (animal)\t${CAT_URL}\n\n`);
  });

  it("treats an unknown term as an empty result", async () => {
    const { run, out, report, logs } = setup("unicorn\n");
    const slow = await run();
    expect(out.text()).toBe("");
    expect(report.text()).toBe("QUERY\tunicorn\nHITS\t0\n\n");
    expect(logs).toEqual([]);
    expect(slow.slowest()[0]).toMatchObject({ lineNo: 1, hits: 0, query: "unicorn" });
  });
});
