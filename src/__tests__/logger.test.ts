import { describe, expect, it } from "vitest";

import { resolveLevel } from "../logger.js";

describe("resolveLevel", () => {
  it("accepts pino level names in any case", () => {
    expect(resolveLevel("WARN")).toBe("warn");
    expect(resolveLevel(" debug ")).toBe("debug");
    expect(resolveLevel("silent")).toBe("silent");
  });

  it("falls back to info", () => {
    expect(resolveLevel(undefined)).toBe("info");
    expect(resolveLevel("")).toBe("info");
    expect(resolveLevel("verbose")).toBe("info");
  });
});
