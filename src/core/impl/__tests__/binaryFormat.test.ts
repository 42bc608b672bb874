import { describe, expect, it } from "vitest";
import { IndexError } from "../../errors.js";
import { SectionType, type IndexData } from "../../indexFormat.js";
import { decodeIndex } from "../binaryReader.js";
import { ByteWriter, encodeIndex } from "../binaryWriter.js";
import { buildPets } from "./fixtures.js";

// Byte positions inside the encoded pets index.
const TABLE_OFFSET = 182;
const FORWARD_OFFSET = 124;

function decodeError(bytes: Uint8Array): IndexError | undefined {
  try {
    decodeIndex(bytes);
  } catch (e) {
    if (e instanceof IndexError) return e;
    throw e;
  }
  return undefined;
}

function handBuilt(overrides: Partial<IndexData>): IndexData {
  return {
    meta: { docCount: 2, totalTokens: 2, uniqueTerms: 2, avgTermLength: 3, buildMillis: 0 },
    dictionary: [
      { term: "cat", df: 1, postingsOffset: 0 },
      { term: "dog", df: 1, postingsOffset: 4 },
    ],
    postings: new Uint32Array([0, 1]),
    documents: [
      { url: "", title: "Document 0" },
      { url: "", title: "Document 1" },
    ],
    ...overrides,
  };
}

describe("encodeIndex", () => {
  it("writes header, four sections and a trailing section table", () => {
    const buf = encodeIndex(buildPets());

    expect(buf.subarray(0, 4).toString("ascii")).toBe("IRIX");
    expect(buf.readUInt32LE(4)).toBe(1);
    expect(buf.readUInt32LE(8)).toBe(4);
    expect(buf.readBigUInt64LE(12)).toBe(BigInt(TABLE_OFFSET));
    expect(buf.length).toBe(TABLE_OFFSET + 4 * 24);

    const sections = [0, 1, 2, 3].map((i) => {
      const at = TABLE_OFFSET + i * 24;
      return {
        type: buf.readUInt32LE(at),
        flags: buf.readUInt32LE(at + 4),
        offset: Number(buf.readBigUInt64LE(at + 8)),
        size: Number(buf.readBigUInt64LE(at + 16)),
      };
    });
    expect(sections).toEqual([
      { type: SectionType.Metadata, flags: 0, offset: 20, size: 32 },
      { type: SectionType.Dictionary, flags: 0, offset: 52, size: 56 },
      { type: SectionType.Postings, flags: 0, offset: 108, size: 16 },
      { type: SectionType.Forward, flags: 0, offset: FORWARD_OFFSET, size: 58 },
    ]);
  });

  it("stores dictionary entries as u16 length, bytes, u32 df, u64 offset", () => {
    const buf = encodeIndex(buildPets());
    expect(buf.readUInt32LE(52)).toBe(3);
    expect(buf.readUInt16LE(56)).toBe(4);
    expect(buf.subarray(58, 62).toString("utf8")).toBe("bird");
    expect(buf.readUInt32LE(62)).toBe(1);
    expect(buf.readBigUInt64LE(66)).toBe(0n);
  });

  it("stores postings as raw little-endian u32", () => {
    const buf = encodeIndex(buildPets());
    expect([0, 1, 2, 3].map((i) => buf.readUInt32LE(108 + i * 4))).toEqual([2, 0, 0, 1]);
  });
});

describe("decodeIndex", () => {
  it("round-trips a built index", () => {
    const data = buildPets(["https://en.wikipedia.org/wiki/Cat", "https://example.org/Dog"]);
    expect(decodeIndex(encodeIndex(data))).toEqual(data);
  });

  it("accepts plain Uint8Array input", () => {
    const buf = encodeIndex(buildPets());
    const copy = new Uint8Array(buf.length + 3).subarray(3);
    copy.set(buf);
    expect(decodeIndex(copy).meta.docCount).toBe(3);
  });

  it("finds sections through the table regardless of order", () => {
    const data = buildPets();
    const buf = encodeIndex(data);
    const table = buf.subarray(TABLE_OFFSET);
    const reversed = Buffer.concat([0, 1, 2, 3].reverse().map((i) => table.subarray(i * 24, i * 24 + 24)));
    reversed.copy(buf, TABLE_OFFSET);
    expect(decodeIndex(buf)).toEqual(data);
  });

  it("rejects a wrong magic tag", () => {
    const buf = encodeIndex(buildPets());
    buf[0] = 0x58;
    expect(decodeError(buf)?.code).toBe("BAD_MAGIC");
    expect(decodeError(Buffer.from("nope"))?.code).toBe("BAD_MAGIC");
  });

  it("rejects other format versions", () => {
    const buf = encodeIndex(buildPets());
    buf.writeUInt32LE(2, 4);
    expect(decodeError(buf)?.code).toBe("UNSUPPORTED_VERSION");
  });

  it("requires all four sections", () => {
    const buf = encodeIndex(buildPets());
    buf.writeUInt32LE(9, TABLE_OFFSET + 2 * 24);
    const err = decodeError(buf);
    expect(err?.code).toBe("SECTION_NOT_FOUND");
    expect(err?.message).toBe("section not found: POSTINGS section (type=2)");
  });

  it("rejects a forward table that disagrees with the metadata", () => {
    const buf = encodeIndex(buildPets());
    buf.writeUInt32LE(5, FORWARD_OFFSET);
    expect(decodeError(buf)?.code).toBe("FORWARD_META_MISMATCH");
  });

  it("rejects a postings section that is not a whole number of u32", () => {
    const buf = encodeIndex(buildPets());
    buf.writeBigUInt64LE(15n, TABLE_OFFSET + 2 * 24 + 16);
    expect(decodeError(buf)?.code).toBe("MISALIGNED_POSTINGS");
  });

  it("rejects truncated files", () => {
    const buf = encodeIndex(buildPets());
    expect(decodeError(buf.subarray(0, 100))?.code).toBe("TRUNCATED");
    expect(decodeError(buf.subarray(0, 10))?.code).toBe("TRUNCATED");
  });

  it("rejects an unsorted dictionary", () => {
    const data = handBuilt({
      dictionary: [
        { term: "dog", df: 1, postingsOffset: 0 },
        { term: "cat", df: 1, postingsOffset: 4 },
      ],
    });
    const err = decodeError(encodeIndex(data));
    expect(err?.code).toBe("DICT_NOT_SORTED");
  });

  it("rejects misaligned and out-of-range postings offsets", () => {
    const misaligned = handBuilt({
      dictionary: [
        { term: "cat", df: 1, postingsOffset: 2 },
        { term: "dog", df: 1, postingsOffset: 4 },
      ],
    });
    expect(decodeError(encodeIndex(misaligned))?.code).toBe("MISALIGNED_POSTINGS");

    const pastEnd = handBuilt({
      dictionary: [
        { term: "cat", df: 1, postingsOffset: 0 },
        { term: "dog", df: 2, postingsOffset: 4 },
      ],
    });
    expect(decodeError(encodeIndex(pastEnd))?.code).toBe("POSTINGS_OUT_OF_RANGE");
  });

  it("rejects postings that are unsorted or reference unknown documents", () => {
    const unsorted = handBuilt({
      dictionary: [{ term: "cat", df: 2, postingsOffset: 0 }],
      postings: new Uint32Array([1, 0]),
    });
    expect(decodeError(encodeIndex(unsorted))?.code).toBe("POSTINGS_OUT_OF_RANGE");

    const unknownDoc = handBuilt({
      dictionary: [{ term: "cat", df: 1, postingsOffset: 0 }],
      postings: new Uint32Array([2]),
    });
    expect(decodeError(encodeIndex(unknownDoc))?.code).toBe("POSTINGS_OUT_OF_RANGE");
  });
});

describe("ByteWriter", () => {
  it("grows past its initial capacity and backpatches", () => {
    const w = new ByteWriter(16);
    w.u32(0);
    for (let i = 0; i < 100; i++) w.u64(i);
    w.patchU32(0, 0xdeadbeef);
    const buf = w.toBuffer();
    expect(buf.length).toBe(804);
    expect(buf.readUInt32LE(0)).toBe(0xdeadbeef);
    expect(buf.readBigUInt64LE(4 + 99 * 8)).toBe(99n);
  });
});
