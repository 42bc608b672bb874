import { readFile } from "node:fs/promises";

import { IndexError } from "../errors.js";
import {
  FORMAT_VERSION,
  HEADER_SIZE,
  MAGIC,
  POSTING_BYTES,
  SECTION_RECORD_SIZE,
  SectionType,
  sectionName,
  type IndexData,
  type SectionInfo,
} from "../indexFormat.js";
import type { DictEntry, DocInfo, IndexMeta } from "../types.js";

/**
 * Bounds-checked little-endian cursor over `[start, end)` of a buffer.
 * Every read past `end` is a TRUNCATED index error naming `label`.
 */
export class ByteReader {
  private pos: number;

  constructor(
    private readonly buf: Buffer,
    private readonly label: string,
    private readonly start: number = 0,
    private readonly end: number = buf.length,
  ) {
    this.pos = start;
  }

  /** bytes left before the end of the window */
  get remaining(): number {
    return this.end - this.pos;
  }

  u16(): number {
    const at = this.take(2);
    return this.buf.readUInt16LE(at);
  }

  u32(): number {
    const at = this.take(4);
    return this.buf.readUInt32LE(at);
  }

  u64(): number {
    const at = this.take(8);
    const v = this.buf.readBigUInt64LE(at);
    if (v > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new IndexError("TRUNCATED", `${this.label}: u64 value ${v} at byte ${at} is not addressable`);
    }
    return Number(v);
  }

  f64(): number {
    const at = this.take(8);
    return this.buf.readDoubleLE(at);
  }

  bytes(n: number): Buffer {
    const at = this.take(n);
    return this.buf.subarray(at, at + n);
  }

  private take(n: number): number {
    const at = this.pos;
    if (n > this.end - at) {
      throw new IndexError("TRUNCATED", `${this.label}: need ${n} bytes at ${at - this.start}, have ${this.end - at}`);
    }
    this.pos += n;
    return at;
  }
}

function readSectionTable(buf: Buffer): SectionInfo[] {
  const head = new ByteReader(buf, "header");
  const magic = head.bytes(4);
  if (!magic.equals(Buffer.from(MAGIC, "ascii"))) {
    throw new IndexError("BAD_MAGIC", `expected ${MAGIC}, got ${JSON.stringify(magic.toString("latin1"))}`);
  }
  const version = head.u32();
  if (version !== FORMAT_VERSION) {
    throw new IndexError("UNSUPPORTED_VERSION", `expected ${FORMAT_VERSION}, got ${version}`);
  }
  const count = head.u32();
  const tableOffset = head.u64();

  if (tableOffset < HEADER_SIZE || tableOffset > buf.length) {
    throw new IndexError("TRUNCATED", `section table offset ${tableOffset} outside file of ${buf.length} bytes`);
  }
  const table = new ByteReader(buf, "section table", tableOffset);
  if (count * SECTION_RECORD_SIZE > table.remaining) {
    throw new IndexError("TRUNCATED", `section table: ${count} records do not fit in ${table.remaining} bytes`);
  }

  const out: SectionInfo[] = [];
  for (let i = 0; i < count; i++) {
    out.push({ type: table.u32(), flags: table.u32(), offset: table.u64(), size: table.u64() });
  }
  return out;
}

function openSection(buf: Buffer, table: SectionInfo[], type: SectionType): ByteReader {
  const name = sectionName(type);
  const s = table.find((x) => x.type === type);
  if (!s) throw new IndexError("SECTION_NOT_FOUND", `${name} section (type=${type})`);
  if (s.offset > buf.length || s.size > buf.length - s.offset) {
    throw new IndexError("TRUNCATED", `${name} section [${s.offset}, +${s.size}) exceeds file of ${buf.length} bytes`);
  }
  return new ByteReader(buf, name, s.offset, s.offset + s.size);
}

function readMeta(r: ByteReader): IndexMeta {
  return {
    docCount: r.u32(),
    totalTokens: r.u64(),
    uniqueTerms: r.u32(),
    avgTermLength: r.f64(),
    buildMillis: r.f64(),
  };
}

function readDictionary(r: ByteReader): { entries: DictEntry[]; keys: Buffer[] } {
  const count = r.u32();
  const entries: DictEntry[] = [];
  const keys: Buffer[] = [];

  for (let i = 0; i < count; i++) {
    const raw = r.bytes(r.u16());
    keys.push(raw);
    entries.push({ term: raw.toString("utf8"), df: r.u32(), postingsOffset: r.u64() });
  }
  return { entries, keys };
}

/** Byte order, equal neighbours allowed: what binary search over the dictionary needs. */
function checkSorted(keys: Buffer[]): void {
  for (let i = 1; i < keys.length; i++) {
    if (Buffer.compare(keys[i - 1], keys[i]) > 0) {
      throw new IndexError("DICT_NOT_SORTED", `entry ${i} (${JSON.stringify(keys[i].toString("utf8"))}) sorts before entry ${i - 1}`);
    }
  }
}

function readPostings(r: ByteReader): Uint32Array {
  const size = r.remaining;
  if (size % POSTING_BYTES !== 0) {
    throw new IndexError("MISALIGNED_POSTINGS", `section size ${size} is not a multiple of ${POSTING_BYTES}`);
  }
  const out = new Uint32Array(size / POSTING_BYTES);
  for (let i = 0; i < out.length; i++) out[i] = r.u32();
  return out;
}

function readForward(r: ByteReader, docCount: number): DocInfo[] {
  const count = r.u32();
  if (count !== docCount) {
    throw new IndexError("FORWARD_META_MISMATCH", `forward has ${count} documents, metadata declares ${docCount}`);
  }
  const out: DocInfo[] = new Array(count);
  for (let d = 0; d < count; d++) {
    const url = r.bytes(r.u32()).toString("utf8");
    const title = r.bytes(r.u32()).toString("utf8");
    out[d] = { url, title };
  }
  return out;
}

/** Every slice must be aligned, in range, strictly ascending and below docCount. */
function checkPostings(dictionary: DictEntry[], postings: Uint32Array, docCount: number): void {
  for (const e of dictionary) {
    if (e.postingsOffset % POSTING_BYTES !== 0) {
      throw new IndexError("MISALIGNED_POSTINGS", `term ${JSON.stringify(e.term)}: offset ${e.postingsOffset}`);
    }
    const from = e.postingsOffset / POSTING_BYTES;
    if (from + e.df > postings.length) {
      throw new IndexError("POSTINGS_OUT_OF_RANGE", `term ${JSON.stringify(e.term)}: slice [${from}, +${e.df}) past ${postings.length} postings`);
    }
    let prev = -1;
    for (let i = from; i < from + e.df; i++) {
      const d = postings[i];
      if (d <= prev || d >= docCount) {
        throw new IndexError("POSTINGS_OUT_OF_RANGE", `term ${JSON.stringify(e.term)}: doc id ${d} at slot ${i - from}`);
      }
      prev = d;
    }
  }
}

/**
 * Parses and validates a whole index image.
 *
 * Check order: magic, version, section table, required sections, META, DICT,
 * POSTINGS, FORWARD count, then dictionary order and per-term postings slices.
 */
export function decodeIndex(bytes: Uint8Array): IndexData {
  const buf = Buffer.isBuffer(bytes) ? bytes : Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  if (buf.length < HEADER_SIZE) {
    if (buf.length < MAGIC.length || !buf.subarray(0, MAGIC.length).equals(Buffer.from(MAGIC, "ascii"))) {
      throw new IndexError("BAD_MAGIC", `file of ${buf.length} bytes has no ${MAGIC} header`);
    }
    throw new IndexError("TRUNCATED", `header needs ${HEADER_SIZE} bytes, file has ${buf.length}`);
  }

  const table = readSectionTable(buf);
  const metaR = openSection(buf, table, SectionType.Metadata);
  const dictR = openSection(buf, table, SectionType.Dictionary);
  const postR = openSection(buf, table, SectionType.Postings);
  const fwdR = openSection(buf, table, SectionType.Forward);

  const meta = readMeta(metaR);
  const { entries: dictionary, keys } = readDictionary(dictR);
  const postings = readPostings(postR);
  const documents = readForward(fwdR, meta.docCount);
  checkSorted(keys);
  checkPostings(dictionary, postings, meta.docCount);

  return { meta, dictionary, keys, postings, documents };
}

export async function loadIndexFile(path: string): Promise<IndexData> {
  let bytes: Buffer;
  try {
    bytes = await readFile(path);
  } catch (e) {
    throw new IndexError("IO_ERROR", `cannot open index: ${path}`, { cause: e });
  }
  return decodeIndex(bytes);
}
