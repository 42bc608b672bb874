import { writeFile } from "node:fs/promises";

import { IndexError } from "../errors.js";
import {
  FORMAT_VERSION,
  HEADER_SECTION_COUNT_OFFSET,
  MAGIC,
  MAX_TERM_BYTES,
  SectionType,
  type IndexData,
  type SectionInfo,
} from "../indexFormat.js";

/**
 * Growable little-endian byte sink.
 *
 * Keeps one backing buffer and doubles it on demand; `patchU32`/`patchU64`
 * rewrite bytes already emitted (header backpatching).
 */
export class ByteWriter {
  private buf: Buffer;
  private len = 0;

  constructor(initialCapacity: number = 1 << 16) {
    this.buf = Buffer.alloc(Math.max(16, initialCapacity));
  }

  get offset(): number {
    return this.len;
  }

  u16(v: number): void {
    this.ensure(2);
    this.buf.writeUInt16LE(v, this.len);
    this.len += 2;
  }

  u32(v: number): void {
    this.ensure(4);
    this.buf.writeUInt32LE(v, this.len);
    this.len += 4;
  }

  u64(v: number): void {
    this.ensure(8);
    this.buf.writeBigUInt64LE(BigInt(v), this.len);
    this.len += 8;
  }

  f64(v: number): void {
    this.ensure(8);
    this.buf.writeDoubleLE(v, this.len);
    this.len += 8;
  }

  bytes(src: Uint8Array): void {
    this.ensure(src.length);
    this.buf.set(src, this.len);
    this.len += src.length;
  }

  patchU32(at: number, v: number): void {
    this.buf.writeUInt32LE(v, at);
  }

  patchU64(at: number, v: number): void {
    this.buf.writeBigUInt64LE(BigInt(v), at);
  }

  /** Copy of the bytes written so far. */
  toBuffer(): Buffer {
    return Buffer.from(this.buf.subarray(0, this.len));
  }

  private ensure(extra: number): void {
    const need = this.len + extra;
    if (need <= this.buf.length) return;
    let cap = this.buf.length * 2;
    while (cap < need) cap *= 2;
    const next = Buffer.alloc(cap);
    this.buf.copy(next, 0, 0, this.len);
    this.buf = next;
  }
}

/**
 * Serializes an index: header with placeholders, META, DICT, POSTINGS,
 * FORWARD, then the section table, then backpatches the header.
 */
export function encodeIndex(data: IndexData): Buffer {
  const w = new ByteWriter(data.postings.length * 4 + data.dictionary.length * 32 + 1024);
  const sections: SectionInfo[] = [];

  const section = (type: SectionType, emit: () => void): void => {
    const start = w.offset;
    emit();
    sections.push({ type, flags: 0, offset: start, size: w.offset - start });
  };

  w.bytes(Buffer.from(MAGIC, "ascii"));
  w.u32(FORMAT_VERSION);
  w.u32(0);
  w.u64(0);

  section(SectionType.Metadata, () => {
    const m = data.meta;
    w.u32(m.docCount);
    w.u64(m.totalTokens);
    w.u32(m.uniqueTerms);
    w.f64(m.avgTermLength);
    w.f64(m.buildMillis);
  });

  section(SectionType.Dictionary, () => {
    w.u32(data.dictionary.length);
    for (let i = 0; i < data.dictionary.length; i++) {
      const e = data.dictionary[i];
      const term = data.keys?.[i] ?? Buffer.from(e.term, "utf8");
      if (term.length > MAX_TERM_BYTES) {
        throw new IndexError("TERM_TOO_LONG", `${term.length} bytes (max ${MAX_TERM_BYTES}): ${e.term.slice(0, 64)}...`);
      }
      w.u16(term.length);
      w.bytes(term);
      w.u32(e.df);
      w.u64(e.postingsOffset);
    }
  });

  section(SectionType.Postings, () => {
    for (let i = 0; i < data.postings.length; i++) w.u32(data.postings[i]);
  });

  section(SectionType.Forward, () => {
    w.u32(data.documents.length);
    for (const d of data.documents) {
      const url = Buffer.from(d.url, "utf8");
      const title = Buffer.from(d.title, "utf8");
      w.u32(url.length);
      w.bytes(url);
      w.u32(title.length);
      w.bytes(title);
    }
  });

  const tableOffset = w.offset;
  for (const s of sections) {
    w.u32(s.type);
    w.u32(s.flags);
    w.u64(s.offset);
    w.u64(s.size);
  }

  w.patchU32(HEADER_SECTION_COUNT_OFFSET, sections.length);
  w.patchU64(HEADER_SECTION_COUNT_OFFSET + 4, tableOffset);

  return w.toBuffer();
}

export async function writeIndexFile(path: string, data: IndexData): Promise<number> {
  const bytes = encodeIndex(data);
  try {
    await writeFile(path, bytes);
  } catch (e) {
    throw new IndexError("IO_ERROR", `cannot write index file: ${path}`, { cause: e });
  }
  return bytes.length;
}
