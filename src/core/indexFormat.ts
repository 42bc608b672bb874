import type { DictEntry, DocInfo, IndexMeta } from "./types.js";

/**
 * On-disk layout (little-endian):
 *
 *   header   magic[4] "IRIX" | u32 version | u32 sectionCount | u64 sectionTableOffset
 *   sections located only through the section table, any order
 *   table    sectionCount x { u32 type | u32 flags | u64 offset | u64 size }
 */
export const MAGIC = "IRIX";
export const FORMAT_VERSION = 1;

export const HEADER_SIZE = 20;
/** byte offset of the section count; the table offset follows it */
export const HEADER_SECTION_COUNT_OFFSET = 8;
export const SECTION_RECORD_SIZE = 24;

/** u16 length prefix */
export const MAX_TERM_BYTES = 0xffff;
export const POSTING_BYTES = 4;

export enum SectionType {
  Dictionary = 1,
  Postings = 2,
  Forward = 3,
  Metadata = 4,
}

export interface SectionInfo {
  type: number;
  flags: number;
  offset: number;
  size: number;
}

/** Everything one index file holds, fully materialized. */
export interface IndexData {
  meta: IndexMeta;
  dictionary: DictEntry[];
  /**
   * Dictionary keys exactly as stored, parallel to `dictionary`. Absent means
   * the UTF-8 encoding of each term.
   */
  keys?: readonly Buffer[];
  postings: Uint32Array;
  documents: DocInfo[];
}

export function sectionName(type: SectionType): string {
  switch (type) {
    case SectionType.Dictionary:
      return "DICT";
    case SectionType.Postings:
      return "POSTINGS";
    case SectionType.Forward:
      return "FORWARD";
    case SectionType.Metadata:
      return "META";
  }
}
