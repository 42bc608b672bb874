import { isUtf8 } from "node:buffer";

import type { DocInfo } from "../types.js";

export const DEFAULT_URL_KEY = "url_norm";

const WIKI_PATH = "/wiki/";

/**
 * Tolerant scan for `"<key>": "<value>"` pairs in a JSON-ish blob.
 *
 * No JSON parsing: the blob may be a dump, a JSON-lines file or a truncated
 * export. Values are decoded for \" \\ \/ \n \t \r; other escapes are kept as written.
 */
export function extractUrls(text: string, key: string = DEFAULT_URL_KEY): string[] {
  const needle = `"${key}"`;
  const out: string[] = [];
  let pos = 0;

  while (true) {
    const k = text.indexOf(needle, pos);
    if (k < 0) break;
    const colon = text.indexOf(":", k + needle.length);
    if (colon < 0) break;
    const open = text.indexOf('"', colon + 1);
    if (open < 0) break;

    let val = "";
    let i = open + 1;
    while (i < text.length) {
      const ch = text[i];
      if (ch === "\\" && i + 1 < text.length) {
        const next = text[i + 1];
        const decoded = ESCAPES[next];
        if (decoded !== undefined) {
          val += decoded;
          i += 2;
          continue;
        }
        val += ch;
        i++;
        continue;
      }
      if (ch === '"') break;
      val += ch;
      i++;
    }

    out.push(val);
    pos = i + 1;
  }

  return out;
}

const ESCAPES: Record<string, string | undefined> = {
  '"': '"',
  "\\": "\\",
  "/": "/",
  n: "\n",
  t: "\t",
  r: "\r",
};

function hexVal(code: number): number {
  if (code >= 48 && code <= 57) return code - 48;
  if (code >= 97 && code <= 102) return code - 87;
  if (code >= 65 && code <= 70) return code - 55;
  return -1;
}

/**
 * Decodes `%XX` escapes and `+` as a space. The resulting bytes are read as
 * UTF-8, or as Latin-1 when they are not valid UTF-8 (`Caf%E9` is "Café").
 * A `%` without two hex digits after it stays literal.
 */
export function percentDecode(s: string): string {
  const src = Buffer.from(s, "utf8");
  const out = Buffer.alloc(src.length);
  let n = 0;

  for (let i = 0; i < src.length; ) {
    const b = src[i];
    if (b === 0x25 && i + 2 < src.length) {
      const hi = hexVal(src[i + 1]);
      const lo = hexVal(src[i + 2]);
      if (hi >= 0 && lo >= 0) {
        out[n++] = (hi << 4) | lo;
        i += 3;
        continue;
      }
    }
    out[n++] = b === 0x2b ? 0x20 : b;
    i++;
  }

  const bytes = out.subarray(0, n);
  return bytes.toString(isUtf8(bytes) ? "utf8" : "latin1");
}

/** Human title from the last path segment of a URL (or whatever follows `/wiki/`). */
export function titleFromUrl(url: string): string {
  let tail = url;
  const p = url.indexOf(WIKI_PATH);
  if (p >= 0) {
    tail = url.slice(p + WIKI_PATH.length);
  } else {
    const s = url.lastIndexOf("/");
    if (s >= 0 && s + 1 < url.length) tail = url.slice(s + 1);
  }
  return percentDecode(tail.replace(/_/g, " "));
}

export function placeholderTitle(docId: number): string {
  return `Document ${docId}`;
}

/** One row per doc id; docs past the end of `urls` get an empty url and a placeholder title. */
export function buildForwardTable(docCount: number, urls: readonly string[] = []): DocInfo[] {
  const out: DocInfo[] = new Array(docCount);
  for (let d = 0; d < docCount; d++) {
    const url = d < urls.length ? urls[d] : undefined;
    if (url === undefined) {
      out[d] = { url: "", title: placeholderTitle(d) };
      continue;
    }
    out[d] = { url, title: titleFromUrl(url) || placeholderTitle(d) };
  }
  return out;
}
