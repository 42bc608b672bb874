import type { DocId, PostingList } from "../types.js";

// All inputs are ascending and duplicate-free; every output keeps that shape.

export function intersect(a: PostingList, b: PostingList): DocId[] {
  const out: DocId[] = [];
  let i = 0;
  let j = 0;
  while (i < a.length && j < b.length) {
    const x = a[i];
    const y = b[j];
    if (x === y) {
      out.push(x);
      i++;
      j++;
    } else if (x < y) {
      i++;
    } else {
      j++;
    }
  }
  return out;
}

export function union(a: PostingList, b: PostingList): DocId[] {
  const out: DocId[] = [];
  let i = 0;
  let j = 0;
  while (i < a.length && j < b.length) {
    const x = a[i];
    const y = b[j];
    if (x === y) {
      out.push(x);
      i++;
      j++;
    } else if (x < y) {
      out.push(x);
      i++;
    } else {
      out.push(y);
      j++;
    }
  }
  while (i < a.length) out.push(a[i++]);
  while (j < b.length) out.push(b[j++]);
  return out;
}

/** `universe \ a`, merged in one pass. */
export function complement(universe: PostingList, a: PostingList): DocId[] {
  const out: DocId[] = [];
  let i = 0;
  let j = 0;
  while (i < universe.length && j < a.length) {
    const x = universe[i];
    const y = a[j];
    if (x === y) {
      i++;
      j++;
    } else if (x < y) {
      out.push(x);
      i++;
    } else {
      j++;
    }
  }
  while (i < universe.length) out.push(universe[i++]);
  return out;
}
