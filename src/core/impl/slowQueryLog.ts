import type { Heap } from "../heap.js";

export interface QueryTiming {
  millis: number;
  /** 1-based line number of the query in its input */
  lineNo: number;
  query: string;
  hits: number;
}

/** Slower first; equal times keep input order. */
export function compareSlowest(a: QueryTiming, b: QueryTiming): number {
  return b.millis - a.millis || a.lineNo - b.lineNo;
}

/** Binary heap with the "smallest" item (by `less`) at the root. */
class ArrayHeap<T> implements Heap<T> {
  private readonly data: T[] = [];

  constructor(private readonly less: (a: T, b: T) => boolean) {}

  size(): number {
    return this.data.length;
  }

  peek(): T | undefined {
    return this.data[0];
  }

  push(item: T): void {
    const a = this.data;
    a.push(item);
    let i = a.length - 1;
    while (i > 0) {
      const p = (i - 1) >> 1;
      if (!this.less(a[i], a[p])) break;
      this.swap(i, p);
      i = p;
    }
  }

  pop(): T | undefined {
    const a = this.data;
    const top = a[0];
    const last = a.pop();
    if (a.length && last !== undefined) {
      a[0] = last;
      this.siftDown(0);
    }
    return top;
  }

  toArray(): T[] {
    return Array.from(this.data);
  }

  private siftDown(i: number): void {
    const a = this.data;
    while (true) {
      const l = i * 2 + 1;
      const r = l + 1;
      let least = i;
      if (l < a.length && this.less(a[l], a[least])) least = l;
      if (r < a.length && this.less(a[r], a[least])) least = r;
      if (least === i) return;
      this.swap(i, least);
      i = least;
    }
  }

  private swap(i: number, j: number): void {
    const a = this.data;
    const t = a[i];
    a[i] = a[j];
    a[j] = t;
  }
}

/**
 * Keeps the N slowest query timings seen so far.
 *
 * The heap root is the fastest of the kept records, so a new timing only
 * costs O(log N) when it displaces it.
 */
export class SlowQueryLog {
  private readonly heap = new ArrayHeap<QueryTiming>((a, b) => compareSlowest(a, b) > 0);
  private total = 0;

  constructor(private readonly limit: number) {}

  record(t: QueryTiming): void {
    this.total++;
    if (this.limit <= 0) return;

    if (this.heap.size() < this.limit) {
      this.heap.push(t);
      return;
    }
    const fastest = this.heap.peek();
    if (fastest && compareSlowest(t, fastest) < 0) {
      this.heap.pop();
      this.heap.push(t);
    }
  }

  /** number of queries recorded, kept or not */
  count(): number {
    return this.total;
  }

  slowest(): QueryTiming[] {
    return this.heap.toArray().sort(compareSlowest);
  }
}
