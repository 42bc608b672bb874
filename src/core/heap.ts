/**
 * Minimal binary-heap contract.
 * Used as a bounded min-heap that keeps the N "worst of the best" items at the root.
 */
export interface Heap<T> {
  size(): number;
  peek(): T | undefined;
  push(item: T): void;
  pop(): T | undefined;
  /** Heap contents in storage order. */
  toArray(): T[];
}
