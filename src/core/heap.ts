/**
 * Minimal heap contract used for topK selection.
 * Intended for a fixed-size heap that keeps the best K items seen so far.
 */
export interface Heap<T> {
  size(): number;
  peek(): T | undefined;
  push(item: T): void;
  pop(): T | undefined;
  /** Converts heap contents to array (order implementation-defined). */
  toArray(): T[];
}

export interface TopKSelector<T> {
  /**
   * Returns the best K items, best first.
   * Comparator behaves like Array.sort: <0 means a ranks before b.
   * Items the comparator treats as equal keep their enumeration order.
   */
  topK(items: Iterable<T>, k: number, comparator: (a: T, b: T) => number): T[];
}
