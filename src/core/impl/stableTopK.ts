import type { Heap, TopKSelector } from "../heap.js";

/** Binary heap ordered by `before`: the root is the item no other item precedes. */
class BinaryHeap<T> implements Heap<T> {
  private readonly slots: T[] = [];

  constructor(private readonly before: (a: T, b: T) => boolean) {}

  size(): number {
    return this.slots.length;
  }

  peek(): T | undefined {
    return this.slots[0];
  }

  push(item: T): void {
    const s = this.slots;
    s.push(item);
    let child = s.length - 1;
    while (child > 0) {
      const parent = (child - 1) >> 1;
      if (!this.before(s[child]!, s[parent]!)) break;
      this.swap(child, parent);
      child = parent;
    }
  }

  pop(): T | undefined {
    const s = this.slots;
    const root = s[0];
    const tail = s.pop();
    if (s.length && tail !== undefined) {
      s[0] = tail;
      this.sink(0);
    }
    return root;
  }

  toArray(): T[] {
    return this.slots.slice();
  }

  private sink(at: number): void {
    const s = this.slots;
    let i = at;

    for (;;) {
      const l = 2 * i + 1;
      const r = l + 1;
      let top = i;
      if (l < s.length && this.before(s[l]!, s[top]!)) top = l;
      if (r < s.length && this.before(s[r]!, s[top]!)) top = r;
      if (top === i) return;
      this.swap(i, top);
      i = top;
    }
  }

  private swap(i: number, j: number): void {
    const s = this.slots;
    const tmp = s[i]!;
    s[i] = s[j]!;
    s[j] = tmp;
  }
}

type Entry<T> = { item: T; seq: number };

/**
 * Keeps a bounded heap of the best K items, with the worst of them at the root.
 *
 * Ties under the caller's comparator are broken by enumeration order, so the
 * result is a total order and repeated calls over the same input agree.
 */
export class StableTopKSelector<T> implements TopKSelector<T> {
  topK(items: Iterable<T>, k: number, comparator: (a: T, b: T) => number): T[] {
    if (k <= 0) return [];

    const order = (a: Entry<T>, b: Entry<T>): number => comparator(a.item, b.item) || a.seq - b.seq;
    // root = entry that ranks last among those kept
    const heap = new BinaryHeap<Entry<T>>((a, b) => order(a, b) > 0);

    let seq = 0;
    for (const item of items) {
      const entry = { item, seq: seq++ };
      if (heap.size() < k) {
        heap.push(entry);
        continue;
      }
      const worst = heap.peek();
      if (worst && order(entry, worst) < 0) {
        heap.pop();
        heap.push(entry);
      }
    }

    return heap
      .toArray()
      .sort(order)
      .map((e) => e.item);
  }
}
