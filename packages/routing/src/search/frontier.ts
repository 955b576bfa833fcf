/**
 * Binary min-heap of integer ids, ordered by a caller-supplied comparator.
 * The search keys it on arena node ids so no per-entry objects are allocated.
 */
export class MinHeap {
  private items: Int32Array;
  private length = 0;

  constructor(
    private readonly less: (a: number, b: number) => boolean,
    initialCapacity = 1024,
  ) {
    this.items = new Int32Array(Math.max(1, initialCapacity));
  }

  get size(): number {
    return this.length;
  }

  push(id: number): void {
    if (this.length === this.items.length) {
      const grown = new Int32Array(this.items.length * 2);
      grown.set(this.items);
      this.items = grown;
    }
    const items = this.items;
    let i = this.length++;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!this.less(id, items[parent])) break;
      items[i] = items[parent];
      i = parent;
    }
    items[i] = id;
  }

  /** Remove and return the smallest id, or undefined when empty */
  pop(): number | undefined {
    if (this.length === 0) return undefined;
    const items = this.items;
    const top = items[0];
    const last = items[--this.length];

    let i = 0;
    const half = this.length >> 1;
    while (i < half) {
      let child = 2 * i + 1;
      const right = child + 1;
      if (right < this.length && this.less(items[right], items[child])) child = right;
      if (!this.less(items[child], last)) break;
      items[i] = items[child];
      i = child;
    }
    if (this.length > 0) items[i] = last;
    return top;
  }
}
