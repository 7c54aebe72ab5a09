/**
 * Binary min-heap keyed by (priority, insertion sequence).
 *
 * Lower priority values pop first; equal priorities pop in arrival order.
 */

interface HeapEntry<T> {
  priority: number;
  seq: number;
  value: T;
}

export class PriorityQueue<T> {
  private readonly heap: Array<HeapEntry<T>> = [];
  private seq = 0;

  get size(): number {
    return this.heap.length;
  }

  push(value: T, priority: number): void {
    this.heap.push({ priority, seq: this.seq++, value });
    this.siftUp(this.heap.length - 1);
  }

  pop(): T | undefined {
    const top = this.heap[0];
    if (!top) return undefined;
    const last = this.heap.pop();
    if (last && this.heap.length > 0) {
      this.heap[0] = last;
      this.siftDown(0);
    }
    return top.value;
  }

  peek(): T | undefined {
    return this.heap[0]?.value;
  }

  /** Values in pop order, without mutating the queue. */
  toArray(): T[] {
    return [...this.heap].sort((a, b) => this.compare(a, b)).map((e) => e.value);
  }

  private compare(a: HeapEntry<T>, b: HeapEntry<T>): number {
    return a.priority !== b.priority ? a.priority - b.priority : a.seq - b.seq;
  }

  private less(i: number, j: number): boolean {
    const a = this.heap[i];
    const b = this.heap[j];
    return a !== undefined && b !== undefined && this.compare(a, b) < 0;
  }

  private swap(i: number, j: number): void {
    const a = this.heap[i];
    const b = this.heap[j];
    if (a === undefined || b === undefined) return;
    this.heap[i] = b;
    this.heap[j] = a;
  }

  private siftUp(index: number): void {
    let i = index;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!this.less(i, parent)) break;
      this.swap(i, parent);
      i = parent;
    }
  }

  private siftDown(index: number): void {
    let i = index;
    const n = this.heap.length;
    for (;;) {
      const left = 2 * i + 1;
      const right = left + 1;
      let smallest = i;
      if (left < n && this.less(left, smallest)) smallest = left;
      if (right < n && this.less(right, smallest)) smallest = right;
      if (smallest === i) return;
      this.swap(i, smallest);
      i = smallest;
    }
  }
}
