interface Entry<T> {
  item: T;
  priority: number;
  seq: number;
}

/**
 * Binary min-heap keyed by a numeric priority.
 *
 * Equal priorities come out in insertion order: every push is stamped with a
 * sequence number that acts as the secondary key.
 */
export class MinPriorityQueue<T> {
  private heap: Entry<T>[] = [];
  private seqCounter = 0;

  push(item: T, priority: number): void {
    this.heap.push({ item, priority, seq: this.seqCounter++ });
    this.siftUp(this.heap.length - 1);
  }

  pop(): T | undefined {
    const top = this.heap[0];
    if (top === undefined) return undefined;

    const last = this.heap.pop();
    if (last !== undefined && this.heap.length > 0) {
      this.heap[0] = last;
      this.siftDown(0);
    }
    return top.item;
  }

  peek(): T | undefined {
    return this.heap[0]?.item;
  }

  get length(): number {
    return this.heap.length;
  }

  private less(a: Entry<T>, b: Entry<T>): boolean {
    if (a.priority !== b.priority) return a.priority < b.priority;
    return a.seq < b.seq;
  }

  private siftUp(index: number): void {
    const entry = this.heap[index];
    while (index > 0) {
      const parentIndex = (index - 1) >> 1;
      const parent = this.heap[parentIndex];
      if (!this.less(entry, parent)) break;
      this.heap[index] = parent;
      index = parentIndex;
    }
    this.heap[index] = entry;
  }

  private siftDown(index: number): void {
    const n = this.heap.length;
    const entry = this.heap[index];

    while (true) {
      const leftIndex = 2 * index + 1;
      if (leftIndex >= n) break;

      const rightIndex = leftIndex + 1;
      let childIndex = leftIndex;
      if (rightIndex < n && this.less(this.heap[rightIndex], this.heap[leftIndex])) {
        childIndex = rightIndex;
      }

      const child = this.heap[childIndex];
      if (!this.less(child, entry)) break;
      this.heap[index] = child;
      index = childIndex;
    }
    this.heap[index] = entry;
  }
}
