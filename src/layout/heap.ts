interface HeapEntry<T> {
  priority: number;
  seq: number;
  value: T;
}

/**
 * Binary min-heap ordered by priority, then by insertion order.
 */
export class MinHeap<T> {
  private readonly entries: Array<HeapEntry<T>> = [];
  private counter = 0;

  get size(): number {
    return this.entries.length;
  }

  push(priority: number, value: T): void {
    this.entries.push({ priority, seq: this.counter, value });
    this.counter += 1;
    this.siftUp(this.entries.length - 1);
  }

  pop(): T | undefined {
    const top = this.entries[0];
    const last = this.entries.pop();
    if (!top || !last) {
      return undefined;
    }
    if (this.entries.length > 0) {
      this.entries[0] = last;
      this.siftDown(0);
    }
    return top.value;
  }

  private less(i: number, j: number): boolean {
    const a = this.entries[i];
    const b = this.entries[j];
    if (a.priority !== b.priority) {
      return a.priority < b.priority;
    }
    return a.seq < b.seq;
  }

  private swap(i: number, j: number): void {
    const tmp = this.entries[i];
    this.entries[i] = this.entries[j];
    this.entries[j] = tmp;
  }

  private siftUp(index: number): void {
    let i = index;
    while (i > 0) {
      const parent = Math.floor((i - 1) / 2);
      if (!this.less(i, parent)) {
        break;
      }
      this.swap(i, parent);
      i = parent;
    }
  }

  private siftDown(index: number): void {
    let i = index;
    const n = this.entries.length;
    while (true) {
      const left = i * 2 + 1;
      const right = left + 1;
      let smallest = i;
      if (left < n && this.less(left, smallest)) {
        smallest = left;
      }
      if (right < n && this.less(right, smallest)) {
        smallest = right;
      }
      if (smallest === i) {
        break;
      }
      this.swap(i, smallest);
      i = smallest;
    }
  }
}
