interface HeapEntry<T> {
  value: T;
  priority: number;
  sequence: number;
}

/**
 * Binary min-heap. Entries with equal priority come out in insertion order.
 */
export class PriorityQueue<T> {
  #heap: HeapEntry<T>[] = [];
  #sequence = 0;

  get size(): number {
    return this.#heap.length;
  }

  push(value: T, priority: number): void {
    this.#heap.push({ value, priority, sequence: this.#sequence++ });
    this.#siftUp(this.#heap.length - 1);
  }

  pop(): T | undefined {
    const heap = this.#heap;
    if (heap.length === 0) return undefined;
    const top = heap[0];
    const last = heap.pop();
    if (last && heap.length > 0) {
      heap[0] = last;
      this.#siftDown(0);
    }
    return top.value;
  }

  #less(a: HeapEntry<T>, b: HeapEntry<T>): boolean {
    return a.priority < b.priority || (a.priority === b.priority && a.sequence < b.sequence);
  }

  #siftUp(index: number) {
    const heap = this.#heap;
    while (index > 0) {
      const parent = (index - 1) >> 1;
      if (!this.#less(heap[index], heap[parent])) break;
      [heap[index], heap[parent]] = [heap[parent], heap[index]];
      index = parent;
    }
  }

  #siftDown(index: number) {
    const heap = this.#heap;
    for (;;) {
      const left = index * 2 + 1;
      const right = left + 1;
      let smallest = index;
      if (left < heap.length && this.#less(heap[left], heap[smallest])) smallest = left;
      if (right < heap.length && this.#less(heap[right], heap[smallest])) smallest = right;
      if (smallest === index) return;
      [heap[index], heap[smallest]] = [heap[smallest], heap[index]];
      index = smallest;
    }
  }
}
