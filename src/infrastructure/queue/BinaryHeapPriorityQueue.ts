import type { IPriorityQueue } from "@domain/ports/IPriorityQueue";

/** Min-heap: the lowest priority value is dequeued first, ties in insertion order. */
export class BinaryHeapPriorityQueue<Data> implements IPriorityQueue<Data> {
  private heap: Array<{ value: Data; priority: number; seq: number }> = [];
  private seq = 0;

  private parent(i: number) {
    return (i - 1) >> 1;
  }
  private left(i: number) {
    return (i << 1) + 1;
  }
  private right(i: number) {
    return (i << 1) + 2;
  }
  private swap(i: number, j: number) {
    [this.heap[i], this.heap[j]] = [this.heap[j], this.heap[i]];
  }
  private less(i: number, j: number) {
    const a = this.heap[i];
    const b = this.heap[j];
    return a.priority < b.priority || (a.priority === b.priority && a.seq < b.seq);
  }

  private siftUp(pos: number) {
    while (pos > 0 && this.less(pos, this.parent(pos))) {
      this.swap(pos, this.parent(pos));
      pos = this.parent(pos);
    }
  }

  private siftDown(pos: number) {
    const count = this.heap.length;
    for (;;) {
      let min = pos;
      const l = this.left(pos);
      const r = this.right(pos);
      if (l < count && this.less(l, min)) min = l;
      if (r < count && this.less(r, min)) min = r;
      if (min === pos) return;
      this.swap(pos, min);
      pos = min;
    }
  }

  enqueue(value: Data, priority = 0) {
    this.heap.push({ value, priority, seq: this.seq++ });
    this.siftUp(this.heap.length - 1);
  }

  dequeue() {
    const root = this.heap[0];
    if (!root) return undefined;
    const last = this.heap.pop();
    if (last && this.heap.length > 0) {
      this.heap[0] = last;
      this.siftDown(0);
    }
    return root.value;
  }

  peek() {
    return this.heap[0]?.value;
  }

  size() {
    return this.heap.length;
  }

  clear() {
    this.heap = [];
  }
}
