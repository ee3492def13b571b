/**
 * Binary min-heap keyed by priority, with a secondary rank for ties.
 *
 * Entries are never updated in place: push the item again with its better
 * priority and skip stale pops (lazy deletion).
 */

export interface QueueEntry<T> {
  item: T;
  priority: number;
  /** Lower rank pops first among equal priorities */
  rank: number;
}

function before<T>(a: QueueEntry<T>, b: QueueEntry<T>): boolean {
  return a.priority < b.priority || (a.priority === b.priority && a.rank < b.rank);
}

export class PriorityQueue<T> {
  private readonly heap: QueueEntry<T>[] = [];

  get size(): number {
    return this.heap.length;
  }

  isEmpty(): boolean {
    return this.heap.length === 0;
  }

  push(item: T, priority: number, rank = 0): void {
    this.heap.push({ item, priority, rank });
    this.siftUp(this.heap.length - 1);
  }

  pop(): QueueEntry<T> | undefined {
    const top = this.heap[0];
    const last = this.heap.pop();
    if (top === undefined || last === undefined) return undefined;
    if (this.heap.length > 0) {
      this.heap[0] = last;
      this.siftDown(0);
    }
    return top;
  }

  private siftUp(index: number): void {
    const entry = this.heap[index];
    if (!entry) return;
    while (index > 0) {
      const parentIndex = (index - 1) >> 1;
      const parent = this.heap[parentIndex];
      if (!parent || !before(entry, parent)) break;
      this.heap[index] = parent;
      index = parentIndex;
    }
    this.heap[index] = entry;
  }

  private siftDown(index: number): void {
    const entry = this.heap[index];
    if (!entry) return;
    const length = this.heap.length;
    for (;;) {
      const leftIndex = 2 * index + 1;
      if (leftIndex >= length) break;
      const rightIndex = leftIndex + 1;
      const left = this.heap[leftIndex];
      const right = this.heap[rightIndex];
      if (!left) break;
      let childIndex = leftIndex;
      let child = left;
      if (right && before(right, left)) {
        childIndex = rightIndex;
        child = right;
      }
      if (!before(child, entry)) break;
      this.heap[index] = child;
      index = childIndex;
    }
    this.heap[index] = entry;
  }
}
