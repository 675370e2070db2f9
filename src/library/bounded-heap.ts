/**
 * Fixed-capacity min-heap that keeps the `capacity` largest items seen.
 *
 * While below capacity every offer is pushed; once full, an offer replaces
 * the current minimum only when it compares strictly greater. Cost per offer
 * is O(log capacity).
 */
export class BoundedMinHeap<T> {
  private readonly items: T[] = [];

  constructor(
    private readonly capacity: number,
    private readonly compare: (a: T, b: T) => number,
  ) {}

  get size(): number {
    return this.items.length;
  }

  peek(): T | undefined {
    return this.items[0];
  }

  offer(item: T): boolean {
    if (this.capacity <= 0) return false;

    if (this.items.length < this.capacity) {
      this.items.push(item);
      this.siftUp(this.items.length - 1);
      return true;
    }

    const min = this.items[0];
    if (min === undefined || this.compare(item, min) <= 0) return false;

    this.items[0] = item;
    this.siftDown(0);
    return true;
  }

  /** Retained items, largest first */
  toSortedDescending(): T[] {
    return [...this.items].sort((a, b) => this.compare(b, a));
  }

  private less(i: number, j: number): boolean {
    const a = this.items[i];
    const b = this.items[j];
    if (a === undefined || b === undefined) return false;
    return this.compare(a, b) < 0;
  }

  private swap(i: number, j: number): void {
    const a = this.items[i];
    const b = this.items[j];
    if (a === undefined || b === undefined) return;
    this.items[i] = b;
    this.items[j] = a;
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
    const n = this.items.length;
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
