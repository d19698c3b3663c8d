/**
 * Binary min-heap keyed by number.
 *
 * Stored 1-indexed: slot 0 is never read, children of `i` are `2i` and
 * `2i + 1`. Entries with equal keys pop in no particular order.
 */

interface HeapEntry<T> {
  key: number;
  value: T;
}

export class MinHeap<T> {
  private readonly items: (HeapEntry<T> | undefined)[] = [undefined];

  get size(): number {
    return this.items.length - 1;
  }

  get isEmpty(): boolean {
    return this.items.length === 1;
  }

  /**
   * Smallest entry without removing it.
   */
  min(): HeapEntry<T> | undefined {
    return this.items[1];
  }

  insert(key: number, value: T): void {
    this.items.push({ key, value });
    this.siftUp(this.items.length - 1);
  }

  /**
   * Remove and return the smallest entry.
   */
  extractMin(): HeapEntry<T> | undefined {
    const last = this.items.length - 1;
    if (last < 1) return undefined;

    this.swap(1, last);
    const best = this.items.pop();
    if (this.items.length > 1) {
      this.siftDown(1);
    }
    return best;
  }

  /**
   * Remove every entry. The backing array keeps its capacity.
   */
  clear(): void {
    this.items.length = 1;
  }

  private keyAt(index: number): number {
    return this.items[index]?.key ?? Number.POSITIVE_INFINITY;
  }

  private swap(a: number, b: number): void {
    const temp = this.items[a];
    this.items[a] = this.items[b];
    this.items[b] = temp;
  }

  private siftUp(startIndex: number): void {
    let index = startIndex;
    while (index > 1) {
      const parent = index >> 1;
      if (this.keyAt(parent) <= this.keyAt(index)) break;
      this.swap(parent, index);
      index = parent;
    }
  }

  private siftDown(startIndex: number): void {
    let index = startIndex;
    const size = this.items.length - 1;

    while (true) {
      const left = index * 2;
      const right = left + 1;
      if (left > size) break;

      let smallest = left;
      if (right <= size && this.keyAt(right) < this.keyAt(left)) {
        smallest = right;
      }
      if (this.keyAt(index) <= this.keyAt(smallest)) break;

      this.swap(index, smallest);
      index = smallest;
    }
  }
}

export type { HeapEntry };
