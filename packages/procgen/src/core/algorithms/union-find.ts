/**
 * Union-Find (Disjoint Set Union) data structure.
 *
 * Tracks connected components with near-constant time operations using
 * path compression and union by rank. `find` is iterative so very long
 * chains never grow the call stack.
 *
 * @example
 * ```typescript
 * const uf = new UnionFind(4);
 * uf.union(0, 1);
 * uf.connected(0, 1); // true
 * uf.connected(0, 2); // false
 * uf.count; // 3
 * ```
 */
export class UnionFind {
  private readonly parent: Int32Array;
  private readonly rank: Uint8Array;
  private components: number;

  /**
   * @param size - Number of elements (0 to size-1)
   */
  constructor(size: number) {
    this.parent = new Int32Array(size);
    this.rank = new Uint8Array(size);
    this.components = size;
    for (let i = 0; i < size; i++) {
      this.parent[i] = i;
    }
  }

  /** Number of disjoint sets. */
  get count(): number {
    return this.components;
  }

  /**
   * Root representative of the set containing x.
   */
  find(x: number): number {
    let root = x;
    let next = this.parent[root] ?? root;
    while (next !== root) {
      root = next;
      next = this.parent[root] ?? root;
    }

    // Second walk points every visited node at the root
    let node = x;
    while (node !== root) {
      const up = this.parent[node] ?? root;
      this.parent[node] = root;
      node = up;
    }

    return root;
  }

  /**
   * Merge the sets containing x and y.
   * @returns True if a merge was performed, false if already in same set
   */
  union(x: number, y: number): boolean {
    const rootX = this.find(x);
    const rootY = this.find(y);

    if (rootX === rootY) return false;

    const rankX = this.rank[rootX] ?? 0;
    const rankY = this.rank[rootY] ?? 0;

    if (rankX < rankY) {
      this.parent[rootX] = rootY;
    } else if (rankX > rankY) {
      this.parent[rootY] = rootX;
    } else {
      this.parent[rootY] = rootX;
      this.rank[rootX] = rankX + 1;
    }
    this.components--;
    return true;
  }

  connected(x: number, y: number): boolean {
    return this.find(x) === this.find(y);
  }
}
