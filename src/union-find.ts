/**
 * Disjoint-set forest over dense indices 0..size-1, stored as flat
 * parent/rank arrays. Rebuilt for every clustering pass.
 */
export class UnionFind {
  private readonly parent: Int32Array;
  private readonly rank: Uint8Array;

  constructor(readonly size: number) {
    this.parent = new Int32Array(size);
    this.rank = new Uint8Array(size);

    for (let i = 0; i < size; i++) {
      this.parent[i] = i;
    }
  }

  find(index: number): number {
    let root = index;

    while (this.parent[root] !== root) {
      root = this.parent[root];
    }

    // Path compression.
    let current = index;
    while (this.parent[current] !== root) {
      const next = this.parent[current];
      this.parent[current] = root;
      current = next;
    }

    return root;
  }

  union(a: number, b: number): boolean {
    const rootA = this.find(a);
    const rootB = this.find(b);

    if (rootA === rootB) {
      return false;
    }

    if (this.rank[rootA] < this.rank[rootB]) {
      this.parent[rootA] = rootB;
    } else if (this.rank[rootA] > this.rank[rootB]) {
      this.parent[rootB] = rootA;
    } else {
      this.parent[rootB] = rootA;
      this.rank[rootA]++;
    }

    return true;
  }

  /**
   * Sets with at least `minSize` members, each listed in ascending index
   * order, ordered by their smallest index.
   */
  sets(minSize: number = 1): number[][] {
    const byRoot = new Map<number, number[]>();

    for (let i = 0; i < this.size; i++) {
      const root = this.find(i);
      const members = byRoot.get(root);

      if (members) {
        members.push(i);
      } else {
        byRoot.set(root, [i]);
      }
    }

    return Array.from(byRoot.values())
      .filter((members) => members.length >= minSize)
      .sort((a, b) => a[0] - b[0]);
  }
}
