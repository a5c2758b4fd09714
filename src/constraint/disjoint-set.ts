/**
 * Disjoint-set forest over keyed items
 *
 * Items live in an arena indexed by insertion order. Union by rank and
 * path-compressed find; neither affects which items end up grouped
 * together, only how fast the grouping is found.
 */

export class DisjointSet<T> {
  private readonly items: T[] = [];
  private readonly parent: number[] = [];
  private readonly rank: number[] = [];
  private readonly index = new Map<string, number>();

  constructor(private readonly keyOf: (item: T) => string) {}

  /**
   * Arena index of an item, adding it as a singleton set on first sight
   */
  add(item: T): number {
    const key = this.keyOf(item);
    const existing = this.index.get(key);
    if (existing !== undefined) {
      return existing;
    }

    const id = this.items.length;
    this.items.push(item);
    this.parent.push(id);
    this.rank.push(0);
    this.index.set(key, id);
    return id;
  }

  has(item: T): boolean {
    return this.index.has(this.keyOf(item));
  }

  /**
   * Representative of the set containing arena index `id`
   */
  find(id: number): number {
    let root = id;
    while (this.parentOf(root) !== root) {
      root = this.parentOf(root);
    }

    let node = id;
    while (node !== root) {
      const next = this.parentOf(node);
      this.parent[node] = root;
      node = next;
    }
    return root;
  }

  /**
   * Merge the sets containing `a` and `b`, adding either if unseen.
   * Returns false when they were already in the same set.
   */
  union(a: T, b: T): boolean {
    const rootA = this.find(this.add(a));
    const rootB = this.find(this.add(b));
    if (rootA === rootB) {
      return false;
    }

    const rankA = this.rankOf(rootA);
    const rankB = this.rankOf(rootB);
    if (rankA < rankB) {
      this.parent[rootA] = rootB;
    } else if (rankA > rankB) {
      this.parent[rootB] = rootA;
    } else {
      this.parent[rootB] = rootA;
      this.rank[rootA] = rankA + 1;
    }
    return true;
  }

  connected(a: T, b: T): boolean {
    if (!this.has(a) || !this.has(b)) {
      return this.keyOf(a) === this.keyOf(b);
    }
    return this.find(this.add(a)) === this.find(this.add(b));
  }

  /**
   * Visit every item in insertion order together with its representative
   */
  forEach(visit: (item: T, root: number) => void): void {
    this.items.forEach((item, id) => visit(item, this.find(id)));
  }

  get size(): number {
    return this.items.length;
  }

  private parentOf(id: number): number {
    const parent = this.parent[id];
    if (parent === undefined) {
      throw new Error(`Disjoint-set index ${id} out of range`);
    }
    return parent;
  }

  private rankOf(id: number): number {
    return this.rank[id] ?? 0;
  }
}
