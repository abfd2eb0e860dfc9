/**
 * Disjoint-set forest with path compression and union by rank. Items are
 * added lazily: `find` on an unknown item registers it as a singleton.
 */
export class UnionFind<T> {
  private readonly parent = new Map<T, T>();
  private readonly rank = new Map<T, number>();
  private sets = 0;

  constructor(items: Iterable<T> = []) {
    for (const item of items) {
      this.add(item);
    }
  }

  /** Number of disjoint sets. Starts at the item count and drops by one per successful union. */
  get count(): number {
    return this.sets;
  }

  get size(): number {
    return this.parent.size;
  }

  add(item: T): boolean {
    if (this.parent.has(item)) {
      return false;
    }
    this.parent.set(item, item);
    this.rank.set(item, 0);
    this.sets += 1;
    return true;
  }

  /** Root of the item's set. Every node on the walked path is re-pointed at the root. */
  find(item: T): T {
    this.add(item);
    let root = item;
    for (let next = this.parent.get(root); next !== undefined && next !== root; next = this.parent.get(root)) {
      root = next;
    }
    let current = item;
    while (current !== root) {
      const next = this.parent.get(current);
      if (next === undefined) {
        break;
      }
      this.parent.set(current, root);
      current = next;
    }
    return root;
  }

  /** Merges the two sets; `false` (and no change) when they are already one. */
  union(left: T, right: T): boolean {
    const leftRoot = this.find(left);
    const rightRoot = this.find(right);
    if (leftRoot === rightRoot) {
      return false;
    }
    const leftRank = this.rank.get(leftRoot) ?? 0;
    const rightRank = this.rank.get(rightRoot) ?? 0;
    if (leftRank < rightRank) {
      this.parent.set(leftRoot, rightRoot);
    } else if (leftRank > rightRank) {
      this.parent.set(rightRoot, leftRoot);
    } else {
      this.parent.set(rightRoot, leftRoot);
      this.rank.set(leftRoot, leftRank + 1);
    }
    this.sets -= 1;
    return true;
  }

  connected(left: T, right: T): boolean {
    return this.find(left) === this.find(right);
  }

  /** Items grouped by set; groups and members follow insertion order. */
  groups(): T[][] {
    const byRoot = new Map<T, T[]>();
    for (const item of this.parent.keys()) {
      const root = this.find(item);
      const group = byRoot.get(root);
      if (group) {
        group.push(item);
      } else {
        byRoot.set(root, [item]);
      }
    }
    return Array.from(byRoot.values());
  }
}
