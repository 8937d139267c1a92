/**
 * Union-find over string keys. The representative of a set is always its
 * earliest-added member, so results never depend on union order.
 */
export class DisjointSet {
  private readonly parent = new Map<string, string>();
  private readonly added = new Map<string, number>();

  add(key: string): void {
    if (this.parent.has(key)) return;
    this.parent.set(key, key);
    this.added.set(key, this.parent.size);
  }

  has(key: string): boolean {
    return this.parent.has(key);
  }

  find(key: string): string {
    let root = this.parent.get(key);
    if (root === undefined) {
      throw new Error(`unknown key ${key}`);
    }
    let current = key;
    while (root !== current) {
      current = root;
      root = this.parent.get(current) ?? current;
    }
    // Path compression.
    let walk = key;
    while (walk !== root) {
      const next = this.parent.get(walk) ?? root;
      this.parent.set(walk, root);
      walk = next;
    }
    return root;
  }

  union(a: string, b: string): string {
    this.add(a);
    this.add(b);
    const ra = this.find(a);
    const rb = this.find(b);
    if (ra === rb) return ra;
    const keep = (this.added.get(ra) ?? 0) <= (this.added.get(rb) ?? 0) ? ra : rb;
    const drop = keep === ra ? rb : ra;
    this.parent.set(drop, keep);
    return keep;
  }

  /** Every set, singletons included, keyed by representative; members in insertion order. */
  groups(): Map<string, string[]> {
    const out = new Map<string, string[]>();
    for (const key of this.parent.keys()) {
      const root = this.find(key);
      const members = out.get(root);
      if (members) members.push(key);
      else out.set(root, [key]);
    }
    return out;
  }
}
