/**
 * Union-Find over heap ownership tokens.
 * Lets a merge hand every node of one heap to another without touching the nodes.
 */

/**
 * Growable disjoint-set forest of owner tokens with path compression.
 * A redirected token resolves to the token it was folded into.
 */
export class OwnerSet {
  private parent: number[] = [];

  /**
   * Number of tokens ever issued.
   */
  get count(): number {
    return this.parent.length;
  }

  /**
   * Issue a new token that resolves to itself.
   */
  add(): number {
    const token = this.parent.length;
    this.parent.push(token);
    return token;
  }

  /**
   * Find the token that currently owns `token`.
   * Iterative, with full path compression.
   */
  find(token: number): number {
    let root = token;
    while (this.parent[root] !== root) {
      root = this.parent[root];
    }

    let cur = token;
    while (this.parent[cur] !== root) {
      const next = this.parent[cur];
      this.parent[cur] = root;
      cur = next;
    }
    return root;
  }

  /**
   * Fold everything owned by `from` into `to`.
   * Unlike union by rank the direction is fixed: the destination heap keeps its token.
   */
  redirect(from: number, to: number): void {
    const rootFrom = this.find(from);
    const rootTo = this.find(to);
    if (rootFrom !== rootTo) {
      this.parent[rootFrom] = rootTo;
    }
  }

  /**
   * Append all of `other`'s tokens, shifted past ours.
   * Returns the offset to add to any token of `other`.
   */
  absorb(other: OwnerSet): number {
    const offset = this.parent.length;
    for (const p of other.parent) {
      this.parent.push(p + offset);
    }
    other.parent = [];
    return offset;
  }
}
