/**
 * HashSet<K> — A set bucketed by Hash<K> and resolved by Eq<K>.
 *
 * Membership never depends on object identity or memory representation,
 * only on the supplied instances. Insert-only: it backs the hashed path of
 * `unique`.
 */

import type { Eq, Hash } from "@seqflow/std";

export class HashSet<K> {
  private readonly _eq: Eq<K>;
  private readonly _hash: Hash<K>;
  private readonly _buckets = new Map<number, K[]>();
  private _size = 0;

  constructor(eq: Eq<K>, hash: Hash<K>) {
    this._eq = eq;
    this._hash = hash;
  }

  get size(): number {
    return this._size;
  }

  /**
   * Add `k` unless an equal element is present.
   * @returns true when `k` was added
   */
  insert(k: K): boolean {
    const h = this._hash.hash(k);
    const bucket = this._buckets.get(h);
    if (!bucket) {
      this._buckets.set(h, [k]);
      this._size++;
      return true;
    }
    for (const other of bucket) {
      if (this._eq.equals(k, other)) return false;
    }
    bucket.push(k);
    this._size++;
    return true;
  }
}
