/**
 * Manually failed connections.
 *
 * A failed connection removes an otherwise feasible link from the
 * feasibility graph. Pairs are unordered: every operation canonicalises its
 * arguments first, so `add(x, y)` and `contains(y, x)` agree.
 */

import type { ConnectionPair } from "../domain/index.js";

/** Put a pair of identities in canonical (lexicographic) order. */
export function canonicalPair(a: string, b: string): ConnectionPair {
  return a <= b ? { a, b } : { a: b, b: a };
}

/** Unambiguous map key for a canonical pair (ids may contain any character). */
function pairKey(pair: ConnectionPair): string {
  return JSON.stringify([pair.a, pair.b]);
}

/** In-memory set of failed connections; persistence is the caller's concern. */
export class ConnectionOverrideStore {
  private pairs = new Map<string, ConnectionPair>();

  constructor(initial: Iterable<ConnectionPair> = []) {
    for (const pair of initial) {
      this.add(pair.a, pair.b);
    }
  }

  get size(): number {
    return this.pairs.size;
  }

  /** Mark a pair as failed. Adding an existing pair is a no-op. */
  add(a: string, b: string): ConnectionPair {
    const pair = canonicalPair(a, b);
    const key = pairKey(pair);
    if (!this.pairs.has(key)) {
      this.pairs.set(key, pair);
    }
    return pair;
  }

  /** @returns whether the pair was present */
  remove(a: string, b: string): boolean {
    return this.pairs.delete(pairKey(canonicalPair(a, b)));
  }

  contains(a: string, b: string): boolean {
    return this.pairs.has(pairKey(canonicalPair(a, b)));
  }

  /** Every failed pair, in the order it was first added. */
  list(): ConnectionPair[] {
    return [...this.pairs.values()].map((pair) => ({ ...pair }));
  }

  /** Drop every pair that has `id` as an endpoint. */
  removeAllFor(id: string): number {
    let removed = 0;
    for (const [key, pair] of this.pairs) {
      if (pair.a === id || pair.b === id) {
        this.pairs.delete(key);
        removed++;
      }
    }
    return removed;
  }

  clone(): ConnectionOverrideStore {
    return new ConnectionOverrideStore(this.pairs.values());
  }
}

/** Read-only view consulted by the graph builder */
export type FailedConnectionLookup = Pick<ConnectionOverrideStore, "contains">;
