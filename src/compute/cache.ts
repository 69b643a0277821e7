/**
 * Memo table for solved race states
 * Grows for the lifetime of its owner; nothing is evicted.
 */

import type { TruncatedPolynomial } from "./polynomial.ts";
import type { MemoStats, ScoreState } from "./types.ts";

export function stateKey({ win, lose, goal }: ScoreState): string {
  return `${win}:${lose}:${goal}`;
}

export class MemoTable {
  private table: Map<string, TruncatedPolynomial> = new Map();
  private hits = 0;
  private misses = 0;

  /** Lookup that counts toward hit/miss stats */
  get(state: ScoreState): TruncatedPolynomial | undefined {
    const entry = this.table.get(stateKey(state));
    if (entry) {
      this.hits++;
    } else {
      this.misses++;
    }
    return entry;
  }

  /** Lookup without touching stats (used while filling the table) */
  peek(state: ScoreState): TruncatedPolynomial | undefined {
    return this.table.get(stateKey(state));
  }

  set(state: ScoreState, value: TruncatedPolynomial): void {
    this.table.set(stateKey(state), value);
  }

  get size(): number {
    return this.table.size;
  }

  stats(): MemoStats {
    const total = this.hits + this.misses;
    return {
      size: this.table.size,
      hits: this.hits,
      misses: this.misses,
      hitRate: total > 0 ? this.hits / total : 0,
    };
  }
}
