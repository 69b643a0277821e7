/**
 * Win probability of a race to `goal` points as a cubic in (p - 1/2).
 *
 *   solve(w, l, g) = 1                                  if w == g
 *                  = 0                                  if l == g
 *                  = P * solve(w+1, l, g) + Q * solve(w, l+1, g)
 *
 * The win terminal is checked first, so the degenerate race to 0 is a win.
 * States are filled bottom-up into the memo table: rows w = goal..win, columns
 * l = goal..lose. Both neighbours of a cell are always filled before it, and the
 * call stack stays flat for any goal.
 */

import { MemoTable } from "./cache.ts";
import { OutOfRangeError } from "./errors.ts";
import { ONE, P, Q, type TruncatedPolynomial, ZERO } from "./polynomial.ts";
import type { MemoStats, ScoreState } from "./types.ts";

function isCount(n: number): boolean {
  return Number.isSafeInteger(n) && n >= 0;
}

export function assertInRange(state: ScoreState): void {
  const { win, lose, goal } = state;
  if (!isCount(win) || !isCount(lose) || !isCount(goal) || win > goal || lose > goal) {
    throw new OutOfRangeError(state);
  }
}

export class WinProbabilitySolver {
  private readonly memo: MemoTable;

  constructor(memo: MemoTable = new MemoTable()) {
    this.memo = memo;
  }

  solve(win: number, lose: number, goal: number): TruncatedPolynomial {
    const state = { win, lose, goal };
    assertInRange(state);

    const cached = this.memo.get(state);
    if (cached) return cached;

    // below[l] holds row w+1, current[l] row w
    let below: TruncatedPolynomial[] = [];
    let current: TruncatedPolynomial[] = [];

    for (let w = goal; w >= win; w--) {
      current = [];
      for (let l = goal; l >= lose; l--) {
        const cell = { win: w, lose: l, goal };
        let value = this.memo.peek(cell);
        if (!value) {
          value = this.step(cell, below, current);
          this.memo.set(cell, value);
        }
        current[l] = value;
      }
      below = current;
    }

    return current[lose];
  }

  stats(): MemoStats {
    return this.memo.stats();
  }

  private step(
    { win, lose, goal }: ScoreState,
    below: TruncatedPolynomial[],
    current: TruncatedPolynomial[],
  ): TruncatedPolynomial {
    if (win === goal) return ONE;
    if (lose === goal) return ZERO;
    return P.mul(below[lose]).add(Q.mul(current[lose + 1]));
  }
}
