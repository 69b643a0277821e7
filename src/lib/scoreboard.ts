/**
 * Scoreboard - running race score fed by the interactive prompt
 *
 * Input lines:
 * - "w" / "l"      one more won / lost point
 * - "<win> <lose>" set the score outright
 *
 * A line only moves the score when the new score solves; otherwise the
 * previous score stays and the result is "Invalid input.".
 */

import { OutOfRangeError } from "../compute/errors.ts";
import type { DisplayPolynomial, TruncatedPolynomial } from "../compute/polynomial.ts";
import type { WinProbabilitySolver } from "../compute/solver.ts";

export const INVALID_INPUT = "Invalid input.";

const INTEGER = /^[+-]?\d+$/;

export type ScoreResult =
  | {
      ok: true;
      win: number;
      lose: number;
      exact: TruncatedPolynomial;
      display: DisplayPolynomial;
    }
  | { ok: false; message: string };

export class Scoreboard {
  private win = 0;
  private lose = 0;

  constructor(
    private readonly solver: WinProbabilitySolver,
    readonly goal: number,
  ) {}

  get score(): { win: number; lose: number } {
    return { win: this.win, lose: this.lose };
  }

  apply(line: string): ScoreResult {
    const next = this.parse(line.trim());
    if (!next) {
      return { ok: false, message: INVALID_INPUT };
    }

    let exact: TruncatedPolynomial;
    try {
      exact = this.solver.solve(next.win, next.lose, this.goal);
    } catch (error) {
      if (error instanceof OutOfRangeError) {
        return { ok: false, message: INVALID_INPUT };
      }
      throw error;
    }

    this.win = next.win;
    this.lose = next.lose;
    return { ok: true, ...next, exact, display: exact.toDisplay() };
  }

  private parse(line: string): { win: number; lose: number } | null {
    if (line === "w") return { win: this.win + 1, lose: this.lose };
    if (line === "l") return { win: this.win, lose: this.lose + 1 };

    const parts = line.split(/\s+/);
    if (parts.length !== 2 || !parts.every((p) => INTEGER.test(p))) {
      return null;
    }
    return { win: Number.parseInt(parts[0], 10), lose: Number.parseInt(parts[1], 10) };
  }
}

/** "[ 3-7 ] ..." - exact form first when requested, display form always */
export function formatReport(result: ScoreResult, fraction: boolean): string[] {
  if (!result.ok) return [result.message];

  const label = `[${String(result.win).padStart(2)}-${String(result.lose).padEnd(2)}]`;
  const lines: string[] = [];
  if (fraction) {
    lines.push(`${label} ${result.exact.render()}`);
  }
  lines.push(`${label} ${result.display.render()}`);
  return lines;
}
