import type { ScoreState } from "./types.ts";

/** Score outside the race: negative, fractional, or past the goal */
export class OutOfRangeError extends Error {
  readonly win: number;
  readonly lose: number;
  readonly goal: number;

  constructor({ win, lose, goal }: ScoreState) {
    super(`Score ${win}-${lose} is out of range for a race to ${goal}`);
    this.name = "OutOfRangeError";
    this.win = win;
    this.lose = lose;
    this.goal = goal;
  }
}
