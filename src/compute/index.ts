/**
 * Compute module - truncated polynomial algebra and the race solver
 */

export { MemoTable, stateKey } from "./cache.ts";
export { OutOfRangeError } from "./errors.ts";
export {
  DisplayPolynomial,
  ONE,
  P,
  Q,
  TruncatedPolynomial,
  ZERO,
} from "./polynomial.ts";
export { Rational } from "./rational.ts";
export { assertInRange, WinProbabilitySolver } from "./solver.ts";
export type { Coefficients, MemoStats, Renderable, ScoreState } from "./types.ts";
