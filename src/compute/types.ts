/**
 * Type definitions for the compute module
 */

/** Coefficients c0..c3 of a cubic in (p - 1/2), lowest degree first */
export type Coefficients<T> = readonly [T, T, T, T];

/** Anything that prints as a truncated polynomial */
export interface Renderable {
  render(): string;
}

/** A race score: points won, points lost, points needed */
export interface ScoreState {
  win: number;
  lose: number;
  goal: number;
}

export interface MemoStats {
  /** Number of memoized states */
  size: number;
  hits: number;
  misses: number;
  hitRate: number;
}
