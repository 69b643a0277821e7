/**
 * Cubic truncated polynomials in x = p - 1/2.
 *
 * The exact flavor carries Rational coefficients and is the only one with
 * arithmetic. Products keep degrees 0-3; every cross-term of total degree >= 4
 * is left out of the sums below rather than computed and discarded.
 *
 * The display flavor carries binary64 coefficients and only renders and
 * evaluates; its 4-place decimals round ties to even on the exact binary
 * value. Both implement the same rendering contract.
 */

import { Rational } from "./rational.ts";
import type { Coefficients, Renderable } from "./types.ts";

const VARIABLE = "(p - 1/2)";

/** Shared layout: "c0 ± |c1| (p - 1/2) ± |c2| (p - 1/2)^2 ± |c3| (p - 1/2)^3" */
function renderTerms<T>(
  coefficients: Coefficients<T>,
  format: (c: T) => string,
  isNegative: (c: T) => boolean,
  magnitude: (c: T) => T,
): string {
  const [c0, ...rest] = coefficients;
  const terms = rest.map((c, i) => {
    const sign = isNegative(c) ? "-" : "+";
    const power = i === 0 ? VARIABLE : `${VARIABLE}^${i + 1}`;
    return `${sign} ${format(magnitude(c))} ${power}`;
  });
  return [format(c0), ...terms].join(" ");
}

export class TruncatedPolynomial implements Renderable {
  readonly coefficients: Coefficients<Rational>;

  constructor(c0: Rational, c1: Rational, c2: Rational, c3: Rational) {
    this.coefficients = [c0, c1, c2, c3];
  }

  /** Build from integer or [num, den] pairs, e.g. of([1, 2], 1, 0, 0) */
  static of(...terms: [RationalLike, RationalLike, RationalLike, RationalLike]): TruncatedPolynomial {
    const [c0, c1, c2, c3] = terms.map(toRational);
    return new TruncatedPolynomial(c0, c1, c2, c3);
  }

  add(other: TruncatedPolynomial): TruncatedPolynomial {
    const [a0, a1, a2, a3] = this.coefficients;
    const [b0, b1, b2, b3] = other.coefficients;
    return new TruncatedPolynomial(a0.add(b0), a1.add(b1), a2.add(b2), a3.add(b3));
  }

  sub(other: TruncatedPolynomial): TruncatedPolynomial {
    const [a0, a1, a2, a3] = this.coefficients;
    const [b0, b1, b2, b3] = other.coefficients;
    return new TruncatedPolynomial(a0.sub(b0), a1.sub(b1), a2.sub(b2), a3.sub(b3));
  }

  mul(other: TruncatedPolynomial): TruncatedPolynomial {
    const [a0, a1, a2, a3] = this.coefficients;
    const [b0, b1, b2, b3] = other.coefficients;
    return new TruncatedPolynomial(
      a0.mul(b0),
      a0.mul(b1).add(a1.mul(b0)),
      a0.mul(b2).add(a1.mul(b1)).add(a2.mul(b0)),
      a0.mul(b3).add(a1.mul(b2)).add(a2.mul(b1)).add(a3.mul(b0)),
    );
  }

  equals(other: TruncatedPolynomial): boolean {
    return this.coefficients.every((c, i) => c.equals(other.coefficients[i]));
  }

  /** Exact value of the approximation at probability p */
  evaluate(p: Rational): Rational {
    const x = p.sub(Rational.HALF);
    const [c0, c1, c2, c3] = this.coefficients;
    return c3.mul(x).add(c2).mul(x).add(c1).mul(x).add(c0);
  }

  toDisplay(): DisplayPolynomial {
    const [c0, c1, c2, c3] = this.coefficients;
    return new DisplayPolynomial(c0.toNumber(), c1.toNumber(), c2.toNumber(), c3.toNumber());
  }

  render(): string {
    return renderTerms(
      this.coefficients,
      (c) => c.toString(),
      (c) => c.sign() < 0,
      (c) => c.abs(),
    );
  }

  toString(): string {
    return this.render();
  }
}

export class DisplayPolynomial implements Renderable {
  readonly coefficients: Coefficients<number>;

  constructor(c0: number, c1: number, c2: number, c3: number) {
    this.coefficients = [c0, c1, c2, c3];
  }

  /** Approximate value at probability p */
  evaluate(p: number): number {
    const x = p - 0.5;
    const [c0, c1, c2, c3] = this.coefficients;
    return ((c3 * x + c2) * x + c1) * x + c0;
  }

  render(): string {
    return renderTerms(
      this.coefficients,
      (c) => Rational.fromNumber(c).toFixed(4),
      (c) => c < 0,
      Math.abs,
    );
  }

  toString(): string {
    return this.render();
  }
}

type RationalLike = number | bigint | readonly [number | bigint, number | bigint];

function toRational(value: RationalLike): Rational {
  return typeof value === "object" ? Rational.of(value[0], value[1]) : Rational.of(value);
}

// p itself: 1/2 + x
export const P = TruncatedPolynomial.of([1, 2], 1, 0, 0);
// q = 1 - p: 1/2 - x
export const Q = TruncatedPolynomial.of([1, 2], -1, 0, 0);
export const ONE = TruncatedPolynomial.of(1, 0, 0, 0);
export const ZERO = TruncatedPolynomial.of(0, 0, 0, 0);
