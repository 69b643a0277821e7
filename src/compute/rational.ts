/**
 * Exact rational numbers on bigint numerator/denominator.
 * Always normalized: den > 0 and gcd(|num|, den) = 1.
 */

import { absBig, bitLength, gcd, isPowerOfTwo, lowestSetBit, toBigInt } from "./math.ts";

// smallest quotient carrying all 53 bits of a double
const FULL_PRECISION = 2n ** 52n;
// 2^-1074 is the smallest subnormal
const MAX_SHIFT = 1074;

export class Rational {
  readonly num: bigint;
  readonly den: bigint;

  private constructor(num: bigint, den: bigint) {
    this.num = num;
    this.den = den;
  }

  static of(num: bigint | number, den: bigint | number = 1n): Rational {
    let n = toBigInt(num);
    let d = toBigInt(den);
    if (d === 0n) {
      throw new RangeError("Rational denominator must be non-zero");
    }
    if (d < 0n) {
      n = -n;
      d = -d;
    }
    // Dyadic denominators only share factors of two with the numerator
    if (isPowerOfTwo(d)) {
      if (n === 0n) return new Rational(0n, 1n);
      const low = lowestSetBit(n);
      const g = low < d ? low : d;
      return new Rational(n / g, d / g);
    }
    const g = gcd(n, d);
    return g > 1n ? new Rational(n / g, d / g) : new Rational(n, d);
  }

  /** Exact value of a finite double */
  static fromNumber(value: number): Rational {
    if (!Number.isFinite(value)) {
      throw new RangeError(`Expected a finite number, got ${value}`);
    }
    let scaled = value;
    let den = 1n;
    // doubling is exact for any value with a fractional part
    while (!Number.isInteger(scaled)) {
      scaled *= 2;
      den *= 2n;
    }
    return Rational.of(BigInt(scaled), den);
  }

  static readonly ZERO = Rational.of(0n);
  static readonly ONE = Rational.of(1n);
  static readonly HALF = Rational.of(1n, 2n);

  add(other: Rational): Rational {
    return Rational.of(this.num * other.den + other.num * this.den, this.den * other.den);
  }

  sub(other: Rational): Rational {
    return Rational.of(this.num * other.den - other.num * this.den, this.den * other.den);
  }

  mul(other: Rational): Rational {
    return Rational.of(this.num * other.num, this.den * other.den);
  }

  neg(): Rational {
    return new Rational(-this.num, this.den);
  }

  abs(): Rational {
    return this.num < 0n ? this.neg() : this;
  }

  sign(): -1 | 0 | 1 {
    if (this.num === 0n) return 0;
    return this.num < 0n ? -1 : 1;
  }

  isZero(): boolean {
    return this.num === 0n;
  }

  compare(other: Rational): -1 | 0 | 1 {
    return this.sub(other).sign();
  }

  equals(other: Rational): boolean {
    return this.num === other.num && this.den === other.den;
  }

  /**
   * Nearest binary64 value, ties to even.
   * The quotient is taken to 53 significant bits (fewer once the result is
   * subnormal) and rounded here, so Number() and the power-of-two scale are exact.
   */
  toNumber(): number {
    if (this.num === 0n) return 0;

    const n = absBig(this.num);
    let shift = Math.min(52 - (bitLength(n) - bitLength(this.den)), MAX_SHIFT);
    let { q, r, divisor } = scaledQuotient(n, this.den, shift);
    if (q < FULL_PRECISION && shift < MAX_SHIFT) {
      shift++;
      ({ q, r, divisor } = scaledQuotient(n, this.den, shift));
    }
    if (roundsUp(q, r, divisor)) q++;

    const magnitude = Number(q) * 2 ** -shift;
    return this.num < 0n ? -magnitude : magnitude;
  }

  /** Decimal string with `digits` places, ties to even */
  toFixed(digits: number): string {
    const scale = 10n ** BigInt(digits);
    const scaled = absBig(this.num) * scale;
    let q = scaled / this.den;
    if (roundsUp(q, scaled % this.den, this.den)) q++;

    const sign = this.num < 0n ? "-" : "";
    if (digits === 0) return `${sign}${q}`;
    const frac = (q % scale).toString().padStart(digits, "0");
    return `${sign}${q / scale}.${frac}`;
  }

  toString(): string {
    return this.den === 1n ? `${this.num}` : `${this.num}/${this.den}`;
  }
}

/** floor(n * 2^shift / d) with its remainder and divisor */
function scaledQuotient(
  n: bigint,
  d: bigint,
  shift: number,
): { q: bigint; r: bigint; divisor: bigint } {
  const scaledNum = shift > 0 ? n << BigInt(shift) : n;
  const divisor = shift < 0 ? d << BigInt(-shift) : d;
  return { q: scaledNum / divisor, r: scaledNum % divisor, divisor };
}

/** Round-half-even decision for quotient q with remainder r over divisor */
function roundsUp(q: bigint, r: bigint, divisor: bigint): boolean {
  const twice = 2n * r;
  return twice > divisor || (twice === divisor && (q & 1n) === 1n);
}
