/**
 * Pure bigint helpers
 * No side effects - just computation
 */

/** Absolute value of a bigint */
export function absBig(n: bigint): bigint {
  return n < 0n ? -n : n;
}

/** Greatest common divisor using Euclidean algorithm */
export function gcd(a: bigint, b: bigint): bigint {
  a = absBig(a);
  b = absBig(b);
  while (b) {
    [a, b] = [b, a % b];
  }
  return a;
}

/** True for 1, 2, 4, 8, ... */
export function isPowerOfTwo(n: bigint): boolean {
  return n > 0n && (n & (n - 1n)) === 0n;
}

/** Largest power of two dividing n (n & -n on two's complement) */
export function lowestSetBit(n: bigint): bigint {
  return n & -n;
}

/** Number of binary digits of |n| (0 for 0) */
export function bitLength(n: bigint): number {
  return n === 0n ? 0 : absBig(n).toString(2).length;
}

/** Convert a safe integer or bigint to bigint, rejecting fractions */
export function toBigInt(n: bigint | number): bigint {
  if (typeof n === "bigint") return n;
  if (!Number.isSafeInteger(n)) {
    throw new RangeError(`Expected a safe integer, got ${n}`);
  }
  return BigInt(n);
}
