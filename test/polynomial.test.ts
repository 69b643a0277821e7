/**
 * Unit tests for the cubic truncated polynomial algebra
 */

import { describe, expect, test } from "vitest";
import {
  DisplayPolynomial,
  ONE,
  P,
  Q,
  TruncatedPolynomial,
  ZERO,
} from "../src/compute/polynomial.ts";
import { Rational } from "../src/compute/rational.ts";

const coeffs = (poly: TruncatedPolynomial) => poly.coefficients.map((c) => c.toString());

describe("TruncatedPolynomial", () => {
  describe("constants", () => {
    test("P is 1/2 + x", () => {
      expect(coeffs(P)).toEqual(["1/2", "1", "0", "0"]);
    });

    test("Q is 1/2 - x", () => {
      expect(coeffs(Q)).toEqual(["1/2", "-1", "0", "0"]);
    });

    test("P + Q = 1", () => {
      expect(P.add(Q).equals(ONE)).toBe(true);
    });

    test("ONE - ONE = ZERO", () => {
      expect(ONE.sub(ONE).equals(ZERO)).toBe(true);
    });
  });

  describe("add / sub", () => {
    test("coefficient-wise", () => {
      const a = TruncatedPolynomial.of([1, 2], 2, [-1, 3], 4);
      const b = TruncatedPolynomial.of([1, 4], -3, [1, 3], [1, 2]);
      expect(coeffs(a.add(b))).toEqual(["3/4", "-1", "0", "9/2"]);
      expect(coeffs(a.sub(b))).toEqual(["1/4", "5", "-2/3", "7/2"]);
    });

    test("operands are left untouched", () => {
      const a = TruncatedPolynomial.of(1, 1, 1, 1);
      a.add(a).mul(a);
      expect(coeffs(a)).toEqual(["1", "1", "1", "1"]);
    });
  });

  describe("mul", () => {
    test("P * Q = 1/4 - x^2", () => {
      expect(coeffs(P.mul(Q))).toEqual(["1/4", "0", "-1", "0"]);
    });

    test("P * P = 1/4 + x + x^2", () => {
      expect(coeffs(P.mul(P))).toEqual(["1/4", "1", "1", "0"]);
    });

    test("all-ones cubics keep only degrees 0-3", () => {
      const a = TruncatedPolynomial.of(1, 1, 1, 1);
      expect(coeffs(a.mul(a))).toEqual(["1", "2", "3", "4"]);
    });

    test("x^3 * x drops the degree-4 term", () => {
      const cube = TruncatedPolynomial.of(0, 0, 0, 1);
      const x = TruncatedPolynomial.of(0, 1, 0, 0);
      expect(cube.mul(x).equals(ZERO)).toBe(true);
    });

    test("x^2 * x^2 drops the degree-4 term", () => {
      const square = TruncatedPolynomial.of(0, 0, 1, 0);
      expect(square.mul(square).equals(ZERO)).toBe(true);
    });

    test("c3 excludes degree 3 x degree 1 cross-terms", () => {
      const a = TruncatedPolynomial.of(0, 2, 0, 5);
      const b = TruncatedPolynomial.of(0, 3, 0, 7);
      // only a1*b1 survives: 6 x^2
      expect(coeffs(a.mul(b))).toEqual(["0", "0", "6", "0"]);
    });

    test("ONE is the identity", () => {
      const a = TruncatedPolynomial.of([3, 8], -2, [5, 6], 1);
      expect(a.mul(ONE).equals(a)).toBe(true);
      expect(ONE.mul(a).equals(a)).toBe(true);
    });
  });

  describe("evaluate", () => {
    test("at p = 1/2 gives c0", () => {
      const a = TruncatedPolynomial.of([3, 8], 5, -7, 11);
      expect(a.evaluate(Rational.HALF).toString()).toBe("3/8");
    });

    test("at p = 1 uses x = 1/2", () => {
      // 1 + 2/2 + 4/4 + 8/8
      const a = TruncatedPolynomial.of(1, 2, 4, 8);
      expect(a.evaluate(Rational.ONE).toString()).toBe("4");
    });
  });

  describe("render", () => {
    test("exact coefficients with signs pulled out", () => {
      const a = TruncatedPolynomial.of([1, 2], [3, 2], 0, -2);
      expect(a.render()).toBe("1/2 + 3/2 (p - 1/2) + 0 (p - 1/2)^2 - 2 (p - 1/2)^3");
    });

    test("negative constant term keeps its own sign", () => {
      const a = TruncatedPolynomial.of([-1, 4], -1, [1, 3], 0);
      expect(a.render()).toBe("-1/4 - 1 (p - 1/2) + 1/3 (p - 1/2)^2 + 0 (p - 1/2)^3");
    });

    test("toString renders", () => {
      expect(`${ONE}`).toBe("1 + 0 (p - 1/2) + 0 (p - 1/2)^2 + 0 (p - 1/2)^3");
    });
  });

  describe("toDisplay", () => {
    test("converts each coefficient", () => {
      const display = TruncatedPolynomial.of([3, 8], [-1, 3], 2, [-5, 4]).toDisplay();
      expect(display.coefficients).toEqual([0.375, -1 / 3, 2, -1.25]);
    });
  });
});

describe("DisplayPolynomial", () => {
  test("renders four decimal places", () => {
    const display = new DisplayPolynomial(0.5, 1.5, 0, -2);
    expect(display.render()).toBe(
      "0.5000 + 1.5000 (p - 1/2) + 0.0000 (p - 1/2)^2 - 2.0000 (p - 1/2)^3",
    );
  });

  test("rounds magnitudes", () => {
    const display = new DisplayPolynomial(-0.12346, -1 / 3, 2 / 3, 0.00004);
    expect(display.render()).toBe(
      "-0.1235 - 0.3333 (p - 1/2) + 0.6667 (p - 1/2)^2 + 0.0000 (p - 1/2)^3",
    );
  });

  test("rounds exact ties to the even digit", () => {
    const display = new DisplayPolynomial(1 / 32, 3 / 32, 5 / 32, -1 / 32);
    expect(display.render()).toBe(
      "0.0312 + 0.0938 (p - 1/2) + 0.1562 (p - 1/2)^2 - 0.0312 (p - 1/2)^3",
    );
  });

  test("evaluate", () => {
    const display = new DisplayPolynomial(0.75, 1, -1, 0);
    expect(display.evaluate(0.5)).toBe(0.75);
    expect(display.evaluate(0.6)).toBeCloseTo(0.84, 12);
  });
});
