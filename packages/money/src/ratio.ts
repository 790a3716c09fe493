/**
 * @fairtab/money — Exact rationals for quantities, weights and rates.
 *
 * Upstream collaborators send weights as numbers or strings; nothing
 * here ever goes through floating-point arithmetic. A JSON number is
 * read through its shortest decimal representation.
 */

import type { RationalInput } from "@fairtab/types";
import { MoneyError } from "./types.js";
import type { Ratio, RoundingMode } from "./types.js";

const DECIMAL_PATTERN = /^\d+(\.\d+)?$/;
const FRACTION_PATTERN = /^(\d+)\/(\d+)$/;

function gcd(a: bigint, b: bigint): bigint {
  let x = a < 0n ? -a : a;
  let y = b < 0n ? -b : b;
  while (y !== 0n) {
    [x, y] = [y, x % y];
  }
  return x;
}

export function lcm(a: bigint, b: bigint): bigint {
  return (a / gcd(a, b)) * b;
}

/**
 * Build a reduced ratio. The denominator must be positive.
 */
export function ratio(numerator: bigint, denominator: bigint = 1n): Ratio {
  if (denominator <= 0n) {
    throw new MoneyError("INVALID_RATIO", `Ratio denominator must be positive, got ${denominator.toString()}`);
  }
  if (numerator < 0n) {
    throw new MoneyError("INVALID_RATIO", `Ratio must be non-negative, got ${numerator.toString()}/${denominator.toString()}`);
  }
  if (numerator === 0n) {
    return { numerator: 0n, denominator: 1n };
  }
  const divisor = gcd(numerator, denominator);
  return { numerator: numerator / divisor, denominator: denominator / divisor };
}

export function isRatio(value: unknown): value is Ratio {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return typeof v.numerator === "bigint" && typeof v.denominator === "bigint";
}

/**
 * Parse a quantity, weight or rate.
 *
 * "2" → 2/1, "0.25" → 1/4, "2/6" → 1/3, 1.5 → 3/2
 * Negative values, exponent notation and zero denominators are rejected.
 */
export function parseRatio(input: RationalInput): Ratio {
  let text: string;
  if (typeof input === "number") {
    if (!Number.isFinite(input)) {
      throw new MoneyError("INVALID_RATIO", `Invalid ratio: ${String(input)}`);
    }
    text = String(input);
  } else if (typeof input === "string") {
    text = input.trim();
  } else {
    throw new MoneyError("INVALID_RATIO", `Invalid ratio: ${String(input)}`);
  }

  const fraction = FRACTION_PATTERN.exec(text);
  if (fraction) {
    const denominator = BigInt(fraction[2] ?? "0");
    if (denominator === 0n) {
      throw new MoneyError("INVALID_RATIO", `Ratio "${text}" has a zero denominator`);
    }
    return ratio(BigInt(fraction[1] ?? "0"), denominator);
  }

  if (!DECIMAL_PATTERN.test(text)) {
    throw new MoneyError("INVALID_RATIO", `Invalid ratio format: "${text}"`);
  }

  const [intPart = "0", fracPart = ""] = text.split(".");
  return ratio(BigInt(intPart + fracPart), 10n ** BigInt(fracPart.length));
}

/**
 * Canonical text form: "3" for whole numbers, "1/3" otherwise.
 */
export function formatRatio(value: Ratio): string {
  const reduced = ratio(value.numerator, value.denominator);
  return reduced.denominator === 1n
    ? reduced.numerator.toString()
    : `${reduced.numerator.toString()}/${reduced.denominator.toString()}`;
}

/**
 * A non-negative amount in minor units as a ratio in major units:
 * 3000n at 2 decimals → 30/1.
 */
export function ratioFromMinorUnits(minor: bigint, decimals: number): Ratio {
  if (minor < 0n) {
    throw new MoneyError("INVALID_RATIO", `Ratio must be non-negative, got ${minor.toString()} minor units`);
  }
  return ratio(minor, 10n ** BigInt(decimals));
}

export function isZeroRatio(value: Ratio): boolean {
  return value.numerator === 0n;
}

/**
 * Divide an integer by a positive integer with an explicit rounding rule.
 */
export function divideRounded(
  dividend: bigint,
  divisor: bigint,
  mode: RoundingMode,
): bigint {
  if (divisor <= 0n) {
    throw new MoneyError("INVALID_RATIO", `Divisor must be positive, got ${divisor.toString()}`);
  }

  const quotient = dividend / divisor;
  const remainder = dividend % divisor;
  if (remainder === 0n) {
    return quotient;
  }

  const sign = dividend < 0n ? -1n : 1n;
  if (mode === "floor") {
    return sign < 0n ? quotient - 1n : quotient;
  }

  const twice = (remainder < 0n ? -remainder : remainder) * 2n;
  if (twice > divisor) {
    return quotient + sign;
  }
  if (twice < divisor) {
    return quotient;
  }

  // Exactly half
  if (mode === "half-up") {
    return quotient + sign;
  }
  return quotient % 2n === 0n ? quotient : quotient + sign;
}
