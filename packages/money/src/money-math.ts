/**
 * @fairtab/money — Deterministic monetary arithmetic.
 *
 * All arithmetic uses bigint minor units internally.
 * String amounts are converted to/from bigint via decimal scaling.
 *
 * Rules:
 * - No floating-point operations
 * - Currency must match for all operations
 * - Amounts must be valid decimal strings
 * - Results always carry exactly `decimals` fractional digits
 */

import type { Money } from "@fairtab/types";
import { divideRounded } from "./ratio.js";
import { DEFAULT_ROUNDING, MoneyError } from "./types.js";
import type { Ratio, RoundingMode } from "./types.js";

// ─── Internal Helpers ────────────────────────────────────────────────────

/**
 * Parse a decimal string amount into a bigint scaled by decimals.
 *
 * "100.50" with decimals=2 → 10050n
 * "100" with decimals=2 → 10000n
 * "-50.25" with decimals=2 → -5025n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  if (typeof amount !== "string" || amount.trim() === "") {
    throw new MoneyError("INVALID_AMOUNT", `Invalid amount: "${String(amount)}"`);
  }

  const trimmed = amount.trim();

  if (!/^-?\d+(\.\d+)?$/.test(trimmed)) {
    throw new MoneyError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const parts = abs.split(".");
  const intPart = parts[0] ?? "0";
  const fracPart = parts[1] ?? "";

  if (fracPart.length > decimals) {
    throw new MoneyError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but currency allows ${String(decimals)}`,
    );
  }

  const paddedFrac = fracPart.padEnd(decimals, "0");
  const value = BigInt(intPart + paddedFrac);

  return negative ? -value : value;
}

/**
 * Convert a scaled bigint back to a decimal string.
 *
 * 10050n with decimals=2 → "100.50"
 * 1n with decimals=2 → "0.01"
 * -5025n with decimals=2 → "-50.25"
 */
export function formatAmount(scaled: bigint, decimals: number): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals);
  const result = `${intPart}.${fracPart}`;

  return negative ? `-${result}` : result;
}

/**
 * Integer minor units of a Money value (cents for USD).
 */
export function toMinorUnits(money: Money): bigint {
  return parseAmount(money.amount, money.decimals);
}

/**
 * Build a Money value from integer minor units.
 */
export function fromMinorUnits(minor: bigint, currency: string, decimals: number): Money {
  return {
    amount: formatAmount(minor, decimals),
    currency,
    decimals,
  };
}

function withMinorUnits(template: Money, minor: bigint): Money {
  return fromMinorUnits(minor, template.currency, template.decimals);
}

// ─── Public API ──────────────────────────────────────────────────────────

/**
 * Validate that a Money object is well-formed.
 * Throws MoneyError if invalid.
 */
export function validateMoney(money: Money): void {
  if (typeof money.amount !== "string" || money.amount.trim() === "") {
    throw new MoneyError("INVALID_MONEY", `Money amount must be a non-empty string, got: "${String(money.amount)}"`);
  }

  if (typeof money.currency !== "string" || money.currency.trim() === "") {
    throw new MoneyError("INVALID_MONEY", `Money currency must be a non-empty string, got: "${String(money.currency)}"`);
  }

  if (typeof money.decimals !== "number" || !Number.isInteger(money.decimals) || money.decimals < 0) {
    throw new MoneyError("INVALID_MONEY", `Money decimals must be a non-negative integer, got: ${String(money.decimals)}`);
  }

  parseAmount(money.amount, money.decimals);
}

/**
 * Assert two Money values have the same currency and decimals.
 * Throws MoneyError if they differ.
 */
export function assertSameCurrency(a: Money, b: Money): void {
  if (a.currency !== b.currency) {
    throw new MoneyError(
      "CURRENCY_MISMATCH",
      `Cannot operate on different currencies: "${a.currency}" vs "${b.currency}"`,
    );
  }
  if (a.decimals !== b.decimals) {
    throw new MoneyError(
      "CURRENCY_MISMATCH",
      `Decimal mismatch for currency "${a.currency}": ${String(a.decimals)} vs ${String(b.decimals)}`,
    );
  }
}

/**
 * Add two Money values. They must have the same currency.
 */
export function addMoney(a: Money, b: Money): Money {
  assertSameCurrency(a, b);
  return withMinorUnits(a, toMinorUnits(a) + toMinorUnits(b));
}

/**
 * Subtract b from a. They must have the same currency.
 */
export function subtractMoney(a: Money, b: Money): Money {
  assertSameCurrency(a, b);
  return withMinorUnits(a, toMinorUnits(a) - toMinorUnits(b));
}

export function negateMoney(money: Money): Money {
  return withMinorUnits(money, -toMinorUnits(money));
}

/**
 * Sum a list of Money values in the given currency.
 * An empty list sums to zero.
 */
export function sumMoney(values: readonly Money[], currency: string, decimals: number): Money {
  let total = zeroMoney(currency, decimals);
  for (const value of values) {
    total = addMoney(total, value);
  }
  return total;
}

/**
 * Multiply by an exact ratio, rounding the minor-unit result.
 *
 * multiplyByRatio("10.00", 1/3) → "3.33"
 * multiplyByRatio("0.05", 1/2, "half-up") → "0.03"
 */
export function multiplyByRatio(
  money: Money,
  factor: Ratio,
  rounding: RoundingMode = DEFAULT_ROUNDING,
): Money {
  const scaled = toMinorUnits(money) * factor.numerator;
  return withMinorUnits(money, divideRounded(scaled, factor.denominator, rounding));
}

export function isZero(money: Money): boolean {
  return toMinorUnits(money) === 0n;
}

export function isPositive(money: Money): boolean {
  return toMinorUnits(money) > 0n;
}

export function isNegative(money: Money): boolean {
  return toMinorUnits(money) < 0n;
}

/**
 * Create a zero Money value for a given currency.
 */
export function zeroMoney(currency: string, decimals: number): Money {
  return fromMinorUnits(0n, currency, decimals);
}

/**
 * Compare two Money values. Returns -1, 0, or 1.
 * They must have the same currency.
 */
export function compareMoney(a: Money, b: Money): -1 | 0 | 1 {
  assertSameCurrency(a, b);
  const va = toMinorUnits(a);
  const vb = toMinorUnits(b);
  if (va < vb) return -1;
  if (va > vb) return 1;
  return 0;
}

export function absMoney(money: Money): Money {
  const scaled = toMinorUnits(money);
  return withMinorUnits(money, scaled < 0n ? -scaled : scaled);
}
