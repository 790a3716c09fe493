/**
 * @fairtab/money — Largest-remainder apportionment.
 *
 * allocate(total, weights) splits an amount into parts that:
 * 1. Sum to the total exactly, in minor units
 * 2. Each equal floor(|total| * w / Σw) or one minor unit more
 * 3. Receive leftover units by largest fractional remainder first,
 *    ties broken by ascending tie-break key
 *
 * Weights are converted to integers over their least common
 * denominator, so remainders compare exactly as bigints.
 * Negative totals (discounts) are apportioned on their magnitude
 * and negated, which keeps the same rounding on either sign.
 */

import type { Money } from "@fairtab/types";
import { fromMinorUnits, toMinorUnits } from "./money-math.js";
import { isRatio, lcm, parseRatio } from "./ratio.js";
import { InvalidAllocationError, MoneyError } from "./types.js";
import type { Ratio, WeightLike } from "./types.js";

interface Slot {
  readonly index: number;
  readonly key: string | null;
  readonly floor: bigint;
  readonly remainder: bigint;
}

function toRatio(weight: WeightLike, index: number): Ratio {
  if (isRatio(weight)) return weight;
  try {
    return parseRatio(weight);
  } catch (err) {
    if (err instanceof MoneyError) {
      throw new InvalidAllocationError(
        "INVALID_WEIGHT",
        `Weight at position ${String(index)} is not a non-negative number: ${err.message}`,
      );
    }
    throw err;
  }
}

/**
 * Order two ids by Unicode code point. Plain `<` compares UTF-16 code
 * units, which puts astral-plane characters before U+E000..U+FFFF.
 */
export function compareCodePoints(a: string, b: string): number {
  const left = [...a];
  const right = [...b];
  const length = Math.min(left.length, right.length);
  for (let i = 0; i < length; i++) {
    const x = left[i]?.codePointAt(0) ?? 0;
    const y = right[i]?.codePointAt(0) ?? 0;
    if (x !== y) return x < y ? -1 : 1;
  }
  return left.length - right.length;
}

/**
 * Apportion `total` over `weights`.
 *
 * @param total - Amount to split; any sign
 * @param weights - One weight per recipient; zero allowed, but not all zero
 * @param tieBreakKeys - Optional ids (participant or line) ordering equal
 *   remainders; defaults to recipient position
 * @returns One Money per weight, in input order
 * @throws InvalidAllocationError for an empty or degenerate weight set
 */
export function allocate(
  total: Money,
  weights: readonly WeightLike[],
  tieBreakKeys?: readonly string[],
): readonly Money[] {
  if (weights.length === 0) {
    throw new InvalidAllocationError("EMPTY_WEIGHTS", "Cannot allocate over an empty weight set");
  }
  if (tieBreakKeys !== undefined && tieBreakKeys.length !== weights.length) {
    throw new InvalidAllocationError(
      "KEY_COUNT_MISMATCH",
      `Expected ${String(weights.length)} tie-break keys, got ${String(tieBreakKeys.length)}`,
    );
  }

  const ratios = weights.map((w, index) => toRatio(w, index));
  for (const [index, r] of ratios.entries()) {
    if (r.numerator < 0n || r.denominator <= 0n) {
      throw new InvalidAllocationError(
        "NEGATIVE_WEIGHT",
        `Weight at position ${String(index)} must be non-negative`,
      );
    }
  }

  // Scale every weight to an integer over the common denominator
  const common = ratios.reduce((acc, r) => lcm(acc, r.denominator), 1n);
  const units = ratios.map((r) => r.numerator * (common / r.denominator));
  const weightSum = units.reduce((sum, u) => sum + u, 0n);

  if (weightSum === 0n) {
    throw new InvalidAllocationError("ZERO_WEIGHT_SUM", "Cannot allocate when all weights are zero");
  }

  const minor = toMinorUnits(total);
  const negative = minor < 0n;
  const magnitude = negative ? -minor : minor;

  const slots: Slot[] = units.map((u, index) => ({
    index,
    key: tieBreakKeys?.[index] ?? null,
    floor: (magnitude * u) / weightSum,
    remainder: (magnitude * u) % weightSum,
  }));

  let leftover = magnitude - slots.reduce((sum, s) => sum + s.floor, 0n);

  const byRemainder = [...slots].sort((a, b) => {
    if (a.remainder !== b.remainder) {
      return a.remainder > b.remainder ? -1 : 1;
    }
    if (a.key !== null && b.key !== null) {
      const byKey = compareCodePoints(a.key, b.key);
      if (byKey !== 0) return byKey;
    }
    return a.index - b.index;
  });

  const bonus = new Set<number>();
  for (const slot of byRemainder) {
    if (leftover === 0n) break;
    bonus.add(slot.index);
    leftover -= 1n;
  }

  return slots.map((slot) => {
    const share = slot.floor + (bonus.has(slot.index) ? 1n : 0n);
    return fromMinorUnits(negative ? -share : share, total.currency, total.decimals);
  });
}
