/**
 * @fairtab/money — Internal types for monetary arithmetic.
 *
 * Rules:
 * - All types are readonly
 * - Fail-closed: invalid input throws, never silently succeeds
 */

import type { RationalInput } from "@fairtab/types";

// ─── Rationals ───────────────────────────────────────────────────────────

/**
 * An exact non-negative fraction, always stored reduced.
 * Used for quantities, share weights and percentage rates.
 */
export interface Ratio {
  readonly numerator: bigint;
  readonly denominator: bigint;
}

/** Anything `allocate` accepts as a weight. */
export type WeightLike = Ratio | RationalInput;

// ─── Rounding ────────────────────────────────────────────────────────────

/**
 * How a fractional minor-unit result is rounded.
 *
 * - half-up: nearest, ties away from zero (receipt convention)
 * - half-even: nearest, ties to the even neighbour
 * - floor: toward negative infinity
 */
export type RoundingMode = "half-up" | "half-even" | "floor";

export const DEFAULT_ROUNDING: RoundingMode = "half-up";

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for money operations. */
export type MoneyErrorCode =
  | "CURRENCY_MISMATCH"
  | "INVALID_AMOUNT"
  | "INVALID_MONEY"
  | "INVALID_RATIO";

/**
 * Structured error from money arithmetic.
 * Always thrown — never returns error codes silently.
 */
export class MoneyError extends Error {
  public readonly code: MoneyErrorCode;

  constructor(code: MoneyErrorCode, message: string) {
    super(message);
    this.name = "MoneyError";
    this.code = code;
  }
}

/** Error codes for degenerate weight sets passed to `allocate`. */
export type InvalidAllocationCode =
  | "EMPTY_WEIGHTS"
  | "INVALID_WEIGHT"
  | "NEGATIVE_WEIGHT"
  | "ZERO_WEIGHT_SUM"
  | "KEY_COUNT_MISMATCH";

/**
 * Thrown when an amount cannot be apportioned over the given weights.
 * `subjectId` names the line or charge being apportioned, when known.
 */
export class InvalidAllocationError extends Error {
  public readonly code: InvalidAllocationCode;
  public readonly subjectId: string | undefined;

  constructor(code: InvalidAllocationCode, message: string, subjectId?: string) {
    super(message);
    this.name = "InvalidAllocationError";
    this.code = code;
    this.subjectId = subjectId;
  }
}
