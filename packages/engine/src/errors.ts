/**
 * Settlement engine errors.
 *
 * Every failure names the line, charge or participant that caused it.
 * Errors are always thrown, never returned as partial results.
 */

import type { Money } from "@fairtab/types";

export { InvalidAllocationError } from "@fairtab/money";
export type { InvalidAllocationCode } from "@fairtab/money";

/** Error codes for malformed or inconsistent receipt/allocation input. */
export type ValidationErrorCode =
  // Receipt
  | "EMPTY_RECEIPT"
  | "MISSING_ID"
  | "DUPLICATE_ID"
  | "INVALID_MONEY"
  | "CURRENCY_MISMATCH"
  | "INVALID_QUANTITY"
  | "NEGATIVE_LINE_AMOUNT"
  | "LINE_TOTAL_MISMATCH"
  | "CHARGE_SIGN"
  | "MISSING_RATE"
  | "UNEXPECTED_RATE"
  | "INVALID_RATE"
  | "CHARGE_DERIVATION_MISMATCH"
  | "GRAND_TOTAL_MISMATCH"
  // Allocation
  | "NO_PARTICIPANTS"
  | "DUPLICATE_PARTICIPANT"
  | "UNKNOWN_PARTICIPANT"
  | "UNKNOWN_LINE"
  | "UNALLOCATED_LINE"
  | "DUPLICATE_LINE_ALLOCATION"
  | "EMPTY_SHARES"
  | "DUPLICATE_SHARE"
  | "INVALID_WEIGHT"
  | "UNKNOWN_CHARGE"
  | "DUPLICATE_CHARGE_POLICY"
  | "INVALID_CHARGE_POLICY"
  // Options
  | "INVALID_OPTIONS";

/**
 * Caller-fixable input problem. Never retried: the engine is
 * deterministic, so identical input fails identically.
 */
export class ValidationError extends Error {
  public readonly code: ValidationErrorCode;
  /** Offending line, charge or participant id ("grand-total" for the receipt total) */
  public readonly subjectId: string | undefined;

  constructor(code: ValidationErrorCode, message: string, subjectId?: string) {
    super(message);
    this.name = "ValidationError";
    this.code = code;
    this.subjectId = subjectId;
  }
}

/**
 * The apportioned amounts miss the grand total by more than the
 * residual tolerance. Signals an upstream data problem.
 */
export class UnreconcilableSettlementError extends Error {
  public readonly code = "UNRECONCILABLE_SETTLEMENT" as const;
  public readonly residual: Money;
  public readonly tolerance: Money;

  constructor(residual: Money, tolerance: Money) {
    super(
      `Residual of ${residual.amount} ${residual.currency} exceeds tolerance of ${tolerance.amount} ${tolerance.currency}`,
    );
    this.name = "UnreconcilableSettlementError";
    this.residual = residual;
    this.tolerance = tolerance;
  }
}
