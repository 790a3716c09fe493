/**
 * @fairtab/engine domain types.
 *
 * Options, warnings, validation verdicts and the outcome of one
 * settlement run.
 */

import type { Money, ReasoningTrace, Settlement } from "@fairtab/types";
import type { RoundingMode } from "@fairtab/money";

// =============================================================================
// Options
// =============================================================================

export interface SettleOptions {
  /**
   * Minor units of disagreement tolerated at ingestion for line totals,
   * percentage charges and the grand total. Default 1.
   */
  readonly tolerance?: number;

  /**
   * Residual allowed per participant before reconciliation gives up.
   * Default 1 minor unit.
   */
  readonly residualTolerancePerParticipant?: number;

  /** Rounding for line and percentage derivations. Default "half-up". */
  readonly rounding?: RoundingMode;
}

export interface ResolvedSettleOptions {
  readonly tolerance: bigint;
  readonly residualTolerancePerParticipant: bigint;
  readonly rounding: RoundingMode;
}

// =============================================================================
// Warnings
// =============================================================================

export type ReconciliationWarningCode =
  | "LINE_TOTAL_ROUNDED"
  | "CHARGE_DERIVATION_ROUNDED"
  | "GRAND_TOTAL_ROUNDED"
  | "RESIDUAL_ABSORBED";

/**
 * Non-fatal finding surfaced alongside a valid settlement.
 * `difference` is declared minus expected (or the absorbed residual).
 */
export interface ReconciliationWarning {
  readonly code: ReconciliationWarningCode;
  readonly subjectId: string;
  readonly difference: Money;
  readonly message: string;
}

// =============================================================================
// Validation
// =============================================================================

export type ValidationReasonCode =
  | "TOTAL_MISMATCH"
  | "MISSING_PARTICIPANT"
  | "DUPLICATE_PARTICIPANT"
  | "UNKNOWN_PARTICIPANT"
  | "NEGATIVE_AMOUNT"
  | "CONTRIBUTION_MISMATCH"
  | "CURRENCY_MISMATCH"
  | "INVALID_AMOUNT";

export interface ValidationReason {
  readonly code: ValidationReasonCode;
  readonly subjectId?: string;
  readonly message: string;
}

export type ValidationResult =
  | { readonly valid: true; readonly reasons: readonly [] }
  | { readonly valid: false; readonly reasons: readonly ValidationReason[] };

// =============================================================================
// Outcome
// =============================================================================

export interface SettlementOutcome {
  readonly settlement: Settlement;
  readonly trace: ReasoningTrace;
  readonly validation: ValidationResult;
  readonly warnings: readonly ReconciliationWarning[];
}
