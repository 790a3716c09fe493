/**
 * @fairtab/engine — Settlement reconciliation engine.
 *
 * Turns a structured receipt and splitting instructions into per-person
 * amounts that sum exactly to the grand total, with a reasoning trace
 * for every decision and an independent validation verdict.
 *
 * Core exports:
 * - settle — the full pipeline
 * - validateSettlement — check any settlement against its inputs
 * - ReceiptModel / AllocationModel — validated input views
 */

// Pipeline
export {
  settle,
  resolveOptions,
  DEFAULT_TOLERANCE,
  DEFAULT_RESIDUAL_TOLERANCE_PER_PARTICIPANT,
} from "./settle.js";

// Models
export { ReceiptModel, GRAND_TOTAL_SUBJECT } from "./receipt-model.js";
export type { ModelLine, ModelCharge } from "./receipt-model.js";
export { AllocationModel, DEFAULT_CHARGE_POLICY } from "./allocation-model.js";
export type { ResolvedShare, ResolvedChargePolicy } from "./allocation-model.js";

// Apportionment and reconciliation
export { apportion, ParticipantLedger } from "./apportionment.js";
export type { ApportionmentResult } from "./apportionment.js";
export { reconcile, pickAbsorber } from "./reconciliation.js";
export type { ReconciliationResult } from "./reconciliation.js";
export { TraceBuilder } from "./trace-builder.js";

// Validation
export { validateSettlement } from "./validator.js";

// Errors
export {
  ValidationError,
  InvalidAllocationError,
  UnreconcilableSettlementError,
} from "./errors.js";
export type { ValidationErrorCode, InvalidAllocationCode } from "./errors.js";

// Types
export type {
  SettleOptions,
  ResolvedSettleOptions,
  ReconciliationWarning,
  ReconciliationWarningCode,
  ValidationReason,
  ValidationReasonCode,
  ValidationResult,
  SettlementOutcome,
} from "./types.js";
