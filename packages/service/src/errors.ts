/**
 * Error envelopes.
 *
 * Every failure leaving the service has the shape
 * { error: { code, message, details? } }. Domain errors from the engine
 * keep their own code under `details.reason`.
 */

import { ZodError } from "zod";
import {
  InvalidAllocationError,
  UnreconcilableSettlementError,
  ValidationError,
} from "@fairtab/engine";

// =============================================================================
// Error Codes
// =============================================================================

export type ApiErrorCode =
  | "VALIDATION_ERROR"
  | "INVALID_ALLOCATION"
  | "UNRECONCILABLE_SETTLEMENT"
  | "INVALID_INPUT"
  | "INTERNAL_ERROR";

export type IntakeErrorCode = "UNREADABLE_FILE" | "INVALID_JSON" | "INVALID_SCAN";

/**
 * Input that never reached the engine: unreadable files, malformed
 * JSON, or scanner output that cannot be turned into a receipt.
 */
export class IntakeError extends Error {
  public readonly code: IntakeErrorCode;

  constructor(code: IntakeErrorCode, message: string) {
    super(message);
    this.name = "IntakeError";
    this.code = code;
  }
}

// =============================================================================
// Error Response
// =============================================================================

export interface ErrorDetail {
  readonly code: ApiErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

export function createErrorEnvelope(
  code: ApiErrorCode,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  const error: ErrorDetail = { code, message };
  if (details !== undefined) {
    return { error: { ...error, details } };
  }
  return { error };
}

// =============================================================================
// Domain Error → Envelope Mapping
// =============================================================================

export function toErrorEnvelope(err: unknown): ErrorEnvelope {
  if (err instanceof ValidationError) {
    return createErrorEnvelope("VALIDATION_ERROR", err.message, withSubject(err.code, err.subjectId));
  }
  if (err instanceof InvalidAllocationError) {
    return createErrorEnvelope("INVALID_ALLOCATION", err.message, withSubject(err.code, err.subjectId));
  }
  if (err instanceof UnreconcilableSettlementError) {
    return createErrorEnvelope("UNRECONCILABLE_SETTLEMENT", err.message, {
      residual: err.residual,
      tolerance: err.tolerance,
    });
  }
  if (err instanceof ZodError) {
    return createErrorEnvelope("INVALID_INPUT", "Input validation failed", {
      issues: formatZodErrors(err),
    });
  }
  if (err instanceof IntakeError) {
    return createErrorEnvelope("INVALID_INPUT", err.message, { reason: err.code });
  }
  if (err instanceof Error) {
    return createErrorEnvelope("INTERNAL_ERROR", err.message);
  }
  return createErrorEnvelope("INTERNAL_ERROR", String(err));
}

function withSubject(reason: string, subjectId: string | undefined): Record<string, unknown> {
  return subjectId === undefined ? { reason } : { reason, subjectId };
}

export function formatZodErrors(
  error: ZodError,
): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
