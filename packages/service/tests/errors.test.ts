/**
 * Tests for error envelope mapping.
 */

import { describe, it, expect } from "vitest";
import {
  InvalidAllocationError,
  UnreconcilableSettlementError,
  ValidationError,
} from "@fairtab/engine";
import { IntakeError, createErrorEnvelope, toErrorEnvelope } from "../src/errors.js";
import { ReceiptSchema } from "../src/schemas.js";
import { usd } from "./fixtures.js";

describe("createErrorEnvelope", () => {
  it("omits details when none are given", () => {
    expect(createErrorEnvelope("INTERNAL_ERROR", "boom")).toEqual({
      error: { code: "INTERNAL_ERROR", message: "boom" },
    });
    expect(createErrorEnvelope("INTERNAL_ERROR", "boom")).not.toHaveProperty("error.details");
  });
});

describe("toErrorEnvelope", () => {
  it("keeps the engine's code and subject for validation errors", () => {
    const err = new ValidationError("UNALLOCATED_LINE", 'Line "pasta" has no allocation', "pasta");

    expect(toErrorEnvelope(err)).toEqual({
      error: {
        code: "VALIDATION_ERROR",
        message: 'Line "pasta" has no allocation',
        details: { reason: "UNALLOCATED_LINE", subjectId: "pasta" },
      },
    });
  });

  it("maps allocation errors", () => {
    const err = new InvalidAllocationError("ZERO_WEIGHT_SUM", "Weights sum to zero", "cover");

    expect(toErrorEnvelope(err)).toEqual({
      error: {
        code: "INVALID_ALLOCATION",
        message: "Weights sum to zero",
        details: { reason: "ZERO_WEIGHT_SUM", subjectId: "cover" },
      },
    });
  });

  it("carries residual and tolerance for unreconcilable settlements", () => {
    const err = new UnreconcilableSettlementError(usd("0.05"), usd("0.02"));

    expect(toErrorEnvelope(err)).toEqual({
      error: {
        code: "UNRECONCILABLE_SETTLEMENT",
        message: "Residual of 0.05 USD exceeds tolerance of 0.02 USD",
        details: { residual: usd("0.05"), tolerance: usd("0.02") },
      },
    });
  });

  it("lists schema issues by path", () => {
    const result = ReceiptSchema.safeParse({ charges: [] });
    expect(result.success).toBe(false);
    if (result.success) return;

    expect(toErrorEnvelope(result.error)).toEqual({
      error: {
        code: "INVALID_INPUT",
        message: "Input validation failed",
        details: {
          issues: [
            { path: "lines", message: "Required" },
            { path: "grandTotal", message: "Required" },
          ],
        },
      },
    });
  });

  it("maps intake errors to invalid input", () => {
    expect(toErrorEnvelope(new IntakeError("INVALID_JSON", "receipt.json is not valid JSON"))).toEqual({
      error: {
        code: "INVALID_INPUT",
        message: "receipt.json is not valid JSON",
        details: { reason: "INVALID_JSON" },
      },
    });
  });

  it("falls back to an internal error", () => {
    expect(toErrorEnvelope(new Error("disk on fire")).error).toEqual({
      code: "INTERNAL_ERROR",
      message: "disk on fire",
    });
    expect(toErrorEnvelope("nope").error.message).toBe("nope");
  });
});
