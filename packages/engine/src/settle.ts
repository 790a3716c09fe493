/**
 * settle — the engine's single entry point.
 *
 * (receipt, allocation, options?) → { settlement, trace, validation, warnings }
 *
 * Pipeline:
 * 1. Resolve options
 * 2. Build and validate the receipt and allocation models
 * 3. Apportion lines, then charges
 * 4. Reconcile the residual against the grand total
 * 5. Validate the result independently
 *
 * Pure and synchronous: no I/O, no clock, no randomness. Identical input
 * yields deep-equal output.
 */

import type { Allocation, Receipt } from "@fairtab/types";
import { DEFAULT_ROUNDING } from "@fairtab/money";
import type { RoundingMode } from "@fairtab/money";
import { AllocationModel } from "./allocation-model.js";
import { apportion } from "./apportionment.js";
import { ValidationError } from "./errors.js";
import { ReceiptModel } from "./receipt-model.js";
import { reconcile } from "./reconciliation.js";
import { TraceBuilder } from "./trace-builder.js";
import type { ResolvedSettleOptions, SettleOptions, SettlementOutcome } from "./types.js";
import { validateSettlement } from "./validator.js";

export const DEFAULT_TOLERANCE = 1;
export const DEFAULT_RESIDUAL_TOLERANCE_PER_PARTICIPANT = 1;

const ROUNDING_MODES: readonly RoundingMode[] = ["half-up", "half-even", "floor"];

/**
 * Fill defaults and check option ranges.
 *
 * @throws ValidationError (INVALID_OPTIONS)
 */
export function resolveOptions(options: SettleOptions = {}): ResolvedSettleOptions {
  const tolerance = toMinorUnitCount("tolerance", options.tolerance ?? DEFAULT_TOLERANCE);
  const residualTolerancePerParticipant = toMinorUnitCount(
    "residualTolerancePerParticipant",
    options.residualTolerancePerParticipant ?? DEFAULT_RESIDUAL_TOLERANCE_PER_PARTICIPANT,
  );
  const rounding = options.rounding ?? DEFAULT_ROUNDING;
  if (!ROUNDING_MODES.includes(rounding)) {
    throw new ValidationError("INVALID_OPTIONS", `Unknown rounding mode "${String(rounding)}"`);
  }
  return { tolerance, residualTolerancePerParticipant, rounding };
}

/**
 * Settle a receipt among its participants.
 *
 * @throws ValidationError when the receipt, allocation or options are malformed
 * @throws InvalidAllocationError when a charge cannot be weighted
 * @throws UnreconcilableSettlementError when the residual exceeds its tolerance
 */
export function settle(
  receipt: Receipt,
  allocation: Allocation,
  options?: SettleOptions,
): SettlementOutcome {
  const resolved = resolveOptions(options);
  const receiptModel = ReceiptModel.from(receipt, resolved);
  const allocationModel = AllocationModel.from(allocation, receiptModel);

  const trace = new TraceBuilder();
  const apportionment = apportion(receiptModel, allocationModel, trace);
  const { settlement, warnings } = reconcile(receiptModel, allocationModel, apportionment, trace, resolved);

  return {
    settlement,
    trace: trace.build(),
    validation: validateSettlement(settlement, receipt, allocation),
    warnings: [...receiptModel.warnings, ...warnings],
  };
}

function toMinorUnitCount(name: string, value: number): bigint {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new ValidationError(
      "INVALID_OPTIONS",
      `${name} must be a non-negative whole number of minor units, got ${String(value)}`,
    );
  }
  return BigInt(value);
}
