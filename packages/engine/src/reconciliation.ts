/**
 * Residual Reconciler
 *
 * After apportionment the per-participant totals sum to subtotal +
 * charges. The receipt's grand total may differ from that by a few
 * minor units (printed rounding). The difference is the residual.
 *
 * Rules:
 * - |residual| <= residualTolerancePerParticipant × participants, else throw
 * - The participant with the largest total absorbs the residual;
 *   ties go to the smallest id in code-point order
 * - Absorption is recorded as a contribution, a trace step and a warning
 * - The resulting settlement sums to the grand total exactly
 */

import type { Money, ResidualAdjustment, Settlement } from "@fairtab/types";
import {
  absMoney,
  compareCodePoints,
  compareMoney,
  fromMinorUnits,
  isZero,
  subtractMoney,
} from "@fairtab/money";
import type { ApportionmentResult, ParticipantLedger } from "./apportionment.js";
import type { AllocationModel } from "./allocation-model.js";
import { UnreconcilableSettlementError } from "./errors.js";
import { GRAND_TOTAL_SUBJECT } from "./receipt-model.js";
import type { ReceiptModel } from "./receipt-model.js";
import type { TraceBuilder } from "./trace-builder.js";
import type { ReconciliationWarning, ResolvedSettleOptions } from "./types.js";

export interface ReconciliationResult {
  readonly settlement: Settlement;
  readonly warnings: readonly ReconciliationWarning[];
}

export function reconcile(
  receipt: ReceiptModel,
  allocation: AllocationModel,
  apportionment: ApportionmentResult,
  trace: TraceBuilder,
  options: Pick<ResolvedSettleOptions, "residualTolerancePerParticipant">,
): ReconciliationResult {
  const participantIds = allocation.participantIds();
  const { ledger, apportionedTotal } = apportionment;
  const residual = subtractMoney(receipt.grandTotal, apportionedTotal);

  const limit = fromMinorUnits(
    options.residualTolerancePerParticipant * BigInt(participantIds.length),
    receipt.currency,
    receipt.decimals,
  );
  if (compareMoney(absMoney(residual), limit) > 0) {
    throw new UnreconcilableSettlementError(residual, limit);
  }

  const warnings: ReconciliationWarning[] = [];
  let residualAdjustment: ResidualAdjustment | null = null;

  if (!isZero(residual)) {
    const absorber = pickAbsorber(participantIds, ledger);
    ledger.credit(absorber, {
      source: { kind: "residual", id: GRAND_TOTAL_SUBJECT },
      amount: residual,
    });
    residualAdjustment = { participantId: absorber, amount: residual };

    trace.recordResidual({
      action: "residual-adjusted",
      subject: { kind: "receipt", id: GRAND_TOTAL_SUBJECT },
      description: `Assign residual of ${residual.amount} ${receipt.currency} to ${absorber} (largest share)`,
      inputs: { grandTotal: receipt.grandTotal, apportionedTotal, residual },
      results: [{ participantId: absorber, amount: residual }],
    });

    warnings.push({
      code: "RESIDUAL_ABSORBED",
      subjectId: absorber,
      difference: residual,
      message: `Residual of ${residual.amount} ${receipt.currency} absorbed by "${absorber}"`,
    });
  }

  const settlement: Settlement = {
    entries: allocation.participants.map((participant) => ({
      participantId: participant.id,
      displayName: participant.displayName,
      owed: ledger.totalFor(participant.id),
      contributions: ledger.contributionsFor(participant.id),
    })),
    total: receipt.grandTotal,
    residualAdjustment,
  };

  return { settlement, warnings };
}

/**
 * Largest running total wins; equal totals fall back to id order.
 */
export function pickAbsorber(participantIds: readonly string[], ledger: ParticipantLedger): string {
  let best: { id: string; total: Money } | null = null;
  for (const id of participantIds) {
    const total = ledger.totalFor(id);
    if (best === null) {
      best = { id, total };
      continue;
    }
    const cmp = compareMoney(total, best.total);
    if (cmp > 0 || (cmp === 0 && compareCodePoints(id, best.id) < 0)) {
      best = { id, total };
    }
  }
  if (best === null) {
    throw new Error("Cannot absorb a residual without participants");
  }
  return best.id;
}

