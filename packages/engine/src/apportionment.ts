/**
 * Apportionment Calculator
 *
 * Two passes over the receipt:
 * 1. Items: each line total is allocated across its owners by weight.
 * 2. Charges: each tax, service charge or discount is allocated by its
 *    policy. The proportional policy weights participants by their
 *    item sub-totals from pass 1.
 *
 * Every split goes through `allocate`, so each one is exact on its own
 * and the running totals sum to subtotal + charges by construction.
 * One reasoning step is recorded per line and per charge.
 */

import type { ChargeAllocationPolicy, Contribution, Money, WeightInput } from "@fairtab/types";
import {
  InvalidAllocationError,
  addMoney,
  allocate,
  formatRatio,
  ratio,
  ratioFromMinorUnits,
  toMinorUnits,
} from "@fairtab/money";
import type { Ratio } from "@fairtab/money";
import type { AllocationModel, ResolvedShare } from "./allocation-model.js";
import type { ModelCharge, ReceiptModel } from "./receipt-model.js";
import type { TraceBuilder } from "./trace-builder.js";

// =============================================================================
// Running totals
// =============================================================================

/**
 * Per-participant accumulator, keyed in participant declaration order.
 */
export class ParticipantLedger {
  private readonly totals = new Map<string, Money>();
  private readonly contributions = new Map<string, Contribution[]>();

  constructor(participantIds: readonly string[], zero: Money) {
    for (const id of participantIds) {
      this.totals.set(id, zero);
      this.contributions.set(id, []);
    }
  }

  credit(participantId: string, contribution: Contribution): void {
    const current = this.totals.get(participantId);
    const list = this.contributions.get(participantId);
    if (current === undefined || list === undefined) {
      throw new Error(`Participant "${participantId}" is not part of this settlement`);
    }
    this.totals.set(participantId, addMoney(current, contribution.amount));
    list.push(contribution);
  }

  totalFor(participantId: string): Money {
    const total = this.totals.get(participantId);
    if (total === undefined) {
      throw new Error(`Participant "${participantId}" is not part of this settlement`);
    }
    return total;
  }

  contributionsFor(participantId: string): readonly Contribution[] {
    return [...(this.contributions.get(participantId) ?? [])];
  }

  participantIds(): readonly string[] {
    return [...this.totals.keys()];
  }
}

export interface ApportionmentResult {
  readonly ledger: ParticipantLedger;
  /** Item sub-total per participant after pass 1 */
  readonly itemTotals: ReadonlyMap<string, Money>;
  /** Sum of everything apportioned (subtotal + charges) */
  readonly apportionedTotal: Money;
}

// =============================================================================
// Calculator
// =============================================================================

export function apportion(
  receipt: ReceiptModel,
  allocation: AllocationModel,
  trace: TraceBuilder,
): ApportionmentResult {
  const participantIds = allocation.participantIds();
  const ledger = new ParticipantLedger(participantIds, receipt.zero());
  let apportionedTotal = receipt.zero();

  // Pass 1: item lines
  for (const line of receipt.lines) {
    const shares = allocation.sharesForLine(line.id);
    const parts = allocateFor(line.id, line.lineTotal, shares);

    const results = shares.map((share, i) => ({
      participantId: share.participantId,
      amount: partAt(parts, i),
    }));
    for (const result of results) {
      ledger.credit(result.participantId, {
        source: { kind: "line", id: line.id },
        amount: result.amount,
      });
    }
    apportionedTotal = addMoney(apportionedTotal, line.lineTotal);

    trace.recordLine({
      action: "line-apportioned",
      subject: { kind: "line", id: line.id },
      description: `Split "${line.description}" (${line.lineTotal.amount} ${receipt.currency}) across ${describeOwners(shares.length)} by weight`,
      inputs: { lineTotal: line.lineTotal, weights: weightInputs(shares) },
      results,
    });
  }

  const itemTotals = new Map<string, Money>(
    participantIds.map((id) => [id, ledger.totalFor(id)]),
  );

  // Pass 2: charges
  for (const charge of receipt.charges) {
    const { policy, shares } = resolveChargeShares(charge, allocation, itemTotals, receipt.decimals);
    const parts = allocateFor(charge.id, charge.value, shares);

    const results = shares.map((share, i) => ({
      participantId: share.participantId,
      amount: partAt(parts, i),
    }));
    // Zero-weight participants appear in the trace but get no contribution
    results.forEach((result, i) => {
      if (shares[i]?.weight.numerator !== 0n) {
        ledger.credit(result.participantId, {
          source: { kind: "charge", id: charge.id },
          amount: result.amount,
        });
      }
    });
    apportionedTotal = addMoney(apportionedTotal, charge.value);

    trace.recordCharge({
      action: "charge-apportioned",
      subject: { kind: "charge", id: charge.id },
      description: `Split ${charge.description} (${charge.value.amount} ${receipt.currency}) by ${policy}`,
      inputs: {
        kind: charge.kind,
        basis: charge.basis,
        value: charge.value,
        policy,
        weights: weightInputs(shares),
      },
      results,
    });
  }

  return { ledger, itemTotals, apportionedTotal };
}

// =============================================================================
// Helpers
// =============================================================================

function resolveChargeShares(
  charge: ModelCharge,
  allocation: AllocationModel,
  itemTotals: ReadonlyMap<string, Money>,
  decimals: number,
): { policy: ChargeAllocationPolicy; shares: readonly ResolvedShare[] } {
  const resolved = allocation.policyForCharge(charge.id);

  switch (resolved.policy) {
    case "assigned_to_specific_participants":
      return { policy: resolved.policy, shares: resolved.shares };

    case "equal_split_across_participants":
      return {
        policy: resolved.policy,
        shares: allocation.participantIds().map((participantId) => ({
          participantId,
          weight: ratio(1n),
        })),
      };

    case "proportional_to_item_share": {
      const shares = allocation.participantIds().map((participantId) => {
        const itemTotal = itemTotals.get(participantId);
        const minor = itemTotal === undefined ? 0n : toMinorUnits(itemTotal);
        return { participantId, weight: ratioFromMinorUnits(minor, decimals) };
      });
      if (shares.every((s) => s.weight.numerator === 0n)) {
        throw new InvalidAllocationError(
          "ZERO_WEIGHT_SUM",
          `Charge "${charge.id}" is split by item share, but every item share is zero`,
          charge.id,
        );
      }
      return { policy: resolved.policy, shares };
    }
  }
}

function allocateFor(
  subjectId: string,
  total: Money,
  shares: readonly ResolvedShare[],
): readonly Money[] {
  const weights: Ratio[] = shares.map((s) => s.weight);
  const keys = shares.map((s) => s.participantId);
  try {
    return allocate(total, weights, keys);
  } catch (err) {
    if (err instanceof InvalidAllocationError && err.subjectId === undefined) {
      throw new InvalidAllocationError(err.code, `"${subjectId}": ${err.message}`, subjectId);
    }
    throw err;
  }
}

function partAt(parts: readonly Money[], index: number): Money {
  const part = parts[index];
  if (part === undefined) {
    throw new Error(`allocate returned ${String(parts.length)} parts, expected index ${String(index)}`);
  }
  return part;
}

function weightInputs(shares: readonly ResolvedShare[]): readonly WeightInput[] {
  return shares.map((s) => ({ participantId: s.participantId, weight: formatRatio(s.weight) }));
}

function describeOwners(count: number): string {
  return count === 1 ? "1 owner" : `${String(count)} owners`;
}
