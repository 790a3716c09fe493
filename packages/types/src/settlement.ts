/**
 * Settlement Types
 *
 * The engine's output: what each participant owes and where every
 * minor unit came from.
 *
 * Rules:
 * - sum(entries.owed) === receipt.grandTotal, exactly
 * - Each entry's contributions sum to its owed amount
 * - Entries are created once per run and never mutated
 */

import type { Money } from "./money.js";

export type ContributionKind = "line" | "charge" | "residual";

export interface ContributionSource {
  readonly kind: ContributionKind;
  /** Line id, charge id, or "grand-total" for a residual */
  readonly id: string;
}

export interface Contribution {
  readonly source: ContributionSource;
  readonly amount: Money;
}

export interface SettlementEntry {
  readonly participantId: string;
  readonly displayName: string;
  readonly owed: Money;
  readonly contributions: readonly Contribution[];
}

/**
 * Who absorbed the rounding residual left after apportionment.
 */
export interface ResidualAdjustment {
  readonly participantId: string;
  readonly amount: Money;
}

export interface Settlement {
  readonly entries: readonly SettlementEntry[];
  readonly total: Money;
  readonly residualAdjustment: ResidualAdjustment | null;
}
