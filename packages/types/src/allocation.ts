/**
 * Allocation Types
 *
 * Structured splitting instructions as supplied by the
 * instruction-understanding collaborator.
 *
 * Rules:
 * - Every receipt line is allocated exactly once
 * - Weights are positive and need not sum to 1
 * - A charge without a policy entry is split proportionally to item share
 */

import type { RationalInput } from "./money.js";

export interface Participant {
  readonly id: string;
  readonly displayName: string;
}

/**
 * One participant's weight on a line or charge.
 */
export interface Share {
  readonly participantId: string;
  readonly weight: RationalInput;
}

export interface LineAllocation {
  readonly lineId: string;
  readonly shares: readonly Share[];
}

export type ChargeAllocationPolicy =
  | "proportional_to_item_share"
  | "equal_split_across_participants"
  | "assigned_to_specific_participants";

export interface ChargeAllocation {
  readonly chargeId: string;
  readonly policy: ChargeAllocationPolicy;

  /** Only for "assigned_to_specific_participants" */
  readonly shares?: readonly Share[] | undefined;
}

export interface Allocation {
  readonly participants: readonly Participant[];
  readonly lines: readonly LineAllocation[];
  readonly charges?: readonly ChargeAllocation[] | undefined;
}
