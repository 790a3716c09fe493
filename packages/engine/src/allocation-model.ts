/**
 * Allocation Model
 *
 * Validated view of the splitting instructions against a ReceiptModel.
 * Every receipt line must be allocated exactly once, every share must
 * name a known participant with a positive weight, and charge policies
 * must reference known charges.
 */

import type {
  Allocation,
  ChargeAllocationPolicy,
  Participant,
  Share,
} from "@fairtab/types";
import { MoneyError, parseRatio } from "@fairtab/money";
import type { Ratio } from "@fairtab/money";
import { ValidationError } from "./errors.js";
import type { ReceiptModel } from "./receipt-model.js";

export const DEFAULT_CHARGE_POLICY: ChargeAllocationPolicy = "proportional_to_item_share";

export interface ResolvedShare {
  readonly participantId: string;
  readonly weight: Ratio;
}

export interface ResolvedChargePolicy {
  readonly policy: ChargeAllocationPolicy;
  /** Non-empty only for "assigned_to_specific_participants" */
  readonly shares: readonly ResolvedShare[];
}

export class AllocationModel {
  readonly participants: readonly Participant[];
  private readonly lineShares: ReadonlyMap<string, readonly ResolvedShare[]>;
  private readonly chargePolicies: ReadonlyMap<string, ResolvedChargePolicy>;

  private constructor(
    participants: readonly Participant[],
    lineShares: ReadonlyMap<string, readonly ResolvedShare[]>,
    chargePolicies: ReadonlyMap<string, ResolvedChargePolicy>,
  ) {
    this.participants = participants;
    this.lineShares = lineShares;
    this.chargePolicies = chargePolicies;
  }

  /**
   * Validate an allocation against its receipt.
   *
   * @throws ValidationError on the first violated invariant
   */
  static from(allocation: Allocation, receipt: ReceiptModel): AllocationModel {
    const participantIds = validateParticipants(allocation.participants);

    const lineShares = new Map<string, readonly ResolvedShare[]>();
    for (const entry of allocation.lines) {
      if (!receipt.hasLine(entry.lineId)) {
        throw new ValidationError(
          "UNKNOWN_LINE",
          `Allocation references unknown line "${entry.lineId}"`,
          entry.lineId,
        );
      }
      if (lineShares.has(entry.lineId)) {
        throw new ValidationError(
          "DUPLICATE_LINE_ALLOCATION",
          `Line "${entry.lineId}" is allocated more than once`,
          entry.lineId,
        );
      }
      lineShares.set(entry.lineId, resolveShares(entry.lineId, entry.shares, participantIds));
    }

    for (const line of receipt.lines) {
      if (!lineShares.has(line.id)) {
        throw new ValidationError(
          "UNALLOCATED_LINE",
          `Line "${line.id}" (${line.description}) is not allocated to anyone`,
          line.id,
        );
      }
    }

    const chargePolicies = new Map<string, ResolvedChargePolicy>();
    for (const entry of allocation.charges ?? []) {
      if (!receipt.hasCharge(entry.chargeId)) {
        throw new ValidationError(
          "UNKNOWN_CHARGE",
          `Allocation references unknown charge "${entry.chargeId}"`,
          entry.chargeId,
        );
      }
      if (chargePolicies.has(entry.chargeId)) {
        throw new ValidationError(
          "DUPLICATE_CHARGE_POLICY",
          `Charge "${entry.chargeId}" has more than one policy`,
          entry.chargeId,
        );
      }

      const hasShares = entry.shares !== undefined && entry.shares.length > 0;
      if (entry.policy === "assigned_to_specific_participants") {
        if (!hasShares) {
          throw new ValidationError(
            "INVALID_CHARGE_POLICY",
            `Charge "${entry.chargeId}" is assigned to specific participants but lists none`,
            entry.chargeId,
          );
        }
        chargePolicies.set(entry.chargeId, {
          policy: entry.policy,
          shares: resolveShares(entry.chargeId, entry.shares ?? [], participantIds),
        });
      } else {
        if (hasShares) {
          throw new ValidationError(
            "INVALID_CHARGE_POLICY",
            `Charge "${entry.chargeId}" uses ${entry.policy}, which takes no explicit shares`,
            entry.chargeId,
          );
        }
        chargePolicies.set(entry.chargeId, { policy: entry.policy, shares: [] });
      }
    }

    return new AllocationModel(allocation.participants, lineShares, chargePolicies);
  }

  sharesForLine(lineId: string): readonly ResolvedShare[] {
    const shares = this.lineShares.get(lineId);
    if (!shares) {
      throw new ValidationError("UNALLOCATED_LINE", `Line "${lineId}" is not allocated to anyone`, lineId);
    }
    return shares;
  }

  policyForCharge(chargeId: string): ResolvedChargePolicy {
    return this.chargePolicies.get(chargeId) ?? { policy: DEFAULT_CHARGE_POLICY, shares: [] };
  }

  participantIds(): readonly string[] {
    return this.participants.map((p) => p.id);
  }
}

// =============================================================================
// Helpers
// =============================================================================

function validateParticipants(participants: readonly Participant[]): ReadonlySet<string> {
  if (participants.length === 0) {
    throw new ValidationError("NO_PARTICIPANTS", "Allocation has no participants");
  }

  const ids = new Set<string>();
  for (const participant of participants) {
    if (participant.id.trim() === "") {
      throw new ValidationError("MISSING_ID", "Every participant needs a non-empty id");
    }
    if (ids.has(participant.id)) {
      throw new ValidationError(
        "DUPLICATE_PARTICIPANT",
        `Participant "${participant.id}" is listed more than once`,
        participant.id,
      );
    }
    ids.add(participant.id);
  }
  return ids;
}

function resolveShares(
  subjectId: string,
  shares: readonly Share[],
  participantIds: ReadonlySet<string>,
): readonly ResolvedShare[] {
  if (shares.length === 0) {
    throw new ValidationError("EMPTY_SHARES", `"${subjectId}" has no owners`, subjectId);
  }

  const seen = new Set<string>();
  return shares.map((share) => {
    if (!participantIds.has(share.participantId)) {
      throw new ValidationError(
        "UNKNOWN_PARTICIPANT",
        `"${subjectId}" is shared with unknown participant "${share.participantId}"`,
        share.participantId,
      );
    }
    if (seen.has(share.participantId)) {
      throw new ValidationError(
        "DUPLICATE_SHARE",
        `Participant "${share.participantId}" appears twice on "${subjectId}"`,
        subjectId,
      );
    }
    seen.add(share.participantId);

    let weight: Ratio;
    try {
      weight = parseRatio(share.weight);
    } catch (err) {
      if (err instanceof MoneyError) {
        throw new ValidationError(
          "INVALID_WEIGHT",
          `Weight for "${share.participantId}" on "${subjectId}": ${err.message}`,
          subjectId,
        );
      }
      throw err;
    }
    if (weight.numerator === 0n) {
      throw new ValidationError(
        "INVALID_WEIGHT",
        `Weight for "${share.participantId}" on "${subjectId}" must be positive`,
        subjectId,
      );
    }

    return { participantId: share.participantId, weight };
  });
}
