/**
 * Runtime Type Guards
 *
 * Narrowing functions for fairtab domain types.
 * These check shape only, at system boundaries (deserialized JSON,
 * collaborator output). Semantic invariants are enforced by the engine.
 */

import type { Money, RationalInput } from "./money.js";
import type { ChargeBasis, ChargeKind, ChargeLine, Receipt, ReceiptLine } from "./receipt.js";
import type {
  Allocation,
  ChargeAllocation,
  ChargeAllocationPolicy,
  LineAllocation,
  Participant,
  Share,
} from "./allocation.js";

// =============================================================================
// Money guards
// =============================================================================

export function isMoney(value: unknown): value is Money {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.amount === "string" &&
    typeof v.currency === "string" &&
    typeof v.decimals === "number" &&
    Number.isInteger(v.decimals) &&
    v.decimals >= 0
  );
}

export function isRationalInput(value: unknown): value is RationalInput {
  return (
    (typeof value === "number" && Number.isFinite(value)) ||
    (typeof value === "string" && value.trim() !== "")
  );
}

// =============================================================================
// Receipt guards
// =============================================================================

const CHARGE_KINDS = new Set<string>(["tax", "service_charge", "discount"]);
const CHARGE_BASES = new Set<string>(["flat", "percentage_of_subtotal"]);

export function isChargeKind(value: unknown): value is ChargeKind {
  return typeof value === "string" && CHARGE_KINDS.has(value);
}

export function isChargeBasis(value: unknown): value is ChargeBasis {
  return typeof value === "string" && CHARGE_BASES.has(value);
}

export function isReceiptLine(value: unknown): value is ReceiptLine {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.id === "string" &&
    typeof v.description === "string" &&
    isRationalInput(v.quantity) &&
    isMoney(v.unitPrice) &&
    isMoney(v.lineTotal)
  );
}

export function isChargeLine(value: unknown): value is ChargeLine {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.id === "string" &&
    isChargeKind(v.kind) &&
    isMoney(v.value) &&
    isChargeBasis(v.basis) &&
    (v.rate === undefined || isRationalInput(v.rate))
  );
}

export function isReceipt(value: unknown): value is Receipt {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    Array.isArray(v.lines) &&
    v.lines.every(isReceiptLine) &&
    Array.isArray(v.charges) &&
    v.charges.every(isChargeLine) &&
    isMoney(v.grandTotal)
  );
}

// =============================================================================
// Allocation guards
// =============================================================================

const POLICIES = new Set<string>([
  "proportional_to_item_share",
  "equal_split_across_participants",
  "assigned_to_specific_participants",
]);

export function isChargeAllocationPolicy(
  value: unknown,
): value is ChargeAllocationPolicy {
  return typeof value === "string" && POLICIES.has(value);
}

export function isParticipant(value: unknown): value is Participant {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return typeof v.id === "string" && typeof v.displayName === "string";
}

export function isShare(value: unknown): value is Share {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return typeof v.participantId === "string" && isRationalInput(v.weight);
}

function isLineAllocation(value: unknown): value is LineAllocation {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return typeof v.lineId === "string" && Array.isArray(v.shares) && v.shares.every(isShare);
}

function isChargeAllocation(value: unknown): value is ChargeAllocation {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.chargeId === "string" &&
    isChargeAllocationPolicy(v.policy) &&
    (v.shares === undefined || (Array.isArray(v.shares) && v.shares.every(isShare)))
  );
}

export function isAllocation(value: unknown): value is Allocation {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    Array.isArray(v.participants) &&
    v.participants.every(isParticipant) &&
    Array.isArray(v.lines) &&
    v.lines.every(isLineAllocation) &&
    (v.charges === undefined ||
      (Array.isArray(v.charges) && v.charges.every(isChargeAllocation)))
  );
}
