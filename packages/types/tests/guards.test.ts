/**
 * Runtime type guard tests for @fairtab/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject invalid / malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  isMoney,
  isRationalInput,
  isChargeKind,
  isChargeBasis,
  isReceiptLine,
  isChargeLine,
  isReceipt,
  isChargeAllocationPolicy,
  isParticipant,
  isShare,
  isAllocation,
} from "../src/guards.js";

const usd = (amount: string) => ({ amount, currency: "USD", decimals: 2 });

// =============================================================================
// Money guards
// =============================================================================

describe("isMoney", () => {
  it("accepts valid Money", () => {
    expect(isMoney(usd("10.01"))).toBe(true);
  });

  it("accepts zero decimals", () => {
    expect(isMoney({ amount: "500", currency: "JPY", decimals: 0 })).toBe(true);
  });

  it("rejects null", () => {
    expect(isMoney(null)).toBe(false);
  });

  it("rejects numeric amount (must be string)", () => {
    expect(isMoney({ amount: 10.01, currency: "USD", decimals: 2 })).toBe(false);
  });

  it("rejects missing currency", () => {
    expect(isMoney({ amount: "1", decimals: 2 })).toBe(false);
  });

  it("rejects negative or fractional decimals", () => {
    expect(isMoney({ amount: "1", currency: "X", decimals: -1 })).toBe(false);
    expect(isMoney({ amount: "1", currency: "X", decimals: 1.5 })).toBe(false);
  });
});

describe("isRationalInput", () => {
  it("accepts finite numbers and non-empty strings", () => {
    expect(isRationalInput(2)).toBe(true);
    expect(isRationalInput(0.5)).toBe(true);
    expect(isRationalInput("1/3")).toBe(true);
  });

  it("rejects NaN, Infinity and blank strings", () => {
    expect(isRationalInput(Number.NaN)).toBe(false);
    expect(isRationalInput(Number.POSITIVE_INFINITY)).toBe(false);
    expect(isRationalInput("  ")).toBe(false);
    expect(isRationalInput(null)).toBe(false);
  });
});

// =============================================================================
// Receipt guards
// =============================================================================

describe("isChargeKind / isChargeBasis", () => {
  it("accepts the known literals", () => {
    expect(isChargeKind("tax")).toBe(true);
    expect(isChargeKind("service_charge")).toBe(true);
    expect(isChargeKind("discount")).toBe(true);
    expect(isChargeBasis("flat")).toBe(true);
    expect(isChargeBasis("percentage_of_subtotal")).toBe(true);
  });

  it("rejects other values", () => {
    expect(isChargeKind("tip")).toBe(false);
    expect(isChargeBasis("percentage")).toBe(false);
    expect(isChargeKind(1)).toBe(false);
  });
});

describe("isReceipt", () => {
  const line = {
    id: "l1",
    description: "Pizza",
    quantity: 1,
    unitPrice: usd("10.00"),
    lineTotal: usd("10.00"),
  };
  const charge = { id: "c1", kind: "tax", value: usd("0.80"), basis: "flat" };

  it("accepts a well-formed receipt", () => {
    expect(isReceiptLine(line)).toBe(true);
    expect(isChargeLine(charge)).toBe(true);
    expect(isReceipt({ lines: [line], charges: [charge], grandTotal: usd("10.80") })).toBe(true);
  });

  it("accepts a percentage charge with a rate", () => {
    expect(
      isChargeLine({ ...charge, basis: "percentage_of_subtotal", rate: "8" }),
    ).toBe(true);
  });

  it("rejects a line with a numeric price", () => {
    expect(isReceiptLine({ ...line, unitPrice: 10 })).toBe(false);
  });

  it("rejects a receipt missing charges", () => {
    expect(isReceipt({ lines: [line], grandTotal: usd("10.00") })).toBe(false);
  });

  it("rejects a charge with an unknown kind", () => {
    expect(isChargeLine({ ...charge, kind: "tip" })).toBe(false);
  });
});

// =============================================================================
// Allocation guards
// =============================================================================

describe("isAllocation", () => {
  const allocation = {
    participants: [
      { id: "a", displayName: "Ana" },
      { id: "b", displayName: "Ben" },
    ],
    lines: [{ lineId: "l1", shares: [{ participantId: "a", weight: 1 }] }],
  };

  it("accepts an allocation without charge policies", () => {
    expect(isAllocation(allocation)).toBe(true);
  });

  it("accepts charge policies with and without shares", () => {
    expect(
      isAllocation({
        ...allocation,
        charges: [
          { chargeId: "c1", policy: "equal_split_across_participants" },
          {
            chargeId: "c2",
            policy: "assigned_to_specific_participants",
            shares: [{ participantId: "b", weight: "1/2" }],
          },
        ],
      }),
    ).toBe(true);
  });

  it("rejects an unknown policy", () => {
    expect(isChargeAllocationPolicy("by_vibes")).toBe(false);
    expect(
      isAllocation({ ...allocation, charges: [{ chargeId: "c1", policy: "by_vibes" }] }),
    ).toBe(false);
  });

  it("rejects malformed participants and shares", () => {
    expect(isParticipant({ id: "a" })).toBe(false);
    expect(isShare({ participantId: "a" })).toBe(false);
    expect(isAllocation({ ...allocation, participants: [{ id: 1, displayName: "x" }] })).toBe(false);
  });
});
