/**
 * Property-Based Tests for settle()
 *
 * For any well-formed receipt and allocation:
 * 1. Owed amounts sum exactly to the grand total
 * 2. Every entry's contributions sum to its owed amount
 * 3. The validator accepts the result
 * 4. Settling twice gives the same result
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import type { Allocation, ChargeAllocationPolicy, Receipt } from "@fairtab/types";
import { fromMinorUnits, toMinorUnits } from "@fairtab/money";
import { settle } from "../src/settle.js";

const PARTICIPANTS = ["ana", "ben", "cy", "dee"];

const cents = (minor: number) => fromMinorUnits(BigInt(minor), "USD", 2);

// =============================================================================
// Arbitraries
// =============================================================================

const arbShares = fc.uniqueArray(
  fc.record({
    participant: fc.integer({ min: 0, max: PARTICIPANTS.length - 1 }),
    weight: fc.integer({ min: 1, max: 3 }),
  }),
  { minLength: 1, maxLength: PARTICIPANTS.length, selector: (s) => s.participant },
);

const arbLine = fc.record({
  minor: fc.integer({ min: 1, max: 20_000 }),
  shares: arbShares,
});

const arbCharge = fc.record({
  minor: fc.integer({ min: 0, max: 3_000 }),
  kind: fc.constantFrom("tax" as const, "service_charge" as const, "discount" as const),
  policy: fc.constantFrom<ChargeAllocationPolicy>(
    "proportional_to_item_share",
    "equal_split_across_participants",
  ),
});

const arbCase = fc
  .record({
    lines: fc.array(arbLine, { minLength: 1, maxLength: 6 }),
    charges: fc.array(arbCharge, { maxLength: 3 }),
    // Printed grand total off by at most one cent
    drift: fc.integer({ min: -1, max: 1 }),
  })
  .map(({ lines, charges, drift }): { receipt: Receipt; allocation: Allocation } => {
    const subtotal = lines.reduce((sum, l) => sum + l.minor, 0);
    const signed = charges.map((c) => (c.kind === "discount" ? -Math.min(c.minor, 500) : c.minor));
    const total = subtotal + signed.reduce((sum, v) => sum + v, 0) + drift;

    return {
      receipt: {
        lines: lines.map((l, i) => ({
          id: `line-${String(i)}`,
          description: `Item ${String(i)}`,
          quantity: 1,
          unitPrice: cents(l.minor),
          lineTotal: cents(l.minor),
        })),
        charges: charges.map((c, i) => ({
          id: `charge-${String(i)}`,
          kind: c.kind,
          basis: "flat",
          value: cents(signed[i] ?? 0),
        })),
        grandTotal: cents(total),
      },
      allocation: {
        participants: PARTICIPANTS.map((id) => ({ id, displayName: id.toUpperCase() })),
        lines: lines.map((l, i) => ({
          lineId: `line-${String(i)}`,
          shares: l.shares.map((s) => ({ participantId: PARTICIPANTS[s.participant] ?? "ana", weight: s.weight })),
        })),
        charges: charges.map((c, i) => ({ chargeId: `charge-${String(i)}`, policy: c.policy })),
      },
    };
  });

// =============================================================================
// Properties
// =============================================================================

describe("settle (property)", () => {
  it("owed amounts sum exactly to the grand total", () => {
    fc.assert(
      fc.property(arbCase, ({ receipt, allocation }) => {
        const { settlement } = settle(receipt, allocation);
        const sum = settlement.entries.reduce((acc, e) => acc + toMinorUnits(e.owed), 0n);
        expect(sum).toBe(toMinorUnits(receipt.grandTotal));
      }),
    );
  });

  it("contributions sum to each owed amount", () => {
    fc.assert(
      fc.property(arbCase, ({ receipt, allocation }) => {
        for (const entry of settle(receipt, allocation).settlement.entries) {
          const sum = entry.contributions.reduce((acc, c) => acc + toMinorUnits(c.amount), 0n);
          expect(sum).toBe(toMinorUnits(entry.owed));
        }
      }),
    );
  });

  it("every settlement passes validation", () => {
    fc.assert(
      fc.property(arbCase, ({ receipt, allocation }) => {
        expect(settle(receipt, allocation).validation).toEqual({ valid: true, reasons: [] });
      }),
    );
  });

  it("is deterministic", () => {
    fc.assert(
      fc.property(arbCase, ({ receipt, allocation }) => {
        expect(JSON.stringify(settle(receipt, allocation))).toBe(JSON.stringify(settle(receipt, allocation)));
      }),
    );
  });
});
