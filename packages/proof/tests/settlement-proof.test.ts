/**
 * Settlement Proof Packaging Tests
 *
 * Verifies:
 * - Package creation from a settlement run
 * - Replay verification (round-trip)
 * - Tampered inputs, hashes, flags and timestamps fail
 * - Replay failures are reported, not thrown
 * - Round-trip serialization (JSON.stringify + parse + verify)
 */

import { describe, it, expect } from "vitest";
import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { Allocation, Money, Receipt } from "@fairtab/types";
import { settle } from "@fairtab/engine";
import { hashCanonical } from "../src/hash.js";
import {
  packageSettlementProof,
  verifySettlementProof,
} from "../src/settlement-proof.js";
import type { SettlementProofPackage } from "../src/types.js";

// =============================================================================
// Helpers
// =============================================================================

const PACKAGED_AT = "2026-01-01T00:00:00.000Z";

function sha256(data: string): string {
  return createHash("sha256").update(data).digest("hex");
}

function usd(amount: string): Money {
  return { amount, currency: "USD", decimals: 2 };
}

function makeReceipt(pastaDescription = "Pasta"): Receipt {
  return {
    lines: [
      { id: "pasta", description: pastaDescription, quantity: 1, unitPrice: usd("30.00"), lineTotal: usd("30.00") },
      { id: "salad", description: "Salad", quantity: 1, unitPrice: usd("20.00"), lineTotal: usd("20.00") },
    ],
    charges: [
      { id: "service", kind: "service_charge", basis: "percentage_of_subtotal", rate: 10, value: usd("5.00") },
    ],
    grandTotal: usd("55.00"),
  };
}

function makeAllocation(): Allocation {
  return {
    participants: [
      { id: "alice", displayName: "Alice" },
      { id: "bob", displayName: "Bob" },
    ],
    lines: [
      { lineId: "pasta", shares: [{ participantId: "alice", weight: 1 }] },
      { lineId: "salad", shares: [{ participantId: "bob", weight: 1 }] },
    ],
  };
}

function makePackage(): SettlementProofPackage {
  const receipt = makeReceipt();
  const allocation = makeAllocation();
  return packageSettlementProof(receipt, allocation, settle(receipt, allocation), PACKAGED_AT);
}

function subjects(pkg: SettlementProofPackage, receipt = makeReceipt(), allocation = makeAllocation()): string[] {
  return verifySettlementProof(pkg, receipt, allocation).discrepancies.map((d) => d.subject);
}

// =============================================================================
// hashCanonical
// =============================================================================

describe("hashCanonical", () => {
  it("hashes RFC 8785 canonical JSON", () => {
    expect(hashCanonical({ b: 2, a: 1 })).toBe(sha256('{"a":1,"b":2}'));
  });

  it("ignores key order", () => {
    expect(hashCanonical({ amount: "1.00", currency: "USD" })).toBe(
      hashCanonical({ currency: "USD", amount: "1.00" }),
    );
  });
});

// =============================================================================
// packageSettlementProof
// =============================================================================

describe("packageSettlementProof", () => {
  it("hashes inputs and outputs", () => {
    const receipt = makeReceipt();
    const allocation = makeAllocation();
    const outcome = settle(receipt, allocation);
    const pkg = packageSettlementProof(receipt, allocation, outcome, PACKAGED_AT);

    expect(pkg.version).toBe(1);
    expect(pkg.receiptHash).toBe(sha256(canonicalize(receipt)));
    expect(pkg.allocationHash).toBe(sha256(canonicalize(allocation)));
    expect(pkg.settlementHash).toBe(sha256(canonicalize(outcome.settlement)));
    expect(pkg.traceHash).toBe(sha256(canonicalize(outcome.trace)));
    expect(pkg.exact).toBe(true);
    expect(pkg.valid).toBe(true);
    expect(pkg.packagedAt).toBe(PACKAGED_AT);
  });

  it("covers every field with the package hash", () => {
    const pkg = makePackage();
    const { packageHash, ...rest } = pkg;

    expect(packageHash).toBe(sha256(canonicalize(rest)));
    expect(packageHash).toMatch(/^[0-9a-f]{64}$/);
  });

  it("is deterministic for a fixed timestamp", () => {
    expect(makePackage()).toEqual(makePackage());
  });

  it("stamps the current time by default", () => {
    const receipt = makeReceipt();
    const allocation = makeAllocation();
    const pkg = packageSettlementProof(receipt, allocation, settle(receipt, allocation));

    expect(Number.isNaN(Date.parse(pkg.packagedAt))).toBe(false);
  });
});

// =============================================================================
// verifySettlementProof
// =============================================================================

describe("verifySettlementProof", () => {
  it("PASS: replay reproduces every hash", () => {
    expect(verifySettlementProof(makePackage(), makeReceipt(), makeAllocation())).toEqual({
      verdict: "PASS",
      discrepancies: [],
    });
  });

  it("PASS: survives JSON serialization", () => {
    const parsed: SettlementProofPackage = JSON.parse(JSON.stringify(makePackage()));

    expect(verifySettlementProof(parsed, makeReceipt(), makeAllocation()).verdict).toBe("PASS");
  });

  it("FAIL: a changed receipt changes the receipt and trace hashes", () => {
    // Descriptions appear in the trace but not in the settlement
    expect(subjects(makePackage(), makeReceipt("Penne"))).toEqual(["receipt", "trace"]);
  });

  it("FAIL: a tampered settlement hash", () => {
    const pkg = { ...makePackage(), settlementHash: "0".repeat(64) };

    expect(subjects(pkg)).toEqual(["settlement", "package"]);
  });

  it("FAIL: a flipped validation flag", () => {
    const pkg = { ...makePackage(), valid: false };

    expect(subjects(pkg)).toEqual(["valid", "package"]);
  });

  it("FAIL: a tampered timestamp", () => {
    const pkg = { ...makePackage(), packagedAt: "2026-02-01T00:00:00.000Z" };

    expect(subjects(pkg)).toEqual(["package"]);
  });

  it("FAIL: reports a replay that throws", () => {
    const allocation: Allocation = { ...makeAllocation(), lines: makeAllocation().lines.slice(0, 1) };
    const result = verifySettlementProof(makePackage(), makeReceipt(), allocation);

    expect(result.verdict).toBe("FAIL");
    expect(result.discrepancies.map((d) => d.subject)).toEqual(["allocation", "replay"]);
    expect(result.discrepancies[1]).toEqual({
      subject: "replay",
      expected: "settlement",
      actual: "ValidationError",
      description: 'Replay failed: Line "salad" (Salad) is not allocated to anyone',
    });
  });
});
