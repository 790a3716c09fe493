/**
 * @fairtab/proof — Settlement Proof Packaging.
 *
 * Binds the inputs of a settlement run (receipt, allocation) to its
 * outputs (settlement, trace) by hash, and lets a third party with the
 * same inputs replay the run and confirm every hash.
 *
 * Design:
 * - Holds only hashes; the inputs stay with whoever shares them
 * - packageHash covers all fields for tamper evidence
 * - Replay uses the same deterministic settle() as the original run
 */

import type { Allocation, Receipt } from "@fairtab/types";
import { settle } from "@fairtab/engine";
import type { SettleOptions, SettlementOutcome } from "@fairtab/engine";
import { toMinorUnits } from "@fairtab/money";
import { hashCanonical } from "./hash.js";
import type {
  ProofDiscrepancy,
  ProofVerificationResult,
  SettlementProofPackage,
} from "./types.js";

// =============================================================================
// Internal Helpers
// =============================================================================

type UnsignedPackage = Omit<SettlementProofPackage, "packageHash">;

function computePackageHash(pkg: UnsignedPackage): string {
  return hashCanonical({
    version: pkg.version,
    receiptHash: pkg.receiptHash,
    allocationHash: pkg.allocationHash,
    settlementHash: pkg.settlementHash,
    traceHash: pkg.traceHash,
    exact: pkg.exact,
    valid: pkg.valid,
    packagedAt: pkg.packagedAt,
  });
}

function isExact(outcome: SettlementOutcome): boolean {
  const { entries, total } = outcome.settlement;
  const sum = entries.reduce((acc, e) => acc + toMinorUnits(e.owed), 0n);
  return sum === toMinorUnits(total);
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Package a settlement run into a proof.
 *
 * @param packagedAt - ISO 8601 timestamp; defaults to now
 */
export function packageSettlementProof(
  receipt: Receipt,
  allocation: Allocation,
  outcome: SettlementOutcome,
  packagedAt: string = new Date().toISOString(),
): SettlementProofPackage {
  const unsigned: UnsignedPackage = {
    version: 1,
    receiptHash: hashCanonical(receipt),
    allocationHash: hashCanonical(allocation),
    settlementHash: hashCanonical(outcome.settlement),
    traceHash: hashCanonical(outcome.trace),
    exact: isExact(outcome),
    valid: outcome.validation.valid,
    packagedAt,
  };

  return { ...unsigned, packageHash: computePackageHash(unsigned) };
}

/**
 * Verify a proof package by replaying the settlement.
 *
 * Checks:
 * 1. Receipt and allocation hash to the packaged input hashes
 * 2. Replaying settle() succeeds
 * 3. Replayed settlement and trace hash to the packaged output hashes
 * 4. exact and valid flags agree with the replay
 * 5. packageHash matches the recomputed hash of all fields
 *
 * @param options - Must match the options of the original run
 */
export function verifySettlementProof(
  pkg: SettlementProofPackage,
  receipt: Receipt,
  allocation: Allocation,
  options?: SettleOptions,
): ProofVerificationResult {
  const discrepancies: ProofDiscrepancy[] = [];

  // Check 1: input hashes
  const receiptHash = hashCanonical(receipt);
  if (receiptHash !== pkg.receiptHash) {
    discrepancies.push({
      subject: "receipt",
      expected: pkg.receiptHash,
      actual: receiptHash,
      description: "Receipt does not match the packaged receipt hash",
    });
  }
  const allocationHash = hashCanonical(allocation);
  if (allocationHash !== pkg.allocationHash) {
    discrepancies.push({
      subject: "allocation",
      expected: pkg.allocationHash,
      actual: allocationHash,
      description: "Allocation does not match the packaged allocation hash",
    });
  }

  // Check 2: replay
  let outcome: SettlementOutcome;
  try {
    outcome = settle(receipt, allocation, options);
  } catch (err) {
    if (!(err instanceof Error)) {
      throw err;
    }
    discrepancies.push({
      subject: "replay",
      expected: "settlement",
      actual: err.name,
      description: `Replay failed: ${err.message}`,
    });
    return { verdict: "FAIL", discrepancies };
  }

  // Check 3: output hashes
  const settlementHash = hashCanonical(outcome.settlement);
  if (settlementHash !== pkg.settlementHash) {
    discrepancies.push({
      subject: "settlement",
      expected: pkg.settlementHash,
      actual: settlementHash,
      description: "Replayed settlement hash differs from the package",
    });
  }
  const traceHash = hashCanonical(outcome.trace);
  if (traceHash !== pkg.traceHash) {
    discrepancies.push({
      subject: "trace",
      expected: pkg.traceHash,
      actual: traceHash,
      description: "Replayed reasoning trace hash differs from the package",
    });
  }

  // Check 4: flags
  const exact = isExact(outcome);
  if (exact !== pkg.exact) {
    discrepancies.push({
      subject: "exact",
      expected: String(pkg.exact),
      actual: String(exact),
      description: "Exactness flag differs from the replay",
    });
  }
  if (outcome.validation.valid !== pkg.valid) {
    discrepancies.push({
      subject: "valid",
      expected: String(pkg.valid),
      actual: String(outcome.validation.valid),
      description: "Validation flag differs from the replay",
    });
  }

  // Check 5: package hash
  const packageHash = computePackageHash(pkg);
  if (packageHash !== pkg.packageHash) {
    discrepancies.push({
      subject: "package",
      expected: pkg.packageHash,
      actual: packageHash,
      description: "Package hash does not cover the packaged fields",
    });
  }

  return {
    verdict: discrepancies.length === 0 ? "PASS" : "FAIL",
    discrepancies,
  };
}
