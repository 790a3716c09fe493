/**
 * @fairtab/proof — Core types.
 *
 * All hashes are SHA-256 hex strings (64 characters, lowercase) over
 * RFC 8785 canonical JSON.
 */

// =============================================================================
// Proof Package
// =============================================================================

/**
 * A tamper-evident record of one settlement run.
 *
 * Holds hashes only, never the receipt or allocation themselves. Anyone
 * holding the same inputs can replay the run and check every hash.
 */
export interface SettlementProofPackage {
  /** Version of the proof package format */
  readonly version: 1;
  readonly receiptHash: string;
  readonly allocationHash: string;
  readonly settlementHash: string;
  readonly traceHash: string;
  /** Owed amounts summed exactly to the grand total */
  readonly exact: boolean;
  /** The validator accepted the settlement */
  readonly valid: boolean;
  /** When this proof package was created */
  readonly packagedAt: string;
  /** SHA-256 of canonical(entire package minus this field) */
  readonly packageHash: string;
}

// =============================================================================
// Verification
// =============================================================================

export type ProofVerdict = "PASS" | "FAIL";

export type ProofSubject =
  | "receipt"
  | "allocation"
  | "settlement"
  | "trace"
  | "exact"
  | "valid"
  | "package"
  | "replay";

/**
 * A single mismatch found while verifying a proof package.
 */
export interface ProofDiscrepancy {
  /** Which part of the package disagreed */
  readonly subject: ProofSubject;

  /** What the package claims */
  readonly expected: string;

  /** What the replay produced */
  readonly actual: string;

  /** Human-readable description */
  readonly description: string;
}

export interface ProofVerificationResult {
  readonly verdict: ProofVerdict;
  readonly discrepancies: readonly ProofDiscrepancy[];
}
