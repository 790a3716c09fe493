/**
 * @fairtab/proof — Tamper-evident proofs of settlement runs.
 *
 * Canonical hashing of receipts, allocations, settlements and traces,
 * and replay-verifiable proof packages.
 *
 * @packageDocumentation
 */

// Types
export type {
  SettlementProofPackage,
  ProofVerdict,
  ProofSubject,
  ProofDiscrepancy,
  ProofVerificationResult,
} from "./types.js";

// Hashing
export { hashCanonical, sha256 } from "./hash.js";

// Settlement proof packaging
export {
  packageSettlementProof,
  verifySettlementProof,
} from "./settlement-proof.js";
