/**
 * Canonical hashing.
 *
 * SHA-256 over RFC 8785 (JSON Canonicalization Scheme) output, so key
 * order and whitespace never change a hash.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";

export function sha256(data: string): string {
  return createHash("sha256").update(data).digest("hex");
}

export function hashCanonical(value: unknown): string {
  return sha256(canonicalize(value));
}
