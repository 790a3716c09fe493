/**
 * Property-Based Tests for @fairtab/money
 *
 * Uses fast-check to verify invariants that must hold for ANY valid input:
 *
 * 1. allocate parts always sum exactly to the total
 * 2. Each part is within one minor unit of its ideal proportional share
 * 3. allocate is deterministic
 * 4. Money addition is commutative
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import type { Money } from "@fairtab/types";
import { allocate } from "../src/allocate.js";
import { addMoney, fromMinorUnits, toMinorUnits } from "../src/money-math.js";

// =============================================================================
// Arbitraries
// =============================================================================

const arbDecimals = fc.integer({ min: 0, max: 4 });

/** Minor-unit totals, both signs (discounts are negative). */
const arbMinor = fc.bigInt({ min: -10_000_000n, max: 10_000_000n });

/** Integer weights with at least one positive entry. */
const arbWeights = fc
  .array(fc.integer({ min: 0, max: 1000 }), { minLength: 1, maxLength: 12 })
  .filter((ws) => ws.some((w) => w > 0));

const arbMoney: fc.Arbitrary<Money> = fc
  .tuple(arbMinor, arbDecimals)
  .map(([minor, decimals]) => fromMinorUnits(minor, "USD", decimals));

// =============================================================================
// allocate
// =============================================================================

describe("allocate (property)", () => {
  it("parts sum exactly to the total", () => {
    fc.assert(
      fc.property(arbMoney, arbWeights, (total, weights) => {
        const parts = allocate(total, weights);
        const sum = parts.reduce((acc, p) => acc + toMinorUnits(p), 0n);
        expect(sum).toBe(toMinorUnits(total));
        expect(parts).toHaveLength(weights.length);
      }),
    );
  });

  it("every part is within one minor unit of its ideal share", () => {
    fc.assert(
      fc.property(arbMoney, arbWeights, (total, weights) => {
        const parts = allocate(total, weights);
        const t = toMinorUnits(total);
        const w = weights.map(BigInt);
        const sum = w.reduce((a, b) => a + b, 0n);

        parts.forEach((part, i) => {
          // |part - t*w/sum| < 1  <=>  |part*sum - t*w| < sum
          const diff = toMinorUnits(part) * sum - t * (w[i] ?? 0n);
          const abs = diff < 0n ? -diff : diff;
          expect(abs < sum).toBe(true);
        });
      }),
    );
  });

  it("is deterministic for identical inputs", () => {
    fc.assert(
      fc.property(arbMoney, arbWeights, (total, weights) => {
        const keys = weights.map((_, i) => `p${String(weights.length - i)}`);
        expect(allocate(total, weights, keys)).toEqual(allocate(total, weights, keys));
      }),
    );
  });
});

// =============================================================================
// Arithmetic
// =============================================================================

describe("addMoney (property)", () => {
  it("is commutative", () => {
    fc.assert(
      fc.property(arbMinor, arbMinor, (a, b) => {
        const ma = fromMinorUnits(a, "USD", 2);
        const mb = fromMinorUnits(b, "USD", 2);
        expect(addMoney(ma, mb)).toEqual(addMoney(mb, ma));
      }),
    );
  });
});
