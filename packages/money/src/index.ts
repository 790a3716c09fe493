/**
 * @fairtab/money — Exact money arithmetic and apportionment.
 *
 * - All monetary arithmetic uses bigint minor units (no floating point)
 * - Quantities, weights and rates are exact reduced rationals
 * - `allocate` splits an amount by weight with largest-remainder rounding,
 *   so every split sums to its total by construction
 *
 * Zero runtime dependencies beyond @fairtab/types.
 */

// Money arithmetic
export {
  parseAmount,
  formatAmount,
  toMinorUnits,
  fromMinorUnits,
  validateMoney,
  assertSameCurrency,
  addMoney,
  subtractMoney,
  negateMoney,
  sumMoney,
  multiplyByRatio,
  isZero,
  isPositive,
  isNegative,
  zeroMoney,
  compareMoney,
  absMoney,
} from "./money-math.js";

// Rationals
export {
  ratio,
  parseRatio,
  ratioFromMinorUnits,
  formatRatio,
  isRatio,
  isZeroRatio,
  divideRounded,
} from "./ratio.js";

// Apportionment
export { allocate, compareCodePoints } from "./allocate.js";

// Types
export type {
  Ratio,
  WeightLike,
  RoundingMode,
  MoneyErrorCode,
  InvalidAllocationCode,
} from "./types.js";

export { MoneyError, InvalidAllocationError, DEFAULT_ROUNDING } from "./types.js";
