/**
 * Money Types
 *
 * Monetary primitives for exact receipt settlement.
 *
 * Rules:
 * - Amounts are decimal strings, never floating-point numbers
 * - Arithmetic happens on integer minor units (see @fairtab/money)
 * - Currency and decimals are always explicit
 */

/**
 * Currency identifier (ISO 4217 code or a display symbol).
 */
export type Currency = string;

/**
 * A precise monetary amount.
 */
export interface Money {
  /** Decimal string, e.g. "10.01" or "-2.50" */
  readonly amount: string;

  /** Currency code, e.g. "USD", "SGD" */
  readonly currency: Currency;

  /**
   * Number of fractional digits in one major unit.
   * USD = 2, JPY = 0, KWD = 3.
   */
  readonly decimals: number;
}

/**
 * A rational quantity or weight as it arrives from upstream.
 *
 * - Integer or plain decimal number: 2, 0.5
 * - Decimal string: "1.25"
 * - Fraction string: "1/3"
 */
export type RationalInput = number | string;
