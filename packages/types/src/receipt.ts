/**
 * Receipt Types
 *
 * Structured receipt as supplied by the scanning collaborator
 * (or hand-corrected into this shape).
 *
 * Rules:
 * - Lines and charges are ordered; order is preserved everywhere
 * - Line and charge ids are unique across the whole receipt
 * - The declared grand total is checked, never trusted
 */

import type { Money, RationalInput } from "./money.js";

/**
 * A purchased item line.
 */
export interface ReceiptLine {
  readonly id: string;
  readonly description: string;

  /** Positive integer or rational quantity */
  readonly quantity: RationalInput;

  readonly unitPrice: Money;

  /** Must equal round(unitPrice * quantity) within tolerance */
  readonly lineTotal: Money;
}

export type ChargeKind = "tax" | "service_charge" | "discount";

export type ChargeBasis = "flat" | "percentage_of_subtotal";

/**
 * A tax, service charge or discount applied on top of the item lines.
 */
export interface ChargeLine {
  readonly id: string;
  readonly kind: ChargeKind;

  /** Signed: discounts are negative */
  readonly value: Money;

  readonly basis: ChargeBasis;

  /** Percent of the item subtotal. Required when basis is a percentage. */
  readonly rate?: RationalInput | undefined;

  readonly description?: string | undefined;
}

export interface Receipt {
  readonly lines: readonly ReceiptLine[];
  readonly charges: readonly ChargeLine[];
  readonly grandTotal: Money;
}
