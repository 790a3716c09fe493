/**
 * Scanned-receipt adapter.
 *
 * Turns the scanning service's output (float amounts in major units,
 * a currency symbol) into a Receipt the engine can check.
 *
 * Rules:
 * - `price` is the unit price; the line total is price × quantity,
 *   rounded half-up to the currency's minor unit
 * - Nonzero tax and service charge become flat charge lines
 * - `total` becomes the declared grand total; `subtotal` is not used,
 *   since the engine derives it from the lines
 * - The caller supplies the currency code and decimals
 */

import type { ChargeLine, Money, Receipt, ReceiptLine } from "@fairtab/types";
import {
  MoneyError,
  divideRounded,
  fromMinorUnits,
  multiplyByRatio,
  parseRatio,
} from "@fairtab/money";
import type { Ratio } from "@fairtab/money";
import { IntakeError } from "./errors.js";
import type { ScannedReceipt } from "./schemas.js";

export interface ReceiptCurrency {
  readonly code: string;
  readonly decimals: number;
}

export function receiptFromScan(scan: ScannedReceipt, currency: ReceiptCurrency): Receipt {
  if (scan.items.length === 0) {
    throw new IntakeError("INVALID_SCAN", "Scanned receipt has no items");
  }

  const money = (value: number, field: string): Money =>
    moneyFromNumber(value, currency, field);

  const lines: ReceiptLine[] = scan.items.map((scanned, i) => {
    const id = `item-${String(i + 1)}`;
    const unitPrice = money(scanned.price, `${id}.price`);
    return {
      id,
      description: scanned.name,
      quantity: scanned.quantity,
      unitPrice,
      lineTotal: multiplyByRatio(unitPrice, ratioOf(scanned.quantity, `${id}.quantity`), "half-up"),
    };
  });

  const charges: ChargeLine[] = [];
  if (scan.tax !== 0) {
    charges.push({ id: "tax", kind: "tax", basis: "flat", value: money(scan.tax, "tax"), description: "Tax" });
  }
  if (scan.service_charge !== 0) {
    charges.push({
      id: "service-charge",
      kind: "service_charge",
      basis: "flat",
      value: money(scan.service_charge, "service_charge"),
      description: "Service charge",
    });
  }

  return { lines, charges, grandTotal: money(scan.total, "total") };
}

// =============================================================================
// Helpers
// =============================================================================

function ratioOf(value: number, field: string): Ratio {
  try {
    return parseRatio(value);
  } catch (err) {
    if (err instanceof MoneyError) {
      throw new IntakeError("INVALID_SCAN", `Scanned ${field}: ${err.message}`);
    }
    throw err;
  }
}

/**
 * Exact conversion through the number's shortest decimal form,
 * rounded half-up to minor units: 4.5 → "4.50", 0.125 → "0.13".
 */
function moneyFromNumber(value: number, currency: ReceiptCurrency, field: string): Money {
  const magnitude = ratioOf(Math.abs(value), field);
  const minor = divideRounded(
    magnitude.numerator * 10n ** BigInt(currency.decimals),
    magnitude.denominator,
    "half-up",
  );
  return fromMinorUnits(value < 0 ? -minor : minor, currency.code, currency.decimals);
}
