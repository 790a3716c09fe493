/**
 * Receipt Model
 *
 * Validated, normalized view of a Receipt. Construction checks every
 * receipt invariant eagerly and throws ValidationError naming the
 * offending line or charge. Nothing is repaired.
 *
 * Checks, in order:
 * 1. Grand total is well-formed; at least one line
 * 2. Ids present and unique across lines and charges
 * 3. Lines: currency, positive quantity, non-negative amounts,
 *    lineTotal == round(unitPrice * quantity) within tolerance
 * 4. Charges: currency, sign by kind, percentage derivation within tolerance
 * 5. grandTotal == subtotal + charges within tolerance
 */

import type { ChargeLine, Money, Receipt, ReceiptLine } from "@fairtab/types";
import {
  MoneyError,
  absMoney,
  addMoney,
  fromMinorUnits,
  isNegative,
  isPositive,
  isZero,
  multiplyByRatio,
  negateMoney,
  parseRatio,
  ratio,
  subtractMoney,
  sumMoney,
  toMinorUnits,
  validateMoney,
} from "@fairtab/money";
import type { Ratio } from "@fairtab/money";
import { ValidationError } from "./errors.js";
import type { ReconciliationWarning, ResolvedSettleOptions } from "./types.js";

export const GRAND_TOTAL_SUBJECT = "grand-total";

export interface ModelLine {
  readonly id: string;
  readonly description: string;
  readonly quantity: Ratio;
  readonly unitPrice: Money;
  readonly lineTotal: Money;
}

export interface ModelCharge {
  readonly id: string;
  readonly kind: ChargeLine["kind"];
  readonly basis: ChargeLine["basis"];
  readonly description: string;
  readonly value: Money;
  /** Percent of subtotal, for percentage charges */
  readonly rate: Ratio | null;
}

type ReceiptModelOptions = Pick<ResolvedSettleOptions, "tolerance" | "rounding">;

export class ReceiptModel {
  readonly currency: string;
  readonly decimals: number;
  readonly lines: readonly ModelLine[];
  readonly charges: readonly ModelCharge[];
  readonly subtotal: Money;
  readonly chargesTotal: Money;
  readonly grandTotal: Money;
  readonly warnings: readonly ReconciliationWarning[];

  private constructor(init: {
    currency: string;
    decimals: number;
    lines: readonly ModelLine[];
    charges: readonly ModelCharge[];
    subtotal: Money;
    chargesTotal: Money;
    grandTotal: Money;
    warnings: readonly ReconciliationWarning[];
  }) {
    this.currency = init.currency;
    this.decimals = init.decimals;
    this.lines = init.lines;
    this.charges = init.charges;
    this.subtotal = init.subtotal;
    this.chargesTotal = init.chargesTotal;
    this.grandTotal = init.grandTotal;
    this.warnings = init.warnings;
  }

  /**
   * Validate and normalize a receipt.
   *
   * @throws ValidationError on the first violated invariant
   */
  static from(receipt: Receipt, options: ReceiptModelOptions): ReceiptModel {
    const warnings: ReconciliationWarning[] = [];
    const grandTotal = normalizeMoney(receipt.grandTotal, GRAND_TOTAL_SUBJECT);
    const { currency, decimals } = grandTotal;
    const inCurrency = (money: Money, subjectId: string): Money => {
      const normalized = normalizeMoney(money, subjectId);
      if (normalized.currency !== currency || normalized.decimals !== decimals) {
        throw new ValidationError(
          "CURRENCY_MISMATCH",
          `Amount on "${subjectId}" is in ${normalized.currency}/${String(normalized.decimals)}, receipt is in ${currency}/${String(decimals)}`,
          subjectId,
        );
      }
      return normalized;
    };

    if (receipt.lines.length === 0) {
      throw new ValidationError("EMPTY_RECEIPT", "Receipt has no item lines");
    }

    assertUniqueIds(receipt.lines, receipt.charges);

    const lines = receipt.lines.map((line) => {
      const modelLine = buildLine(line, inCurrency);
      const expected = multiplyByRatio(modelLine.unitPrice, modelLine.quantity, options.rounding);
      const warning = checkWithinTolerance(
        modelLine.lineTotal,
        expected,
        options.tolerance,
        line.id,
        "LINE_TOTAL_MISMATCH",
        `Line "${line.id}" total ${modelLine.lineTotal.amount} does not match ${modelLine.unitPrice.amount} × ${line.quantity.toString()} = ${expected.amount}`,
      );
      if (warning) {
        warnings.push({ ...warning, code: "LINE_TOTAL_ROUNDED" });
      }
      return modelLine;
    });

    const subtotal = sumMoney(lines.map((l) => l.lineTotal), currency, decimals);

    const charges = receipt.charges.map((charge) => {
      const modelCharge = buildCharge(charge, inCurrency);
      if (modelCharge.rate !== null) {
        const magnitude = multiplyByRatio(
          subtotal,
          ratio(modelCharge.rate.numerator, modelCharge.rate.denominator * 100n),
          options.rounding,
        );
        const expected = modelCharge.kind === "discount" ? negateMoney(magnitude) : magnitude;
        const warning = checkWithinTolerance(
          modelCharge.value,
          expected,
          options.tolerance,
          charge.id,
          "CHARGE_DERIVATION_MISMATCH",
          `Charge "${charge.id}" value ${modelCharge.value.amount} does not match ${String(charge.rate)}% of subtotal ${subtotal.amount} = ${expected.amount}`,
        );
        if (warning) {
          warnings.push({ ...warning, code: "CHARGE_DERIVATION_ROUNDED" });
        }
      }
      return modelCharge;
    });

    const chargesTotal = sumMoney(charges.map((c) => c.value), currency, decimals);
    const computedTotal = addMoney(subtotal, chargesTotal);
    const totalWarning = checkWithinTolerance(
      grandTotal,
      computedTotal,
      options.tolerance,
      GRAND_TOTAL_SUBJECT,
      "GRAND_TOTAL_MISMATCH",
      `Grand total ${grandTotal.amount} does not match subtotal ${subtotal.amount} + charges ${chargesTotal.amount} = ${computedTotal.amount}`,
    );
    if (totalWarning) {
      warnings.push({ ...totalWarning, code: "GRAND_TOTAL_ROUNDED" });
    }

    return new ReceiptModel({
      currency,
      decimals,
      lines,
      charges,
      subtotal,
      chargesTotal,
      grandTotal,
      warnings,
    });
  }

  hasLine(id: string): boolean {
    return this.lines.some((l) => l.id === id);
  }

  hasCharge(id: string): boolean {
    return this.charges.some((c) => c.id === id);
  }

  hasDiscount(): boolean {
    return this.charges.some((c) => c.kind === "discount");
  }

  zero(): Money {
    return fromMinorUnits(0n, this.currency, this.decimals);
  }
}

// =============================================================================
// Helpers
// =============================================================================

function normalizeMoney(money: Money, subjectId: string): Money {
  try {
    validateMoney(money);
    return fromMinorUnits(toMinorUnits(money), money.currency, money.decimals);
  } catch (err) {
    if (err instanceof MoneyError) {
      throw new ValidationError("INVALID_MONEY", `Invalid amount on "${subjectId}": ${err.message}`, subjectId);
    }
    throw err;
  }
}

function assertUniqueIds(lines: readonly ReceiptLine[], charges: readonly ChargeLine[]): void {
  const seen = new Set<string>();
  for (const { id } of [...lines, ...charges]) {
    if (typeof id !== "string" || id.trim() === "") {
      throw new ValidationError("MISSING_ID", "Every receipt line and charge needs a non-empty id");
    }
    if (id === GRAND_TOTAL_SUBJECT) {
      throw new ValidationError("DUPLICATE_ID", `Receipt id "${id}" is reserved for the grand total`, id);
    }
    if (seen.has(id)) {
      throw new ValidationError("DUPLICATE_ID", `Receipt id "${id}" is used more than once`, id);
    }
    seen.add(id);
  }
}

function buildLine(
  line: ReceiptLine,
  inCurrency: (money: Money, subjectId: string) => Money,
): ModelLine {
  let quantity: Ratio;
  try {
    quantity = parseRatio(line.quantity);
  } catch (err) {
    if (err instanceof MoneyError) {
      throw new ValidationError("INVALID_QUANTITY", `Line "${line.id}" quantity: ${err.message}`, line.id);
    }
    throw err;
  }
  if (quantity.numerator === 0n) {
    throw new ValidationError("INVALID_QUANTITY", `Line "${line.id}" quantity must be positive`, line.id);
  }

  const unitPrice = inCurrency(line.unitPrice, line.id);
  const lineTotal = inCurrency(line.lineTotal, line.id);
  if (isNegative(unitPrice) || isNegative(lineTotal)) {
    throw new ValidationError(
      "NEGATIVE_LINE_AMOUNT",
      `Line "${line.id}" has a negative price; record reductions as discount charges`,
      line.id,
    );
  }

  return { id: line.id, description: line.description, quantity, unitPrice, lineTotal };
}

function buildCharge(
  charge: ChargeLine,
  inCurrency: (money: Money, subjectId: string) => Money,
): ModelCharge {
  const value = inCurrency(charge.value, charge.id);

  if (charge.kind === "discount" ? isPositive(value) : isNegative(value)) {
    throw new ValidationError(
      "CHARGE_SIGN",
      `Charge "${charge.id}" of kind ${charge.kind} cannot be ${charge.kind === "discount" ? "positive" : "negative"}`,
      charge.id,
    );
  }

  let rate: Ratio | null = null;
  if (charge.basis === "percentage_of_subtotal") {
    if (charge.rate === undefined) {
      throw new ValidationError("MISSING_RATE", `Percentage charge "${charge.id}" has no rate`, charge.id);
    }
    try {
      rate = parseRatio(charge.rate);
    } catch (err) {
      if (err instanceof MoneyError) {
        throw new ValidationError("INVALID_RATE", `Charge "${charge.id}" rate: ${err.message}`, charge.id);
      }
      throw err;
    }
  } else if (charge.rate !== undefined) {
    throw new ValidationError("UNEXPECTED_RATE", `Flat charge "${charge.id}" must not carry a rate`, charge.id);
  }

  return {
    id: charge.id,
    kind: charge.kind,
    basis: charge.basis,
    description: charge.description ?? charge.kind,
    value,
    rate,
  };
}

/**
 * Compare a declared amount against the amount derived from it.
 * Beyond tolerance → throws; inside tolerance but nonzero → warning.
 */
function checkWithinTolerance(
  declared: Money,
  expected: Money,
  tolerance: bigint,
  subjectId: string,
  code: "LINE_TOTAL_MISMATCH" | "CHARGE_DERIVATION_MISMATCH" | "GRAND_TOTAL_MISMATCH",
  message: string,
): Omit<ReconciliationWarning, "code"> | null {
  const difference = subtractMoney(declared, expected);
  if (toMinorUnits(absMoney(difference)) > tolerance) {
    throw new ValidationError(code, message, subjectId);
  }
  if (isZero(difference)) {
    return null;
  }
  return { subjectId, difference, message: `${message} (within tolerance)` };
}
