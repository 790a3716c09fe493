/**
 * Settlement Validator
 *
 * Independent check of a settlement against the raw receipt and
 * allocation it claims to settle. Never throws on a bad settlement:
 * every problem becomes a reason, and all reasons are collected.
 *
 * Rules:
 * - sum(owed) === grandTotal and settlement.total === grandTotal
 * - Every participant with a nonzero share appears exactly once
 * - No entry for a participant the allocation does not declare
 * - No negative owed amount unless the receipt carries a discount
 * - Each entry's contributions sum to its owed amount
 * - Every amount is well-formed and in the receipt's currency
 */

import type { Allocation, Money, Receipt, Settlement } from "@fairtab/types";
import {
  MoneyError,
  addMoney,
  compareMoney,
  isNegative,
  parseRatio,
  validateMoney,
  zeroMoney,
} from "@fairtab/money";
import type { RationalInput } from "@fairtab/types";
import { GRAND_TOTAL_SUBJECT } from "./receipt-model.js";
import type { ValidationReason, ValidationResult } from "./types.js";

export function validateSettlement(
  settlement: Settlement,
  receipt: Receipt,
  allocation: Allocation,
): ValidationResult {
  const reasons: ValidationReason[] = [];
  const { grandTotal } = receipt;

  const grandTotalProblem = moneyProblem(grandTotal);
  if (grandTotalProblem !== null) {
    return {
      valid: false,
      reasons: [{ code: "INVALID_AMOUNT", subjectId: GRAND_TOTAL_SUBJECT, message: `Grand total: ${grandTotalProblem}` }],
    };
  }

  const sameUnit = (money: Money): boolean =>
    money.currency === grandTotal.currency && money.decimals === grandTotal.decimals;

  // ─── Amount checks ─────────────────────────────────────────────────
  const declared = new Set(allocation.participants.map((p) => p.id));
  const seen = new Set<string>();
  const hasDiscount = receipt.charges.some((c) => c.kind === "discount");
  let sum = zeroMoney(grandTotal.currency, grandTotal.decimals);
  let sumIsSound = true;

  for (const entry of settlement.entries) {
    const id = entry.participantId;

    if (seen.has(id)) {
      reasons.push({ code: "DUPLICATE_PARTICIPANT", subjectId: id, message: `Participant "${id}" has more than one entry` });
    }
    seen.add(id);

    if (!declared.has(id)) {
      reasons.push({ code: "UNKNOWN_PARTICIPANT", subjectId: id, message: `Participant "${id}" is not part of the allocation` });
    }

    const problem = moneyProblem(entry.owed);
    if (problem !== null) {
      reasons.push({ code: "INVALID_AMOUNT", subjectId: id, message: `Owed amount for "${id}": ${problem}` });
      sumIsSound = false;
      continue;
    }
    if (!sameUnit(entry.owed)) {
      reasons.push({
        code: "CURRENCY_MISMATCH",
        subjectId: id,
        message: `Owed amount for "${id}" is in ${entry.owed.currency}, receipt is in ${grandTotal.currency}`,
      });
      sumIsSound = false;
      continue;
    }

    sum = addMoney(sum, entry.owed);

    if (isNegative(entry.owed) && !hasDiscount) {
      reasons.push({
        code: "NEGATIVE_AMOUNT",
        subjectId: id,
        message: `"${id}" owes ${entry.owed.amount}, but the receipt has no discount`,
      });
    }

    const contributed = sumContributions(
      entry.contributions,
      zeroMoney(grandTotal.currency, grandTotal.decimals),
      sameUnit,
    );
    if (contributed === null) {
      reasons.push({
        code: "CURRENCY_MISMATCH",
        subjectId: id,
        message: `Contributions for "${id}" are not all well-formed ${grandTotal.currency} amounts`,
      });
    } else if (compareMoney(contributed, entry.owed) !== 0) {
      reasons.push({
        code: "CONTRIBUTION_MISMATCH",
        subjectId: id,
        message: `Contributions for "${id}" sum to ${contributed.amount}, owed is ${entry.owed.amount}`,
      });
    }
  }

  // ─── Totals ────────────────────────────────────────────────────────
  if (sumIsSound && compareMoney(sum, grandTotal) !== 0) {
    reasons.push({
      code: "TOTAL_MISMATCH",
      subjectId: GRAND_TOTAL_SUBJECT,
      message: `Owed amounts sum to ${sum.amount}, grand total is ${grandTotal.amount}`,
    });
  }
  if (moneyProblem(settlement.total) !== null || !sameUnit(settlement.total)) {
    reasons.push({
      code: "CURRENCY_MISMATCH",
      subjectId: GRAND_TOTAL_SUBJECT,
      message: `Settlement total is not a well-formed ${grandTotal.currency} amount`,
    });
  } else if (compareMoney(settlement.total, grandTotal) !== 0) {
    reasons.push({
      code: "TOTAL_MISMATCH",
      subjectId: GRAND_TOTAL_SUBJECT,
      message: `Settlement total ${settlement.total.amount} differs from grand total ${grandTotal.amount}`,
    });
  }

  // ─── Coverage ──────────────────────────────────────────────────────
  for (const id of expectedParticipants(allocation)) {
    if (!seen.has(id)) {
      reasons.push({ code: "MISSING_PARTICIPANT", subjectId: id, message: `Participant "${id}" has a share but no entry` });
    }
  }

  return reasons.length === 0 ? { valid: true, reasons: [] } : { valid: false, reasons };
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Participants who must owe something: any nonzero line or assigned
 * charge share, or everyone when a charge is split equally.
 */
function expectedParticipants(allocation: Allocation): readonly string[] {
  const charges = allocation.charges ?? [];
  if (charges.some((c) => c.policy === "equal_split_across_participants")) {
    return allocation.participants.map((p) => p.id);
  }

  const expected = new Set<string>();
  const shares = [
    ...allocation.lines.flatMap((l) => l.shares),
    ...charges.flatMap((c) => c.shares ?? []),
  ];
  for (const share of shares) {
    if (isNonZeroWeight(share.weight)) {
      expected.add(share.participantId);
    }
  }
  // Declaration order
  return allocation.participants.map((p) => p.id).filter((id) => expected.has(id));
}

function isNonZeroWeight(weight: RationalInput): boolean {
  try {
    return parseRatio(weight).numerator !== 0n;
  } catch (err) {
    if (err instanceof MoneyError) {
      return false;
    }
    throw err;
  }
}

function moneyProblem(money: Money): string | null {
  try {
    validateMoney(money);
    return null;
  } catch (err) {
    if (err instanceof MoneyError) {
      return err.message;
    }
    throw err;
  }
}

function sumContributions(
  contributions: Settlement["entries"][number]["contributions"],
  zero: Money,
  sameUnit: (money: Money) => boolean,
): Money | null {
  let total = zero;
  for (const { amount } of contributions) {
    if (moneyProblem(amount) !== null || !sameUnit(amount)) {
      return null;
    }
    total = addMoney(total, amount);
  }
  return total;
}
