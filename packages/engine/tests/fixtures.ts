/**
 * Shared receipt and allocation builders for engine tests.
 */

import type {
  Allocation,
  ChargeLine,
  Money,
  Receipt,
  ReceiptLine,
} from "@fairtab/types";

export function usd(amount: string): Money {
  return { amount, currency: "USD", decimals: 2 };
}

export function item(id: string, price: string, quantity: number | string = 1, lineTotal = price): ReceiptLine {
  return { id, description: id, quantity, unitPrice: usd(price), lineTotal: usd(lineTotal) };
}

export function flatCharge(id: string, kind: ChargeLine["kind"], value: string): ChargeLine {
  return { id, kind, basis: "flat", value: usd(value) };
}

export function percentCharge(
  id: string,
  kind: ChargeLine["kind"],
  rate: number | string,
  value: string,
): ChargeLine {
  return { id, kind, basis: "percentage_of_subtotal", rate, value: usd(value) };
}

/**
 * Pasta 30.00 and salad 20.00 with a 10% service charge of 5.00.
 */
export function dinnerReceipt(grandTotal = "55.00"): Receipt {
  return {
    lines: [item("pasta", "30.00"), item("salad", "20.00")],
    charges: [percentCharge("service", "service_charge", 10, "5.00")],
    grandTotal: usd(grandTotal),
  };
}

/** Alice had the pasta, Bob the salad. */
export function dinnerAllocation(): Allocation {
  return {
    participants: [
      { id: "alice", displayName: "Alice" },
      { id: "bob", displayName: "Bob" },
    ],
    lines: [
      { lineId: "pasta", shares: [{ participantId: "alice", weight: 1 }] },
      { lineId: "salad", shares: [{ participantId: "bob", weight: 1 }] },
    ],
  };
}

export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("Expected the call to throw");
}
