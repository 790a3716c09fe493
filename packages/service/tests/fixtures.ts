/**
 * Shared input and log capture for service tests.
 */

import type { DestinationStream } from "pino";
import type { AppConfig } from "../src/config.js";
import { loadConfig } from "../src/config.js";

export function usd(amount: string): { amount: string; currency: string; decimals: number } {
  return { amount, currency: "USD", decimals: 2 };
}

/** Pasta 30.00 and salad 20.00 with a 10% service charge, as JSON input. */
export function dinnerReceiptJson(grandTotal = "55.00"): Record<string, unknown> {
  return {
    lines: [
      { id: "pasta", description: "Pasta", quantity: 1, unitPrice: usd("30.00"), lineTotal: usd("30.00") },
      { id: "salad", description: "Salad", quantity: 1, unitPrice: usd("20.00"), lineTotal: usd("20.00") },
    ],
    charges: [
      { id: "service", kind: "service_charge", basis: "percentage_of_subtotal", rate: "10", value: usd("5.00") },
    ],
    grandTotal: usd(grandTotal),
  };
}

/** Shares without weights; the schema fills in 1. */
export function dinnerAllocationJson(): Record<string, unknown> {
  return {
    participants: [
      { id: "alice", displayName: "Alice" },
      { id: "bob", displayName: "Bob" },
    ],
    lines: [
      { lineId: "pasta", shares: [{ participantId: "alice" }] },
      { lineId: "salad", shares: [{ participantId: "bob" }] },
    ],
  };
}

/**
 * Ramen 2 × 12.50 and gyoza 6.00, tax 2.48, as the scanner reports it.
 */
export function scannedLunchJson(): Record<string, unknown> {
  return {
    items: [
      { name: "Ramen", price: 12.5, quantity: 2 },
      { name: "Gyoza", price: 6 },
    ],
    subtotal: 31,
    tax: 2.48,
    total: 33.48,
    currency: "$",
  };
}

export function lunchAllocationJson(): Record<string, unknown> {
  return {
    participants: [
      { id: "alice", displayName: "Alice" },
      { id: "bob", displayName: "Bob" },
    ],
    lines: [
      { lineId: "item-1", shares: [{ participantId: "alice" }] },
      { lineId: "item-2", shares: [{ participantId: "bob" }] },
    ],
  };
}

export function testConfig(env: Record<string, string> = {}): AppConfig {
  return loadConfig({ NODE_ENV: "test", LOG_LEVEL: "debug", ...env });
}

/**
 * pino destination that keeps every line in memory.
 */
export class MemoryLog implements DestinationStream {
  readonly lines: string[] = [];

  write(msg: string): void {
    this.lines.push(msg);
  }

  entries(): unknown[] {
    return this.lines.map((line): unknown => JSON.parse(line));
  }
}
