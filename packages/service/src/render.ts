/**
 * Plain-text rendering.
 *
 * A chat-friendly summary of who owes what, and one line per reasoning
 * step. Local formatting only; amounts are printed exactly as the
 * engine produced them.
 */

import type { ReasoningTrace } from "@fairtab/types";
import type { SettlementOutcome } from "@fairtab/engine";

export function renderSummary(outcome: SettlementOutcome): string {
  const { settlement, validation } = outcome;
  const { currency } = settlement.total;
  const lines = ["Bill split:"];

  for (const entry of settlement.entries) {
    lines.push(`- ${entry.displayName}: ${entry.owed.amount} ${currency}`);
  }
  lines.push(`Total: ${settlement.total.amount} ${currency}`);

  const adjustment = settlement.residualAdjustment;
  if (adjustment !== null) {
    const name =
      settlement.entries.find((e) => e.participantId === adjustment.participantId)?.displayName ??
      adjustment.participantId;
    const sign = adjustment.amount.amount.startsWith("-") ? "" : "+";
    lines.push(`Rounding: ${name} ${sign}${adjustment.amount.amount} ${currency}`);
  }

  if (!validation.valid) {
    for (const reason of validation.reasons) {
      lines.push(`! ${reason.message}`);
    }
  }

  return lines.join("\n");
}

export function renderTrace(trace: ReasoningTrace): string {
  return trace
    .map((step) => {
      const results = step.results.map((r) => `${r.participantId} ${r.amount.amount}`).join(", ");
      return `${String(step.index + 1)}. ${step.description} -> ${results}`;
    })
    .join("\n");
}
