/**
 * Reasoning Trace Builder
 *
 * Append-only recorder for apportionment and reconciliation decisions.
 * Steps are numbered in the order they are recorded and frozen on
 * entry, nested results and weights included; `build()` hands out a
 * frozen copy.
 *
 * Recording order within one run: item lines (receipt order), then
 * charges (receipt order), then the residual adjustment, if any.
 */

import type {
  ChargeApportionedStep,
  LineApportionedStep,
  ReasoningStep,
  ReasoningTrace,
  ResidualAdjustedStep,
} from "@fairtab/types";

type Unindexed<S extends ReasoningStep> = Omit<S, "index">;

export class TraceBuilder {
  private readonly steps: ReasoningStep[] = [];

  recordLine(step: Unindexed<LineApportionedStep>): LineApportionedStep {
    const recorded: LineApportionedStep = deepFreeze({ index: this.steps.length, ...step });
    this.steps.push(recorded);
    return recorded;
  }

  recordCharge(step: Unindexed<ChargeApportionedStep>): ChargeApportionedStep {
    const recorded: ChargeApportionedStep = deepFreeze({ index: this.steps.length, ...step });
    this.steps.push(recorded);
    return recorded;
  }

  recordResidual(step: Unindexed<ResidualAdjustedStep>): ResidualAdjustedStep {
    const recorded: ResidualAdjustedStep = deepFreeze({ index: this.steps.length, ...step });
    this.steps.push(recorded);
    return recorded;
  }

  build(): ReasoningTrace {
    return Object.freeze([...this.steps]);
  }
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}
