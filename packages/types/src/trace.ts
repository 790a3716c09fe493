/**
 * Reasoning Trace Types
 *
 * Every apportionment and reconciliation decision is recorded as one
 * ReasoningStep. The trace is append-only and fully determined by the
 * receipt and allocation, so it can be hashed, replayed and rendered.
 */

import type { Money } from "./money.js";
import type { ChargeAllocationPolicy } from "./allocation.js";
import type { ChargeBasis, ChargeKind } from "./receipt.js";

export type StepSubjectKind = "line" | "charge" | "receipt";

export interface StepSubject {
  readonly kind: StepSubjectKind;
  readonly id: string;
}

/** A weight as an exact reduced fraction string ("1", "1/2", "61/2"). */
export interface WeightInput {
  readonly participantId: string;
  readonly weight: string;
}

export interface StepResult {
  readonly participantId: string;
  readonly amount: Money;
}

interface StepBase {
  /** 0-based position in the trace */
  readonly index: number;
  readonly subject: StepSubject;
  readonly description: string;
  readonly results: readonly StepResult[];
}

export interface LineApportionedStep extends StepBase {
  readonly action: "line-apportioned";
  readonly inputs: {
    readonly lineTotal: Money;
    readonly weights: readonly WeightInput[];
  };
}

export interface ChargeApportionedStep extends StepBase {
  readonly action: "charge-apportioned";
  readonly inputs: {
    readonly kind: ChargeKind;
    readonly basis: ChargeBasis;
    readonly value: Money;
    readonly policy: ChargeAllocationPolicy;
    readonly weights: readonly WeightInput[];
  };
}

export interface ResidualAdjustedStep extends StepBase {
  readonly action: "residual-adjusted";
  readonly inputs: {
    readonly grandTotal: Money;
    readonly apportionedTotal: Money;
    readonly residual: Money;
  };
}

export type ReasoningStep =
  | LineApportionedStep
  | ChargeApportionedStep
  | ResidualAdjustedStep;

export type ReasoningAction = ReasoningStep["action"];

export type ReasoningTrace = readonly ReasoningStep[];
