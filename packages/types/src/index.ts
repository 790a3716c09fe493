/**
 * @fairtab/types — Shared domain types for the fairtab stack.
 *
 * These types are used across all fairtab packages:
 * - Money primitives
 * - Receipt lines and charges
 * - Allocation instructions and charge policies
 * - Settlement entries and the reasoning trace
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types — meaning lives in the engine
 */

// Money types
export type { Money, Currency, RationalInput } from "./money.js";

// Receipt types
export type {
  Receipt,
  ReceiptLine,
  ChargeLine,
  ChargeKind,
  ChargeBasis,
} from "./receipt.js";

// Allocation types
export type {
  Allocation,
  Participant,
  Share,
  LineAllocation,
  ChargeAllocation,
  ChargeAllocationPolicy,
} from "./allocation.js";

// Settlement types
export type {
  Settlement,
  SettlementEntry,
  Contribution,
  ContributionKind,
  ContributionSource,
  ResidualAdjustment,
} from "./settlement.js";

// Trace types
export type {
  ReasoningStep,
  ReasoningAction,
  ReasoningTrace,
  LineApportionedStep,
  ChargeApportionedStep,
  ResidualAdjustedStep,
  StepSubject,
  StepSubjectKind,
  StepResult,
  WeightInput,
} from "./trace.js";

// Runtime type guards
export {
  isMoney,
  isRationalInput,
  isChargeKind,
  isChargeBasis,
  isReceiptLine,
  isChargeLine,
  isReceipt,
  isChargeAllocationPolicy,
  isParticipant,
  isShare,
  isAllocation,
} from "./guards.js";
