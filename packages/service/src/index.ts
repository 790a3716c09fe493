/**
 * @fairtab/service
 *
 * Input parsing, configuration, logging and the command-line front end
 * around the settlement engine.
 */

// Service
export { SettlementService } from "./settlement-service.js";
export type { SettlementReport, SettlementServiceConfig } from "./settlement-service.js";

// Config
export { ConfigSchema, loadConfig, settleOptionsFromConfig } from "./config.js";
export type { AppConfig } from "./config.js";

// Logging
export { createLogger } from "./logger.js";
export type { Logger } from "./logger.js";

// Input
export {
  MoneySchema,
  RationalSchema,
  ReceiptLineSchema,
  ChargeLineSchema,
  ReceiptSchema,
  ParticipantSchema,
  ShareSchema,
  AllocationSchema,
  ScannedReceiptSchema,
} from "./schemas.js";
export type { ReceiptDto, AllocationDto, ScannedReceipt } from "./schemas.js";
export { receiptFromScan } from "./intake.js";
export type { ReceiptCurrency } from "./intake.js";

// Errors
export {
  IntakeError,
  createErrorEnvelope,
  toErrorEnvelope,
  formatZodErrors,
} from "./errors.js";
export type {
  ApiErrorCode,
  IntakeErrorCode,
  ErrorDetail,
  ErrorEnvelope,
} from "./errors.js";

// Output
export { renderSummary, renderTrace } from "./render.js";

// CLI
export { parseCliArgs, runCli, USAGE } from "./cli.js";
export type { CliArgs, CliIo, ParsedCliArgs } from "./cli.js";
