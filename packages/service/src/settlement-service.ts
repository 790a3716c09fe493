/**
 * SettlementService — the layer between raw JSON and the engine.
 *
 * Parses input with the intake schemas, settles with the configured
 * options, packages a proof of the run, and logs the outcome. Engine
 * errors are logged and rethrown unchanged.
 */

import type { Allocation, Receipt } from "@fairtab/types";
import { settle } from "@fairtab/engine";
import type { SettleOptions, SettlementOutcome } from "@fairtab/engine";
import { packageSettlementProof } from "@fairtab/proof";
import type { SettlementProofPackage } from "@fairtab/proof";
import type { AppConfig } from "./config.js";
import { settleOptionsFromConfig } from "./config.js";
import { toErrorEnvelope } from "./errors.js";
import { receiptFromScan } from "./intake.js";
import type { Logger } from "./logger.js";
import { AllocationSchema, ReceiptSchema, ScannedReceiptSchema } from "./schemas.js";

export interface SettlementServiceConfig {
  readonly config: AppConfig;
  readonly logger: Logger;
  /** Clock for proof timestamps */
  readonly now?: () => Date;
}

export interface SettlementReport {
  readonly receipt: Receipt;
  readonly allocation: Allocation;
  readonly outcome: SettlementOutcome;
  readonly proof: SettlementProofPackage;
}

export class SettlementService {
  private readonly config: AppConfig;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly options: SettleOptions;

  constructor({ config, logger, now }: SettlementServiceConfig) {
    this.config = config;
    this.logger = logger;
    this.now = now ?? (() => new Date());
    this.options = settleOptionsFromConfig(config);
  }

  /**
   * Settle a structured receipt.
   *
   * @throws ZodError when either input has the wrong shape
   */
  settleReceipt(receiptInput: unknown, allocationInput: unknown): SettlementReport {
    const receipt = ReceiptSchema.parse(receiptInput);
    const allocation = AllocationSchema.parse(allocationInput);
    return this.run(receipt, allocation);
  }

  /**
   * Settle the scanning service's raw output, in the configured
   * default currency.
   */
  settleScan(scanInput: unknown, allocationInput: unknown): SettlementReport {
    const scan = ScannedReceiptSchema.parse(scanInput);
    const allocation = AllocationSchema.parse(allocationInput);
    const receipt = receiptFromScan(scan, {
      code: this.config.DEFAULT_CURRENCY,
      decimals: this.config.DEFAULT_DECIMALS,
    });
    this.logger.debug({ items: scan.items.length, currencySymbol: scan.currency }, "Scanned receipt converted");
    return this.run(receipt, allocation);
  }

  private run(receipt: Receipt, allocation: Allocation): SettlementReport {
    let outcome: SettlementOutcome;
    try {
      outcome = settle(receipt, allocation, this.options);
    } catch (err) {
      const { error } = toErrorEnvelope(err);
      this.logger.warn({ code: error.code, details: error.details }, `Settlement rejected: ${error.message}`);
      throw err;
    }

    for (const warning of outcome.warnings) {
      this.logger.warn(
        { code: warning.code, subjectId: warning.subjectId, difference: warning.difference.amount },
        warning.message,
      );
    }

    const proof = packageSettlementProof(receipt, allocation, outcome, this.now().toISOString());

    this.logger.info(
      {
        participants: outcome.settlement.entries.length,
        lines: receipt.lines.length,
        charges: receipt.charges.length,
        total: outcome.settlement.total.amount,
        currency: outcome.settlement.total.currency,
        valid: outcome.validation.valid,
        warnings: outcome.warnings.length,
        packageHash: proof.packageHash,
      },
      "Settlement completed",
    );

    return { receipt, allocation, outcome, proof };
  }
}
