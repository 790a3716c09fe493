/**
 * @fairtab/service — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { SettleOptions } from "@fairtab/engine";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Currency for receipts that arrive without one (scanned receipts)
  DEFAULT_CURRENCY: z.string().min(1).default("USD"),
  DEFAULT_DECIMALS: z.coerce.number().int().min(0).max(18).default(2),

  // Engine tolerances, in minor units
  SETTLE_TOLERANCE: z.coerce.number().int().min(0).default(1),
  RESIDUAL_TOLERANCE_PER_PARTICIPANT: z.coerce.number().int().min(0).default(1),
  ROUNDING_MODE: z.enum(["half-up", "half-even", "floor"]).default("half-up"),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

/**
 * Engine options carried by the configuration.
 */
export function settleOptionsFromConfig(config: AppConfig): SettleOptions {
  return {
    tolerance: config.SETTLE_TOLERANCE,
    residualTolerancePerParticipant: config.RESIDUAL_TOLERANCE_PER_PARTICIPANT,
    rounding: config.ROUNDING_MODE,
  };
}
