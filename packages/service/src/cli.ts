/**
 * Command-line front end.
 *
 * fairtab <receipt.json> <allocation.json> [--scan] [--json] [--trace]
 *
 * Rules:
 * - stdout carries only the result (summary text or JSON)
 * - Errors print as an error envelope on stderr
 * - Exit 0 for a valid settlement, 1 for a rejected or invalid one,
 *   2 for bad arguments
 */

import chalk, { Chalk } from "chalk";
import type { ChalkInstance } from "chalk";
import type { DestinationStream } from "pino";
import { loadConfig } from "./config.js";
import { IntakeError, toErrorEnvelope } from "./errors.js";
import { createLogger } from "./logger.js";
import { renderSummary, renderTrace } from "./render.js";
import { SettlementService } from "./settlement-service.js";
import type { SettlementReport } from "./settlement-service.js";

// =============================================================================
// Arguments
// =============================================================================

export interface CliArgs {
  readonly receiptPath: string;
  readonly allocationPath: string;
  /** Receipt file is raw scanner output */
  readonly scan: boolean;
  readonly json: boolean;
  readonly trace: boolean;
}

export type ParsedCliArgs =
  | { readonly kind: "run"; readonly args: CliArgs }
  | { readonly kind: "help" }
  | { readonly kind: "invalid"; readonly message: string };

export const USAGE = [
  "Usage: fairtab <receipt.json> <allocation.json> [options]",
  "",
  "Options:",
  "  --scan    Treat the receipt file as scanner output",
  "  --json    Print the full outcome and proof as JSON",
  "  --trace   Print the reasoning trace after the summary",
  "  --help    Show this message",
].join("\n");

export function parseCliArgs(argv: readonly string[]): ParsedCliArgs {
  const positional: string[] = [];
  let scan = false;
  let json = false;
  let trace = false;

  for (const arg of argv) {
    switch (arg) {
      case "--help":
      case "-h":
        return { kind: "help" };
      case "--scan":
        scan = true;
        break;
      case "--json":
        json = true;
        break;
      case "--trace":
        trace = true;
        break;
      default:
        if (arg.startsWith("-")) {
          return { kind: "invalid", message: `Unknown option: ${arg}` };
        }
        positional.push(arg);
    }
  }

  const [receiptPath, allocationPath, ...extra] = positional;
  if (receiptPath === undefined || allocationPath === undefined) {
    return { kind: "invalid", message: "Expected a receipt file and an allocation file" };
  }
  if (extra.length > 0) {
    return { kind: "invalid", message: `Unexpected argument: ${extra.join(" ")}` };
  }

  return { kind: "run", args: { receiptPath, allocationPath, scan, json, trace } };
}

// =============================================================================
// Runner
// =============================================================================

export interface CliIo {
  readonly readFile: (path: string) => Promise<string>;
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
  readonly env?: Record<string, string | undefined>;
  /** Log sink; defaults to the configured logger on stderr */
  readonly logDestination?: DestinationStream;
  /** Colored output; defaults to what the terminal supports */
  readonly color?: boolean;
}

/**
 * Run the CLI once and resolve with the process exit code.
 */
export async function runCli(argv: readonly string[], io: CliIo): Promise<number> {
  const c: ChalkInstance =
    io.color === undefined ? chalk : new Chalk({ level: io.color ? 1 : 0 });

  const parsed = parseCliArgs(argv);
  if (parsed.kind === "help") {
    io.stdout(USAGE);
    return 0;
  }
  if (parsed.kind === "invalid") {
    io.stderr(c.red(parsed.message));
    io.stderr(USAGE);
    return 2;
  }
  const { args } = parsed;

  try {
    const config = loadConfig(io.env);
    const logger = createLogger(config, io.logDestination);
    const service = new SettlementService({ config, logger });

    const receiptInput = await readJson(io, args.receiptPath);
    const allocationInput = await readJson(io, args.allocationPath);
    const report = args.scan
      ? service.settleScan(receiptInput, allocationInput)
      : service.settleReceipt(receiptInput, allocationInput);

    if (args.json) {
      io.stdout(JSON.stringify(toJsonOutput(report, args.trace), null, 2));
    } else {
      printText(io, c, report, args.trace);
    }

    return report.outcome.validation.valid ? 0 : 1;
  } catch (err) {
    const envelope = toErrorEnvelope(err);
    if (args.json) {
      io.stderr(JSON.stringify(envelope, null, 2));
    } else {
      io.stderr(c.red(`${envelope.error.code}: ${envelope.error.message}`));
    }
    return 1;
  }
}

// ─── Helpers ─────────────────────────────────────────────────────────

async function readJson(io: CliIo, path: string): Promise<unknown> {
  let text: string;
  try {
    text = await io.readFile(path);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new IntakeError("UNREADABLE_FILE", `Cannot read ${path}: ${reason}`);
  }
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new IntakeError("INVALID_JSON", `${path} is not valid JSON: ${reason}`);
  }
}

function toJsonOutput(report: SettlementReport, includeTrace: boolean): Record<string, unknown> {
  const { outcome, proof } = report;
  return {
    settlement: outcome.settlement,
    validation: outcome.validation,
    warnings: outcome.warnings,
    ...(includeTrace ? { trace: outcome.trace } : {}),
    proof,
  };
}

function printText(io: CliIo, c: ChalkInstance, report: SettlementReport, includeTrace: boolean): void {
  const { outcome, proof } = report;

  io.stdout(renderSummary(outcome));
  if (includeTrace) {
    io.stdout("");
    io.stdout(renderTrace(outcome.trace));
  }

  for (const warning of outcome.warnings) {
    io.stderr(c.yellow(`note: ${warning.message}`));
  }
  io.stderr(c.gray(`proof: ${proof.packageHash}`));
}
