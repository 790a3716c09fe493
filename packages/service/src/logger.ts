/**
 * Structured logging.
 *
 * pino writes JSON lines; in development the pino-pretty transport
 * formats them for the terminal. The engine never logs; only this
 * layer does.
 */

import pino from "pino";
import type { DestinationStream, Logger } from "pino";
import type { AppConfig } from "./config.js";

export type { Logger } from "pino";

/**
 * Create the service logger.
 *
 * @param destination - Explicit output stream; disables the pretty transport
 */
export function createLogger(
  config: Pick<AppConfig, "LOG_LEVEL" | "NODE_ENV">,
  destination?: DestinationStream,
): Logger {
  if (destination !== undefined) {
    return pino({ level: config.LOG_LEVEL }, destination);
  }
  // Logs go to stderr so stdout carries only the settlement output
  if (config.NODE_ENV === "development") {
    return pino({
      level: config.LOG_LEVEL,
      transport: { target: "pino-pretty", options: { destination: 2 } },
    });
  }
  return pino({ level: config.LOG_LEVEL }, pino.destination(2));
}
