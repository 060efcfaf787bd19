import pino, { type Logger } from "pino";
import type { AppConfig } from "../config/env";

export type { Logger };

export const createLogger = (
  config: Pick<AppConfig, "logLevel">,
  name = "equity-ledger",
): Logger =>
  pino({
    name,
    level: config.logLevel,
  });

/**
 * Flattens thrown values into fields pino serializes the same way for every entry point.
 */
export const toErrorDetails = (error: unknown) => {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return { message: String(error) };
};
