import pino, { type Logger } from "pino";

/**
 * Paths never written to the log: signature headers and the investor's
 * bank account number, wherever a request or payload is logged.
 */
export const REDACTED_PATHS = [
  "headers.authorization",
  "headers.Authorization",
  "headers['X-Gateway-Authorization']",
  "*.source_bank_account_number",
  "params.source_bank_account_number",
];

/**
 * Create a Pino logger instance for a specific service/module.
 *
 *   - JSON output with ISO timestamps and a `level` label
 *   - service name included in every log line
 *   - level from LOG_LEVEL (defaults to "info")
 *
 * Usage:
 *   const logger = createLogger("bap-dispatcher");
 *   logger.error({ err }, "Something went wrong");
 */
export function createLogger(serviceName: string): Logger {
  return pino({
    name: serviceName,
    level: process.env["LOG_LEVEL"] ?? "info",
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: REDACTED_PATHS, censor: "[redacted]" },
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
  });
}
