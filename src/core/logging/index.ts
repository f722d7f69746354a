import pino, { type Logger } from "pino";

/**
 * Named module logger. Level comes from LOG_LEVEL (default "info");
 * the test config sets LOG_LEVEL=silent.
 */
export function createLogger(name: string): Logger {
  return pino({ name, level: process.env["LOG_LEVEL"] ?? "info" });
}
