import pino, { type Logger } from "pino";

export type { Logger };

// stdout carries command results, so log lines go to stderr.
export function createLogger(level = "info"): Logger {
  return pino({ name: "lookalike", level }, pino.destination(2));
}

// The configured LOG_LEVEL is applied by the CLI once settings are loaded.
export const logger = createLogger();
