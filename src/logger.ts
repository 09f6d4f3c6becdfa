import pino from "pino";

// Diagnostics go to stderr; stdout carries the tool's own output.
export const logger = pino(
  {
    name: "daily-by-hostname",
    level: process.env.LOG_LEVEL ?? "warn",
  },
  pino.destination(2),
);

/** Raise the log level for --verbose, unless LOG_LEVEL already asks for more. */
export function enableVerboseLogging(): void {
  if (logger.levelVal > logger.levels.values.debug) logger.level = "debug";
}
