/**
 * Structured JSON logger.
 *
 * Uses Pino for JSON log lines written to stderr, leaving stdout to the
 * scan output.
 */

import pino from "pino";

type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

const DEFAULT_LEVEL: LogLevel = "warn";

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Create and configure a Pino logger instance.
 *
 * Reads LOG_LEVEL from environment variable (supports both lowercase and uppercase).
 * Defaults to 'warn' so a normal run keeps stderr quiet. Unknown levels fall
 * back to the default.
 *
 * @param name - Logger name
 * @param level - Optional log level override
 * @returns Configured Pino logger
 */
export function setupLogger(name: string = "find-serverless-stacks", level?: string): pino.Logger {
  const requested = (level || process.env.LOG_LEVEL || DEFAULT_LEVEL).toLowerCase();
  const logLevel: LogLevel = isLogLevel(requested) ? requested : DEFAULT_LEVEL;

  return pino(
    {
      name,
      level: logLevel,
      formatters: {
        level: (label) => ({ level: label.toUpperCase() }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    process.stderr
  );
}
