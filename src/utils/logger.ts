/**
 * Logger Module
 * Structured logging using pino
 */

import pino, { type Logger as PinoLogger } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerOptions {
  level?: LogLevel;
}

const VALID_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

/**
 * Pretty output only makes sense for a human watching a terminal.
 */
function wantsPrettyOutput(): boolean {
  const env = process.env.NODE_ENV;
  return env !== "production" && env !== "test" && process.stdout.isTTY === true;
}

function isLogLevel(value: string): value is LogLevel {
  return (VALID_LEVELS as readonly string[]).includes(value);
}

/**
 * Get log level from environment or default
 */
export function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return process.env.NODE_ENV === "production" ? "info" : "debug";
}

/**
 * Create a logger instance for a specific component
 *
 * @param component - The component name (e.g., "frontier", "coordinator", "cli")
 *
 * @example
 * ```typescript
 * const logger = createLogger("coordinator");
 * logger.info({ key: "channel:chan_1" }, "Entity committed");
 * logger.error({ err }, "Graph write failed");
 * ```
 */
export function createLogger(component: string, options: LoggerOptions = {}): PinoLogger {
  const { level = getLogLevel() } = options;

  const baseOptions: pino.LoggerOptions = {
    name: component,
    level,
  };

  if (wantsPrettyOutput()) {
    return pino({
      ...baseOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:HH:MM:ss",
          ignore: "pid,hostname",
        },
      },
    });
  }

  return pino(baseOptions);
}
