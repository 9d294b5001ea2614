/**
 * Logger Module
 * Structured logging using pino. Logs go to stderr: stdout carries CLI output.
 */

import pino, { type Logger as PinoLogger } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

export interface LoggerOptions {
  level?: LogLevel;
  /** Pretty-print with pino-pretty instead of emitting JSON lines */
  pretty?: boolean;
}

const STDERR = 2;

const loggers = new Set<PinoLogger>();

/**
 * Determine if we're in development mode
 */
function isDevelopment(): boolean {
  return process.env.NODE_ENV !== "production";
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Get log level from environment or default
 */
export function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return isDevelopment() ? "debug" : "info";
}

/**
 * Create a logger instance for a specific component
 *
 * @param component - The component name (e.g., "annotations", "type-fetcher", "cli")
 * @param options - Optional configuration
 * @returns A configured pino logger instance
 *
 * @example
 * ```typescript
 * const logger = createLogger("annotations");
 * logger.debug({ count: 2 }, "Extracted examples");
 * logger.error({ err }, "Failed to load assemblies");
 * ```
 */
export function createLogger(component: string, options: LoggerOptions = {}): PinoLogger {
  const { level = getLogLevel(), pretty = isDevelopment() } = options;

  const baseOptions: pino.LoggerOptions = {
    name: component,
    level,
  };

  const logger =
    pretty && level !== "silent"
      ? pino({
          ...baseOptions,
          transport: {
            target: "pino-pretty",
            options: {
              colorize: true,
              translateTime: "SYS:HH:MM:ss",
              ignore: "pid,hostname",
              destination: STDERR,
            },
          },
        })
      : pino(baseOptions, pino.destination(STDERR));

  loggers.add(logger);
  return logger;
}

/**
 * Change the level of every logger created so far
 */
export function setLogLevel(level: LogLevel): void {
  for (const logger of loggers) {
    logger.level = level;
  }
}

/**
 * Logger type export for use in type annotations
 */
export type Logger = PinoLogger;
