/**
 * Logger Module
 * Structured logging using pino with file and console output
 */

import pino, { type Logger as PinoLogger } from "pino";
import * as fs from "node:fs";
import * as path from "node:path";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerOptions {
  level?: LogLevel;
  enableFileLogging?: boolean;
  logDir?: string;
  pretty?: boolean;
}

const VALID_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

function isLogLevel(value: string): value is LogLevel {
  return (VALID_LEVELS as readonly string[]).includes(value);
}

/**
 * Get log level from environment or default.
 * Only used until the loaded configuration calls configureLogging().
 */
function getEnvLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return "info";
}

let settings: Required<Omit<LoggerOptions, "logDir">> & { logDir?: string } = {
  level: getEnvLogLevel(),
  enableFileLogging: false,
  logDir: undefined,
  pretty: false,
};

/**
 * Applies process-wide logging settings. Loggers created afterwards use them.
 */
export function configureLogging(options: LoggerOptions): void {
  settings = {
    level: options.level ?? settings.level,
    enableFileLogging: options.enableFileLogging ?? settings.enableFileLogging,
    logDir: options.logDir ?? settings.logDir,
    pretty: options.pretty ?? settings.pretty,
  };
}

/**
 * Create a logger instance for a specific component
 *
 * @param component - The component name (e.g., "scanner", "dispatch", "cli")
 *
 * @example
 * ```typescript
 * const logger = createLogger("scanner");
 * logger.info({ path: "/data/jan.csv" }, "New file detected");
 * logger.error({ err }, "Failed to stat file");
 * ```
 */
export function createLogger(component: string, options: LoggerOptions = {}): PinoLogger {
  const {
    level = settings.level,
    enableFileLogging = settings.enableFileLogging,
    logDir = settings.logDir,
    pretty = settings.pretty,
  } = options;

  const baseOptions: pino.LoggerOptions = {
    name: component,
    level,
  };

  if (enableFileLogging && logDir) {
    fs.mkdirSync(logDir, { recursive: true });

    const destination = pino.destination({
      dest: path.join(logDir, `${component}.log`),
      sync: false,
    });

    return pino(baseOptions, destination);
  }

  if (pretty && level !== "silent") {
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

/**
 * Logger type export for use in type annotations
 */
export type Logger = PinoLogger;
