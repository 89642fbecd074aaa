// CHANGE: Level logger for progress lines, HTTP detail and terminal diagnostics.
// WHY: Progress goes to stdout at INFO; failures go to stderr; machine-readable lines stay unprefixed.
// SOURCE: internal reasoning

import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error";

const levelWeight: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(levelWeight, value);
}

const envLevel = process.env.APK_SYNC_LOG_LEVEL?.toLowerCase();
let activeLevel: LogLevel = isLogLevel(envLevel) ? envLevel : "info";

const formatters: Record<LogLevel, (message: string) => string> = {
  debug: message => chalk.gray(`[DEBUG] ${message}`),
  info: message => chalk.blue(`[+] ${message}`),
  warn: message => chalk.yellow(`[!] ${message}`),
  error: message => chalk.red(`[ERROR] ${message}`)
};

function shouldLog(level: LogLevel): boolean {
  return levelWeight[level] >= levelWeight[activeLevel];
}

/**
 * Set log level for runtime diagnostics.
 *
 * @throws Error if level is not recognised.
 */
export function setLogLevel(level: string): void {
  if (!isLogLevel(level)) {
    throw new Error(`Unsupported log level: ${level}`);
  }
  activeLevel = level;
}

/**
 * Emit information-level log entry (stage transitions, chosen URLs).
 */
export function info(message: string): void {
  if (shouldLog("info")) {
    console.log(formatters.info(message));
  }
}

/**
 * Emit debug-level log entry.
 *
 * @param message - Detailed diagnostic message.
 */
export function debug(message: string): void {
  if (shouldLog("debug")) {
    console.log(formatters.debug(message));
  }
}

/**
 * Emit warning-level log entry on stderr (partial files left behind).
 */
export function warn(message: string): void {
  if (shouldLog("warn")) {
    console.error(formatters.warn(message));
  }
}

/**
 * Emit error-level log entry.
 *
 * @param message - Description of encountered error.
 */
export function error(message: string): void {
  if (shouldLog("error")) {
    console.error(formatters.error(message));
  }
}

/**
 * Write a raw `KEY=value` line for orchestration tooling. Never coloured or filtered.
 */
export function emitOutput(key: string, value: string): void {
  console.log(`${key}=${value}`);
}
