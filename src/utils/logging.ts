/**
 * Logging utilities with color support.
 *
 * Every level writes to stderr so stdout stays clean for output that
 * shells evaluate.
 */

import chalk from "chalk";

/**
 * Log levels.
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Logger configuration.
 */
export interface LoggerConfig {
  level: LogLevel;
  timestamps: boolean;
  colors: boolean;
}

/**
 * Default logger configuration.
 */
const defaultConfig: LoggerConfig = {
  level: "info",
  timestamps: false,
  colors: true,
};

/**
 * Current logger configuration.
 */
let config: LoggerConfig = { ...defaultConfig };

/**
 * Log level priorities.
 */
const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Configure the logger.
 *
 * @param newConfig - Partial configuration to apply
 */
export function configureLogger(newConfig: Partial<LoggerConfig>): void {
  config = { ...config, ...newConfig };
}

/**
 * Restore the default configuration.
 */
export function resetLogger(): void {
  config = { ...defaultConfig };
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[config.level];
}

/**
 * Format a log message.
 *
 * @param level - Log level
 * @param message - Message to format
 * @returns Formatted message
 */
function formatMessage(level: LogLevel, message: string): string {
  let prefix = "";

  if (config.timestamps) {
    prefix += `[${new Date().toISOString()}] `;
  }

  if (config.colors) {
    switch (level) {
      case "debug":
        prefix += chalk.gray("[DEBUG]");
        break;
      case "info":
        prefix += chalk.blue("[INFO]");
        break;
      case "warn":
        prefix += chalk.yellow("[WARN]");
        break;
      case "error":
        prefix += chalk.red("[ERROR]");
        break;
    }
  } else {
    prefix += `[${level.toUpperCase()}]`;
  }

  return `${prefix} ${message}`;
}

/**
 * Log a debug message.
 */
export function debug(message: string, ...args: unknown[]): void {
  if (shouldLog("debug")) {
    console.error(formatMessage("debug", message), ...args);
  }
}

/**
 * Log an info message.
 */
export function info(message: string, ...args: unknown[]): void {
  if (shouldLog("info")) {
    console.error(formatMessage("info", message), ...args);
  }
}

/**
 * Log a warning message.
 */
export function warn(message: string, ...args: unknown[]): void {
  if (shouldLog("warn")) {
    console.error(formatMessage("warn", message), ...args);
  }
}

/**
 * Log an error message.
 */
export function error(message: string, ...args: unknown[]): void {
  if (shouldLog("error")) {
    console.error(formatMessage("error", message), ...args);
  }
}

/**
 * Log a success message.
 *
 * @param message - Message to log
 */
export function success(message: string): void {
  if (shouldLog("info")) {
    const formatted = config.colors
      ? chalk.green(`✅ ${message}`)
      : `[SUCCESS] ${message}`;
    console.error(formatted);
  }
}

/**
 * Log a failure message.
 *
 * @param message - Message to log
 */
export function failure(message: string): void {
  if (shouldLog("info")) {
    const formatted = config.colors
      ? chalk.red(`❌ ${message}`)
      : `[FAILURE] ${message}`;
    console.error(formatted);
  }
}

/**
 * Create a table for CLI output.
 *
 * @param headers - Column headers
 * @param rows - Table rows
 * @returns Formatted table string
 */
export function table(headers: string[], rows: string[][]): string {
  // Calculate column widths
  const widths = headers.map((h, i) => {
    const rowMax = Math.max(0, ...rows.map((r) => (r[i] ?? "").length));
    return Math.max(h.length, rowMax);
  });

  const headerRow = headers.map((h, i) => h.padEnd(widths[i] ?? 0)).join(" | ");
  const separator = widths.map((w) => "-".repeat(w)).join("-+-");

  const dataRows = rows.map((row) =>
    row.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join(" | "),
  );

  return [headerRow, separator, ...dataRows].join("\n");
}

/**
 * Default logger instance.
 */
export const logger = {
  debug,
  info,
  warn,
  error,
  success,
  failure,
  configure: configureLogger,
  reset: resetLogger,
};
