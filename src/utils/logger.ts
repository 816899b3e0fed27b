import { existsSync, mkdirSync } from "fs";
import { appendFile } from "fs/promises";
import { dirname } from "path";
import chalk from "chalk";
import type { MultiBar } from "cli-progress";

// Define log levels
export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

// Interface for logger configuration
export interface LoggerConfig {
  logToConsole: boolean;
  logToFile: boolean;
  logFilePath?: string;
  consoleLogLevel: LogLevel; // Separate level for console
  fileLogLevel: LogLevel; // Separate level for file
  multibar?: MultiBar | null;
}

// Default configuration
const defaultConfig: LoggerConfig = {
  logToConsole: true,
  logToFile: false,
  consoleLogLevel: "info",
  fileLogLevel: "debug",
  multibar: null,
};

// Current configuration
let currentConfig: LoggerConfig = { ...defaultConfig };

// File appends are chained so lines land in call order
let pendingWrite: Promise<void> = Promise.resolve();

/**
 * Configure the logger
 * @param config Configuration options
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  currentConfig = { ...currentConfig, ...config };

  // Create log directory if logging to file
  if (currentConfig.logToFile && currentConfig.logFilePath) {
    const logDir = dirname(currentConfig.logFilePath);
    if (logDir && !existsSync(logDir)) {
      try {
        mkdirSync(logDir, { recursive: true });
      } catch (error) {
        console.error(`Failed to create log directory: ${describeError(error)}`);
        currentConfig.logToFile = false;
      }
    }
  }
}

/** Restores the default configuration. */
export function resetLogger(): void {
  currentConfig = { ...defaultConfig };
}

/**
 * Sets or clears the active MultiBar instance for the logger
 * @param multibar The cli-progress MultiBar instance or null
 */
export function setActiveMultibar(multibar: MultiBar | null): void {
  currentConfig.multibar = multibar;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/** Message text for anything thrown. */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Numeric value for log level (for filtering)
 */
const logLevelValue: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/** Checks if a level should be logged to a specific target (console or file). */
function shouldLog(level: LogLevel, target: "console" | "file"): boolean {
  const threshold =
    target === "console"
      ? currentConfig.consoleLogLevel
      : currentConfig.fileLogLevel;
  return logLevelValue[level] >= logLevelValue[threshold];
}

/**
 * Format a log message with timestamp and level
 */
function formatLogMessage(level: LogLevel, message: string): string {
  const timestamp = new Date().toISOString();
  return `[${timestamp}] [${level.toUpperCase()}] ${message}`;
}

function logToConsole(level: LogLevel, coloredMessage: string): void {
  if (!currentConfig.logToConsole || !shouldLog(level, "console")) return;

  let messageForConsole = coloredMessage;
  if (currentConfig.multibar && currentConfig.logToFile && level === "error") {
    messageForConsole += chalk.gray(" (See log file for full details)");
  }

  if (currentConfig.multibar) {
    currentConfig.multibar.log(`${messageForConsole}\n`);
    return;
  }

  switch (level) {
    case "debug":
      console.debug(messageForConsole);
      break;
    case "info":
      console.info(messageForConsole);
      break;
    case "warn":
      console.warn(messageForConsole);
      break;
    case "error":
      console.error(messageForConsole);
      break;
  }
}

/** Queue a file write if configured AND level meets file threshold. */
function logToFile(
  level: LogLevel,
  formattedMessage: string,
  context?: string
): void {
  const logFilePath = currentConfig.logFilePath;
  if (!currentConfig.logToFile || !logFilePath || !shouldLog(level, "file"))
    return;

  let messageToWrite = formattedMessage;
  // Full context (like stack traces) only goes to the file
  if (context) {
    messageToWrite += `\n  Context: ${context}`;
  }

  pendingWrite = pendingWrite.then(async () => {
    try {
      await appendFile(logFilePath, messageToWrite + "\n");
    } catch (error) {
      console.error(
        `[Logger Error] Failed to write to log file: ${describeError(error)}`
      );
    }
  });
}

/**
 * Resolves once every queued file write has finished. Call before exiting.
 */
export function flushLogs(): Promise<void> {
  return pendingWrite;
}

function emit(
  level: LogLevel,
  message: string,
  colorize: (text: string) => string,
  context?: string
): void {
  if (!shouldLog(level, "console") && !shouldLog(level, "file")) return;
  const formattedMessage = formatLogMessage(level, message);
  logToConsole(level, colorize(formattedMessage));
  logToFile(level, formattedMessage, context);
}

export function debug(message: string, context?: string): void {
  emit("debug", message, chalk.gray, context);
}

export function info(message: string, context?: string): void {
  emit("info", message, chalk.blue, context);
}

export function warn(message: string, context?: string): void {
  emit("warn", message, chalk.yellow, context);
}

export function error(message: string, context?: string): void {
  emit("error", message, chalk.red, context);
}

/**
 * Log a success message (info level with green color)
 */
export function success(message: string, context?: string): void {
  emit("info", message, chalk.green, context);
}
