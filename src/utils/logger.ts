import { existsSync, mkdirSync } from "fs";
import { appendFile } from "fs/promises";
import { dirname } from "path";
import chalk from "chalk";
import type { MultiBar } from "cli-progress";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LoggerConfig {
  logToConsole: boolean;
  logToFile: boolean;
  logFilePath?: string;
  consoleLogLevel: LogLevel;
  fileLogLevel: LogLevel;
  multibar?: MultiBar | null;
}

const defaultConfig: LoggerConfig = {
  logToConsole: true,
  logToFile: false,
  consoleLogLevel: "info",
  fileLogLevel: "debug",
  multibar: null,
};

let currentConfig: LoggerConfig = { ...defaultConfig };

// File appends are chained so lines land in call order
let pendingWrites: Promise<void> = Promise.resolve();

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Configure the logger. Unspecified fields keep their current values.
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  currentConfig = { ...currentConfig, ...config };

  if (currentConfig.logToFile && currentConfig.logFilePath) {
    const logDir = dirname(currentConfig.logFilePath);
    if (logDir && !existsSync(logDir)) {
      try {
        mkdirSync(logDir, { recursive: true });
      } catch (error) {
        console.error(`Failed to create log directory: ${error}`);
        currentConfig.logToFile = false;
      }
    }
  }
}

/** Restores the default configuration */
export function resetLogger(): void {
  currentConfig = { ...defaultConfig };
}

/**
 * Sets or clears the active MultiBar so console lines don't tear the progress bars
 */
export function setActiveMultibar(multibar: MultiBar | null): void {
  currentConfig.multibar = multibar;
}

/**
 * Resolves once every queued file write has completed.
 */
export function flushLogs(): Promise<void> {
  return pendingWrites;
}

const logLevelValue: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function shouldLog(level: LogLevel, target: "console" | "file"): boolean {
  if (target === "console" && !currentConfig.logToConsole) return false;
  if (
    target === "file" &&
    (!currentConfig.logToFile || !currentConfig.logFilePath)
  )
    return false;
  const threshold =
    target === "console"
      ? currentConfig.consoleLogLevel
      : currentConfig.fileLogLevel;
  return logLevelValue[level] >= logLevelValue[threshold];
}

function formatLogMessage(level: LogLevel, message: string): string {
  const timestamp = new Date().toISOString();
  return `[${timestamp}] [${level.toUpperCase()}] ${message}`;
}

function logToConsole(level: LogLevel, coloredMessage: string): void {
  if (!shouldLog(level, "console")) return;

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

function logToFile(
  level: LogLevel,
  formattedMessage: string,
  context?: string
): void {
  const filePath = currentConfig.logFilePath;
  if (!filePath || !shouldLog(level, "file")) return;

  // Full context (stack traces, offending snippets) only goes to the file
  const messageToWrite = context
    ? `${formattedMessage}\n  Context: ${context}\n`
    : `${formattedMessage}\n`;

  pendingWrites = pendingWrites.then(() =>
    appendFile(filePath, messageToWrite).catch((error: unknown) => {
      console.error(`[Logger Error] Failed to write to log file: ${error}`);
    })
  );
}

function log(
  level: LogLevel,
  colorize: (text: string) => string,
  message: string,
  context?: string
): void {
  if (!shouldLog(level, "console") && !shouldLog(level, "file")) return;
  const formattedMessage = formatLogMessage(level, message);
  logToConsole(level, colorize(formattedMessage));
  logToFile(level, formattedMessage, context);
}

export function debug(message: string, context?: string): void {
  log("debug", chalk.gray, message, context);
}

export function info(message: string, context?: string): void {
  log("info", chalk.blue, message, context);
}

export function warn(message: string, context?: string): void {
  log("warn", chalk.yellow, message, context);
}

export function error(message: string, context?: string): void {
  log("error", chalk.red, message, context);
}

/**
 * Log a success message (info level with green color)
 */
export function success(message: string, context?: string): void {
  log("info", chalk.green, message, context);
}
