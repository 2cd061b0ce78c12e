type LogContext = Record<string, unknown>;

type LoggerFn = (message: string, context?: LogContext) => void;

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let threshold: LogLevel = "warn";

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

// stdout carries reports, so every level goes to stderr.
const emit = (
  level: Exclude<LogLevel, "silent">,
  message: string,
  context?: LogContext,
): void => {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) {
    return;
  }
  const logger = level === "warn" ? console.warn : console.error;
  if (context && Object.keys(context).length > 0) {
    logger(message, context);
    return;
  }
  logger(message);
};

export const logInfo: LoggerFn = (message, context) =>
  emit("info", message, context);
export const logWarning: LoggerFn = (message, context) =>
  emit("warn", message, context);
export const logError: LoggerFn = (message, context) =>
  emit("error", message, context);
export const logDebug: LoggerFn = (message, context) =>
  emit("debug", message, context);
