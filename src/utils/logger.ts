/**
 * Level-filtered logging on top of console. LOG_LEVEL selects the minimum level
 * (debug, info, warn, error or silent; default info).
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function currentLevel(): LogLevel {
  const raw = (process.env.LOG_LEVEL ?? "info").trim().toLowerCase();
  return isLogLevel(raw) ? raw : "info";
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel()];
}

function format(level: LogLevel, message: string): string {
  return `${new Date().toISOString()} [${level.toUpperCase()}] ${message}`;
}

export function logDebug(message: string): void {
  if (shouldLog("debug")) console.debug(format("debug", message));
}

export function logInfo(message: string): void {
  if (shouldLog("info")) console.log(format("info", message));
}

export function logWarn(message: string): void {
  if (shouldLog("warn")) console.warn(format("warn", message));
}

export function logError(message: string, error?: unknown): void {
  if (!shouldLog("error")) return;
  if (error === undefined) {
    console.error(format("error", message));
  } else {
    console.error(format("error", message), error);
  }
}
