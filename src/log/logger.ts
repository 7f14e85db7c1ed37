/**
 * Scoped stderr logger. Level is process-wide; stdout stays reserved for suggestions.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

function initialLevel(): LogLevel {
  const flag = (process.env.WHOOPS_DEBUG ?? "").trim().toLowerCase();
  return flag === "1" || flag === "true" || flag === "yes" ? "debug" : "warn";
}

let currentLevel: LogLevel = initialLevel();

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

function enabled(level: Exclude<LogLevel, "silent">): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

export function createLogger(scope: string): Logger {
  const prefix = `[whoops:${scope}]`;
  const write = (level: Exclude<LogLevel, "silent">, message: string, details: unknown[]): void => {
    if (!enabled(level)) return;
    const tag = level === "debug" || level === "info" ? prefix : `${prefix} ${level}:`;
    console.error(tag, message, ...details);
  };
  return {
    debug: (message, ...details) => write("debug", message, details),
    info: (message, ...details) => write("info", message, details),
    warn: (message, ...details) => write("warn", message, details),
    error: (message, ...details) => write("error", message, details),
  };
}
