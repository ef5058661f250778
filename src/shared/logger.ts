import { appendFileSync, mkdirSync } from "node:fs";
import { resolve } from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_PRIORITY;
}

const rawLevel = process.env.CV_LOG_LEVEL;
const currentLevel: LogLevel = isLogLevel(rawLevel) ? rawLevel : "info";

/** Optional file logging directory. Set CV_LOG_DIR to enable. */
const logDir = process.env.CV_LOG_DIR;

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel];
}

export function formatMessage(
  level: LogLevel,
  component: string,
  message: string,
  data?: Record<string, unknown>,
  now: Date = new Date()
): string {
  const base = `${now.toISOString()} [${level.toUpperCase().padEnd(5)}] [${component}] ${message}`;
  if (data && Object.keys(data).length > 0) {
    return `${base} ${JSON.stringify(data)}`;
  }
  return base;
}

function writeToFile(component: string, formatted: string): void {
  if (!logDir) return;
  try {
    mkdirSync(logDir, { recursive: true });
    appendFileSync(resolve(logDir, `${component}.log`), formatted + "\n");
  } catch (err) {
    // Logging must not take the process down
    process.stderr.write(`log file write failed: ${String(err)}\n`);
  }
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

const SINKS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.info(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

export function createLogger(component: string): Logger {
  const emit = (level: LogLevel, message: string, data?: Record<string, unknown>) => {
    if (!shouldLog(level)) return;
    const fmt = formatMessage(level, component, message, data);
    SINKS[level](fmt);
    writeToFile(component, fmt);
  };
  return {
    debug: (message, data) => emit("debug", message, data),
    info: (message, data) => emit("info", message, data),
    warn: (message, data) => emit("warn", message, data),
    error: (message, data) => emit("error", message, data),
  };
}
