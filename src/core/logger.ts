export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

function initialLevel(): LogLevel {
  const fromEnv = process.env.PAGESIM_LOG_LEVEL;
  return fromEnv !== undefined && isLogLevel(fromEnv) ? fromEnv : "warn";
}

let current: LogLevel = initialLevel();

export function setLogLevel(level: LogLevel) {
  current = level;
}

export function getLogLevel(): LogLevel {
  return current;
}

function enabled(level: LogLevel): boolean {
  return LEVELS[level] >= LEVELS[current];
}

// Everything goes to stderr; stdout is reserved for the trace.
export const logger = {
  debug(message: string, ...details: unknown[]) {
    if (enabled("debug")) console.error(`[debug] ${message}`, ...details);
  },
  info(message: string, ...details: unknown[]) {
    if (enabled("info")) console.error(`[info] ${message}`, ...details);
  },
  warn(message: string, ...details: unknown[]) {
    if (enabled("warn")) console.warn(`[warn] ${message}`, ...details);
  },
  error(message: string, ...details: unknown[]) {
    if (enabled("error")) console.error(`[error] ${message}`, ...details);
  },
};
