export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const noop = () => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

/** Console-backed logger; everything goes to stderr so stdout stays clean for XML. */
export function createConsoleLogger(level: LogLevel = "warn"): Logger {
  const on = (l: LogLevel) => RANK[l] >= RANK[level];
  return {
    debug: on("debug") ? (m, ...a) => console.error(`[debug] ${m}`, ...a) : noop,
    info: on("info") ? (m, ...a) => console.error(`[info] ${m}`, ...a) : noop,
    warn: on("warn") ? (m, ...a) => console.error(`[warn] ${m}`, ...a) : noop,
    error: on("error") ? (m, ...a) => console.error(`[error] ${m}`, ...a) : noop,
  };
}
