/**
 * Console-backed scoped logger. Lines are prefixed with "[scope]".
 * Level: EQUITY_LOG_LEVEL, else silent under NODE_ENV=test, else info.
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
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const fromEnv = env.EQUITY_LOG_LEVEL?.toLowerCase();
  if (fromEnv && isLogLevel(fromEnv)) return fromEnv;
  return env.NODE_ENV === "test" ? "silent" : "info";
}

export function createLogger(scope: string, level: LogLevel = resolveLogLevel()): Logger {
  const threshold = LEVEL_ORDER[level];
  const prefix = `[${scope}]`;
  const enabled = (l: LogLevel) => LEVEL_ORDER[l] >= threshold;

  return {
    debug: (...args) => {
      if (enabled("debug")) console.debug(prefix, ...args);
    },
    info: (...args) => {
      if (enabled("info")) console.log(prefix, ...args);
    },
    warn: (...args) => {
      if (enabled("warn")) console.warn(prefix, ...args);
    },
    error: (...args) => {
      if (enabled("error")) console.error(prefix, ...args);
    },
  };
}
