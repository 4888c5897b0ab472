/** Tagged console logger: `[dock] Panel removed panelId=a panelCount=2` */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogContext = Record<string, string | number | boolean>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return normalized && isLogLevel(normalized) ? normalized : "info";
}

export function formatLine(tag: string, message: string, context?: LogContext): string {
  const pairs = context ? Object.entries(context).map(([k, v]) => `${k}=${v}`) : [];
  return [`[${tag}] ${message}`, ...pairs].join(" ");
}

/**
 * Level is read from LOG_LEVEL on every call so tests and the CLI can
 * change it after modules are loaded.
 */
export function createLogger(tag: string, level?: LogLevel): Logger {
  const enabled = (wanted: LogLevel) =>
    LEVELS[wanted] >= LEVELS[level ?? parseLogLevel(process.env.LOG_LEVEL)];

  return {
    debug(message, context) {
      if (enabled("debug")) console.debug(formatLine(tag, message, context));
    },
    info(message, context) {
      if (enabled("info")) console.log(formatLine(tag, message, context));
    },
    warn(message, context) {
      if (enabled("warn")) console.warn(formatLine(tag, message, context));
    },
    error(message, context) {
      if (enabled("error")) console.error(formatLine(tag, message, context));
    },
  };
}
