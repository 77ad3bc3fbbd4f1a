/**
 * Structured logger accepted by the client. `console` satisfies it.
 */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

/**
 * Console logger that drops messages below `level`.
 * Silent unless a level is passed or DWOLLA_LOG_LEVEL is set.
 */
export function createLogger(
  level: string = process.env.DWOLLA_LOG_LEVEL ?? "silent",
  sink: Logger = console,
): Logger {
  const threshold = LEVELS[isLogLevel(level) ? level : "silent"];
  const emit =
    (name: Exclude<LogLevel, "silent">) =>
    (message: string, meta?: Record<string, unknown>): void => {
      if (LEVELS[name] < threshold) {
        return;
      }
      if (meta) {
        sink[name](`[Dwolla] ${message}`, meta);
      } else {
        sink[name](`[Dwolla] ${message}`);
      }
    };

  return {
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
  };
}
