/**
 * Minimal leveled logger.
 *
 * Components log through this interface so hosts can route output elsewhere;
 * the default writes to the console with a `[Scope]` prefix.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface ConsoleLoggerOptions {
  level?: LogLevel;
}

export function createConsoleLogger(scope: string, options: ConsoleLoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? "info"];
  const prefix = `[${scope}]`;

  function emit(level: Exclude<LogLevel, "silent">, message: string, meta?: LogMeta): void {
    if (LEVEL_ORDER[level] < threshold) return;
    const args: unknown[] = meta && Object.keys(meta).length > 0 ? [prefix, message, meta] : [prefix, message];
    switch (level) {
      case "debug":
        console.debug(...args);
        break;
      case "info":
        console.log(...args);
        break;
      case "warn":
        console.warn(...args);
        break;
      case "error":
        console.error(...args);
        break;
    }
  }

  return {
    debug: (message, meta) => emit("debug", message, meta),
    info: (message, meta) => emit("info", message, meta),
    warn: (message, meta) => emit("warn", message, meta),
    error: (message, meta) => emit("error", message, meta),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
