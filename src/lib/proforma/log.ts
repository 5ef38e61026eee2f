import { engineEnv, type LogLevel } from "@/lib/env/engine";

const RANK: Record<LogLevel, number> = { silent: 0, error: 1, warn: 2, info: 3, debug: 4 };

export interface EngineLogger {
  error(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
}

/**
 * Tagged console logger, e.g. `[proforma:runner] run complete`.
 * Level defaults to PROFORMA_LOG_LEVEL.
 */
export function createLogger(tag: string, level?: LogLevel): EngineLogger {
  const threshold = RANK[level ?? engineEnv().PROFORMA_LOG_LEVEL];
  const prefix = `[proforma:${tag}]`;

  const emit = (at: Exclude<LogLevel, "silent">, message: string, meta?: Record<string, unknown>) => {
    if (RANK[at] > threshold) return;
    const args: unknown[] = meta ? [prefix, message, meta] : [prefix, message];
    switch (at) {
      case "error":
        console.error(...args);
        break;
      case "warn":
        console.warn(...args);
        break;
      case "info":
        console.info(...args);
        break;
      case "debug":
        console.debug(...args);
        break;
    }
  };

  return {
    error: (m, meta) => emit("error", m, meta),
    warn: (m, meta) => emit("warn", m, meta),
    info: (m, meta) => emit("info", m, meta),
    debug: (m, meta) => emit("debug", m, meta),
  };
}
