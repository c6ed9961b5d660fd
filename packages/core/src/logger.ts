import type { LogEntry, LogLevel, TraceContext } from "@parley/types";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type LogSink = (entry: LogEntry) => void;

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  /** Same component, every entry tagged with `traceCtx`. */
  withTrace(traceCtx: TraceContext): Logger;
}

function consoleSink(entry: LogEntry): void {
  const line = JSON.stringify(entry);
  if (entry.level === "error") {
    console.error(line);
  } else if (entry.level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && value in LEVEL_ORDER;
}

const envLevel = process.env.PARLEY_LOG_LEVEL;

let threshold: LogLevel = isLogLevel(envLevel) ? envLevel : "info";
let sink: LogSink = consoleSink;

/**
 * Process-wide logging settings. Loggers created earlier pick up changes.
 */
export function configureLogging(options: { level?: LogLevel; sink?: LogSink }): void {
  if (options.level) threshold = options.level;
  if (options.sink) sink = options.sink;
}

/** Restores the console sink and the environment's level. */
export function resetLogging(): void {
  threshold = isLogLevel(envLevel) ? envLevel : "info";
  sink = consoleSink;
}

/**
 * Structured JSON-lines logger bound to one component.
 */
export function createLogger(component: string, traceCtx?: TraceContext): Logger {
  const emit = (level: LogLevel, message: string, data?: Record<string, unknown>): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
    sink({
      level,
      message,
      timestamp: new Date().toISOString(),
      component,
      traceCtx,
      data,
    });
  };

  return {
    debug: (message, data) => emit("debug", message, data),
    info: (message, data) => emit("info", message, data),
    warn: (message, data) => emit("warn", message, data),
    error: (message, data) => emit("error", message, data),
    withTrace: (ctx) => createLogger(component, ctx),
  };
}
