import type { LogLevel, LogEntry, LogContext } from "./types.ts";

const LOG_LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

function parseLevel(value: string | undefined): LogLevel {
  return LOG_LEVELS.find((level) => level === value) ?? "info";
}

const currentLevel: LogLevel = parseLevel(process.env.LOG_LEVEL);

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(currentLevel);
}

function emit(entry: LogEntry): void {
  const output = JSON.stringify(entry);

  if (entry.level === "error" || entry.level === "warn") {
    console.error(output);
  } else {
    console.log(output);
  }
}

export function errorContext(err: unknown, ctx?: LogContext): LogContext {
  const errorCtx: LogContext = { ...ctx };
  if (err instanceof Error) {
    errorCtx.error = err.message;
    errorCtx.error_stack = err.stack;
  } else if (typeof err === "string") {
    errorCtx.error = err;
  } else if (err !== undefined && err !== null) {
    errorCtx.error = JSON.stringify(err);
  }
  return errorCtx;
}

function write(level: LogLevel, tag: string, msg: string, ctx?: LogContext): void {
  if (!shouldLog(level)) return;
  emit({ ts: new Date().toISOString(), level, tag, msg, ...ctx });
}

export const log = {
  debug: (tag: string, msg: string, ctx?: LogContext): void => write("debug", tag, msg, ctx),
  info: (tag: string, msg: string, ctx?: LogContext): void => write("info", tag, msg, ctx),
  warn: (tag: string, msg: string, ctx?: LogContext): void => write("warn", tag, msg, ctx),
  error: (tag: string, msg: string, err?: unknown, ctx?: LogContext): void =>
    write("error", tag, msg, errorContext(err, ctx)),
};
