export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  // Path context
  path?: string;
  root?: string;

  // Request context
  method?: string;
  status?: number;
  duration_ms?: number;

  // Index context
  books_found?: number;
  years?: number;
  authors?: number;
  entries_count?: number;
  query?: string;

  // Watcher context
  event?: string;
  pending?: number;

  // Error context
  error?: string;
  error_stack?: string;

  // Misc
  port?: number;
  ttl_seconds?: number;
  page_size?: number;
  watch?: boolean;
  devMode?: boolean;
}

export interface LogEntry extends LogContext {
  ts: string;
  level: LogLevel;
  tag: string;
  msg: string;
}
