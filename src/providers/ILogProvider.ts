/**
 * Logging provider interface.
 * Wraps the log destination (pino, in-memory buffer, etc).
 */

/** Log severity levels. */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** A structured log event. */
export interface LogEvent {
  /** Severity level. */
  level: LogLevel;
  /** Human-readable message. */
  message: string;
  /** ISO-8601 timestamp (auto-set if omitted). */
  timestamp?: string;
  /** Arbitrary structured metadata. */
  fields?: Record<string, unknown>;
}

/** One request/response record; `message` is the formatted log line. */
export interface TrafficLogEvent extends LogEvent {
  /** HTTP method (GET, POST, etc). */
  method: string;
  /** URL path (e.g. /api/echo). */
  path: string;
  /** Response status; absent when the handler threw. */
  status?: number;
  /** Epoch millis when the handler was invoked. */
  startTime: number;
  /** Epoch millis when the handler settled. */
  endTime: number;
  durationMs: number;
  /** Whether the line carries a `response info:` section. */
  responseCaptured: boolean;
}

export interface ILogProvider {
  /** Enqueue a structured log event for delivery. */
  log(event: LogEvent): void;

  /** Flush any buffered events. Returns when the flush attempt completes. */
  flush(): Promise<void>;

  /* Convenience methods, all non-blocking. */
  info(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(message: string, fields?: Record<string, unknown>): void;
  debug(message: string, fields?: Record<string, unknown>): void;
}
