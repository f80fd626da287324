// ============================================
// Log Records
// ============================================

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Structured fields attached to a record: the logger's bindings merged
 * with the fields given at the call site.
 */
export type LogFields = Readonly<Record<string, unknown>>;

export interface LogRecord {
  readonly level: LogLevel;
  readonly msg: string;
  readonly time: Date;
  readonly fields: LogFields;
}

/**
 * Destination for log records. Writes are synchronous; a transport that
 * buffers exposes `flush` and releases its timers in `close`.
 */
export interface LogTransport {
  write(record: LogRecord): void;
  flush?(): Promise<void>;
  close?(): void;
}

export interface LoggerOptions {
  /** Records below this level are dropped (default: `info`) */
  level?: LogLevel;
  /** Fields every record carries, e.g. `{ component: "cache" }` */
  bindings?: LogFields;
  transports?: readonly LogTransport[];
}
