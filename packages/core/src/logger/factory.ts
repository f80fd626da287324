import type { ChalkInstance } from "chalk";
import { Logger } from "./logger.js";
import { ConsoleTransport } from "./transports/console.js";
import { FileTransport } from "./transports/file.js";
import { JsonTransport } from "./transports/json.js";
import type { LogLevel, LogTransport } from "./types.js";

export interface CreateLoggerOptions {
  level?: LogLevel;
  /** Log to stderr (default: true) */
  console?: boolean;
  /** Newline-delimited JSON on stderr instead of text */
  json?: boolean;
  chalk?: ChalkInstance;
  /** Also append to this file */
  file?: string;
}

/**
 * Logger with the usual transports.
 *
 * @example
 * ```typescript
 * const commandLogger = createLogger({ level: "warn" });
 * const tuiLogger = createLogger({ console: false, file: getLogFilePath(config.cache.dir) });
 * ```
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const transports: LogTransport[] = [];
  if (options.console ?? true) {
    transports.push(options.json ? new JsonTransport() : new ConsoleTransport({ chalk: options.chalk }));
  }
  if (options.file) {
    transports.push(new FileTransport({ path: options.file }));
  }
  return new Logger({ level: options.level ?? "info", transports });
}
