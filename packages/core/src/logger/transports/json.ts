import type { LogRecord, LogTransport } from "../types.js";
import { jsonReplacer } from "./format.js";

export interface JsonTransportOptions {
  /** Line writer (default: stderr) */
  write?: (line: string) => void;
}

/**
 * Newline-delimited JSON with the fields flattened beside `time`, `level`
 * and `msg`.
 *
 * @example
 * ```typescript
 * // {"time":"2026-01-02T10:00:00.000Z","level":"debug","msg":"Cache hit","component":"cache"}
 * ```
 */
export class JsonTransport implements LogTransport {
  private readonly writeLine: (line: string) => void;

  constructor(options: JsonTransportOptions = {}) {
    this.writeLine = options.write ?? ((line) => process.stderr.write(`${line}\n`));
  }

  write(record: LogRecord): void {
    const { time, level, msg, fields } = record;
    this.writeLine(JSON.stringify({ time: time.toISOString(), level, msg, ...fields }, jsonReplacer));
  }
}
