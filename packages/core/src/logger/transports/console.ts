import { type ChalkInstance, chalkStderr } from "chalk";
import type { LogLevel, LogRecord, LogTransport } from "../types.js";
import { formatFields } from "./format.js";

export interface ConsoleTransportOptions {
  /** Defaults to chalk's stderr instance, which honors NO_COLOR and FORCE_COLOR */
  chalk?: ChalkInstance;
  /** Line writer (default: stderr, leaving stdout to command output) */
  write?: (line: string) => void;
}

const PAINT: Record<LogLevel, (chalk: ChalkInstance) => ChalkInstance> = {
  debug: (chalk) => chalk.gray,
  info: (chalk) => chalk.cyan,
  warn: (chalk) => chalk.yellow,
  error: (chalk) => chalk.red,
};

/**
 * One line per record for the plain commands:
 * `WARN  Fetch failed key=https://... attempt=1`.
 */
export class ConsoleTransport implements LogTransport {
  private readonly chalk: ChalkInstance;
  private readonly writeLine: (line: string) => void;

  constructor(options: ConsoleTransportOptions = {}) {
    this.chalk = options.chalk ?? chalkStderr;
    this.writeLine = options.write ?? ((line) => process.stderr.write(`${line}\n`));
  }

  write(record: LogRecord): void {
    const level = PAINT[record.level](this.chalk)(record.level.toUpperCase().padEnd(5));
    const fields = formatFields(record.fields);
    this.writeLine(fields ? `${level} ${record.msg} ${this.chalk.dim(fields)}` : `${level} ${record.msg}`);
  }
}
