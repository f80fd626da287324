import { appendFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import type { LogRecord, LogTransport } from "../types.js";
import { formatFields } from "./format.js";

export interface FileTransportOptions {
  /** Log file; its directory is created on the first write */
  path: string;
  /** Delay between the first buffered record and the write (default: 500) */
  flushDelayMs?: number;
  /** Buffered records that trigger an immediate write (default: 100) */
  maxBuffered?: number;
  onError?: (error: Error) => void;
}

export function formatLine(record: LogRecord): string {
  const fields = formatFields(record.fields);
  const head = `${record.time.toISOString()} ${record.level.toUpperCase().padEnd(5)} ${record.msg}`;
  return fields ? `${head} ${fields}` : head;
}

/**
 * Appends records to a file in batches. The TUI logs only here: output on
 * the terminal would tear the Ink frame.
 */
export class FileTransport implements LogTransport {
  private readonly path: string;
  private readonly flushDelayMs: number;
  private readonly maxBuffered: number;
  private readonly onError?: (error: Error) => void;
  private pending: string[] = [];
  private timer: ReturnType<typeof setTimeout> | undefined;
  private inFlight: Promise<void> | undefined;
  private dirCreated = false;

  /** Last failed write, cleared by the next successful one */
  lastError: Error | undefined;

  constructor(options: FileTransportOptions) {
    this.path = options.path;
    this.flushDelayMs = options.flushDelayMs ?? 500;
    this.maxBuffered = options.maxBuffered ?? 100;
    this.onError = options.onError;
  }

  write(record: LogRecord): void {
    this.pending.push(formatLine(record));
    if (this.pending.length >= this.maxBuffered) {
      void this.flush();
    } else if (this.timer === undefined) {
      this.timer = setTimeout(() => {
        this.timer = undefined;
        void this.flush();
      }, this.flushDelayMs);
      this.timer.unref();
    }
  }

  /**
   * Write everything buffered so far. Resolves once the file holds it, or
   * once the failure has been reported; it never rejects.
   */
  async flush(): Promise<void> {
    if (this.inFlight) {
      await this.inFlight;
    }
    if (this.pending.length === 0) {
      return;
    }
    const lines = this.pending;
    this.pending = [];
    this.inFlight = this.append(lines);
    try {
      await this.inFlight;
    } finally {
      this.inFlight = undefined;
    }
  }

  close(): void {
    clearTimeout(this.timer);
    this.timer = undefined;
    void this.flush();
  }

  private async append(lines: string[]): Promise<void> {
    try {
      if (!this.dirCreated) {
        await mkdir(dirname(this.path), { recursive: true });
        this.dirCreated = true;
      }
      await appendFile(this.path, `${lines.join("\n")}\n`, "utf8");
      this.lastError = undefined;
    } catch (error) {
      this.lastError = error instanceof Error ? error : new Error(String(error));
      this.onError?.(this.lastError);
      // Retried with the next flush
      this.pending = [...lines, ...this.pending];
    }
  }
}
