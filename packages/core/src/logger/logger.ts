import { LOG_LEVELS, type LogFields, type LoggerOptions, type LogLevel, type LogTransport } from "./types.js";

function rank(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

/**
 * Leveled structured logger. Children carry extra bindings and write to the
 * same transports.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ level: "debug", transports: [new ConsoleTransport()] });
 * const cacheLogger = logger.child({ component: "cache" });
 * cacheLogger.debug("Cache hit", { key });
 * // DEBUG Cache hit component=cache key=https://translate.fedoraproject.org/api/projects/
 * ```
 */
export class Logger {
  readonly level: LogLevel;
  private readonly bindings: LogFields;
  private readonly transports: readonly LogTransport[];

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.bindings = options.bindings ?? {};
    this.transports = options.transports ?? [];
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.transports.length > 0 && rank(level) >= rank(this.level);
  }

  debug(msg: string, fields?: LogFields): void {
    this.emit("debug", msg, fields);
  }

  info(msg: string, fields?: LogFields): void {
    this.emit("info", msg, fields);
  }

  warn(msg: string, fields?: LogFields): void {
    this.emit("warn", msg, fields);
  }

  error(msg: string, fields?: LogFields): void {
    this.emit("error", msg, fields);
  }

  child(bindings: LogFields): Logger {
    return new Logger({
      level: this.level,
      bindings: { ...this.bindings, ...bindings },
      transports: this.transports,
    });
  }

  async flush(): Promise<void> {
    await Promise.all(this.transports.map((transport) => transport.flush?.()));
  }

  /** Release transport timers. Records written afterwards are still accepted. */
  dispose(): void {
    for (const transport of this.transports) {
      transport.close?.();
    }
  }

  private emit(level: LogLevel, msg: string, fields?: LogFields): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }
    const record = { level, msg, time: new Date(), fields: { ...this.bindings, ...fields } };
    for (const transport of this.transports) {
      transport.write(record);
    }
  }
}

/** Logger without transports, used where none was passed in. */
export const silentLogger = new Logger();
