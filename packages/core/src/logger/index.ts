export { type CreateLoggerOptions, createLogger } from "./factory.js";
export { Logger, silentLogger } from "./logger.js";
export * from "./transports/index.js";
export {
  LOG_LEVELS,
  type LogFields,
  type LoggerOptions,
  type LogLevel,
  type LogRecord,
  type LogTransport,
} from "./types.js";
