export { dct, DctUtils } from "./dct.js";
export { InvalidInputError } from "./errors.js";
export {
  Logger,
  JSONFormatter,
  TextFormatter,
  createConsoleHandler,
  createMockHandler,
  createLogCallback,
  type Formatter,
  type HandlerWithFlush,
  type ConsoleHandlerConfig,
  type LoggerMetrics,
  type LoggerOptions,
} from "./backends.js";
export type {
  NumericSequence,
  InvalidInputReason,
  DctOptions,
  LogCallback,
  LogContext,
  LogEntry,
  LogLevel,
  LogTopic,
} from "./types.js";
