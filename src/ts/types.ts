/**
 * Any ordered sequence of real samples accepted by the transforms.
 *
 * Plain arrays, Float64Array and Float32Array all qualify. Values are read
 * as JavaScript numbers (double precision) regardless of the source type.
 */
export type NumericSequence = ArrayLike<number>;

/**
 * Why an input sequence was rejected
 */
export type InvalidInputReason = "EmptySequence" | "NonFiniteValue";

/**
 * Log levels, most verbose first
 */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/**
 * Dotted log topics, e.g. "dct", "dct.validation", "example.dct"
 */
export type LogTopic = string;

/**
 * Context information passed to logging callbacks
 */
export interface LogContext {
  [key: string]: unknown;
}

/**
 * A single log entry with timestamp and topic
 */
export interface LogEntry {
  topic?: LogTopic;
  level: LogLevel;
  message: string;
  context?: LogContext;
  timestamp: number;
}

/**
 * Synchronous log callback accepted by the transforms
 */
export type LogCallback = (
  level: LogLevel,
  message: string,
  context?: LogContext
) => void;

/**
 * Options for {@link dct}
 */
export interface DctOptions {
  /**
   * Called once per successful transform at "debug" level, and at "warn"
   * level when summation overflowed to a non-finite coefficient.
   */
  onLog?: LogCallback;

  /**
   * Destination for the coefficients. Must have the same length as the
   * input and must not be the input itself.
   * Default: a new Float64Array is allocated
   */
  output?: Float64Array;
}
