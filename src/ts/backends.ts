/**
 * Logging backends
 *
 * - Pluggable formatters (JSON, text, custom)
 * - Console and in-memory (mock) handlers
 * - Extended log levels (trace -> fatal) with a dynamic minimum level
 * - Graceful shutdown with flush hooks
 * - Bridge from the synchronous `onLog` callback of the transforms
 */

import type {
  LogCallback,
  LogContext,
  LogEntry,
  LogLevel,
  LogTopic,
} from "./types.js";

/**
 * Formatter interface for encoding log entries
 */
export interface Formatter {
  format(log: LogEntry): string;
}

/**
 * JSON formatter (one entry per line)
 */
export class JSONFormatter implements Formatter {
  format(log: LogEntry): string {
    try {
      return JSON.stringify(log);
    } catch (error) {
      return JSON.stringify({
        ...log,
        context: `[Unable to stringify: ${
          error instanceof Error ? error.message : "unknown error"
        }]`,
      });
    }
  }
}

/**
 * Text formatter for human-readable output
 */
export class TextFormatter implements Formatter {
  format(log: LogEntry): string {
    const timestamp = new Date(log.timestamp).toISOString();
    const level = log.level.toUpperCase().padEnd(5);
    const topic = log.topic || "default";

    let output = `[${timestamp}] ${level} [${topic}] ${log.message}`;

    if (log.context && Object.keys(log.context).length > 0) {
      try {
        output += `\n  Context: ${JSON.stringify(log.context)}`;
      } catch (error) {
        // Circular references, BigInt values
        output += `\n  Context: [Unable to stringify: ${
          error instanceof Error ? error.message : "unknown error"
        }]`;
      }
    }

    return output;
  }
}

/**
 * Handler with optional flush capability
 */
export interface HandlerWithFlush {
  (log: LogEntry): Promise<void> | void;
  flush?: () => Promise<void>;
}

/**
 * Console handler configuration
 */
export interface ConsoleHandlerConfig {
  /** Default: TextFormatter */
  formatter?: Formatter;
  /** Wrap each line in an ANSI color per level. Default: true */
  colors?: boolean;
}

const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: "\x1b[90m", // Gray
  debug: "\x1b[36m", // Cyan
  info: "\x1b[32m", // Green
  warn: "\x1b[33m", // Yellow
  error: "\x1b[31m", // Red
  fatal: "\x1b[35;1m", // Bright Magenta
};

const COLOR_RESET = "\x1b[0m";

/**
 * Console handler (for development/debugging)
 */
export function createConsoleHandler(
  config: ConsoleHandlerConfig = {}
): HandlerWithFlush {
  const formatter = config.formatter ?? new TextFormatter();
  const colors = config.colors ?? true;

  return (log: LogEntry): void => {
    const line = formatter.format(log);
    console.log(colors ? `${LEVEL_COLORS[log.level]}${line}${COLOR_RESET}` : line);
  };
}

/**
 * In-memory handler for tests
 *
 * @example
 * ```ts
 * const mock = createMockHandler();
 * const logger = new Logger([mock.handler]);
 * await logger.info("hello");
 * mock.getLogs(); // [{ level: "info", message: "hello", ... }]
 * ```
 */
export function createMockHandler(onLog?: (log: LogEntry) => void) {
  const logs: LogEntry[] = [];

  const handler = (log: LogEntry): void => {
    logs.push(log);
    if (onLog) {
      onLog(log);
    }
  };

  return {
    handler,
    getLogs: () => [...logs],
    clear: () => logs.splice(0, logs.length),
  };
}

/**
 * Performance metrics for internal instrumentation
 */
export interface LoggerMetrics {
  logsProcessed: number;
  logsFailed: number;
  flushCount: number;
  handlerErrors: Map<string, number>;
}

/**
 * Logger options
 */
export interface LoggerOptions {
  /** Receives handler failures. Default: a console handler */
  fallbackHandler?: (log: LogEntry) => void;
  enableMetrics?: boolean;
  /** Minimum level to log. Default: "trace" */
  minLevel?: LogLevel;
  /** Prefix prepended to every topic, dot-separated */
  topicPrefix?: string;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
};

/**
 * Logger that dispatches each entry to several handlers
 *
 * A failing handler never prevents the others from receiving the entry;
 * the failure is reported as an "error" entry on topic
 * "logger.handler.error" to the fallback handler.
 *
 * @example
 * ```ts
 * const logger = new Logger([createConsoleHandler()], { minLevel: "info" });
 *
 * await logger.info("Transform ready", "dct", { length: 8 });
 * await logger.debug("dropped: below minLevel");
 *
 * const coeffs = dct(signal, { onLog: createLogCallback(logger, "dct") });
 * ```
 */
export class Logger {
  private fallbackHandler: (log: LogEntry) => void;
  private enableMetrics: boolean;
  private minLevel: LogLevel;
  private topicPrefix?: string;

  private metrics: LoggerMetrics = {
    logsProcessed: 0,
    logsFailed: 0,
    flushCount: 0,
    handlerErrors: new Map(),
  };

  constructor(
    private handlers: Array<HandlerWithFlush>,
    options?: LoggerOptions
  ) {
    this.fallbackHandler =
      options?.fallbackHandler || createConsoleHandler({ colors: false });
    this.enableMetrics = options?.enableMetrics ?? false;
    this.minLevel = options?.minLevel || "trace";
    this.topicPrefix = options?.topicPrefix;
  }

  /**
   * Set minimum log level dynamically
   */
  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getMinLevel(): LogLevel {
    return this.minLevel;
  }

  /**
   * Check if a log level meets the minimum threshold
   */
  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.minLevel];
  }

  /**
   * Log a message at the specified level
   */
  async log(
    level: LogLevel,
    message: string,
    topic?: LogTopic,
    context?: LogContext
  ): Promise<void> {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      topic: this.resolveTopic(topic),
      context,
      timestamp: Date.now(),
    };

    if (this.enableMetrics) {
      this.metrics.logsProcessed++;
    }

    // Dispatch to all handlers in parallel, isolating errors
    await Promise.all(
      this.handlers.map(async (handler) => {
        try {
          await handler(entry);
        } catch (error) {
          if (this.enableMetrics) {
            this.metrics.logsFailed++;
            const handlerName = handler.name || "anonymous";
            this.metrics.handlerErrors.set(
              handlerName,
              (this.metrics.handlerErrors.get(handlerName) || 0) + 1
            );
          }

          const errorEntry: LogEntry = {
            level: "error",
            message: `Handler error: ${
              error instanceof Error ? error.message : String(error)
            }`,
            topic: "logger.handler.error",
            context: {
              originalLog: entry,
              error:
                error instanceof Error
                  ? {
                      name: error.name,
                      message: error.message,
                      stack: error.stack,
                    }
                  : String(error),
            },
            timestamp: Date.now(),
          };

          try {
            this.fallbackHandler(errorEntry);
          } catch (fallbackError) {
            console.error("Fallback handler failed:", fallbackError);
          }
        }
      })
    );
  }

  async trace(message: string, topic?: LogTopic, context?: LogContext): Promise<void> {
    await this.log("trace", message, topic, context);
  }

  async debug(message: string, topic?: LogTopic, context?: LogContext): Promise<void> {
    await this.log("debug", message, topic, context);
  }

  async info(message: string, topic?: LogTopic, context?: LogContext): Promise<void> {
    await this.log("info", message, topic, context);
  }

  async warn(message: string, topic?: LogTopic, context?: LogContext): Promise<void> {
    await this.log("warn", message, topic, context);
  }

  async error(message: string, topic?: LogTopic, context?: LogContext): Promise<void> {
    await this.log("error", message, topic, context);
  }

  async fatal(message: string, topic?: LogTopic, context?: LogContext): Promise<void> {
    await this.log("fatal", message, topic, context);
  }

  /**
   * Flush all handlers (for graceful shutdown)
   */
  async flushAll(): Promise<void> {
    await Promise.all(
      this.handlers.map(async (handler) => {
        if (handler.flush) {
          try {
            await handler.flush();
          } catch (error) {
            console.error("Handler flush error:", error);
          }
        }
      })
    );

    if (this.enableMetrics) {
      this.metrics.flushCount++;
    }
  }

  getMetrics(): LoggerMetrics {
    return { ...this.metrics, handlerErrors: new Map(this.metrics.handlerErrors) };
  }

  resetMetrics(): void {
    this.metrics = {
      logsProcessed: 0,
      logsFailed: 0,
      flushCount: 0,
      handlerErrors: new Map(),
    };
  }

  /**
   * Create a child logger with a default topic prefix
   *
   * @example
   * ```ts
   * const child = logger.child("example");
   * await child.info("done", "dct"); // topic "example.dct"
   * await child.info("done");        // topic "example.default"
   * ```
   */
  child(topicPrefix: string): Logger {
    return new Logger(this.handlers, {
      fallbackHandler: this.fallbackHandler,
      enableMetrics: false, // Don't double-count metrics
      minLevel: this.minLevel,
      topicPrefix: this.topicPrefix
        ? `${this.topicPrefix}.${topicPrefix}`
        : topicPrefix,
    });
  }

  private resolveTopic(topic?: LogTopic): LogTopic {
    if (!this.topicPrefix) {
      return topic || "default";
    }
    return `${this.topicPrefix}.${topic || "default"}`;
  }
}

/**
 * Adapt a Logger to the synchronous `onLog` callback taken by the transforms.
 *
 * Entries are dispatched without waiting; await `logger.flushAll()` before
 * shutdown if handlers buffer.
 */
export function createLogCallback(
  logger: Logger,
  topic: LogTopic = "dct"
): LogCallback {
  return (level, message, context) => {
    logger.log(level, message, topic, context).catch((error: unknown) => {
      console.error("Log delivery failed:", error);
    });
  };
}
