/**
 * toolcast logger - Pino-based structured logging
 *
 * - pretty console output for development, JSON lines otherwise
 * - optional file target
 * - child loggers carrying session / call context
 * - tool execution and request tracing helpers
 */

import pino from "pino";
import { LoggerConfig, createLoggerConfig } from "./config";
import { createConsoleTransport, createFileTransport } from "./transports";
import { createFormatter, formatDuration, redactSecrets } from "./formatters";

export interface LoggerContext {
  sessionId?: string;
  callId?: string;
  toolName?: string;
  requestId?: string;
  correlationId?: string;
  [key: string]: unknown;
}

export class ToolcastLogger {
  private pinoLogger: pino.Logger;
  private config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}, instance?: pino.Logger) {
    this.config = createLoggerConfig(config);
    this.pinoLogger = instance ?? this.createPinoLogger();
  }

  private createPinoLogger(): pino.Logger {
    const options: pino.LoggerOptions = {
      level: this.config.level,
      formatters: createFormatter(this.config),
      serializers: {
        err: pino.stdSerializers.err,
      },
    };

    // No worker thread when nothing will ever be written
    if (this.config.level === "silent") {
      return pino(options);
    }

    const targets: pino.TransportTargetOptions[] = [
      createConsoleTransport(this.config.format, this.config.level),
    ];
    if (this.config.file?.enabled) {
      targets.push(createFileTransport(this.config.file));
    }

    return pino(options, pino.transport({ targets }));
  }

  /**
   * Create child logger with context
   */
  child(context: LoggerContext): ToolcastLogger {
    return new ToolcastLogger(this.config, this.pinoLogger.child(context));
  }

  debug(message: string, context?: LoggerContext): void {
    this.pinoLogger.debug(context || {}, message);
  }

  info(message: string, context?: LoggerContext): void {
    this.pinoLogger.info(context || {}, message);
  }

  warn(message: string, context?: LoggerContext): void {
    this.pinoLogger.warn(context || {}, message);
  }

  error(message: string | Error, context?: LoggerContext): void {
    const error = message instanceof Error ? message : new Error(message);
    this.pinoLogger.error({ ...context, err: error }, error.message);
  }

  fatal(message: string | Error, context?: LoggerContext): void {
    const error = message instanceof Error ? message : new Error(message);
    this.pinoLogger.fatal({ ...context, err: error }, error.message);
  }

  /**
   * Returns a function that logs the elapsed time when called
   */
  startTimer(name: string, context?: LoggerContext): () => number {
    const start = Date.now();
    return () => {
      const duration = Date.now() - start;
      this.debug(`Timer: ${name} (${formatDuration(duration)})`, { ...context, duration, timer: name });
      return duration;
    };
  }

  /**
   * Request tracing
   */
  traceRequest(method: string, url: string, statusCode: number, duration: number, context?: LoggerContext): void {
    const level = statusCode >= 400 ? "warn" : "info";
    this.pinoLogger[level](
      {
        ...context,
        method,
        url,
        statusCode,
        duration,
        type: "request",
      },
      `${method} ${url} ${statusCode} (${formatDuration(duration)})`
    );
  }

  /**
   * Tool execution tracing; arguments are logged with secrets redacted
   */
  traceToolExecution(
    toolName: string,
    args: unknown,
    durationMs: number,
    success: boolean,
    error?: string,
    context?: LoggerContext
  ): void {
    const level = success ? "debug" : "warn";
    this.pinoLogger[level](
      {
        ...context,
        toolName,
        args: redactSecrets(args),
        duration: durationMs,
        success,
        error,
        type: "tool_execution",
      },
      `Tool ${toolName} ${success ? "succeeded" : "failed"} (${formatDuration(durationMs)})`
    );
  }

  /**
   * Flush pending logs
   */
  flush(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.pinoLogger.flush((err) => (err ? reject(err) : resolve()));
    });
  }
}

/**
 * A logger that discards everything; used as the default before initialization and in tests
 */
export function createSilentLogger(): ToolcastLogger {
  return new ToolcastLogger({ level: "silent" });
}

let globalLogger: ToolcastLogger | null = null;

/**
 * Initialize global logger
 */
export function initializeLogger(config: Partial<LoggerConfig> = {}): ToolcastLogger {
  globalLogger = new ToolcastLogger(config);
  return globalLogger;
}

/**
 * Get global logger instance; silent until initializeLogger() is called
 */
export function getLogger(): ToolcastLogger {
  if (!globalLogger) {
    globalLogger = createSilentLogger();
  }
  return globalLogger;
}

export { LoggerConfig, LogLevel, LogFormat } from "./config";
