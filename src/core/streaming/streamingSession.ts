/**
 * Streaming session: ordered, append-only event sink for one remote observer
 * - dispatches to handlers in-process (sync), in emission order
 * - keeps a bounded in-memory history
 */

import { ulid } from "ulid";
import { ToolcastLogger, getLogger } from "../logger";
import { toErrorMessage } from "../errors";
import { StreamEvent, StreamEventType } from "./streamTypes";

export interface StreamHandler {
  handleEvent(event: StreamEvent): void;
  handleError?(error: Error, sessionId?: string): void;
  close?(): void | Promise<void>;
}

export interface StreamingSessionConfig {
  sessionId?: string;
  maxHistorySize?: number;
  logger?: ToolcastLogger;
}

export class StreamingSession {
  readonly sessionId: string;
  private readonly handlers: Set<StreamHandler> = new Set();
  private readonly history: StreamEvent[] = [];
  private readonly maxHistorySize: number;
  private readonly logger: ToolcastLogger;
  private closed = false;
  private emitted = 0;

  constructor(config: StreamingSessionConfig = {}) {
    this.sessionId = config.sessionId ?? ulid();
    this.maxHistorySize = config.maxHistorySize ?? 1000;
    this.logger = (config.logger ?? getLogger()).child({ sessionId: this.sessionId });
  }

  addHandler(handler: StreamHandler): void {
    this.handlers.add(handler);
  }

  removeHandler(handler: StreamHandler): void {
    this.handlers.delete(handler);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  emit(event: StreamEvent): void {
    if (this.closed) {
      this.logger.debug("Dropping event on closed session", { eventType: event.event_type });
      return;
    }

    this.emitted++;
    this.history.push(event);
    if (this.history.length > this.maxHistorySize) {
      this.history.splice(0, this.history.length - this.maxHistorySize);
    }

    for (const handler of this.handlers) {
      try {
        handler.handleEvent(event);
      } catch (e) {
        // Handler errors are logged, never rethrown to the emitter
        this.logger.error(`Stream handler failed: ${toErrorMessage(e)}`, { eventType: event.event_type });
      }
    }
  }

  /**
   * Get history with optional filtering
   */
  getHistory(options?: { type?: StreamEventType; limit?: number }): StreamEvent[] {
    let filtered = [...this.history];

    if (options?.type) {
      filtered = filtered.filter((e) => e.event_type === options.type);
    }

    if (options?.limit !== undefined) {
      filtered = options.limit > 0 ? filtered.slice(-options.limit) : [];
    }

    return filtered;
  }

  /** Total events emitted, including those already evicted from history */
  get eventCount(): number {
    return this.emitted;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    for (const handler of this.handlers) {
      try {
        await handler.close?.();
      } catch (e) {
        this.logger.error(`Stream handler close failed: ${toErrorMessage(e)}`);
      }
    }
    this.handlers.clear();
  }
}

/**
 * Handler that mirrors every stream event into the logger at debug level
 */
export class LoggingStreamHandler implements StreamHandler {
  constructor(private readonly logger: ToolcastLogger) {}

  handleEvent(event: StreamEvent): void {
    this.logger.debug(`Stream event ${event.event_type}`, {
      sessionId: event.session_id,
      eventId: event.id,
      data: event.data,
    });
  }
}
