/**
 * Server-Sent Events handler
 *
 * Renders stream events as named SSE frames:
 *
 *   event: <event_type>
 *   data: <JSON payload>
 *   <blank line>
 *
 * The writer is any sink taking string chunks (an HTTP response, stdout, a test buffer).
 */

import { ToolcastLogger, getLogger } from "../logger";
import { toErrorMessage } from "../errors";
import { StreamEvent } from "./streamTypes";
import { StreamHandler } from "./streamingSession";

export type SseWriter = (chunk: string) => void;

export interface SseHandlerOptions {
  writer: SseWriter;
  includeMetadata?: boolean;
  /** Ring buffer of recent events; 0 disables buffering */
  bufferSize?: number;
  autoHeartbeat?: boolean;
  heartbeatIntervalMs?: number;
  logger?: ToolcastLogger;
}

export interface SseStatistics {
  event_count: number;
  session_duration: number;
  buffer_size: number;
  last_heartbeat: string;
  is_closed: boolean;
  include_metadata: boolean;
  auto_heartbeat: boolean;
  heartbeat_interval: number;
}

export function formatSseFrame(eventType: string, data: unknown): string {
  return `event: ${eventType}\ndata: ${JSON.stringify(data)}\n\n`;
}

export class SseHandler implements StreamHandler {
  private readonly writer: SseWriter;
  private readonly includeMetadata: boolean;
  private readonly bufferSize: number;
  private readonly heartbeatIntervalMs: number;
  private readonly logger: ToolcastLogger;
  private readonly startedAt = Date.now();
  private readonly buffer: StreamEvent[] = [];
  private heartbeatTimer: NodeJS.Timeout | null = null;
  private lastHeartbeat = Date.now();
  private closed = false;
  private eventCount = 0;

  constructor(options: SseHandlerOptions) {
    this.writer = options.writer;
    this.includeMetadata = options.includeMetadata ?? false;
    this.bufferSize = options.bufferSize ?? 100;
    this.heartbeatIntervalMs = options.heartbeatIntervalMs ?? 30_000;
    this.logger = options.logger ?? getLogger();

    if (options.autoHeartbeat ?? true) {
      this.startHeartbeat();
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  handleEvent(event: StreamEvent): void {
    if (this.closed) return;

    this.eventCount++;
    if (this.bufferSize > 0) {
      this.buffer.push(event);
      if (this.buffer.length > this.bufferSize) {
        this.buffer.shift();
      }
    }

    const payload: Record<string, unknown> = {
      event_type: event.event_type,
      timestamp: event.timestamp,
      session_id: event.session_id,
      data: event.data,
    };
    if (this.includeMetadata) {
      payload.metadata = {
        event_index: this.eventCount,
        processing_time: this.elapsedSeconds(),
        buffer_size: this.buffer.length,
        original_metadata: event.metadata,
      };
    }

    try {
      this.writer(formatSseFrame(event.event_type, payload));
    } catch (e) {
      this.logger.error(`Failed to write SSE event: ${toErrorMessage(e)}`, {
        sessionId: event.session_id,
        eventType: event.event_type,
      });
      this.handleError(e instanceof Error ? e : new Error(toErrorMessage(e)), event.session_id);
    }
  }

  handleError(error: Error, sessionId?: string): void {
    if (this.closed) return;

    const data: Record<string, unknown> = {
      error_message: error.message,
      error_type: error.name,
      timestamp: new Date().toISOString(),
      session_id: sessionId,
      event_count: this.eventCount,
    };
    if (this.includeMetadata) {
      data.metadata = {
        session_duration: this.elapsedSeconds(),
        buffer_size: this.buffer.length,
      };
    }
    this.safeWrite("error", data);
  }

  sendConnectionEvent(sessionId: string, config: Record<string, unknown> = {}): void {
    this.safeWrite("connection", {
      status: "connected",
      timestamp: new Date().toISOString(),
      session_id: sessionId,
      config,
      server_info: {
        sse_handler: "SseHandler",
        features: ["streaming", "heartbeat", "metadata"],
      },
    });
  }

  sendCompletionEvent(result: Record<string, unknown>): void {
    this.safeWrite("complete", {
      status: "completed",
      timestamp: new Date().toISOString(),
      result,
      statistics: {
        total_events: this.eventCount,
        session_duration: this.elapsedSeconds(),
        buffer_size: this.buffer.length,
      },
    });
  }

  sendHeartbeat(): void {
    if (this.closed) return;
    this.safeWrite("heartbeat", {
      timestamp: new Date().toISOString(),
      session_duration: this.elapsedSeconds(),
      event_count: this.eventCount,
      buffer_size: this.buffer.length,
    });
    this.lastHeartbeat = Date.now();
  }

  /**
   * Stop the heartbeat and send the final `close` frame. Safe to call twice.
   */
  close(message = "Stream completed successfully"): void {
    if (this.closed) return;
    this.closed = true;
    this.stopHeartbeat();

    this.safeWrite("close", {
      status: "closing",
      message,
      timestamp: new Date().toISOString(),
      final_statistics: {
        total_events: this.eventCount,
        session_duration: this.elapsedSeconds(),
      },
    });
    this.logger.debug(`SSE handler closed after ${this.eventCount} events`);
  }

  getStatistics(): SseStatistics {
    return {
      event_count: this.eventCount,
      session_duration: this.elapsedSeconds(),
      buffer_size: this.buffer.length,
      last_heartbeat: new Date(this.lastHeartbeat).toISOString(),
      is_closed: this.closed,
      include_metadata: this.includeMetadata,
      auto_heartbeat: this.heartbeatTimer !== null,
      heartbeat_interval: this.heartbeatIntervalMs,
    };
  }

  getBufferedEvents(): StreamEvent[] {
    return [...this.buffer];
  }

  clearBuffer(): void {
    this.buffer.length = 0;
  }

  private startHeartbeat(): void {
    if (this.heartbeatTimer || this.closed) return;
    this.heartbeatTimer = setInterval(() => this.sendHeartbeat(), this.heartbeatIntervalMs);
    this.heartbeatTimer.unref();
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }

  private safeWrite(eventType: string, data: unknown): void {
    try {
      this.writer(formatSseFrame(eventType, data));
    } catch (e) {
      this.logger.error(`Failed to write SSE ${eventType} frame: ${toErrorMessage(e)}`);
    }
  }

  private elapsedSeconds(): number {
    return (Date.now() - this.startedAt) / 1000;
  }
}
