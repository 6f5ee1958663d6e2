/**
 * Terminal renderer for stream events: one readable line per event instead of SSE frames.
 *
 *   * Processing 2 tool call(s)
 *   > Calling research... [call_1]
 *     . Running research...
 *     ok research completed in 1.20s
 *     x design failed: Tool execution timed out after 60 seconds
 */

import { StreamEvent } from "./streamTypes";
import { StreamHandler } from "./streamingSession";

export type LineWriter = (line: string) => void;

export interface CliStreamHandlerOptions {
  write?: LineWriter;
  /** Prefix lines with the event's HH:MM:SS (UTC) */
  showTimestamps?: boolean;
  /** Print call arguments, error details and error types */
  showMetadata?: boolean;
}

function read(data: unknown, key: string): unknown {
  if (typeof data !== "object" || data === null) return undefined;
  return Object.entries(data).find(([k]) => k === key)?.[1];
}

function text(data: unknown, key: string): string | undefined {
  const value = read(data, key);
  return typeof value === "string" ? value : undefined;
}

function count(data: unknown, key: string): number {
  const value = read(data, key);
  return typeof value === "number" ? value : 0;
}

export class CliStreamHandler implements StreamHandler {
  private readonly write: LineWriter;
  private readonly showTimestamps: boolean;
  private readonly showMetadata: boolean;
  private readonly activeCalls: Set<string> = new Set();
  private closed = false;

  constructor(options: CliStreamHandlerOptions = {}) {
    this.write = options.write ?? ((line: string) => console.log(line));
    this.showTimestamps = options.showTimestamps ?? false;
    this.showMetadata = options.showMetadata ?? false;
  }

  handleEvent(event: StreamEvent): void {
    if (this.closed) return;
    const { data } = event;

    switch (event.event_type) {
      case "processing_status": {
        const message = text(data, "message");
        if (message) this.line(event, `* ${message}`);
        break;
      }
      case "batch_start":
        this.line(event, `* ${count(data, "accepted_calls")} of ${count(data, "total_calls")} call(s) accepted`);
        break;
      case "tool_call_start": {
        const toolName = text(data, "tool_name") ?? "unknown";
        const callId = text(data, "call_id") ?? "";
        this.activeCalls.add(callId);
        this.line(event, `> ${text(data, "progress_message") ?? `Calling ${toolName}...`} [${callId}]`);
        if (this.showMetadata) {
          this.line(event, `  arguments: ${JSON.stringify(read(data, "arguments") ?? {})}`);
        }
        break;
      }
      case "tool_call_progress": {
        const message = text(data, "progress_message");
        if (message) this.line(event, `  . ${message}`);
        break;
      }
      case "tool_call_end": {
        const toolName = text(data, "tool_name") ?? "unknown";
        this.activeCalls.delete(text(data, "call_id") ?? "");
        if (text(data, "status") === "completed") {
          this.line(event, `  ok ${toolName} completed in ${count(data, "execution_time").toFixed(2)}s`);
        } else {
          this.line(event, `  x ${toolName} failed: ${text(data, "error_message") ?? "unknown error"}`);
        }
        break;
      }
      case "batch_end":
        this.line(
          event,
          `= ${count(data, "succeeded")} succeeded, ${count(data, "failed")} failed ` +
            `in ${count(data, "execution_time").toFixed(2)}s`
        );
        break;
      case "error": {
        this.line(event, `! Error: ${text(data, "error_message") ?? "unknown error"}`);
        const details = read(data, "details");
        if (this.showMetadata && details !== undefined) {
          this.line(event, `  details: ${JSON.stringify(details)}`);
        }
        break;
      }
      default:
        // connection, heartbeat, complete and close only make sense on the wire
        break;
    }
  }

  handleError(error: Error, sessionId?: string): void {
    if (this.closed) return;
    this.write(`! Handler error: ${error.message}`);
    if (this.showMetadata) {
      this.write(`  type: ${error.name}${sessionId ? `, session: ${sessionId}` : ""}`);
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.activeCalls.size > 0) {
      this.write(`! Interrupted ${this.activeCalls.size} running tool call(s)`);
    }
    this.activeCalls.clear();
  }

  private line(event: StreamEvent, content: string): void {
    this.write(this.showTimestamps ? `[${event.timestamp.slice(11, 19)}] ${content}` : content);
  }
}
