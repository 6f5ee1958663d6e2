/**
 * Streaming protocol types and event builders.
 *
 * Everything that leaves the process is snake_case; the builders are the
 * only place that maps in-process values onto the wire shape.
 */

import { ulid } from "ulid";
import { ExecutionOutcome, ToolArguments, ToolCallPhase, ToolResult } from "../types";
import { ErrorRecord } from "../tool-engine/errorLog";

export type StreamEventType =
  | "connection"
  | "processing_status"
  | "tool_call_start"
  | "tool_call_progress"
  | "tool_call_end"
  | "batch_start"
  | "batch_end"
  | "error"
  | "heartbeat"
  | "complete"
  | "close";

/**
 * One snapshot of a call's lifecycle. Re-emitted, never patched.
 */
export interface ToolCallStatus {
  readonly tool_name: string;
  readonly status: ToolCallPhase;
  readonly call_id: string;
  readonly progress_message?: string;
  readonly arguments?: ToolArguments;
  readonly result?: ToolResult;
  readonly execution_time?: number;
  readonly error_message?: string;
}

export interface StreamEvent<T = unknown> {
  readonly id: string;
  readonly event_type: StreamEventType;
  readonly session_id: string;
  readonly timestamp: string;
  readonly data: T;
  readonly metadata?: Record<string, unknown>;
}

/**
 * Wire shape of an ExecutionOutcome
 */
export interface OutcomePayload {
  call_id: string;
  execution_id: string;
  tool_name: string;
  arguments: ToolArguments;
  result: ToolResult;
  success: boolean;
  execution_time: number;
}

export interface ErrorRecordPayload {
  source: string;
  tool_name: string;
  message: string;
  timestamp: string;
}

export function serializeOutcome(outcome: ExecutionOutcome): OutcomePayload {
  return {
    call_id: outcome.callId,
    execution_id: outcome.executionId,
    tool_name: outcome.toolName,
    arguments: outcome.arguments,
    result: outcome.result,
    success: outcome.success,
    execution_time: outcome.executionTime,
  };
}

export function serializeErrorRecord(record: ErrorRecord): ErrorRecordPayload {
  return {
    source: record.source,
    tool_name: record.toolName,
    message: record.message,
    timestamp: new Date(record.timestamp).toISOString(),
  };
}

function createEvent<T>(eventType: StreamEventType, sessionId: string, data: T): StreamEvent<T> {
  return Object.freeze({
    id: ulid(),
    event_type: eventType,
    session_id: sessionId,
    timestamp: new Date().toISOString(),
    data,
  });
}

export class StreamEventBuilder {
  static toolCallStart(sessionId: string, status: ToolCallStatus): StreamEvent<ToolCallStatus> {
    return createEvent("tool_call_start", sessionId, status);
  }

  static toolCallProgress(sessionId: string, status: ToolCallStatus): StreamEvent<ToolCallStatus> {
    return createEvent("tool_call_progress", sessionId, status);
  }

  static toolCallEnd(sessionId: string, status: ToolCallStatus): StreamEvent<ToolCallStatus> {
    return createEvent("tool_call_end", sessionId, status);
  }

  static processingStatus(sessionId: string, message: string): StreamEvent<{ message: string }> {
    return createEvent("processing_status", sessionId, { message });
  }

  static error(
    sessionId: string,
    errorMessage: string,
    details?: Record<string, unknown>
  ): StreamEvent<{ error_message: string; details?: Record<string, unknown> }> {
    return createEvent("error", sessionId, { error_message: errorMessage, details });
  }

  static batchStart(
    sessionId: string,
    totalCalls: number,
    acceptedCalls: number
  ): StreamEvent<{ total_calls: number; accepted_calls: number }> {
    return createEvent("batch_start", sessionId, { total_calls: totalCalls, accepted_calls: acceptedCalls });
  }

  static batchEnd(
    sessionId: string,
    outcomes: ExecutionOutcome[],
    executionTime: number
  ): StreamEvent<{ succeeded: number; failed: number; execution_time: number }> {
    const succeeded = outcomes.filter((o) => o.success).length;
    return createEvent("batch_end", sessionId, {
      succeeded,
      failed: outcomes.length - succeeded,
      execution_time: executionTime,
    });
  }
}
