/**
 * Per-call status emitter: starting -> running (1..n) -> exactly one terminal event.
 * Out-of-order transitions are dropped rather than emitted.
 */

import { ExecutionOutcome, ValidatedCall } from "../types";
import { StreamingSession } from "../streaming/streamingSession";
import { StreamEventBuilder } from "../streaming/streamTypes";

type Phase = "idle" | "running" | "terminated";

export class CallLifecycle {
  private phase: Phase = "idle";

  constructor(
    private readonly session: StreamingSession,
    private readonly call: ValidatedCall
  ) {}

  start(): void {
    if (this.phase !== "idle") return;
    this.phase = "running";

    const { toolName, callId } = this.call;
    this.session.emit(
      StreamEventBuilder.toolCallStart(this.session.sessionId, {
        tool_name: toolName,
        status: "starting",
        call_id: callId,
        progress_message: `Calling ${toolName}...`,
        arguments: { ...this.call.arguments },
      })
    );
    this.progress(`Running ${toolName}...`);
  }

  progress(message: string): void {
    if (this.phase !== "running") return;

    this.session.emit(
      StreamEventBuilder.toolCallProgress(this.session.sessionId, {
        tool_name: this.call.toolName,
        status: "running",
        call_id: this.call.callId,
        progress_message: message,
      })
    );
  }

  /**
   * Emit the terminal event for this call. Later calls are no-ops.
   */
  finish(outcome: ExecutionOutcome): void {
    if (this.phase === "terminated") return;
    this.phase = "terminated";

    const { toolName, callId } = this.call;
    this.session.emit(
      StreamEventBuilder.toolCallEnd(this.session.sessionId, {
        tool_name: toolName,
        status: outcome.success ? "completed" : "failed",
        call_id: callId,
        progress_message: outcome.success ? `${toolName} completed` : `${toolName} failed`,
        result: outcome.result,
        execution_time: outcome.executionTime,
        error_message: outcome.success ? undefined : outcome.result.error ?? "Tool reported failure",
      })
    );
  }
}
