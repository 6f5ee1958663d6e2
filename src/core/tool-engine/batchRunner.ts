/**
 * Runs one batch inside a streaming session and brackets it with
 * batch_start / batch_end events. Shared by the HTTP routes and the CLI.
 */

import { ExecutionOutcome, ToolCallRequest } from "../types";
import { StreamingSession } from "../streaming/streamingSession";
import { StreamEventBuilder, serializeErrorRecord, serializeOutcome } from "../streaming/streamTypes";
import { ErrorLog, ErrorRecord } from "./errorLog";
import { ToolExecutor } from "./toolExecutor";

export interface BatchRunResult {
  sessionId: string;
  outcomes: ExecutionOutcome[];
  errors: ErrorRecord[];
  /** Seconds */
  executionTime: number;
}

export async function runBatch(
  executor: ToolExecutor,
  requests: ToolCallRequest[],
  session: StreamingSession,
  options: { signal?: AbortSignal; errorLog?: ErrorLog } = {}
): Promise<BatchRunResult> {
  const startedAt = Date.now();
  const errorLog = options.errorLog ?? executor.createErrorLog();

  const calls = executor.prepare(requests, errorLog);
  session.emit(StreamEventBuilder.batchStart(session.sessionId, requests.length, calls.length));

  const outcomes = await executor.executeCalls(calls, session, { errorLog, signal: options.signal });
  const executionTime = (Date.now() - startedAt) / 1000;
  session.emit(StreamEventBuilder.batchEnd(session.sessionId, outcomes, executionTime));

  return {
    sessionId: session.sessionId,
    outcomes,
    errors: errorLog.entries(),
    executionTime,
  };
}

/**
 * Wire shape of a finished batch, as returned by POST /tools/execute and the `complete` frame
 */
export function serializeBatchResult(result: BatchRunResult): Record<string, unknown> {
  return {
    session_id: result.sessionId,
    outcomes: result.outcomes.map(serializeOutcome),
    errors: result.errors.map(serializeErrorRecord),
    execution_time: result.executionTime,
  };
}
