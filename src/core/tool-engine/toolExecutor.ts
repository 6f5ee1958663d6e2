/**
 * Tool executor: runs one batch of model-issued function calls.
 *
 * validate -> priority sort -> submit everything to the shared pool -> collect
 * outcomes in submission order. A failing tool yields a failed outcome; it never
 * rejects the batch.
 */

import { ExecutionOutcome, ToolCallRequest, ToolResult, ValidatedCall } from "../types";
import { ToolNotFoundError, toErrorMessage } from "../errors";
import { ToolcastLogger, getLogger } from "../logger";
import { StreamingSession } from "../streaming/streamingSession";
import { ToolRegistry } from "./registry";
import { ToolExecutionPool, PoolWorkContext } from "./toolExecutionPool";
import { validateToolCall } from "./validator";
import { CallLifecycle } from "./callLifecycle";
import { ErrorLog } from "./errorLog";

export interface ToolExecutorOptions {
  registry: ToolRegistry;
  pool: ToolExecutionPool;
  logger?: ToolcastLogger;
}

export interface BatchOptions {
  /** Receives validation and invocation failures; a fresh log is used when omitted */
  errorLog?: ErrorLog;
  /** Cancels pending and running calls of this batch */
  signal?: AbortSignal;
}

export class ToolExecutor {
  private readonly registry: ToolRegistry;
  private readonly pool: ToolExecutionPool;
  private readonly logger: ToolcastLogger;

  constructor(options: ToolExecutorOptions) {
    this.registry = options.registry;
    this.pool = options.pool;
    this.logger = options.logger ?? getLogger();
  }

  /** An error log that writes through this executor's logger */
  createErrorLog(): ErrorLog {
    return new ErrorLog(this.logger);
  }

  async executeBatch(
    requests: ToolCallRequest[],
    session: StreamingSession,
    options: BatchOptions = {}
  ): Promise<ExecutionOutcome[]> {
    const errorLog = options.errorLog ?? this.createErrorLog();
    const calls = this.prepare(requests, errorLog);
    return this.executeCalls(calls, session, { ...options, errorLog });
  }

  /**
   * Validate and priority-sort. Invalid requests are recorded and dropped.
   */
  prepare(requests: ToolCallRequest[], errorLog: ErrorLog): ValidatedCall[] {
    const accepted: ValidatedCall[] = [];
    for (const request of requests) {
      const validation = validateToolCall(request, this.registry);
      if (!validation.ok) {
        const { source, toolName, message } = validation.failure;
        errorLog.record({ source, toolName, message });
        continue;
      }
      accepted.push(validation.call);
    }

    // Array#sort is stable: equal priorities keep request order
    return accepted.sort((a, b) => a.priority - b.priority);
  }

  /**
   * Submit every call at once; the pool applies the concurrency bound.
   * Promise.all keeps index order, so outcomes line up with `calls`.
   */
  executeCalls(
    calls: ValidatedCall[],
    session: StreamingSession,
    options: BatchOptions = {}
  ): Promise<ExecutionOutcome[]> {
    if (calls.length === 0) return Promise.resolve([]);
    const errorLog = options.errorLog ?? this.createErrorLog();
    return Promise.all(calls.map((call) => this.submit(call, session, errorLog, options.signal)));
  }

  private async submit(
    call: ValidatedCall,
    session: StreamingSession,
    errorLog: ErrorLog,
    signal?: AbortSignal
  ): Promise<ExecutionOutcome> {
    const lifecycle = new CallLifecycle(session, call);

    const outcome = await this.pool.submit({
      callId: call.callId,
      toolName: call.toolName,
      arguments: call.arguments,
      timeoutMs: call.timeoutMs,
      signal,
      work: (context) => this.runCall(call, lifecycle, context, session.sessionId, errorLog),
    });

    // Timed out or cancelled: the work never got to report a terminal status
    lifecycle.finish(outcome);

    this.logger.traceToolExecution(
      call.toolName,
      call.arguments,
      outcome.executionTime * 1000,
      outcome.success,
      outcome.result.error,
      { sessionId: session.sessionId, callId: call.callId }
    );
    return outcome;
  }

  private async runCall(
    call: ValidatedCall,
    lifecycle: CallLifecycle,
    context: PoolWorkContext,
    sessionId: string,
    errorLog: ErrorLog
  ): Promise<ExecutionOutcome> {
    const { signal, executionId } = context;
    const startedAt = Date.now();
    const elapsed = () => (Date.now() - startedAt) / 1000;
    const outcomeFor = (result: ToolResult): ExecutionOutcome => ({
      callId: call.callId,
      executionId,
      toolName: call.toolName,
      arguments: call.arguments,
      result,
      success: result.success,
      executionTime: elapsed(),
    });

    lifecycle.start();

    try {
      const tool = this.registry.get(call.toolName);
      if (!tool) {
        throw new ToolNotFoundError(call.toolName);
      }

      const raw: unknown = await tool.invoke(
        { ...call.arguments },
        {
          callId: call.callId,
          executionId,
          sessionId,
          signal,
          reportProgress: (message) => lifecycle.progress(message),
        }
      );
      const outcome = outcomeFor(normalizeResult(raw));
      // An abandoned call's terminal event was already sent by the pool path
      if (!signal.aborted) {
        lifecycle.finish(outcome);
      }
      return outcome;
    } catch (error) {
      const message = toErrorMessage(error);
      const outcome = outcomeFor({ success: false, error: message });
      if (!signal.aborted) {
        errorLog.record({
          source: "executor.invoke",
          toolName: call.toolName,
          message: `Tool ${call.toolName} raised: ${message}`,
        });
        lifecycle.finish(outcome);
      }
      return outcome;
    }
  }
}

/**
 * Tools are typed to return ToolResult, but backends hand back arbitrary JSON.
 * A missing or non-boolean `success` counts as failure.
 */
export function normalizeResult(raw: unknown): ToolResult {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    return { success: false, error: `Tool returned a non-object result (${raw === null ? "null" : typeof raw})` };
  }

  const entries = Object.entries(raw);
  const rawSuccess = entries.find(([key]) => key === "success")?.[1];
  const rawError = entries.find(([key]) => key === "error")?.[1];

  const result: ToolResult = { success: rawSuccess === true };
  for (const [key, value] of entries) {
    if (key !== "success" && key !== "error") result[key] = value;
  }
  if (typeof rawError === "string") {
    result.error = rawError;
  } else if (!result.success) {
    result.error = "Tool reported failure";
  }
  return result;
}
