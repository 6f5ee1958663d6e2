/**
 * Core type definitions for toolcast
 */

/**
 * Raw function call as emitted by the model layer.
 * `function.arguments` is a JSON string that still has to be parsed.
 */
export interface ToolCallRequest {
  id: string;
  type?: "function";
  function: {
    name: string;
    arguments: string;
  };
}

export type ToolArguments = Record<string, unknown>;

/**
 * Payload a tool hands back. `success` decides the terminal status of the call.
 */
export interface ToolResult {
  success: boolean;
  error?: string;
  [key: string]: unknown;
}

/**
 * A request that passed parsing and schema checks. Frozen on creation.
 */
export interface ValidatedCall {
  readonly callId: string;
  readonly toolName: string;
  readonly arguments: Readonly<ToolArguments>;
  readonly priority: number;
  readonly timeoutMs: number;
}

export interface ExecutionOutcome {
  callId: string;
  /** Pool-internal identity; differs from callId when a duplicate was aliased */
  executionId: string;
  toolName: string;
  arguments: ToolArguments;
  result: ToolResult;
  success: boolean;
  /** Seconds */
  executionTime: number;
}

export type ToolCallPhase = "starting" | "running" | "completed" | "failed";

/**
 * Context handed to a tool implementation for one invocation
 */
export interface ToolContext {
  callId: string;
  executionId: string;
  sessionId: string;
  /** Aborted when the call times out or the batch is cancelled */
  signal: AbortSignal;
  /** Emits an extra `running` status for this call */
  reportProgress: (message: string) => void;
}

export type JsonSchema = Record<string, unknown>;

/**
 * Tool capability - what the registry resolves a tool name to
 */
export interface ToolCapability {
  name: string;
  description?: string;
  /** JSON Schema for the parsed arguments object */
  parameters?: JsonSchema;
  /** Lower runs first */
  priority?: number;
  timeoutMs?: number;
  invoke(args: ToolArguments, context: ToolContext): Promise<ToolResult>;
}

/** Largest delay Node timers honour; anything above fires after 1 ms */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export function isTimerDelay(ms: number): boolean {
  return ms > 0 && ms <= MAX_TIMER_DELAY_MS;
}
