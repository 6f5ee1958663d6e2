/**
 * Tool backends: where built-in tools actually send their work.
 * The planning logic itself lives outside this process.
 */

import { setTimeout as sleep } from "timers/promises";
import { ToolArguments, ToolContext, ToolResult } from "../types";
import { normalizeResult } from "../tool-engine/toolExecutor";

export type ToolBackend = (toolName: string, args: ToolArguments, context: ToolContext) => Promise<ToolResult>;

export interface HttpBackendOptions {
  baseUrl: string;
  headers?: Record<string, string>;
}

/**
 * POST <baseUrl>/tools/<name> with { arguments, call_id, session_id }.
 * The call's signal is forwarded, so a timeout also aborts the request.
 */
export function createHttpBackend(options: HttpBackendOptions): ToolBackend {
  const baseUrl = options.baseUrl.replace(/\/+$/, "");

  return async (toolName, args, context) => {
    const response = await fetch(`${baseUrl}/tools/${encodeURIComponent(toolName)}`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        ...options.headers,
      },
      body: JSON.stringify({
        arguments: args,
        call_id: context.callId,
        session_id: context.sessionId,
      }),
      signal: context.signal,
    });

    if (!response.ok) {
      const errorText = await response.text();
      return {
        success: false,
        error: `Tool backend error: ${response.status} ${response.statusText}${errorText ? ` - ${errorText}` : ""}`,
      };
    }

    const data: unknown = await response.json();
    return normalizeResult(data);
  };
}

export interface MockBackendOptions {
  delayMs?: number;
}

/**
 * Development backend: acknowledges every call after a delay.
 */
export function createMockBackend(options: MockBackendOptions = {}): ToolBackend {
  const delayMs = options.delayMs ?? 250;

  return async (toolName, args, context) => {
    context.reportProgress(`${toolName}: processing`);
    await sleep(delayMs, undefined, { signal: context.signal });
    return {
      success: true,
      tool: toolName,
      arguments: args,
      message: `Mock result for ${toolName}`,
    };
  };
}
