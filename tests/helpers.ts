/**
 * Shared fixtures: in-process tools, a collecting stream handler, call builders
 */

import pino from "pino";
import { StreamHandler, StreamingSession } from "../src/core/streaming/streamingSession";
import { StreamEvent } from "../src/core/streaming/streamTypes";
import { ToolcastLogger, createSilentLogger } from "../src/core/logger";
import { createLoggerConfig } from "../src/core/logger/config";
import { createFormatter } from "../src/core/logger/formatters";
import { ToolCallRequest, ToolCapability, ToolContext } from "../src/core/types";

export class CollectingHandler implements StreamHandler {
  readonly events: StreamEvent[] = [];
  closed = false;

  handleEvent(event: StreamEvent): void {
    this.events.push(event);
  }

  close(): void {
    this.closed = true;
  }

  types(): string[] {
    return this.events.map((e) => e.event_type);
  }

  forCall(callId: string): StreamEvent[] {
    return this.events.filter((e) => field(e.data, "call_id") === callId);
  }
}

export function field(data: unknown, key: string): unknown {
  if (typeof data === "object" && data !== null && key in data) {
    return Object.entries(data).find(([k]) => k === key)?.[1];
  }
  return undefined;
}

export function createTestSession(sessionId = "test-session"): { session: StreamingSession; collector: CollectingHandler } {
  const session = new StreamingSession({ sessionId, logger: createSilentLogger() });
  const collector = new CollectingHandler();
  session.addHandler(collector);
  return { session, collector };
}

export function call(id: string, name: string, args: unknown = {}): ToolCallRequest {
  return {
    id,
    type: "function",
    function: { name, arguments: typeof args === "string" ? args : JSON.stringify(args) },
  };
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Rejects with the signal's reason once aborted */
export function untilAborted(context: Pick<ToolContext, "signal">): Promise<never> {
  return new Promise((_, reject) => {
    context.signal.addEventListener("abort", () => reject(context.signal.reason), { once: true });
  });
}

export function fakeTool(
  name: string,
  invoke: ToolCapability["invoke"] = async (args) => ({ success: true, echo: args }),
  extra: Partial<Omit<ToolCapability, "name" | "invoke">> = {}
): ToolCapability {
  return { name, invoke, ...extra };
}

/** A trace-level logger whose JSON lines are kept in memory */
export function captureLogger(source?: string): { logger: ToolcastLogger; lines: () => Record<string, unknown>[] } {
  const raw: string[] = [];
  const config = createLoggerConfig({ level: "trace", format: "json", source });
  const instance = pino(
    { level: "trace", formatters: createFormatter(config) },
    { write: (msg: string) => void raw.push(msg) }
  );
  return {
    logger: new ToolcastLogger(config, instance),
    lines: () => raw.map((line) => JSON.parse(line)),
  };
}
