/**
 * StreamingSession tests
 */

import { StreamingSession, LoggingStreamHandler } from "../src/core/streaming/streamingSession";
import { StreamEventBuilder, serializeOutcome } from "../src/core/streaming/streamTypes";
import { createSilentLogger } from "../src/core/logger";
import { CollectingHandler } from "./helpers";

describe("StreamingSession", () => {
  const logger = createSilentLogger();

  test("should generate a ULID session id by default", () => {
    const session = new StreamingSession({ logger });
    expect(session.sessionId).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/);
  });

  test("should dispatch events to every handler in emission order", () => {
    const session = new StreamingSession({ sessionId: "s", logger });
    const a = new CollectingHandler();
    const b = new CollectingHandler();
    session.addHandler(a);
    session.addHandler(b);

    session.emit(StreamEventBuilder.processingStatus("s", "one"));
    session.emit(StreamEventBuilder.batchStart("s", 3, 2));

    expect(a.types()).toEqual(["processing_status", "batch_start"]);
    expect(b.events).toEqual(a.events);
    expect(a.events[1].data).toEqual({ total_calls: 3, accepted_calls: 2 });
  });

  test("should keep dispatching when a handler throws", () => {
    const session = new StreamingSession({ sessionId: "s", logger });
    const after = new CollectingHandler();
    session.addHandler({
      handleEvent: () => {
        throw new Error("observer broke");
      },
    });
    session.addHandler(after);

    expect(() => session.emit(StreamEventBuilder.processingStatus("s", "x"))).not.toThrow();
    expect(after.events).toHaveLength(1);
  });

  test("should bound history and filter it", () => {
    const session = new StreamingSession({ sessionId: "s", maxHistorySize: 3, logger });
    session.emit(StreamEventBuilder.batchStart("s", 1, 1));
    ["a", "b", "c"].forEach((m) => session.emit(StreamEventBuilder.processingStatus("s", m)));

    expect(session.getHistory().map((e) => e.data)).toEqual([{ message: "a" }, { message: "b" }, { message: "c" }]);
    expect(session.getHistory({ type: "batch_start" })).toEqual([]);
    expect(session.getHistory({ limit: 1 }).map((e) => e.data)).toEqual([{ message: "c" }]);
    expect(session.getHistory({ limit: 0 })).toEqual([]);
    expect(session.eventCount).toBe(4);
  });

  test("should close handlers and drop later events", async () => {
    const session = new StreamingSession({ sessionId: "s", logger });
    const handler = new CollectingHandler();
    session.addHandler(handler);

    await session.close();
    session.emit(StreamEventBuilder.processingStatus("s", "late"));

    expect(handler.closed).toBe(true);
    expect(handler.events).toEqual([]);
    expect(session.isClosed).toBe(true);
  });

  test("should stop dispatching to a removed handler", () => {
    const session = new StreamingSession({ sessionId: "s", logger });
    const handler = new CollectingHandler();
    session.addHandler(handler);
    session.removeHandler(handler);
    session.emit(StreamEventBuilder.processingStatus("s", "x"));
    expect(handler.events).toEqual([]);
  });

  test("should accept a logging handler", () => {
    const session = new StreamingSession({ sessionId: "s", logger });
    session.addHandler(new LoggingStreamHandler(logger));
    expect(() => session.emit(StreamEventBuilder.error("s", "bad", { code: 1 }))).not.toThrow();
  });
});

describe("StreamEventBuilder", () => {
  test("should build frozen events with ids and ISO timestamps", () => {
    const event = StreamEventBuilder.error("s", "bad", { code: 1 });
    expect(Object.isFrozen(event)).toBe(true);
    expect(event.id).toHaveLength(26);
    expect(new Date(event.timestamp).toISOString()).toBe(event.timestamp);
    expect(event.data).toEqual({ error_message: "bad", details: { code: 1 } });
  });

  test("should summarise a batch", () => {
    const outcome = {
      callId: "c",
      executionId: "c",
      toolName: "t",
      arguments: {},
      result: { success: true },
      success: true,
      executionTime: 0.5,
    };
    const event = StreamEventBuilder.batchEnd("s", [outcome, { ...outcome, success: false }], 1.25);
    expect(event.data).toEqual({ succeeded: 1, failed: 1, execution_time: 1.25 });
    expect(serializeOutcome(outcome)).toEqual({
      call_id: "c",
      execution_id: "c",
      tool_name: "t",
      arguments: {},
      result: { success: true },
      success: true,
      execution_time: 0.5,
    });
  });
});
