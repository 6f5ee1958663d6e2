/**
 * ToolExecutor Unit Tests
 */

import { ToolExecutor } from "../src/core/tool-engine/toolExecutor";
import { ToolExecutionPool } from "../src/core/tool-engine/toolExecutionPool";
import { ToolRegistry } from "../src/core/tool-engine/registry";
import { ErrorLog } from "../src/core/tool-engine/errorLog";
import { createSilentLogger } from "../src/core/logger";
import { registerBuiltinTools } from "../src/core/tools/builtinTools";
import { ToolBackend } from "../src/core/tools/backends";
import { call, createTestSession, delay, fakeTool, field, untilAborted } from "./helpers";

const looseSchema = (required: string[]) => ({
  type: "object",
  properties: Object.fromEntries(required.map((name) => [name, { type: "array", items: { type: "string" } }])),
  required,
});

describe("ToolExecutor", () => {
  const logger = createSilentLogger();
  let registry: ToolRegistry;

  const createExecutor = (maxConcurrent = 5) =>
    new ToolExecutor({ registry, pool: new ToolExecutionPool({ maxConcurrent, logger }), logger });

  beforeEach(() => {
    registry = new ToolRegistry();
    registry
      .register(fakeTool("research", undefined, { priority: 1, parameters: looseSchema(["keywords"]) }))
      .register(fakeTool("short_planning", undefined, { priority: 1 }))
      .register(fakeTool("tool_recommend", undefined, { priority: 2 }))
      .register(fakeTool("notes"));
  });

  test("should return outcomes in priority order, stable within a priority", async () => {
    const { session } = createTestSession();
    const outcomes = await createExecutor().executeBatch(
      [
        call("c1", "tool_recommend"),
        call("c2", "notes"),
        call("c3", "research", { keywords: ["queue"] }),
        call("c4", "short_planning"),
      ],
      session
    );

    expect(outcomes.map((o) => o.callId)).toEqual(["c3", "c4", "c1", "c2"]);
    expect(outcomes.every((o) => o.success)).toBe(true);
  });

  test("should keep priority order even when low-priority calls finish first", async () => {
    registry = new ToolRegistry();
    registry
      .register(
        fakeTool(
          "slow_first",
          async () => {
            await delay(30);
            return { success: true };
          },
          { priority: 1 }
        )
      )
      .register(fakeTool("fast_later", async () => ({ success: true }), { priority: 2 }));

    const { session } = createTestSession();
    const outcomes = await createExecutor().executeBatch(
      [call("b", "fast_later"), call("a", "slow_first")],
      session
    );
    expect(outcomes.map((o) => o.callId)).toEqual(["a", "b"]);
  });

  test("should drop invalid calls, record them and emit nothing for them", async () => {
    const { session, collector } = createTestSession();
    const errorLog = new ErrorLog(logger);

    const outcomes = await createExecutor().executeBatch(
      [call("bad-json", "notes", "{bad"), call("bad-args", "research", {}), call("good", "notes", { a: 1 })],
      session,
      { errorLog }
    );

    expect(outcomes.map((o) => o.callId)).toEqual(["good"]);
    expect(collector.forCall("bad-json")).toEqual([]);
    expect(collector.forCall("bad-args")).toEqual([]);

    const [parse, schema] = errorLog.entries();
    expect(parse.source).toBe("validator.parse");
    expect(parse.toolName).toBe("notes");
    expect(parse.message).toContain("Invalid JSON arguments:");
    expect(parse.message).toContain("raw: {bad");
    expect(schema.source).toBe("validator.schema");
    expect(schema.message).toBe("Argument validation failed for research: / must have required property 'keywords'");
  });

  test("should return an empty list when every call is invalid", async () => {
    const { session, collector } = createTestSession();
    const outcomes = await createExecutor().executeBatch([call("x", "notes", "[1,2]")], session);
    expect(outcomes).toEqual([]);
    expect(collector.events).toEqual([]);
  });

  test("should emit start, running and one terminal event per call", async () => {
    registry.register(
      fakeTool("chatty", async (args, context) => {
        context.reportProgress("halfway");
        return { success: true, value: 42 };
      })
    );
    const { session, collector } = createTestSession();

    const [outcome] = await createExecutor().executeBatch([call("c", "chatty")], session);

    const events = collector.forCall("c");
    expect(events.map((e) => e.event_type)).toEqual([
      "tool_call_start",
      "tool_call_progress",
      "tool_call_progress",
      "tool_call_end",
    ]);
    expect(events.map((e) => field(e.data, "status"))).toEqual(["starting", "running", "running", "completed"]);
    expect(events.map((e) => field(e.data, "progress_message"))).toEqual([
      "Calling chatty...",
      "Running chatty...",
      "halfway",
      "chatty completed",
    ]);
    expect(field(events[3].data, "result")).toEqual({ success: true, value: 42 });
    expect(field(events[3].data, "execution_time")).toBe(outcome.executionTime);
  });

  test("should turn a thrown error into a failed outcome", async () => {
    registry.register(
      fakeTool("flaky", async () => {
        throw new Error("boom");
      })
    );
    const { session, collector } = createTestSession();
    const errorLog = new ErrorLog(logger);

    const [flaky, other] = await createExecutor().executeBatch(
      [call("f", "flaky"), call("n", "notes")],
      session,
      { errorLog }
    );

    expect(flaky.success).toBe(false);
    expect(flaky.result).toEqual({ success: false, error: "boom" });
    expect(other.success).toBe(true);
    expect(errorLog.bySource("executor.invoke").map((r) => r.message)).toEqual(["Tool flaky raised: boom"]);

    const end = collector.forCall("f").filter((e) => e.event_type === "tool_call_end");
    expect(end).toHaveLength(1);
    expect(field(end[0].data, "status")).toBe("failed");
    expect(field(end[0].data, "error_message")).toBe("boom");
  });

  test("should treat a result without success: true as a failure", async () => {
    registry.register(fakeTool("shy", async () => ({ success: false })));
    const { session, collector } = createTestSession();

    const [outcome] = await createExecutor().executeBatch([call("s", "shy")], session);

    expect(outcome.success).toBe(false);
    expect(outcome.result.error).toBe("Tool reported failure");
    const end = collector.forCall("s").find((e) => e.event_type === "tool_call_end");
    expect(field(end?.data, "progress_message")).toBe("shy failed");
  });

  test("should fail an unknown tool at invocation time", async () => {
    const { session } = createTestSession();
    const errorLog = new ErrorLog(logger);

    const [outcome] = await createExecutor().executeBatch([call("u", "mystery")], session, { errorLog });

    expect(outcome.success).toBe(false);
    expect(outcome.result.error).toBe("Unknown tool: mystery");
    expect(errorLog.entries().map((r) => r.message)).toEqual(["Tool mystery raised: Unknown tool: mystery"]);
  });

  test("should emit exactly one terminal event for a timed-out call", async () => {
    registry.register(fakeTool("stuck", (args, context) => untilAborted(context), { timeoutMs: 40 }));
    const { session, collector } = createTestSession();
    const errorLog = new ErrorLog(logger);

    const [outcome] = await createExecutor().executeBatch([call("t", "stuck")], session, { errorLog });
    await delay(5);

    expect(outcome.result.error).toBe("Tool execution timed out after 0.04 seconds");
    const events = collector.forCall("t");
    expect(events.map((e) => e.event_type)).toEqual(["tool_call_start", "tool_call_progress", "tool_call_end"]);
    expect(field(events[2].data, "error_message")).toBe("Tool execution timed out after 0.04 seconds");
    expect(errorLog.size).toBe(0);
  });

  test("should not let one call's timeout delay the others", async () => {
    registry.register(fakeTool("stuck", (args, context) => untilAborted(context), { timeoutMs: 40 }));
    const { session } = createTestSession();

    const outcomes = await createExecutor(2).executeBatch(
      [call("t", "stuck"), call("a", "notes"), call("b", "notes"), call("c", "notes")],
      session
    );

    expect(outcomes.map((o) => [o.callId, o.success])).toEqual([
      ["t", false],
      ["a", true],
      ["b", true],
      ["c", true],
    ]);
    expect(outcomes.slice(1).every((o) => o.executionTime < 0.04)).toBe(true);
  });

  test("should cancel running and pending calls when the batch signal aborts", async () => {
    registry.register(fakeTool("stuck", (args, context) => untilAborted(context)));
    const { session, collector } = createTestSession();
    const controller = new AbortController();

    const batch = createExecutor(1).executeBatch([call("r", "stuck"), call("p", "stuck")], session, {
      signal: controller.signal,
    });
    await delay(5);
    controller.abort();
    const outcomes = await batch;
    await delay(5);

    expect(outcomes.map((o) => o.result.error)).toEqual(["Tool execution cancelled", "Tool execution cancelled"]);
    expect(collector.forCall("r").map((e) => e.event_type)).toEqual([
      "tool_call_start",
      "tool_call_progress",
      "tool_call_end",
    ]);
    expect(collector.forCall("p").map((e) => e.event_type)).toEqual(["tool_call_end"]);
  });

  test("should run two calls sharing an id and return both outcomes", async () => {
    registry.register(
      fakeTool("slow", async (args) => {
        await delay(10);
        return { success: true, echo: args };
      })
    );
    const { session, collector } = createTestSession();

    const outcomes = await createExecutor(2).executeBatch([call("d", "slow", { n: 1 }), call("d", "slow", { n: 2 })], session);

    expect(outcomes.map((o) => [o.callId, o.success])).toEqual([
      ["d", true],
      ["d", true],
    ]);
    expect(outcomes[0].executionId).toBe("d");
    expect(outcomes[1].executionId).toMatch(/^d_\d+_\d+$/);
    expect(outcomes.map((o) => o.result.echo)).toEqual([{ n: 1 }, { n: 2 }]);
    expect(collector.forCall("d").filter((e) => e.event_type === "tool_call_end")).toHaveLength(2);
  });

  test("should hand the tool a copy of the validated arguments", async () => {
    let received: unknown;
    registry.register(
      fakeTool(
        "defaults",
        async (args) => {
          received = args;
          args.mutated = true;
          return { success: true };
        },
        { parameters: { type: "object", properties: { mode: { type: "string", default: "quick" } } } }
      )
    );
    const { session } = createTestSession();

    const [outcome] = await createExecutor().executeBatch([call("d", "defaults", {})], session);

    expect(received).toEqual({ mode: "quick", mutated: true });
    expect(outcome.arguments).toEqual({ mode: "quick" });
  });
});

describe("ToolExecutor with the built-in tools", () => {
  const logger = createSilentLogger();
  const researchCall = call("r", "research", { keywords: ["sse"], focus_areas: ["api"] });
  const planningCall = call("p", "short_planning", { user_requirements: "todo app" });

  const build = (backend: ToolBackend) => {
    const registry = registerBuiltinTools(new ToolRegistry(), backend);
    return new ToolExecutor({ registry, pool: new ToolExecutionPool({ logger }), logger });
  };

  afterEach(() => {
    jest.useRealTimers();
  });

  test("should run research and short_planning to success", async () => {
    const executor = build(async (name) => ({ success: true, tool: name }));
    const { session, collector } = createTestSession();

    const outcomes = await executor.executeBatch([researchCall, planningCall], session);

    expect(outcomes.map((o) => [o.callId, o.success])).toEqual([
      ["r", true],
      ["p", true],
    ]);
    for (const id of ["r", "p"]) {
      expect(collector.forCall(id).map((e) => e.event_type)).toEqual([
        "tool_call_start",
        "tool_call_progress",
        "tool_call_end",
      ]);
    }
  });

  test("should time research out at 90 seconds without affecting short_planning", async () => {
    jest.useFakeTimers({ doNotFake: ["nextTick", "queueMicrotask"] });
    const executor = build((name, _args, context) =>
      name === "research" ? untilAborted(context) : Promise.resolve({ success: true })
    );
    const { session, collector } = createTestSession();

    const pending = executor.executeBatch([researchCall, planningCall], session);
    await jest.advanceTimersByTimeAsync(89_999);
    expect(collector.forCall("r").map((e) => e.event_type)).not.toContain("tool_call_end");

    await jest.advanceTimersByTimeAsync(1);
    const [research, planning] = await pending;

    expect(research.success).toBe(false);
    expect(research.result.error).toBe("Tool execution timed out after 90 seconds");
    expect(research.executionTime).toBe(90);
    expect(planning.success).toBe(true);
    const researchEvents = collector.forCall("r");
    expect(field(researchEvents[researchEvents.length - 1].data, "status")).toBe("failed");
  });
});
