/**
 * Call validator tests
 */

import { parseArguments, validateToolCall, formatSchemaErrors } from "../src/core/tool-engine/validator";
import { ToolRegistry } from "../src/core/tool-engine/registry";
import { call, fakeTool } from "./helpers";

describe("parseArguments", () => {
  test("should parse a JSON object", () => {
    expect(parseArguments('{"query":"redis","top_k":3}')).toEqual({ ok: true, value: { query: "redis", top_k: 3 } });
  });

  test("should treat an empty string as no arguments", () => {
    expect(parseArguments("")).toEqual({ ok: true, value: {} });
    expect(parseArguments("   ")).toEqual({ ok: true, value: {} });
  });

  test("should reject non-object JSON", () => {
    expect(parseArguments("null")).toEqual({ ok: false, message: "Arguments must be a JSON object, got null" });
    expect(parseArguments("[1]")).toEqual({ ok: false, message: "Arguments must be a JSON object, got array" });
    expect(parseArguments("7")).toEqual({ ok: false, message: "Arguments must be a JSON object, got number" });
  });

  test("should reject a non-string payload", () => {
    expect(parseArguments({ already: "parsed" })).toEqual({
      ok: false,
      message: "Arguments must be a JSON string, got object",
    });
  });

  test("should include a bounded preview of malformed JSON", () => {
    const raw = `{${"x".repeat(300)}`;
    const result = parseArguments(raw);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.message.startsWith("Invalid JSON arguments: ")).toBe(true);
    expect(result.message.endsWith(`; raw: {${"x".repeat(199)}...`)).toBe(true);
  });
});

describe("validateToolCall", () => {
  let registry: ToolRegistry;

  beforeEach(() => {
    registry = new ToolRegistry({ defaultPriority: 3, defaultTimeoutMs: 1000 });
    registry.register(
      fakeTool("design", undefined, {
        priority: 2,
        timeoutMs: 5000,
        parameters: {
          type: "object",
          properties: {
            design_mode: { type: "string", enum: ["quick", "deep"] },
            depth: { type: "integer", default: 1 },
          },
          required: ["design_mode"],
        },
      })
    );
  });

  test("should produce a frozen call with registry priority and timeout", () => {
    const outcome = validateToolCall(call("d1", "design", { design_mode: "quick" }), registry);
    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;

    expect(outcome.call).toEqual({
      callId: "d1",
      toolName: "design",
      arguments: { design_mode: "quick", depth: 1 },
      priority: 2,
      timeoutMs: 5000,
    });
    expect(Object.isFrozen(outcome.call)).toBe(true);
    expect(Object.isFrozen(outcome.call.arguments)).toBe(true);
  });

  test("should report enum violations with the allowed values", () => {
    const outcome = validateToolCall(call("d2", "design", { design_mode: "slow" }), registry);
    expect(outcome).toEqual({
      ok: false,
      failure: {
        source: "validator.schema",
        callId: "d2",
        toolName: "design",
        message: 'Argument validation failed for design: /design_mode must be equal to one of the allowed values (allowed: "quick", "deep")',
      },
    });
  });

  test("should report parse failures with the parse source", () => {
    const outcome = validateToolCall(call("d3", "design", "not json"), registry);
    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.failure.source).toBe("validator.parse");
    expect(outcome.failure.callId).toBe("d3");
  });

  test("should pass unknown tools through with default priority and timeout", () => {
    const outcome = validateToolCall(call("u1", "unregistered", { any: "thing" }), registry);
    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.call.priority).toBe(3);
    expect(outcome.call.timeoutMs).toBe(1000);
  });
});

describe("formatSchemaErrors", () => {
  test("should fall back when there are no details", () => {
    expect(formatSchemaErrors(null)).toBe("arguments do not match schema");
  });
});
