/**
 * Call validator: raw function call -> ValidatedCall, or a failure value.
 * Never throws for bad input; the executor decides what to do with failures.
 */

import { ErrorObject } from "ajv";
import { ToolArguments, ToolCallRequest, ValidatedCall } from "../types";
import { toErrorMessage } from "../errors";
import { ToolRegistry } from "./registry";

export interface ValidationFailure {
  source: "validator.parse" | "validator.schema";
  callId: string;
  toolName: string;
  message: string;
}

export type ValidationOutcome =
  | { ok: true; call: ValidatedCall }
  | { ok: false; failure: ValidationFailure };

const RAW_PREVIEW_LIMIT = 200;

export function parseArguments(raw: unknown): { ok: true; value: ToolArguments } | { ok: false; message: string } {
  if (typeof raw !== "string") {
    return { ok: false, message: `Arguments must be a JSON string, got ${typeof raw}` };
  }
  // Models send "" for calls without parameters
  if (raw.trim() === "") {
    return { ok: true, value: {} };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    return { ok: false, message: `Invalid JSON arguments: ${toErrorMessage(e)}; raw: ${preview(raw)}` };
  }

  if (!isPlainObject(parsed)) {
    const kind = parsed === null ? "null" : Array.isArray(parsed) ? "array" : typeof parsed;
    return { ok: false, message: `Arguments must be a JSON object, got ${kind}` };
  }
  return { ok: true, value: parsed };
}

export function formatSchemaErrors(errors: ErrorObject[] | null | undefined): string {
  if (!errors || errors.length === 0) return "arguments do not match schema";
  return errors
    .map((err) => {
      const path = err.instancePath || "/";
      const allowed = err.keyword === "enum" ? ` (${formatAllowed(err.params)})` : "";
      return `${path} ${err.message ?? "is invalid"}${allowed}`;
    })
    .join("; ");
}

export function validateToolCall(request: ToolCallRequest, registry: ToolRegistry): ValidationOutcome {
  const toolName = request.function.name;
  const callId = request.id;

  const parsed = parseArguments(request.function.arguments);
  if (!parsed.ok) {
    return { ok: false, failure: { source: "validator.parse", callId, toolName, message: parsed.message } };
  }

  const args = parsed.value;
  const validate = registry.validatorFor(toolName);
  // Ajv fills schema defaults into `args` in place
  if (validate && !validate(args)) {
    return {
      ok: false,
      failure: {
        source: "validator.schema",
        callId,
        toolName,
        message: `Argument validation failed for ${toolName}: ${formatSchemaErrors(validate.errors)}`,
      },
    };
  }

  return {
    ok: true,
    call: Object.freeze({
      callId,
      toolName,
      arguments: Object.freeze(args),
      priority: registry.priorityOf(toolName),
      timeoutMs: registry.timeoutOf(toolName),
    }),
  };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function formatAllowed(params: Record<string, unknown>): string {
  const allowed = params.allowedValues;
  return Array.isArray(allowed) ? `allowed: ${allowed.map((v) => JSON.stringify(v)).join(", ")}` : "";
}

function preview(raw: string): string {
  return raw.length > RAW_PREVIEW_LIMIT ? `${raw.slice(0, RAW_PREVIEW_LIMIT)}...` : raw;
}
