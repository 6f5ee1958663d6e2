/**
 * Built-in planning tools.
 * Each declares the argument schema the model is given; the work goes to a ToolBackend.
 */

import { JsonSchema } from "../types";
import { ToolRegistry } from "../tool-engine/registry";
import { ToolBackend } from "./backends";

export interface BuiltinToolsConfig {
  /** Tool name -> priority (lower runs first) */
  priorities: Record<string, number>;
  longRunningTools: string[];
  longRunningTimeoutMs: number;
}

interface BuiltinToolDefinition {
  name: string;
  description: string;
  parameters: JsonSchema;
}

export const BUILTIN_TOOLS: readonly BuiltinToolDefinition[] = [
  {
    name: "short_planning",
    description: "Turn raw user requirements into a short, staged project plan",
    parameters: {
      type: "object",
      properties: {
        user_requirements: { type: "string", minLength: 1, description: "Original requirement text" },
        improvement_points: { type: "array", items: { type: "string" } },
        planning_stage: { type: "string", enum: ["initial", "technical"], default: "initial" },
      },
      required: ["user_requirements"],
    },
  },
  {
    name: "tool_recommend",
    description: "Recommend packages and APIs relevant to a query",
    parameters: {
      type: "object",
      properties: {
        query: { type: "string", minLength: 1 },
        top_k: { type: "integer", minimum: 1, maximum: 20, default: 5 },
        tool_types: {
          type: "array",
          items: { type: "string", enum: ["PYTHON_PACKAGE", "APIS"] },
        },
        use_llm_filter: { type: "boolean", default: true },
      },
      required: ["query"],
    },
  },
  {
    name: "research",
    description: "Research keywords against the given focus areas",
    parameters: {
      type: "object",
      properties: {
        keywords: { type: "array", items: { type: "string" }, minItems: 1 },
        focus_areas: { type: "array", items: { type: "string" }, minItems: 1 },
        project_context: { type: "string", default: "" },
      },
      required: ["keywords", "focus_areas"],
    },
  },
  {
    name: "design",
    description: "Produce a design document in quick or deep mode",
    parameters: {
      type: "object",
      properties: {
        user_requirements: { type: "string" },
        design_mode: { type: "string", enum: ["quick", "deep"] },
      },
      required: ["design_mode"],
    },
  },
];

export const DEFAULT_BUILTIN_TOOLS_CONFIG: BuiltinToolsConfig = {
  priorities: { research: 1, short_planning: 1, tool_recommend: 2 },
  longRunningTools: ["research"],
  longRunningTimeoutMs: 90_000,
};

/**
 * Register all built-in tools; priorities and timeouts come from config
 */
export function registerBuiltinTools(
  registry: ToolRegistry,
  backend: ToolBackend,
  config: BuiltinToolsConfig = DEFAULT_BUILTIN_TOOLS_CONFIG
): ToolRegistry {
  for (const tool of BUILTIN_TOOLS) {
    registry.register({
      ...tool,
      priority: config.priorities[tool.name],
      timeoutMs: config.longRunningTools.includes(tool.name) ? config.longRunningTimeoutMs : undefined,
      invoke: (args, context) => backend(tool.name, args, context),
    });
  }
  return registry;
}
