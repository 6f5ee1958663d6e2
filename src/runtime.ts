/**
 * Wires registry, backend, pool and executor from a loaded configuration.
 * Shared by the server entry point and the CLI.
 */

import { ToolcastConfig } from "./core/config";
import { ToolcastLogger, getLogger } from "./core/logger";
import { ToolRegistry } from "./core/tool-engine/registry";
import { ToolExecutionPool } from "./core/tool-engine/toolExecutionPool";
import { ToolExecutor } from "./core/tool-engine/toolExecutor";
import { ToolBackend, createHttpBackend, createMockBackend } from "./core/tools/backends";
import { registerBuiltinTools } from "./core/tools/builtinTools";

export interface ToolcastRuntime {
  config: ToolcastConfig;
  registry: ToolRegistry;
  pool: ToolExecutionPool;
  executor: ToolExecutor;
  backendKind: "http" | "mock" | "custom";
  logger: ToolcastLogger;
}

export interface RuntimeOptions {
  logger?: ToolcastLogger;
  /** Replaces the configured backend */
  backend?: ToolBackend;
}

export function createBackend(config: ToolcastConfig): { kind: "http" | "mock"; backend: ToolBackend } {
  if (config.backend.url) {
    return { kind: "http", backend: createHttpBackend({ baseUrl: config.backend.url }) };
  }
  return { kind: "mock", backend: createMockBackend({ delayMs: config.backend.mockDelayMs }) };
}

export function createRuntime(config: ToolcastConfig, options: RuntimeOptions = {}): ToolcastRuntime {
  const logger = options.logger ?? getLogger();
  const configured = createBackend(config);
  const backend = options.backend ?? configured.backend;

  const registry = new ToolRegistry({
    defaultPriority: config.tools.defaultPriority,
    defaultTimeoutMs: config.pool.defaultTimeoutMs,
  });
  registerBuiltinTools(registry, backend, {
    priorities: config.tools.priorities,
    longRunningTools: config.tools.longRunningTools,
    longRunningTimeoutMs: config.tools.longRunningTimeoutMs,
  });

  const pool = new ToolExecutionPool({
    maxConcurrent: config.pool.maxConcurrentTools,
    defaultTimeoutMs: config.pool.defaultTimeoutMs,
    logger: logger.child({ source: "pool" }),
  });
  const executor = new ToolExecutor({ registry, pool, logger: logger.child({ source: "executor" }) });

  if (configured.kind === "mock" && !options.backend) {
    logger.warn("TOOL_BACKEND_URL is not set; built-in tools use the mock backend");
  }

  return {
    config,
    registry,
    pool,
    executor,
    backendKind: options.backend ? "custom" : configured.kind,
    logger,
  };
}
