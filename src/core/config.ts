/**
 * toolcast configuration
 *
 * Sources, later wins:
 *   1. built-in defaults
 *   2. toolcast.config.json in the working directory (optional)
 *   3. environment variables
 */

import fs from "fs";
import path from "path";
import { z } from "zod";
import { ConfigError, toErrorMessage } from "./errors";
import { MAX_TIMER_DELAY_MS } from "./types";
import { LoggerSettingsSchema } from "./logger/config";

export const CONFIG_FILE_NAME = "toolcast.config.json";

const positiveInt = z.number().int().positive();
// Durations that end up in setTimeout / setInterval
const timerMs = positiveInt.max(MAX_TIMER_DELAY_MS);

export const ConfigSchema = z
  .object({
    server: z
      .object({
        port: z.number().int().min(0).max(65535).default(4000),
        allowedOrigins: z.array(z.string()).default(["http://localhost:3000"]),
      })
      .strict()
      .default({}),
    pool: z
      .object({
        maxConcurrentTools: positiveInt.default(5),
        defaultTimeoutMs: timerMs.default(60_000),
      })
      .strict()
      .default({}),
    tools: z
      .object({
        priorities: z.record(z.number().int()).default({ research: 1, short_planning: 1, tool_recommend: 2 }),
        defaultPriority: z.number().int().default(3),
        longRunningTools: z.array(z.string()).default(["research"]),
        longRunningTimeoutMs: timerMs.default(90_000),
      })
      .strict()
      .default({}),
    streaming: z
      .object({
        heartbeatIntervalMs: timerMs.default(30_000),
        bufferSize: z.number().int().min(0).default(100),
        includeMetadata: z.boolean().default(false),
        sessionRetentionMs: timerMs.default(300_000),
      })
      .strict()
      .default({}),
    backend: z
      .object({
        url: z.string().url().optional(),
        mockDelayMs: z.number().int().min(0).max(MAX_TIMER_DELAY_MS).default(250),
      })
      .strict()
      .default({}),
    logger: LoggerSettingsSchema.default({}),
  })
  .strict();

export type ToolcastConfig = z.infer<typeof ConfigSchema>;

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Explicit file path; overrides the lookup in cwd */
  file?: string;
}

export function loadConfig(options: LoadConfigOptions = {}): ToolcastConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const filePath = options.file ?? path.join(cwd, CONFIG_FILE_NAME);

  const fromFile = readConfigFile(filePath, options.file !== undefined);
  return parseConfig(mergeEnv(fromFile, env));
}

export function parseConfig(input: unknown): ToolcastConfig {
  const result = ConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.errors.map((err) => `${err.path.join(".") || "<root>"}: ${err.message}`);
    throw new ConfigError(issues.join("; "), issues);
  }
  return result.data;
}

function readConfigFile(filePath: string, required: boolean): Record<string, unknown> {
  if (!fs.existsSync(filePath)) {
    if (required) throw new ConfigError(`config file not found: ${filePath}`);
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (e) {
    throw new ConfigError(`cannot read ${filePath}: ${toErrorMessage(e)}`);
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`${filePath} must contain a JSON object`);
  }
  return { ...parsed };
}

function mergeEnv(base: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const section = (name: string): Record<string, unknown> => {
    const value = base[name];
    return typeof value === "object" && value !== null && !Array.isArray(value) ? { ...value } : {};
  };

  const server = section("server");
  const pool = section("pool");
  const tools = section("tools");
  const streaming = section("streaming");
  const backend = section("backend");
  const logger = section("logger");

  setNumber(server, "port", env.PORT);
  if (env.ALLOWED_ORIGINS) {
    server.allowedOrigins = env.ALLOWED_ORIGINS.split(",").map((o) => o.trim()).filter(Boolean);
  }
  setNumber(pool, "maxConcurrentTools", env.TOOLCAST_MAX_CONCURRENT_TOOLS);
  setNumber(pool, "defaultTimeoutMs", env.TOOLCAST_DEFAULT_TIMEOUT_MS);
  setNumber(tools, "longRunningTimeoutMs", env.TOOLCAST_LONG_RUNNING_TIMEOUT_MS);
  setNumber(streaming, "heartbeatIntervalMs", env.TOOLCAST_HEARTBEAT_INTERVAL_MS);
  if (env.TOOL_BACKEND_URL) backend.url = env.TOOL_BACKEND_URL;
  if (env.LOG_LEVEL) logger.level = env.LOG_LEVEL;
  if (env.LOG_FORMAT) logger.format = env.LOG_FORMAT;
  if (env.LOG_FILE_ENABLED !== undefined || env.LOG_FILE_PATH) {
    const file = typeof logger.file === "object" && logger.file !== null ? { ...logger.file } : {};
    if (env.LOG_FILE_ENABLED !== undefined) Object.assign(file, { enabled: env.LOG_FILE_ENABLED === "true" });
    if (env.LOG_FILE_PATH) Object.assign(file, { path: env.LOG_FILE_PATH });
    logger.file = file;
  }

  // Shape errors are left to the schema; this only overlays values
  return { ...base, server, pool, tools, streaming, backend, logger };
}

// Non-numeric strings are passed through so the schema reports them
function setNumber(target: Record<string, unknown>, key: string, raw: string | undefined): void {
  if (raw === undefined || raw === "") return;
  const value = Number(raw);
  target[key] = Number.isNaN(value) ? raw : value;
}
