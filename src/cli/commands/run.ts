/**
 * toolcast run <batch.json>
 * Executes a batch file and writes the event stream to stdout, as SSE frames or readable lines.
 */

import fs from "fs";
import { Command, InvalidArgumentError } from "commander";
import { ToolcastConfig, loadConfig } from "../../core/config";
import { ToolcastLogger, createSilentLogger } from "../../core/logger";
import { toErrorMessage } from "../../core/errors";
import { createMockBackend } from "../../core/tools/backends";
import { runBatch, serializeBatchResult } from "../../core/tool-engine/batchRunner";
import { StreamingSession } from "../../core/streaming/streamingSession";
import { SseHandler, SseWriter } from "../../core/streaming/sseHandler";
import { CliStreamHandler } from "../../core/streaming/cliHandler";
import { StreamEventBuilder } from "../../core/streaming/streamTypes";
import { BatchRequest, BatchRequestSchema } from "../../server/routes/schemas";
import { formatZodIssues } from "../../server/middleware/validation";
import { createRuntime } from "../../runtime";

export type RunOutputFormat = "sse" | "text";

export interface RunFileOptions {
  format?: RunOutputFormat;
  /** Text format only */
  showTimestamps?: boolean;
  mockDelayMs?: number;
  maxConcurrent?: number;
  config?: ToolcastConfig;
  logger?: ToolcastLogger;
  /** Where diagnostics go; stdout carries the frames */
  reportError?: (message: string) => void;
}

function parseIntOption(min: number) {
  return (value: string): number => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < min) {
      throw new InvalidArgumentError(`Expected an integer >= ${min}.`);
    }
    return parsed;
  };
}

function parseFormat(value: string): RunOutputFormat {
  if (value === "sse" || value === "text") return value;
  throw new InvalidArgumentError("Expected sse or text.");
}

/**
 * Read and validate a batch file. Accepts `{ session_id?, tool_calls }` or a bare array of calls.
 */
export function readBatchFile(file: string): { ok: true; batch: BatchRequest } | { ok: false; error: string } {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, "utf8"));
  } catch (e) {
    return { ok: false, error: `Cannot read batch file ${file}: ${toErrorMessage(e)}` };
  }

  const result = BatchRequestSchema.safeParse(Array.isArray(raw) ? { tool_calls: raw } : raw);
  if (!result.success) {
    const issues = formatZodIssues(result.error).map((d) => `${d.path || "<root>"}: ${d.message}`);
    return { ok: false, error: `Invalid batch file ${file}: ${issues.join("; ")}` };
  }
  return { ok: true, batch: result.data };
}

/**
 * Returns the process exit code
 */
export async function executeBatchFile(file: string, write: SseWriter, options: RunFileOptions = {}): Promise<number> {
  const reportError = options.reportError ?? ((message: string) => console.error(message));
  const loaded = readBatchFile(file);
  if (!loaded.ok) {
    reportError(loaded.error);
    return 1;
  }

  const base = options.config ?? loadConfig();
  const config =
    options.maxConcurrent !== undefined
      ? { ...base, pool: { ...base.pool, maxConcurrentTools: options.maxConcurrent } }
      : base;
  const logger = options.logger ?? createSilentLogger();

  const runtime = createRuntime(config, {
    logger,
    backend: options.mockDelayMs !== undefined ? createMockBackend({ delayMs: options.mockDelayMs }) : undefined,
  });

  const { batch } = loaded;
  const session = new StreamingSession({ sessionId: batch.session_id, logger });

  let sse: SseHandler | undefined;
  if (options.format === "text") {
    session.addHandler(
      new CliStreamHandler({ write: (line) => write(`${line}\n`), showTimestamps: options.showTimestamps })
    );
  } else {
    sse = new SseHandler({ writer: write, autoHeartbeat: false, bufferSize: 0, logger });
    session.addHandler(sse);
    sse.sendConnectionEvent(session.sessionId, { total_calls: batch.tool_calls.length, source: file });
  }
  session.emit(StreamEventBuilder.processingStatus(session.sessionId, `Processing ${batch.tool_calls.length} tool call(s)`));

  const result = await runBatch(runtime.executor, batch.tool_calls, session);
  sse?.sendCompletionEvent(serializeBatchResult(result));
  await session.close();
  return 0;
}

export function runCommand(): Command {
  const cmd = new Command("run");
  cmd
    .description("Execute a batch of tool calls from a JSON file and stream its events")
    .argument("<batch.json>", "file with { session_id?, tool_calls } or an array of tool calls")
    .option("--format <format>", "sse frames or readable text", parseFormat, "sse")
    .option("--timestamps", "prefix text lines with the event time")
    .option("--mock-delay <ms>", "use the mock backend with this delay", parseIntOption(0))
    .option("--max-concurrent <n>", "override the concurrency bound", parseIntOption(1))
    .option("--config <path>", "path to toolcast.config.json")
    .action(
      async (
        file: string,
        opts: { format: RunOutputFormat; timestamps?: boolean; mockDelay?: number; maxConcurrent?: number; config?: string }
      ) => {
        try {
          process.exitCode = await executeBatchFile(file, (chunk) => process.stdout.write(chunk), {
            format: opts.format,
            showTimestamps: opts.timestamps,
            mockDelayMs: opts.mockDelay,
            maxConcurrent: opts.maxConcurrent,
            config: loadConfig({ file: opts.config }),
          });
        } catch (e) {
          console.error("Run failed:", toErrorMessage(e));
          process.exitCode = 1;
        }
      }
    );

  return cmd;
}
