/**
 * toolcast public API
 */

export * from "./core/types";
export * from "./core/errors";
export * from "./core/tool-engine";
export { ToolcastConfig, ConfigSchema, loadConfig, parseConfig, LoadConfigOptions } from "./core/config";
export {
  ToolcastLogger,
  createSilentLogger,
  initializeLogger,
  getLogger,
  LoggerConfig,
  LogLevel,
  LogFormat,
} from "./core/logger";
export { StreamingSession, StreamHandler, LoggingStreamHandler } from "./core/streaming/streamingSession";
export { SseHandler, SseWriter, formatSseFrame } from "./core/streaming/sseHandler";
export {
  StreamEvent,
  StreamEventType,
  StreamEventBuilder,
  ToolCallStatus,
  serializeOutcome,
  serializeErrorRecord,
} from "./core/streaming/streamTypes";
export { ToolBackend, createHttpBackend, createMockBackend } from "./core/tools/backends";
export { BUILTIN_TOOLS, registerBuiltinTools, DEFAULT_BUILTIN_TOOLS_CONFIG } from "./core/tools/builtinTools";
export { createRuntime, ToolcastRuntime } from "./runtime";
export { startServer, RunningServer, StartServerOptions } from "./server/index";
