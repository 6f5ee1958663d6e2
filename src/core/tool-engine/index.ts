/**
 * Tool engine: registry, validation, bounded pool and batch executor
 */

export { ToolRegistry, RegistryDefaults, ToolDescriptor } from "./registry";
export { validateToolCall, parseArguments, ValidationFailure, ValidationOutcome } from "./validator";
export {
  ToolExecutionPool,
  ToolExecutionPoolOptions,
  PoolSubmission,
  PoolWork,
  PoolWorkContext,
  PoolStats,
  PoolExecutionStatus,
} from "./toolExecutionPool";
export { ToolExecutor, ToolExecutorOptions, BatchOptions, normalizeResult } from "./toolExecutor";
export { CallLifecycle } from "./callLifecycle";
export { ErrorLog, ErrorRecord, ErrorSource } from "./errorLog";
export { runBatch, serializeBatchResult, BatchRunResult } from "./batchRunner";
