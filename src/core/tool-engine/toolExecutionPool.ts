// toolExecutionPool.ts

import { ExecutionOutcome, MAX_TIMER_DELAY_MS, ToolArguments, isTimerDelay } from "../types";
import { ToolCancelledError, ToolTimeoutError, ValidationError, toErrorMessage } from "../errors";
import { ToolcastLogger, getLogger } from "../logger";

export type PoolExecutionStatus =
  | "pending"
  | "running"
  | "completed"
  | "failed"
  | "timed_out"
  | "cancelled";

export type PoolTerminalStatus = Exclude<PoolExecutionStatus, "pending" | "running">;

export interface PoolWorkContext {
  executionId: string;
  /** Aborted on timeout or cancellation; the work is expected to stop early if it can */
  signal: AbortSignal;
}

export type PoolWork = (context: PoolWorkContext) => Promise<ExecutionOutcome>;

export interface PoolSubmission {
  callId: string;
  toolName: string;
  arguments: ToolArguments;
  timeoutMs?: number;
  work: PoolWork;
  /** External cancellation, e.g. the client went away */
  signal?: AbortSignal;
}

export interface PoolExecution {
  readonly executionId: string;
  readonly callId: string;
  readonly toolName: string;
  status: PoolExecutionStatus;
  startedAt?: number;
}

export interface PoolStats {
  maxConcurrent: number;
  running: number;
  queued: number;
  activeIdentities: number;
  /** Executions settled since the pool was created, by terminal status */
  finished: Record<PoolTerminalStatus, number>;
}

export interface ToolExecutionPoolOptions {
  maxConcurrent?: number;
  defaultTimeoutMs?: number;
  logger?: ToolcastLogger;
}

interface QueuedExecution {
  execution: PoolExecution;
  submission: PoolSubmission;
  timeoutMs: number;
  controller: AbortController;
  resolve: (outcome: ExecutionOutcome) => void;
  timer?: NodeJS.Timeout;
  detachSignal?: () => void;
  settled: boolean;
}

/**
 * Bounded-concurrency gate for tool work.
 *
 * All bookkeeping (queue, running count, active identities) is mutated only in
 * synchronous sections, so no interleaving on the event loop can lose an update.
 * A timed-out work item is abandoned, not killed: its signal is aborted and its
 * late result discarded.
 */
export class ToolExecutionPool {
  private readonly maxConcurrent: number;
  private readonly defaultTimeoutMs: number;
  private readonly logger: ToolcastLogger;
  private readonly queue: QueuedExecution[] = [];
  private readonly activeIds: Set<string> = new Set();
  private runningCount = 0;
  private aliasCounter = 0;
  private readonly finished: Record<PoolTerminalStatus, number> = {
    completed: 0,
    failed: 0,
    timed_out: 0,
    cancelled: 0,
  };

  constructor(options: ToolExecutionPoolOptions = {}) {
    this.maxConcurrent = options.maxConcurrent ?? 5;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? 60_000;
    this.logger = options.logger ?? getLogger();

    if (!Number.isInteger(this.maxConcurrent) || this.maxConcurrent < 1) {
      throw new ValidationError(`maxConcurrent must be a positive integer, got ${this.maxConcurrent}`);
    }
    if (!isTimerDelay(this.defaultTimeoutMs)) {
      throw new ValidationError(timeoutRangeMessage(this.defaultTimeoutMs));
    }
  }

  submit(submission: PoolSubmission): Promise<ExecutionOutcome> {
    const executionId = this.claimIdentity(submission.callId);
    const timeoutMs = submission.timeoutMs ?? this.defaultTimeoutMs;

    return new Promise<ExecutionOutcome>((resolve) => {
      const entry: QueuedExecution = {
        execution: {
          executionId,
          callId: submission.callId,
          toolName: submission.toolName,
          status: "pending",
        },
        submission,
        timeoutMs,
        controller: new AbortController(),
        resolve,
        settled: false,
      };

      if (!isTimerDelay(timeoutMs)) {
        const error = new ValidationError(timeoutRangeMessage(timeoutMs));
        this.logger.warn(error.message, { callId: submission.callId, toolName: submission.toolName });
        this.settle(entry, this.failedOutcome(entry, error.message, 0), "failed");
        return;
      }

      const external = submission.signal;
      if (external) {
        if (external.aborted) {
          this.cancel(entry);
          return;
        }
        const onAbort = () => this.cancel(entry);
        external.addEventListener("abort", onAbort, { once: true });
        entry.detachSignal = () => external.removeEventListener("abort", onAbort);
      }

      this.queue.push(entry);
      this.tryRunNext();
    });
  }

  getStats(): PoolStats {
    return {
      maxConcurrent: this.maxConcurrent,
      running: this.runningCount,
      queued: this.queue.length,
      activeIdentities: this.activeIds.size,
      finished: { ...this.finished },
    };
  }

  isActive(identity: string): boolean {
    return this.activeIds.has(identity);
  }

  private claimIdentity(callId: string): string {
    let identity = callId;
    while (this.activeIds.has(identity)) {
      identity = `${callId}_${Date.now()}_${++this.aliasCounter}`;
    }
    if (identity !== callId) {
      this.logger.debug("Duplicate call id aliased", { callId, executionId: identity });
    }
    this.activeIds.add(identity);
    return identity;
  }

  private tryRunNext(): void {
    while (this.runningCount < this.maxConcurrent) {
      const next = this.queue.shift();
      if (!next) {
        return;
      }
      // A batch abort cancels entries one listener at a time; never start one already aborted
      if (next.submission.signal?.aborted) {
        this.cancel(next);
        continue;
      }
      this.start(next);
    }
  }

  private start(entry: QueuedExecution): void {
    const { execution, submission, controller } = entry;

    this.runningCount++;
    execution.status = "running";
    execution.startedAt = Date.now();
    entry.timer = setTimeout(() => this.expire(entry), entry.timeoutMs);

    let work: Promise<ExecutionOutcome>;
    try {
      work = submission.work({ executionId: execution.executionId, signal: controller.signal });
    } catch (error) {
      work = Promise.reject(error);
    }

    void work.then(
      (outcome) => {
        this.settle(
          entry,
          { ...outcome, executionId: execution.executionId },
          outcome.success ? "completed" : "failed"
        );
      },
      (error: unknown) => {
        const message = toErrorMessage(error);
        this.logger.error(`Pool work for ${execution.toolName} rejected: ${message}`, {
          callId: execution.callId,
          executionId: execution.executionId,
        });
        this.settle(entry, this.failedOutcome(entry, message, this.elapsedSeconds(entry)), "failed");
      }
    );
  }

  private expire(entry: QueuedExecution): void {
    if (entry.settled) return;

    const error = new ToolTimeoutError(entry.timeoutMs);
    this.logger.warn(error.message, {
      callId: entry.execution.callId,
      executionId: entry.execution.executionId,
      toolName: entry.execution.toolName,
    });
    // Settle first so the caller sees the timeout before any abort-driven rejection
    this.settle(entry, this.failedOutcome(entry, error.message, entry.timeoutMs / 1000), "timed_out");
    entry.controller.abort(error);
  }

  private cancel(entry: QueuedExecution): void {
    if (entry.settled) return;

    const wasRunning = entry.execution.status === "running";
    const error = new ToolCancelledError();
    const elapsed = wasRunning ? this.elapsedSeconds(entry) : 0;
    this.settle(entry, this.failedOutcome(entry, error.message, elapsed), "cancelled");
    if (wasRunning) {
      entry.controller.abort(error);
    }
  }

  /**
   * Single exit path: every terminal transition goes through here exactly once.
   */
  private settle(entry: QueuedExecution, outcome: ExecutionOutcome, status: PoolTerminalStatus): void {
    if (entry.settled) return;
    entry.settled = true;

    const wasRunning = entry.execution.status === "running";
    entry.execution.status = status;
    this.finished[status]++;

    if (entry.timer) clearTimeout(entry.timer);
    entry.detachSignal?.();
    this.activeIds.delete(entry.execution.executionId);

    if (wasRunning) {
      this.runningCount--;
    } else {
      const index = this.queue.indexOf(entry);
      if (index !== -1) this.queue.splice(index, 1);
    }

    entry.resolve(outcome);
    this.tryRunNext();
  }

  private failedOutcome(entry: QueuedExecution, message: string, executionTime: number): ExecutionOutcome {
    return {
      callId: entry.submission.callId,
      executionId: entry.execution.executionId,
      toolName: entry.submission.toolName,
      arguments: entry.submission.arguments,
      result: { success: false, error: message },
      success: false,
      executionTime,
    };
  }

  private elapsedSeconds(entry: QueuedExecution): number {
    return entry.execution.startedAt ? (Date.now() - entry.execution.startedAt) / 1000 : 0;
  }
}

function timeoutRangeMessage(timeoutMs: number): string {
  return `timeoutMs must be in (0, ${MAX_TIMER_DELAY_MS}], got ${timeoutMs}`;
}
