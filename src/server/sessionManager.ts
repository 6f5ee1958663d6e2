/**
 * In-memory status of recent batch sessions, served by GET /sessions/:id
 */

import { StreamingSession } from "../core/streaming/streamingSession";
import { BatchRunResult } from "../core/tool-engine/batchRunner";

export type SessionStatus = "processing" | "completed" | "failed";

export interface SessionRecord {
  session_id: string;
  status: SessionStatus;
  started_at: string;
  finished_at?: string;
  total_calls: number;
  event_count: number;
  succeeded?: number;
  failed?: number;
  error_count?: number;
  error?: string;
}

interface TrackedSession {
  record: SessionRecord;
  session: StreamingSession;
  finishedAt?: number;
}

export interface SessionManagerOptions {
  retentionMs?: number;
  /** How often finished sessions are swept; defaults to retentionMs */
  sweepIntervalMs?: number;
}

export class SessionManager {
  private readonly sessions = new Map<string, TrackedSession>();
  private readonly retentionMs: number;
  private sweepTimer: NodeJS.Timeout | null;

  constructor(options: SessionManagerOptions = {}) {
    this.retentionMs = options.retentionMs ?? 300_000;
    this.sweepTimer = setInterval(() => this.sweep(), options.sweepIntervalMs ?? this.retentionMs);
    this.sweepTimer.unref();
  }

  begin(session: StreamingSession, totalCalls: number): SessionRecord {
    const record: SessionRecord = {
      session_id: session.sessionId,
      status: "processing",
      started_at: new Date().toISOString(),
      total_calls: totalCalls,
      event_count: 0,
    };
    this.sessions.set(session.sessionId, { record, session });
    return record;
  }

  complete(sessionId: string, result: BatchRunResult): void {
    const tracked = this.sessions.get(sessionId);
    if (!tracked) return;
    const succeeded = result.outcomes.filter((o) => o.success).length;
    Object.assign(tracked.record, {
      status: "completed",
      finished_at: new Date().toISOString(),
      succeeded,
      failed: result.outcomes.length - succeeded,
      error_count: result.errors.length,
    });
    tracked.finishedAt = Date.now();
  }

  fail(sessionId: string, message: string): void {
    const tracked = this.sessions.get(sessionId);
    if (!tracked) return;
    Object.assign(tracked.record, {
      status: "failed",
      finished_at: new Date().toISOString(),
      error: message,
    });
    tracked.finishedAt = Date.now();
  }

  get(sessionId: string): SessionRecord | undefined {
    const tracked = this.sessions.get(sessionId);
    if (!tracked) return undefined;
    return { ...tracked.record, event_count: tracked.session.eventCount };
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Forget sessions that finished more than retentionMs ago. Returns how many were removed.
   */
  sweep(now = Date.now()): number {
    let removed = 0;
    for (const [id, tracked] of this.sessions) {
      if (tracked.finishedAt !== undefined && now - tracked.finishedAt >= this.retentionMs) {
        this.sessions.delete(id);
        removed++;
      }
    }
    return removed;
  }

  dispose(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    this.sessions.clear();
  }
}
