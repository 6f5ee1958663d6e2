/**
 * Out-of-band error log for a batch.
 * Dropped calls never reach the stream, so this is the only place they show up.
 */

import { ToolcastLogger, getLogger } from "../logger";

export type ErrorSource = "validator.parse" | "validator.schema" | "executor.invoke";

export interface ErrorRecord {
  source: ErrorSource;
  toolName: string;
  message: string;
  /** Epoch milliseconds */
  timestamp: number;
}

export class ErrorLog {
  private readonly records: ErrorRecord[] = [];
  private readonly logger: ToolcastLogger;

  constructor(logger?: ToolcastLogger) {
    this.logger = logger ?? getLogger();
  }

  record(entry: Omit<ErrorRecord, "timestamp">): ErrorRecord {
    const record: ErrorRecord = { ...entry, timestamp: Date.now() };
    this.records.push(record);
    this.logger.warn(record.message, { source: record.source, toolName: record.toolName });
    return record;
  }

  entries(): ErrorRecord[] {
    return [...this.records];
  }

  bySource(source: ErrorSource): ErrorRecord[] {
    return this.records.filter((r) => r.source === source);
  }

  get size(): number {
    return this.records.length;
  }
}
