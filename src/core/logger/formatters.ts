/**
 * Logger Formatters
 * Custom Pino formatters and value helpers for structured logging
 */

import { LoggerConfig } from "./config";

const SENSITIVE_KEYS = ["password", "token", "secret", "auth", "apikey", "api_key"];

/**
 * Create Pino formatters based on configuration.
 * Multi-target transports reject a custom `level` formatter, so only `log` is set.
 */
export function createFormatter(config: LoggerConfig): { log: (obj: Record<string, unknown>) => Record<string, unknown> } {
  return {
    log: (obj) => {
      if (config.source) {
        obj.source = config.source;
      }

      if (!obj.correlationId && obj.sessionId) {
        obj.correlationId = obj.sessionId;
      }

      return obj;
    },
  };
}

/**
 * Format duration for display
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  } else if (ms < 60000) {
    return `${(ms / 1000).toFixed(2)}s`;
  } else {
    const minutes = Math.floor(ms / 60000);
    const seconds = ((ms % 60000) / 1000).toFixed(2);
    return `${minutes}m ${seconds}s`;
  }
}

/**
 * Replace values of secret-looking keys, recursing into nested objects and arrays
 */
export function redactSecrets(value: unknown, maxDepth = 5): unknown {
  if (maxDepth <= 0) return "[Max Depth Reached]";
  if (Array.isArray(value)) {
    return value.map((item) => redactSecrets(item, maxDepth - 1));
  }
  if (!value || typeof value !== "object") return value;

  const sanitized: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (SENSITIVE_KEYS.some((sensitive) => key.toLowerCase().includes(sensitive))) {
      sanitized[key] = "[REDACTED]";
    } else {
      sanitized[key] = redactSecrets(entry, maxDepth - 1);
    }
  }
  return sanitized;
}
