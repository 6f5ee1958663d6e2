/**
 * Custom error types for toolcast
 */

export class ToolcastError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode?: number,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "ToolcastError";
    Object.setPrototypeOf(this, ToolcastError.prototype);
  }
}

export class ValidationError extends ToolcastError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(
      `Validation failed: ${message}`,
      "validation_error",
      400,
      details
    );
    this.name = "ValidationError";
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export class ToolNotFoundError extends ToolcastError {
  constructor(toolName: string) {
    super(
      `Unknown tool: ${toolName}`,
      "tool_not_found",
      404,
      { toolName }
    );
    this.name = "ToolNotFoundError";
    Object.setPrototypeOf(this, ToolNotFoundError.prototype);
  }
}

export class ToolRegistrationError extends ToolcastError {
  constructor(toolName: string, reason: string) {
    super(
      `Cannot register tool ${toolName}: ${reason}`,
      "tool_registration_error",
      500,
      { toolName, reason }
    );
    this.name = "ToolRegistrationError";
    Object.setPrototypeOf(this, ToolRegistrationError.prototype);
  }
}

export class ToolTimeoutError extends ToolcastError {
  constructor(public readonly timeoutMs: number) {
    super(
      `Tool execution timed out after ${formatSeconds(timeoutMs)} seconds`,
      "timeout_error",
      504,
      { timeoutMs }
    );
    this.name = "ToolTimeoutError";
    Object.setPrototypeOf(this, ToolTimeoutError.prototype);
  }
}

export class ToolCancelledError extends ToolcastError {
  constructor() {
    super("Tool execution cancelled", "cancelled", 499);
    this.name = "ToolCancelledError";
    Object.setPrototypeOf(this, ToolCancelledError.prototype);
  }
}

export class ConfigError extends ToolcastError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(
      `Invalid configuration: ${message}`,
      "config_error",
      500,
      { issues }
    );
    this.name = "ConfigError";
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/**
 * Normalize anything thrown into a message string
 */
export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}

// 90000 -> "90", 1500 -> "1.5"
function formatSeconds(ms: number): string {
  return String(Number((ms / 1000).toFixed(3)));
}
