/**
 * Tool registry: tool name -> capability, resolved once at startup.
 * Priority, timeout and argument schema all come from here so the
 * executor never branches on tool names itself.
 */

import Ajv, { ValidateFunction } from "ajv";
import { MAX_TIMER_DELAY_MS, ToolCapability, isTimerDelay } from "../types";
import { ToolRegistrationError, ValidationError, toErrorMessage } from "../errors";

export interface RegistryDefaults {
  /** Priority for tools without a hint, including unknown tools */
  defaultPriority?: number;
  defaultTimeoutMs?: number;
}

export interface ToolDescriptor {
  name: string;
  description?: string;
  priority: number;
  timeoutMs: number;
  parameters?: Record<string, unknown>;
}

interface RegisteredTool {
  capability: ToolCapability;
  validate: ValidateFunction | null;
}

export class ToolRegistry {
  private readonly tools: Map<string, RegisteredTool> = new Map();
  private readonly ajv = new Ajv({ allErrors: true, useDefaults: true });
  readonly defaultPriority: number;
  readonly defaultTimeoutMs: number;

  constructor(defaults: RegistryDefaults = {}) {
    this.defaultPriority = defaults.defaultPriority ?? 3;
    this.defaultTimeoutMs = defaults.defaultTimeoutMs ?? 60_000;
    if (!isTimerDelay(this.defaultTimeoutMs)) {
      throw new ValidationError(`defaultTimeoutMs must be in (0, ${MAX_TIMER_DELAY_MS}], got ${this.defaultTimeoutMs}`);
    }
  }

  register(capability: ToolCapability): this {
    const { name } = capability;
    if (!name) throw new ToolRegistrationError("<unnamed>", "name is required");
    if (this.tools.has(name)) throw new ToolRegistrationError(name, "already registered");
    if (capability.timeoutMs !== undefined && !isTimerDelay(capability.timeoutMs)) {
      throw new ToolRegistrationError(name, `timeoutMs must be in (0, ${MAX_TIMER_DELAY_MS}]`);
    }

    let validate: ValidateFunction | null = null;
    if (capability.parameters) {
      try {
        validate = this.ajv.compile(capability.parameters);
      } catch (e) {
        throw new ToolRegistrationError(name, `invalid parameters schema: ${toErrorMessage(e)}`);
      }
    }

    this.tools.set(name, { capability, validate });
    return this;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get(name: string): ToolCapability | undefined {
    return this.tools.get(name)?.capability;
  }

  validatorFor(name: string): ValidateFunction | null {
    return this.tools.get(name)?.validate ?? null;
  }

  priorityOf(name: string): number {
    return this.tools.get(name)?.capability.priority ?? this.defaultPriority;
  }

  timeoutOf(name: string): number {
    return this.tools.get(name)?.capability.timeoutMs ?? this.defaultTimeoutMs;
  }

  list(): ToolDescriptor[] {
    return [...this.tools.values()].map(({ capability }) => ({
      name: capability.name,
      description: capability.description,
      priority: this.priorityOf(capability.name),
      timeoutMs: this.timeoutOf(capability.name),
      parameters: capability.parameters,
    }));
  }
}
