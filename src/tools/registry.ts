import { createToolCallId } from "../shared/ids.js";
import { asErrorMessage } from "../shared/types.js";
import { silentLogger, type Logger } from "../shared/logger.js";
import type { ToolArguments } from "../shared/values.js";
import {
  createAlreadyStartedResult,
  createFailedResult,
  createNotFoundResult,
  runToolCall,
  type RegisteredTool,
} from "./executor.js";
import { buildDescriptor, validateToolCall } from "./validation.js";
import type {
  CapabilityDescriptor,
  ParameterSchemaInput,
  ToolCall,
  ToolHandler,
  ToolQueryOptions,
  ToolResult,
  ToolSpec,
} from "./types.js";

function normalizeName(name: string): string {
  return name.trim().toLowerCase();
}

function normalizeAllowList(allowList?: string[]): Set<string> {
  if (!Array.isArray(allowList)) {
    return new Set();
  }
  const normalized = new Set<string>();
  for (const raw of allowList) {
    const name = normalizeName(raw);
    if (name) {
      normalized.add(name);
    }
  }
  return normalized;
}

// Descriptors handed out are copies, so callers cannot change what execute enforces.
function copyDescriptor(descriptor: CapabilityDescriptor): CapabilityDescriptor {
  return structuredClone(descriptor);
}

export function createToolCall(name: string, args: ToolArguments = {}, id?: string): ToolCall {
  return {
    id: id && id.trim() ? id : createToolCallId(),
    name,
    arguments: args,
    status: "pending",
  };
}

export interface ToolRegistryOptions {
  logger?: Logger;
}

/**
 * Name-keyed registry of capabilities.
 *
 * Lookups are exact on the registered name. Re-registering a name replaces
 * both the handler and the descriptor and keeps its listing position.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();
  private readonly logger: Logger;

  constructor(options: ToolRegistryOptions = {}) {
    this.logger = options.logger ?? silentLogger;
  }

  register(
    handler: ToolHandler,
    name: string,
    description = "",
    parameters: Record<string, ParameterSchemaInput> = {},
  ): CapabilityDescriptor {
    const descriptor = buildDescriptor(name, description, parameters);
    if (this.tools.has(descriptor.name)) {
      this.logger.warn(`Tool ${descriptor.name} already registered, overwriting`);
    }
    this.tools.set(descriptor.name, { descriptor, handler });
    this.logger.info(`Registered tool: ${descriptor.name}`);
    return copyDescriptor(descriptor);
  }

  registerAll(specs: ToolSpec[]): void {
    for (const spec of specs) {
      this.register(spec.handler, spec.name, spec.description, spec.parameters);
    }
  }

  unregister(name: string): boolean {
    return this.tools.delete(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  getHandler(name: string): ToolHandler | undefined {
    return this.tools.get(name)?.handler;
  }

  getDescriptor(name: string): CapabilityDescriptor | undefined {
    const entry = this.tools.get(name);
    return entry ? copyDescriptor(entry.descriptor) : undefined;
  }

  list(options: ToolQueryOptions = {}): CapabilityDescriptor[] {
    const allowSet = normalizeAllowList(options.allowList);
    const descriptors: CapabilityDescriptor[] = [];
    for (const { descriptor } of this.tools.values()) {
      if (allowSet.size === 0 || allowSet.has(normalizeName(descriptor.name))) {
        descriptors.push(copyDescriptor(descriptor));
      }
    }
    return descriptors;
  }

  listNames(): string[] {
    return Array.from(this.tools.keys());
  }

  get size(): number {
    return this.tools.size;
  }

  validate(call: ToolCall): string[] {
    return validateToolCall(this.tools.get(call.name)?.descriptor, call);
  }

  async execute(call: ToolCall): Promise<ToolResult> {
    if (call.status !== "pending") {
      this.logger.warn(`Tool call ${call.id} already ${call.status}, not running it again`);
      return createAlreadyStartedResult(call);
    }
    const entry = this.tools.get(call.name);
    if (!entry) {
      return createNotFoundResult(call);
    }
    return runToolCall(entry, call, (failed, error) => {
      this.logger.error(`Tool execution failed for ${failed.name}: ${asErrorMessage(error)}`);
    });
  }

  /**
   * Runs every call concurrently. The result at index i always belongs to
   * calls[i], whatever order the calls settle in. A call object listed twice
   * runs once; the later slot gets an already-running failure.
   */
  async executeBatch(calls: ToolCall[]): Promise<ToolResult[]> {
    if (calls.length === 0) {
      return [];
    }

    const settled = await Promise.allSettled(calls.map((call) => this.execute(call)));
    return settled.map((outcome, index) => {
      if (outcome.status === "fulfilled") {
        return outcome.value;
      }
      const call = calls[index];
      this.logger.error(`Batch slot ${index} (${call.name}) rejected: ${asErrorMessage(outcome.reason)}`);
      return createFailedResult(call, outcome.reason);
    });
  }
}
