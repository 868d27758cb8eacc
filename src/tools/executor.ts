import { asErrorMessage, ValidationError } from "../shared/types.js";
import type { ToolValue } from "../shared/values.js";
import { applyDefaults } from "./validation.js";
import type { CapabilityDescriptor, ToolCall, ToolHandler, ToolResult } from "./types.js";

export interface RegisteredTool {
  descriptor: CapabilityDescriptor;
  handler: ToolHandler;
}

export type ToolFailureListener = (call: ToolCall, error: unknown) => void;

export function createNotFoundResult(call: ToolCall): ToolResult {
  return {
    call_id: call.id,
    error: `Tool '${call.name}' not found`,
    metadata: {
      tool_name: call.name,
    },
  };
}

export function createFailedResult(call: ToolCall, error: unknown, durationMs?: number): ToolResult {
  return {
    call_id: call.id,
    error: asErrorMessage(error) || "tool execution failed",
    metadata: {
      tool_name: call.name,
      ...(typeof durationMs === "number" ? { duration_ms: durationMs } : {}),
    },
  };
}

export function createAlreadyStartedResult(call: ToolCall): ToolResult {
  return {
    call_id: call.id,
    error: `Tool call '${call.id}' already ${call.status}`,
    metadata: {
      tool_name: call.name,
    },
  };
}

/**
 * Runs one call against its registered tool, moving `call.status`
 * pending -> running -> completed | failed. Never rejects.
 *
 * Only a pending call is run; any other call gets a failed result and keeps
 * its status. A call lacking a required argument fails without reaching the
 * handler; argument types are not checked here.
 */
export async function runToolCall(
  entry: RegisteredTool,
  call: ToolCall,
  onFailure?: ToolFailureListener,
): Promise<ToolResult> {
  if (call.status !== "pending") {
    return createAlreadyStartedResult(call);
  }
  const started = Date.now();
  call.status = "running";
  try {
    const missing = entry.descriptor.required.filter(
      (name) => !Object.prototype.hasOwnProperty.call(call.arguments, name),
    );
    if (missing.length > 0) {
      throw new ValidationError(`Missing required argument(s): ${missing.join(", ")}`, "INVALID_ARGS");
    }
    const args = applyDefaults(entry.descriptor, call.arguments);
    const content: ToolValue = await Promise.resolve(
      entry.handler(args, { callId: call.id, toolName: entry.descriptor.name }),
    );
    call.status = "completed";
    return {
      call_id: call.id,
      content,
      metadata: {
        tool_name: entry.descriptor.name,
        duration_ms: Date.now() - started,
      },
    };
  } catch (error) {
    call.status = "failed";
    onFailure?.(call, error);
    return createFailedResult(call, error, Date.now() - started);
  }
}
