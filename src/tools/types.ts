import type { ToolArguments, ToolValue } from "../shared/values.js";

export type ParameterType = "string" | "int" | "bool" | "list" | "dict" | "any";

export const PARAMETER_TYPES: readonly ParameterType[] = ["string", "int", "bool", "list", "dict", "any"];

export interface ParameterSchemaInput {
  type: ParameterType;
  description?: string;
  default?: ToolValue;
  required?: boolean;
}

export interface ParameterSchema {
  type: ParameterType;
  description?: string;
  default?: ToolValue;
  required: boolean;
}

export interface CapabilityDescriptor {
  readonly name: string;
  description: string;
  parameters: Record<string, ParameterSchema>;
  /** Parameters without a default, in declaration order. */
  required: string[];
}

export interface ToolContext {
  callId: string;
  toolName: string;
}

export type ToolHandler = (
  args: ToolArguments,
  context: ToolContext,
) => Promise<ToolValue> | ToolValue;

export interface ToolSpec {
  name: string;
  description: string;
  parameters: Record<string, ParameterSchemaInput>;
  handler: ToolHandler;
}

export type ToolCallStatus = "pending" | "running" | "completed" | "failed";

export interface ToolCall {
  readonly id: string;
  name: string;
  arguments: ToolArguments;
  status: ToolCallStatus;
}

export interface ToolResultMetadata {
  tool_name: string;
  duration_ms?: number;
  [key: string]: ToolValue | undefined;
}

export interface ToolResult {
  call_id: string;
  content?: ToolValue;
  error?: string;
  metadata: ToolResultMetadata;
}

export interface ToolQueryOptions {
  allowList?: string[];
}
