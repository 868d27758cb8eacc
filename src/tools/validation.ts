import { ValidationError } from "../shared/types.js";
import { describeValueType, type ToolArguments, type ToolValue } from "../shared/values.js";
import {
  PARAMETER_TYPES,
  type CapabilityDescriptor,
  type ParameterSchema,
  type ParameterSchemaInput,
  type ParameterType,
  type ToolCall,
} from "./types.js";

const TYPE_LABELS: Partial<Record<ParameterType, string>> = {
  string: "string",
  int: "integer",
  bool: "boolean",
};

function isParameterType(value: unknown): value is ParameterType {
  return typeof value === "string" && PARAMETER_TYPES.some((type) => type === value);
}

function isString(value: ToolValue): value is string {
  return typeof value === "string";
}

function isInteger(value: ToolValue): value is number {
  return typeof value === "number" && Number.isInteger(value);
}

function isBoolean(value: ToolValue): value is boolean {
  return typeof value === "boolean";
}

/**
 * Only the scalar types are checked; list, dict and any accept whatever is supplied.
 */
export function matchesParameterType(type: ParameterType, value: ToolValue): boolean {
  if (type === "string") {
    return isString(value);
  }
  if (type === "int") {
    return isInteger(value);
  }
  if (type === "bool") {
    return isBoolean(value);
  }
  return true;
}

function normalizeParameter(toolName: string, name: string, input: ParameterSchemaInput): ParameterSchema {
  if (!isParameterType(input.type)) {
    throw new ValidationError(
      `Tool '${toolName}' parameter '${name}' has unknown type: ${String(input.type)}`,
      "INVALID_TOOL_SPEC",
    );
  }
  const hasDefault = input.default !== undefined;
  if (hasDefault && input.required === true) {
    throw new ValidationError(
      `Tool '${toolName}' parameter '${name}' cannot be required and have a default`,
      "INVALID_TOOL_SPEC",
    );
  }
  // A null default marks an optional parameter of any type.
  if (input.default !== undefined && input.default !== null && !matchesParameterType(input.type, input.default)) {
    throw new ValidationError(
      `Tool '${toolName}' parameter '${name}' default is ${describeValueType(input.default)}, expected ${input.type}`,
      "INVALID_TOOL_SPEC",
    );
  }

  return {
    type: input.type,
    ...(input.description ? { description: input.description } : {}),
    ...(hasDefault ? { default: input.default } : {}),
    required: input.required ?? !hasDefault,
  };
}

export function buildDescriptor(
  name: string,
  description: string,
  parameters: Record<string, ParameterSchemaInput>,
): CapabilityDescriptor {
  const toolName = name.trim();
  if (!toolName) {
    throw new ValidationError("Tool name must be a non-empty string", "INVALID_TOOL_SPEC");
  }

  const normalized: Record<string, ParameterSchema> = {};
  const required: string[] = [];
  for (const [paramName, input] of Object.entries(parameters)) {
    const schema = normalizeParameter(toolName, paramName, input);
    normalized[paramName] = schema;
    if (schema.required) {
      required.push(paramName);
    }
  }

  return {
    name: toolName,
    description,
    parameters: normalized,
    required,
  };
}

/**
 * Returns human-readable violations for a call, or an empty list when it conforms.
 * Arguments the schema does not declare are not reported.
 */
export function validateToolCall(descriptor: CapabilityDescriptor | undefined, call: ToolCall): string[] {
  if (!descriptor) {
    return [`Tool '${call.name}' not found`];
  }

  const errors: string[] = [];
  for (const requiredParam of descriptor.required) {
    if (!Object.prototype.hasOwnProperty.call(call.arguments, requiredParam)) {
      errors.push(`Required parameter '${requiredParam}' missing`);
    }
  }

  for (const [paramName, value] of Object.entries(call.arguments)) {
    const schema = descriptor.parameters[paramName];
    if (!schema || (value === null && schema.default === null)) {
      continue;
    }
    if (!matchesParameterType(schema.type, value)) {
      errors.push(`Parameter '${paramName}' should be ${TYPE_LABELS[schema.type] ?? schema.type}`);
    }
  }

  return errors;
}

export function applyDefaults(descriptor: CapabilityDescriptor, args: ToolArguments): ToolArguments {
  const merged: ToolArguments = { ...args };
  for (const [paramName, schema] of Object.entries(descriptor.parameters)) {
    if (schema.default !== undefined && !Object.prototype.hasOwnProperty.call(merged, paramName)) {
      merged[paramName] = structuredClone(schema.default);
    }
  }
  return merged;
}
