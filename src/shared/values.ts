export type ToolValue =
  | string
  | number
  | boolean
  | null
  | ToolValue[]
  | { [key: string]: ToolValue };

export type ToolArguments = { [name: string]: ToolValue };

export type ValueKind = "string" | "int" | "number" | "bool" | "list" | "dict" | "null";

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isToolValue(value: unknown): value is ToolValue {
  if (value === null || typeof value === "string" || typeof value === "boolean") {
    return true;
  }
  if (typeof value === "number") {
    return Number.isFinite(value);
  }
  if (Array.isArray(value)) {
    return value.every(isToolValue);
  }
  if (isPlainObject(value)) {
    return Object.values(value).every(isToolValue);
  }
  return false;
}

export function isToolArguments(value: unknown): value is ToolArguments {
  return isPlainObject(value) && Object.values(value).every(isToolValue);
}

export function describeValueType(value: ToolValue): ValueKind {
  if (value === null) {
    return "null";
  }
  if (typeof value === "string") {
    return "string";
  }
  if (typeof value === "boolean") {
    return "bool";
  }
  if (typeof value === "number") {
    return Number.isInteger(value) ? "int" : "number";
  }
  if (Array.isArray(value)) {
    return "list";
  }
  return "dict";
}
