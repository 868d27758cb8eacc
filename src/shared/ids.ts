import crypto from "node:crypto";

const TOOL_CALL_ID_PREFIX = "call_";
const TOOL_CALL_ID_HEX_LENGTH = 8;

export function createSessionId(): string {
  return crypto.randomUUID();
}

export function createToolCallId(): string {
  return `${TOOL_CALL_ID_PREFIX}${crypto.randomUUID().replace(/-/g, "").slice(0, TOOL_CALL_ID_HEX_LENGTH)}`;
}
