import type { ToolCall, ToolResult } from "../tools/types.js";
import type { ToolValue } from "../shared/values.js";

export type MessageRole = "user" | "assistant" | "system" | "tool";

export interface SessionMessage {
  role: MessageRole;
  content: string;
  timestamp: string;
  toolCalls?: ToolCall[];
  toolResults?: ToolResult[];
}

export interface SessionRecord {
  sessionId: string;
  /** Epoch milliseconds. */
  createdAt: number;
  /** Epoch milliseconds; never decreases. */
  lastActivity: number;
  messages: SessionMessage[];
  metadata: Record<string, ToolValue>;
}

export interface SessionInfo {
  session_id: string;
  created_at: string;
  message_count: number;
  last_activity: string;
}

export interface SessionEnsureResult {
  id: string;
  created: boolean;
}
