import { silentLogger, type Logger } from "../shared/logger.js";
import { asErrorMessage } from "../shared/types.js";
import type { ToolArguments } from "../shared/values.js";
import type { SessionStore } from "../sessions/sessionStore.js";
import type { MessageRole, SessionInfo } from "../sessions/types.js";
import { createToolCall, type ToolRegistry } from "../tools/registry.js";
import type { ToolCall, ToolResult } from "../tools/types.js";

const NO_TOOLS_REPLY = "No tools were requested.";
const TOOL_MESSAGE_CONTENT = "Tool execution completed";
const TOOL_ERRORS_LABEL = "Tool execution errors";
const SUMMARY_RECENT_MESSAGES = 5;
const SUMMARY_CONTENT_MAX_CHARS = 100;

export interface ToolCallInput {
  id?: string;
  name: string;
  arguments?: ToolArguments;
}

export interface TurnRequest {
  sessionId: string;
  message: string;
  toolCalls?: ToolCallInput[];
}

export interface TurnResponse {
  sessionId: string;
  message: string;
  toolCalls: ToolCall[];
  toolResults: ToolResult[];
  completed: boolean;
  error?: string;
}

export interface SessionSummary {
  session: SessionInfo;
  recentMessages: Array<{ role: MessageRole; content: string; timestamp: string }>;
}

export interface RequestOrchestratorOptions {
  registry: ToolRegistry;
  sessions: SessionStore;
  now?: () => number;
  logger?: Logger;
}

export interface RequestOrchestrator {
  runTurn(request: TurnRequest): Promise<TurnResponse>;
  getSessionSummary(sessionId: string): SessionSummary | undefined;
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

export function describeToolOutcome(results: ToolResult[]): { message: string; error?: string } {
  if (results.length === 0) {
    return { message: NO_TOOLS_REPLY };
  }
  const errors = results.flatMap((result) => (result.error ? [result.error] : []));
  if (errors.length > 0) {
    return {
      message: `Some tools failed: ${errors.join(", ")}`,
      error: TOOL_ERRORS_LABEL,
    };
  }
  return { message: `Successfully executed ${results.length} tool(s).` };
}

/**
 * Answers one conversational turn: records the user message, runs the
 * explicitly requested tool calls as one batch and records the outcome.
 */
export function createRequestOrchestrator(options: RequestOrchestratorOptions): RequestOrchestrator {
  const { registry, sessions } = options;
  const now = options.now ?? Date.now;
  const logger = options.logger ?? silentLogger;
  const timestamp = () => new Date(now()).toISOString();

  const runTurn = async (request: TurnRequest): Promise<TurnResponse> => {
    try {
      const { created } = sessions.ensure(request.sessionId);
      if (created) {
        logger.debug(`Session ${request.sessionId} created for incoming turn`);
      }
      sessions.appendMessage(request.sessionId, {
        role: "user",
        content: request.message,
        timestamp: timestamp(),
      });

      const toolCalls = (request.toolCalls ?? []).map((input) =>
        createToolCall(input.name, input.arguments ?? {}, input.id),
      );
      const toolResults = await registry.executeBatch(toolCalls);
      // The session can be evicted or swept while the batch is awaited.
      let recorded = true;
      if (toolCalls.length > 0) {
        recorded = sessions.appendMessage(request.sessionId, {
          role: "tool",
          content: TOOL_MESSAGE_CONTENT,
          toolCalls,
          toolResults,
          timestamp: timestamp(),
        });
      }

      const outcome = describeToolOutcome(toolResults);
      recorded = recorded && sessions.appendMessage(request.sessionId, {
        role: "assistant",
        content: outcome.message,
        timestamp: timestamp(),
      });

      if (!recorded) {
        logger.warn(`Session ${request.sessionId} was removed before turn could be recorded`);
        return {
          sessionId: request.sessionId,
          message: outcome.message,
          toolCalls,
          toolResults,
          completed: false,
          error: `Session ${request.sessionId} was removed during the turn`,
        };
      }

      return {
        sessionId: request.sessionId,
        message: outcome.message,
        toolCalls,
        toolResults,
        completed: true,
        ...(outcome.error ? { error: outcome.error } : {}),
      };
    } catch (error) {
      const message = asErrorMessage(error);
      logger.error(`Error processing request: ${message}`);
      return {
        sessionId: request.sessionId,
        message: `Error processing request: ${message}`,
        toolCalls: [],
        toolResults: [],
        completed: false,
        error: message,
      };
    }
  };

  const getSessionSummary = (sessionId: string): SessionSummary | undefined => {
    const session = sessions.getInfo(sessionId);
    if (!session) {
      return undefined;
    }
    const recentMessages = sessions.listMessages(sessionId, SUMMARY_RECENT_MESSAGES).map((message) => ({
      role: message.role,
      content: truncate(message.content, SUMMARY_CONTENT_MAX_CHARS),
      timestamp: message.timestamp,
    }));
    return { session, recentMessages };
  };

  return { runTurn, getSessionSummary };
}
