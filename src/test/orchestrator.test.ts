import assert from "node:assert/strict";
import { test } from "node:test";
import { createAppContext } from "../app/context.js";
import { createRequestOrchestrator, describeToolOutcome } from "../app/orchestrator.js";
import { DEFAULT_APP_CONFIG, type AppConfig } from "../config/appConfig.js";
import { SessionStore } from "../sessions/sessionStore.js";
import type { SessionMessage } from "../sessions/types.js";
import { silentLogger } from "../shared/logger.js";
import { createToolCall, ToolRegistry } from "../tools/registry.js";

const FIXED_NOW = Date.UTC(2024, 4, 1, 12, 0, 0);

function buildContext(overrides: Partial<AppConfig> = {}) {
  return createAppContext({ ...DEFAULT_APP_CONFIG, ...overrides }, { logger: silentLogger, now: () => FIXED_NOW });
}

test("app context registers the built-in tools", async () => {
  const context = buildContext();
  assert.deepEqual(context.registry.listNames(), ["echo", "time.now", "wait"]);

  const result = await context.registry.execute(createToolCall("time.now", {}, "t1"));
  assert.deepEqual(result.content, { iso: "2024-05-01T12:00:00.000Z", epochMs: FIXED_NOW });
});

test("app context start and shutdown are idempotent", async () => {
  const context = buildContext({ sweepIntervalMs: 5 });
  context.start();
  context.start();
  await context.shutdown();
  await context.shutdown();
});

test("a turn without tool calls records the user and assistant messages", async () => {
  const context = buildContext();
  const response = await context.orchestrator.runTurn({ sessionId: "s1", message: "hello" });

  assert.deepEqual(response, {
    sessionId: "s1",
    message: "No tools were requested.",
    toolCalls: [],
    toolResults: [],
    completed: true,
  });
  const roles = context.sessions.listMessages("s1").map((message) => message.role);
  assert.deepEqual(roles, ["user", "assistant"]);
  assert.equal(context.sessions.listMessages("s1")[0].timestamp, "2024-05-01T12:00:00.000Z");
});

test("a turn runs requested tools as a batch and records their results", async () => {
  const context = buildContext();
  const response = await context.orchestrator.runTurn({
    sessionId: "s1",
    message: "run tools",
    toolCalls: [
      { id: "e1", name: "echo", arguments: { message: "hi" } },
      { id: "e2", name: "echo", arguments: { message: "yo", repeat: 2 } },
    ],
  });

  assert.equal(response.message, "Successfully executed 2 tool(s).");
  assert.equal(response.error, undefined);
  assert.deepEqual(response.toolResults.map((result) => result.content), ["hi", "yo yo"]);
  assert.deepEqual(response.toolCalls.map((call) => call.status), ["completed", "completed"]);

  const messages: SessionMessage[] = context.sessions.listMessages("s1");
  assert.deepEqual(messages.map((message) => message.role), ["user", "tool", "assistant"]);
  assert.equal(messages[1].content, "Tool execution completed");
  assert.deepEqual(messages[1].toolResults?.map((result) => result.call_id), ["e1", "e2"]);
});

test("failed tool calls are summarised in the response", async () => {
  const context = buildContext();
  const response = await context.orchestrator.runTurn({
    sessionId: "s2",
    message: "try",
    toolCalls: [
      { id: "ok", name: "echo", arguments: { message: "fine" } },
      { id: "missing", name: "nope" },
    ],
  });

  assert.equal(response.message, "Some tools failed: Tool 'nope' not found");
  assert.equal(response.error, "Tool execution errors");
  assert.equal(response.completed, true);
  assert.equal(response.toolResults[0].content, "fine");
});

test("turns reuse an existing session", async () => {
  const context = buildContext();
  context.sessions.create("s3");
  await context.orchestrator.runTurn({ sessionId: "s3", message: "first" });
  await context.orchestrator.runTurn({ sessionId: "s3", message: "second" });

  assert.equal(context.sessions.size, 1);
  assert.equal(context.sessions.getInfo("s3")?.message_count, 4);
});

test("unexpected failures become an error response", async () => {
  class BrokenStore extends SessionStore {
    override appendMessage(): boolean {
      throw new Error("store unavailable");
    }
  }
  const orchestrator = createRequestOrchestrator({
    registry: new ToolRegistry(),
    sessions: new BrokenStore(),
  });

  const response = await orchestrator.runTurn({ sessionId: "s4", message: "hi" });
  assert.deepEqual(response, {
    sessionId: "s4",
    message: "Error processing request: store unavailable",
    toolCalls: [],
    toolResults: [],
    completed: false,
    error: "store unavailable",
  });
});

test("session summary truncates long messages and keeps the latest five", async () => {
  const context = buildContext();
  await context.orchestrator.runTurn({ sessionId: "s5", message: "x".repeat(120) });
  await context.orchestrator.runTurn({ sessionId: "s5", message: "short" });
  await context.orchestrator.runTurn({ sessionId: "s5", message: "last" });

  const summary = context.orchestrator.getSessionSummary("s5");
  assert.ok(summary);
  assert.equal(summary.session.message_count, 6);
  assert.equal(summary.recentMessages.length, 5);
  assert.equal(summary.recentMessages[0].content, "No tools were requested.");
  assert.equal(summary.recentMessages[4].content, "No tools were requested.");
  assert.equal(context.orchestrator.getSessionSummary("ghost"), undefined);

  await context.orchestrator.runTurn({ sessionId: "s6", message: "y".repeat(120) });
  const truncated = context.orchestrator.getSessionSummary("s6");
  assert.equal(truncated?.recentMessages[0].content, `${"y".repeat(100)}...`);
});

test("describeToolOutcome handles the empty case", () => {
  assert.deepEqual(describeToolOutcome([]), { message: "No tools were requested." });
});

test("concurrent turns on one session record every message", async () => {
  const context = buildContext();
  const responses = await Promise.all([
    context.orchestrator.runTurn({
      sessionId: "shared",
      message: "m0",
      toolCalls: [{ id: "w0", name: "wait", arguments: { ms: 20 } }],
    }),
    context.orchestrator.runTurn({ sessionId: "shared", message: "m1" }),
    context.orchestrator.runTurn({
      sessionId: "shared",
      message: "m2",
      toolCalls: [
        { id: "w2", name: "wait", arguments: { ms: 5 } },
        { id: "e2", name: "echo", arguments: { message: "two" } },
      ],
    }),
    context.orchestrator.runTurn({
      sessionId: "shared",
      message: "m3",
      toolCalls: [{ id: "e3", name: "echo", arguments: { message: "three" } }],
    }),
  ]);

  assert.deepEqual(responses.map((response) => response.completed), [true, true, true, true]);
  assert.equal(context.sessions.size, 1);
  assert.equal(context.sessions.getInfo("shared")?.message_count, 11);

  const messages = context.sessions.listMessages("shared");
  const contentsOf = (role: SessionMessage["role"]) =>
    messages.filter((message) => message.role === role).map((message) => message.content).sort();
  assert.deepEqual(contentsOf("user"), ["m0", "m1", "m2", "m3"]);
  assert.deepEqual(contentsOf("assistant"), [
    "No tools were requested.",
    "Successfully executed 1 tool(s).",
    "Successfully executed 1 tool(s).",
    "Successfully executed 2 tool(s).",
  ]);
  const recordedCallIds = messages
    .filter((message) => message.role === "tool")
    .flatMap((message) => message.toolResults?.map((result) => result.call_id) ?? [])
    .sort();
  assert.deepEqual(recordedCallIds, ["e2", "e3", "w0", "w2"]);
});

test("a session removed while tools run is reported, not recreated", async () => {
  const warnings: string[] = [];
  const logger = { ...silentLogger, warn: (message: string) => warnings.push(message) };
  const sessions = new SessionStore({ maxSessions: 1 });
  const registry = new ToolRegistry();
  registry.register(() => {
    sessions.create("intruder");
    return "crowded";
  }, "crowd");
  const orchestrator = createRequestOrchestrator({ registry, sessions, logger });

  const response = await orchestrator.runTurn({
    sessionId: "victim",
    message: "hello",
    toolCalls: [{ id: "c1", name: "crowd" }],
  });

  assert.equal(response.completed, false);
  assert.equal(response.error, "Session victim was removed during the turn");
  assert.equal(response.message, "Successfully executed 1 tool(s).");
  assert.equal(response.toolResults[0].content, "crowded");
  assert.equal(sessions.has("victim"), false);
  assert.deepEqual(sessions.listSummaries().map((info) => info.session_id), ["intruder"]);
  assert.deepEqual(warnings, ["Session victim was removed before turn could be recorded"]);
});
