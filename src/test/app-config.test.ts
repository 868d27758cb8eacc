import assert from "node:assert/strict";
import { test } from "node:test";
import { DEFAULT_APP_CONFIG, resolveAppConfig } from "../config/appConfig.js";
import { ValidationError } from "../shared/types.js";

test("defaults apply when no variables are set", () => {
  assert.deepEqual(resolveAppConfig({}), DEFAULT_APP_CONFIG);
  assert.deepEqual(DEFAULT_APP_CONFIG, {
    maxSessions: 100,
    sessionTtlMs: 86_400_000,
    sweepIntervalMs: 3_600_000,
    maxMessages: 50,
    debug: false,
  });
});

test("environment variables override the defaults", () => {
  const config = resolveAppConfig({
    OPSDESK_MAX_SESSIONS: "5",
    OPSDESK_SESSION_TTL_MS: "0",
    OPSDESK_SWEEP_INTERVAL_MS: " 250 ",
    OPSDESK_MAX_MESSAGES: "10",
    OPSDESK_DEBUG: "yes",
  });
  assert.deepEqual(config, {
    maxSessions: 5,
    sessionTtlMs: 0,
    sweepIntervalMs: 250,
    maxMessages: 10,
    debug: true,
  });
});

test("invalid values are rejected", () => {
  const isConfigError = (error: unknown) => error instanceof ValidationError && error.code === "INVALID_CONFIG";
  assert.throws(() => resolveAppConfig({ OPSDESK_MAX_SESSIONS: "abc" }), isConfigError);
  assert.throws(() => resolveAppConfig({ OPSDESK_MAX_SESSIONS: "0" }), isConfigError);
  assert.throws(() => resolveAppConfig({ OPSDESK_SESSION_TTL_MS: "-1" }), isConfigError);
  assert.throws(() => resolveAppConfig({ OPSDESK_MAX_MESSAGES: "1.5" }), isConfigError);
});

test("blank values fall back to the defaults", () => {
  assert.equal(resolveAppConfig({ OPSDESK_MAX_SESSIONS: "  " }).maxSessions, 100);
  assert.equal(resolveAppConfig({ OPSDESK_DEBUG: "off" }).debug, false);
});

test("sweep interval is bounded by the largest timer delay", () => {
  assert.equal(resolveAppConfig({ OPSDESK_SWEEP_INTERVAL_MS: "2147483647" }).sweepIntervalMs, 2147483647);
  assert.throws(
    () => resolveAppConfig({ OPSDESK_SWEEP_INTERVAL_MS: "2147483648" }),
    (error: unknown) =>
      error instanceof ValidationError &&
      error.code === "INVALID_CONFIG" &&
      error.message === "OPSDESK_SWEEP_INTERVAL_MS must be an integer <= 2147483647, got 2147483648",
  );
});
