import { ValidationError } from "../shared/types.js";
import { DEFAULT_MAX_MESSAGES, DEFAULT_MAX_SESSIONS, DEFAULT_SESSION_TTL_MS } from "../sessions/sessionStore.js";
import { DEFAULT_SWEEP_INTERVAL_MS, MAX_SWEEP_INTERVAL_MS } from "../sessions/sweeper.js";

export interface AppConfig {
  maxSessions: number;
  sessionTtlMs: number;
  sweepIntervalMs: number;
  maxMessages: number;
  debug: boolean;
}

export const ENV_KEYS = {
  maxSessions: "OPSDESK_MAX_SESSIONS",
  sessionTtlMs: "OPSDESK_SESSION_TTL_MS",
  sweepIntervalMs: "OPSDESK_SWEEP_INTERVAL_MS",
  maxMessages: "OPSDESK_MAX_MESSAGES",
  debug: "OPSDESK_DEBUG",
} as const;

export const DEFAULT_APP_CONFIG: AppConfig = {
  maxSessions: DEFAULT_MAX_SESSIONS,
  sessionTtlMs: DEFAULT_SESSION_TTL_MS,
  sweepIntervalMs: DEFAULT_SWEEP_INTERVAL_MS,
  maxMessages: DEFAULT_MAX_MESSAGES,
  debug: false,
};

const TRUE_FLAG_VALUES = new Set(["1", "true", "yes", "on"]);

export function parseFlag(raw: string | undefined): boolean {
  return typeof raw === "string" && TRUE_FLAG_VALUES.has(raw.trim().toLowerCase());
}

function parseIntegerEnv(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: number,
  minimum: number,
  maximum: number = Number.MAX_SAFE_INTEGER,
): number {
  const raw = env[key];
  if (typeof raw !== "string" || raw.trim().length === 0) {
    return fallback;
  }
  const normalized = raw.trim();
  if (!/^\d+$/.test(normalized)) {
    throw new ValidationError(`Invalid value for ${key}: ${raw}`, "INVALID_CONFIG");
  }
  const parsed = Number.parseInt(normalized, 10);
  if (!Number.isSafeInteger(parsed) || parsed < minimum) {
    throw new ValidationError(`${key} must be an integer >= ${minimum}, got ${raw}`, "INVALID_CONFIG");
  }
  if (parsed > maximum) {
    throw new ValidationError(`${key} must be an integer <= ${maximum}, got ${raw}`, "INVALID_CONFIG");
  }
  return parsed;
}

export function resolveAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    maxSessions: parseIntegerEnv(env, ENV_KEYS.maxSessions, DEFAULT_APP_CONFIG.maxSessions, 1),
    sessionTtlMs: parseIntegerEnv(env, ENV_KEYS.sessionTtlMs, DEFAULT_APP_CONFIG.sessionTtlMs, 0),
    sweepIntervalMs: parseIntegerEnv(
      env,
      ENV_KEYS.sweepIntervalMs,
      DEFAULT_APP_CONFIG.sweepIntervalMs,
      1,
      MAX_SWEEP_INTERVAL_MS,
    ),
    maxMessages: parseIntegerEnv(env, ENV_KEYS.maxMessages, DEFAULT_APP_CONFIG.maxMessages, 1),
    debug: parseFlag(env[ENV_KEYS.debug]),
  };
}
