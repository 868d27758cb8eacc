import type { AppConfig } from "../config/appConfig.js";
import { createLogger, type Logger } from "../shared/logger.js";
import { SessionStore } from "../sessions/sessionStore.js";
import { startSessionSweeper, type SessionSweeperHandle } from "../sessions/sweeper.js";
import { createBuiltinTools } from "../tools/builtin/index.js";
import { ToolRegistry } from "../tools/registry.js";
import type { ToolSpec } from "../tools/types.js";
import { createRequestOrchestrator, type RequestOrchestrator } from "./orchestrator.js";

export interface AppContextOptions {
  logger?: Logger;
  now?: () => number;
  /** Replaces the built-in tool set. */
  tools?: ToolSpec[];
}

export interface AppContext {
  readonly config: AppConfig;
  readonly registry: ToolRegistry;
  readonly sessions: SessionStore;
  readonly orchestrator: RequestOrchestrator;
  start(): void;
  shutdown(): Promise<void>;
}

/**
 * Wires the registry, session store and orchestrator for one process.
 * `start()` begins the TTL sweep; `shutdown()` cancels it and waits for
 * an in-flight pass. Both are safe to call more than once.
 */
export function createAppContext(config: AppConfig, options: AppContextOptions = {}): AppContext {
  const now = options.now ?? Date.now;
  const logger = options.logger ?? createLogger("opsdesk", { debug: config.debug });

  const registry = new ToolRegistry({ logger });
  registry.registerAll(options.tools ?? createBuiltinTools(now));

  const sessions = new SessionStore({
    maxSessions: config.maxSessions,
    sessionTtlMs: config.sessionTtlMs,
    maxMessages: config.maxMessages,
    now,
    logger,
  });

  const orchestrator = createRequestOrchestrator({ registry, sessions, now, logger });
  let sweeper: SessionSweeperHandle | null = null;

  return {
    config,
    registry,
    sessions,
    orchestrator,
    start: () => {
      if (sweeper) {
        return;
      }
      logger.info("Starting session sweeper");
      sweeper = startSessionSweeper(sessions, { intervalMs: config.sweepIntervalMs, logger });
    },
    shutdown: async () => {
      const active = sweeper;
      sweeper = null;
      if (active) {
        logger.info("Stopping session sweeper");
        await active.stop();
      }
    },
  };
}
