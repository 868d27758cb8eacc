import { silentLogger, type Logger } from "../shared/logger.js";
import { asErrorMessage } from "../shared/types.js";
import type { SessionStore } from "./sessionStore.js";

export const DEFAULT_SWEEP_INTERVAL_MS = 60 * 60 * 1000;
/** Largest delay setTimeout honours; anything above fires after 1 ms. */
export const MAX_SWEEP_INTERVAL_MS = 2_147_483_647;

export function resolveSweepIntervalMs(raw: number | undefined): number {
  if (typeof raw !== "number" || !(raw > 0)) {
    return DEFAULT_SWEEP_INTERVAL_MS;
  }
  return Math.min(Math.floor(raw), MAX_SWEEP_INTERVAL_MS);
}

export interface SessionSweeperOptions {
  intervalMs?: number;
  logger?: Logger;
  onSweep?: (deleted: string[]) => void;
}

export interface SessionSweeperHandle {
  readonly intervalMs: number;
  /** Runs one pass now, or joins the pass already in flight. */
  runOnce: () => Promise<string[]>;
  /** Cancels the schedule and waits for an in-flight pass to finish. */
  stop: () => Promise<void>;
  readonly running: boolean;
}

export function startSessionSweeper(
  store: SessionStore,
  options: SessionSweeperOptions = {},
): SessionSweeperHandle {
  const logger = options.logger ?? silentLogger;
  const intervalMs = resolveSweepIntervalMs(options.intervalMs);
  if (typeof options.intervalMs === "number" && options.intervalMs > MAX_SWEEP_INTERVAL_MS) {
    logger.warn(`Sweep interval ${options.intervalMs}ms exceeds timer limit, using ${MAX_SWEEP_INTERVAL_MS}ms`);
  }
  let stopRequested = false;
  let timer: NodeJS.Timeout | null = null;
  let inFlight: Promise<string[]> | null = null;

  const requestRun = (): Promise<string[]> => {
    if (!inFlight) {
      inFlight = Promise.resolve()
        .then(() => store.sweepExpired())
        .then((deleted) => {
          if (deleted.length > 0) {
            logger.info(`Expired ${deleted.length} session(s)`);
          }
          options.onSweep?.(deleted);
          return deleted;
        })
        .finally(() => {
          inFlight = null;
        });
    }
    return inFlight;
  };

  const scheduleNext = () => {
    if (stopRequested) {
      return;
    }
    timer = setTimeout(() => {
      timer = null;
      if (stopRequested) {
        return;
      }
      requestRun()
        .catch((error: unknown) => {
          logger.error(`Session sweep failed: ${asErrorMessage(error)}`);
        })
        .finally(scheduleNext);
    }, intervalMs);
    timer.unref?.();
  };

  scheduleNext();

  return {
    intervalMs,
    runOnce: requestRun,
    stop: async () => {
      stopRequested = true;
      if (timer) {
        clearTimeout(timer);
      }
      timer = null;
      if (inFlight) {
        await inFlight.catch((error: unknown) => {
          logger.error(`Session sweep failed during shutdown: ${asErrorMessage(error)}`);
        });
      }
    },
    get running() {
      return !stopRequested;
    },
  };
}
