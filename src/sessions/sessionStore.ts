import { createSessionId } from "../shared/ids.js";
import { silentLogger, type Logger } from "../shared/logger.js";
import { asErrorMessage, DuplicateSessionError } from "../shared/types.js";
import type { ToolValue } from "../shared/values.js";
import type { SessionEnsureResult, SessionInfo, SessionMessage, SessionRecord } from "./types.js";

export const DEFAULT_MAX_SESSIONS = 100;
export const DEFAULT_SESSION_TTL_MS = 24 * 60 * 60 * 1000;
export const DEFAULT_MAX_MESSAGES = 50;

export interface SessionStoreOptions {
  maxSessions?: number;
  sessionTtlMs?: number;
  maxMessages?: number;
  now?: () => number;
  logger?: Logger;
}

function resolvePositiveInt(raw: number | undefined, fallback: number): number {
  return typeof raw === "number" && Number.isFinite(raw) && raw >= 1 ? Math.floor(raw) : fallback;
}

function resolveTtl(raw: number | undefined): number {
  return typeof raw === "number" && Number.isFinite(raw) && raw >= 0 ? Math.floor(raw) : DEFAULT_SESSION_TTL_MS;
}

function copyMessage(message: SessionMessage): SessionMessage {
  return structuredClone(message);
}

function copyRecord(record: SessionRecord): SessionRecord {
  return structuredClone(record);
}

function toInfo(record: SessionRecord): SessionInfo {
  return {
    session_id: record.sessionId,
    created_at: new Date(record.createdAt).toISOString(),
    message_count: record.messages.length,
    last_activity: new Date(record.lastActivity).toISOString(),
  };
}

/**
 * In-memory session store bounded by session count and message count.
 *
 * Every method runs synchronously, so each read-modify-write on a record
 * completes before any other caller on the event loop can observe it.
 * Values are deep-copied on the way in and on the way out.
 */
export class SessionStore {
  readonly maxSessions: number;
  readonly sessionTtlMs: number;
  readonly maxMessages: number;

  private readonly sessions = new Map<string, SessionRecord>();
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(options: SessionStoreOptions = {}) {
    this.maxSessions = resolvePositiveInt(options.maxSessions, DEFAULT_MAX_SESSIONS);
    this.sessionTtlMs = resolveTtl(options.sessionTtlMs);
    this.maxMessages = resolvePositiveInt(options.maxMessages, DEFAULT_MAX_MESSAGES);
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger;
  }

  get size(): number {
    return this.sessions.size;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  create(sessionId?: string): string {
    const id = sessionId ?? createSessionId();
    if (this.sessions.has(id)) {
      throw new DuplicateSessionError(id);
    }

    if (this.sessions.size >= this.maxSessions) {
      this.evictLeastRecentlyActive();
    }

    const now = this.now();
    this.sessions.set(id, {
      sessionId: id,
      createdAt: now,
      lastActivity: now,
      messages: [],
      metadata: {},
    });
    this.logger.info(`Created new session: ${id}`);
    return id;
  }

  ensure(sessionId: string): SessionEnsureResult {
    if (this.touch(sessionId)) {
      return { id: sessionId, created: false };
    }
    return { id: this.create(sessionId), created: true };
  }

  get(sessionId: string): SessionRecord | undefined {
    const record = this.touch(sessionId);
    return record ? copyRecord(record) : undefined;
  }

  getInfo(sessionId: string): SessionInfo | undefined {
    const record = this.touch(sessionId);
    return record ? toInfo(record) : undefined;
  }

  appendMessage(sessionId: string, message: SessionMessage): boolean {
    const record = this.touch(sessionId);
    if (!record) {
      return false;
    }

    record.messages.push(copyMessage(message));
    if (record.messages.length > this.maxMessages) {
      record.messages.splice(0, record.messages.length - this.maxMessages);
    }
    this.logger.debug(`Added message to session ${sessionId}`);
    return true;
  }

  listMessages(sessionId: string, limit?: number): SessionMessage[] {
    const record = this.touch(sessionId);
    if (!record) {
      return [];
    }
    const messages = typeof limit === "number" && limit > 0
      ? record.messages.slice(-Math.floor(limit))
      : record.messages;
    return messages.map(copyMessage);
  }

  delete(sessionId: string): boolean {
    const existed = this.sessions.delete(sessionId);
    if (existed) {
      this.logger.info(`Deleted session: ${sessionId}`);
    }
    return existed;
  }

  listSummaries(): SessionInfo[] {
    return Array.from(this.sessions.values(), toInfo);
  }

  setMetadata(sessionId: string, key: string, value: ToolValue): boolean {
    const record = this.touch(sessionId);
    if (!record) {
      return false;
    }
    record.metadata[key] = structuredClone(value);
    return true;
  }

  getMetadata(sessionId: string, key: string): ToolValue | undefined {
    const record = this.touch(sessionId);
    if (!record || !Object.prototype.hasOwnProperty.call(record.metadata, key)) {
      return undefined;
    }
    return structuredClone(record.metadata[key]);
  }

  /**
   * Deletes every session idle for longer than the TTL and returns their ids.
   * A failing deletion is logged and the pass moves on to the next session.
   */
  sweepExpired(now: number = this.now()): string[] {
    const expired: string[] = [];
    for (const record of this.sessions.values()) {
      // A zero TTL expires every session, including ones touched this millisecond.
      if (this.sessionTtlMs === 0 || now - record.lastActivity > this.sessionTtlMs) {
        expired.push(record.sessionId);
      }
    }

    const deleted: string[] = [];
    for (const sessionId of expired) {
      try {
        if (this.delete(sessionId)) {
          deleted.push(sessionId);
          this.logger.info(`Cleaned up expired session: ${sessionId}`);
        }
      } catch (error) {
        this.logger.error(`Failed to expire session ${sessionId}: ${asErrorMessage(error)}`);
      }
    }
    return deleted;
  }

  private touch(sessionId: string): SessionRecord | undefined {
    const record = this.sessions.get(sessionId);
    if (record) {
      record.lastActivity = Math.max(record.lastActivity, this.now());
    }
    return record;
  }

  // Strict comparison keeps the first-inserted record on ties.
  private evictLeastRecentlyActive(): void {
    let oldest: SessionRecord | undefined;
    for (const record of this.sessions.values()) {
      if (!oldest || record.lastActivity < oldest.lastActivity) {
        oldest = record;
      }
    }
    if (oldest) {
      this.delete(oldest.sessionId);
      this.logger.info(`Evicted least recently active session: ${oldest.sessionId}`);
    }
  }
}
