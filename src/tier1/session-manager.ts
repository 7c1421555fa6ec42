/**
 * SessionManager - Tier 1 conversation lifecycle
 *
 * Sessions are conversations seen from the caller's side:
 * - startSession creates an active conversation, then enforces FIFO capacity
 * - getActiveSession applies the idle boundary lazily, on read
 * - endSession completes a conversation (idempotent)
 *
 * No timers run in the background; staleness is resolved on next access.
 *
 * @module cortex-memory/tier1/session-manager
 */

import { EventEmitter } from 'node:events';
import { CortexConfig } from '../config.js';
import { BetterDatabase, DatabaseHandle } from '../database.js';
import { NotInitializedError, ValidationError } from '../errors.js';
import {
  ConversationStats,
  EvictionLogEntry,
  Message,
  SessionInfo,
  SessionListOptions,
  StartSessionOptions,
  generateConversationId,
} from '../types.js';
import { ConversationStore } from './conversation-store.js';

const EVICTION_REASON = 'FIFO capacity';

/**
 * Emits `initialized`, `shutdown`, `session:started`, `session:ended`,
 * `session:boundary` and `conversation:evicted`.
 */
export class SessionManager extends EventEmitter {
  private readonly config: CortexConfig;
  private readonly handle: DatabaseHandle;
  private store: ConversationStore | null = null;
  private closed = false;

  constructor(config: CortexConfig, db?: BetterDatabase) {
    super();
    this.config = config;
    this.handle = new DatabaseHandle(config, db);
  }

  async initialize(): Promise<void> {
    this.open();
  }

  async shutdown(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.handle.release();
    this.store = null;
    this.emit('shutdown');
  }

  private open(): ConversationStore {
    if (this.store) return this.store;
    if (this.closed) throw new NotInitializedError('SessionManager');

    this.store = new ConversationStore(this.handle.acquire(), this.config.clock);
    if (this.config.verbose) {
      console.log('[SessionManager] Initialized');
    }
    this.emit('initialized');
    return this.store;
  }

  // ===== Lifecycle =====

  /**
   * Start a new active conversation and trim completed ones over capacity.
   * The new conversation is never evicted by its own start.
   */
  async startSession(options: StartSessionOptions = {}): Promise<string> {
    const store = this.open();
    const conversationId = options.conversationId ?? generateConversationId();
    const startTime = this.config.clock();
    const capacity = this.config.conversationCapacity;

    const evicted = store.transaction(() => {
      store.create({ conversationId, intent: options.intent ?? null, startTime });
      return store.evictOverCapacity(capacity, EVICTION_REASON);
    });

    for (const entry of evicted) {
      this.emit('conversation:evicted', entry);
    }
    if (evicted.length > 0 && this.config.verbose) {
      console.log(`[SessionManager] Evicted ${evicted.length} conversation(s) over capacity ${capacity}`);
    }

    const total = store.count();
    if (total > capacity) {
      console.warn(
        `[SessionManager] ${total} conversations exceed capacity ${capacity}; the excess are all active`
      );
    }

    this.emit('session:started', { conversationId, intent: options.intent ?? null, startTime });
    return conversationId;
  }

  /**
   * Current session id, or null. A session idle for longer than the
   * boundary is completed here and null is returned.
   */
  async getActiveSession(): Promise<string | null> {
    const store = this.open();
    const timeout = this.config.sessionTimeoutMs;

    const outcome = store.transaction(() => {
      const current = store.getLatestActive();
      if (!current) return null;

      const now = this.config.clock();
      const idleMs = now - current.lastActivity;
      const closed = idleMs > timeout;
      if (closed) {
        store.complete(current.conversationId, now);
      }
      return { conversationId: current.conversationId, closed, idleMs };
    });

    if (!outcome) return null;
    if (outcome.closed) {
      if (this.config.verbose) {
        console.log(
          `[SessionManager] Session ${outcome.conversationId} crossed the boundary after ${Math.round(outcome.idleMs / 1000)}s idle`
        );
      }
      this.emit('session:boundary', { conversationId: outcome.conversationId, idleMs: outcome.idleMs });
      return null;
    }
    return outcome.conversationId;
  }

  /**
   * Complete a conversation. Ending a completed or unknown one is a no-op.
   */
  async endSession(conversationId: string): Promise<void> {
    const store = this.open();
    const ended = store.complete(conversationId, this.config.clock());
    if (ended) {
      this.emit('session:ended', { conversationId });
    }
  }

  /**
   * Complete every active conversation idle beyond the boundary
   */
  async closeStaleSessions(): Promise<string[]> {
    const store = this.open();
    const timeout = this.config.sessionTimeoutMs;

    const closed = store.transaction(() => {
      const now = this.config.clock();
      return store
        .listActive()
        .filter((conversation) => now - conversation.lastActivity > timeout)
        .filter((conversation) => store.complete(conversation.conversationId, now))
        .map((conversation) => conversation.conversationId);
    });

    for (const conversationId of closed) {
      this.emit('session:boundary', { conversationId });
    }
    return closed;
  }

  // ===== Queries =====

  async getSessionInfo(conversationId: string): Promise<SessionInfo | null> {
    return this.open().getInfo(conversationId);
  }

  /**
   * Sessions newest first
   */
  async getAllSessions(options: SessionListOptions = {}): Promise<SessionInfo[]> {
    if (options.limit !== undefined && (!Number.isInteger(options.limit) || options.limit < 1)) {
      throw new ValidationError(`limit must be a positive integer, got ${options.limit}`);
    }
    return this.open().list(options.status, options.limit);
  }

  /**
   * Sessions whose intent or messages mention `keyword`, newest first
   */
  async searchConversations(keyword: string): Promise<SessionInfo[]> {
    const store = this.open();
    const trimmed = keyword.trim();
    if (!trimmed) return [];
    return store.search(trimmed);
  }

  /**
   * Sessions started between `start` and `end` inclusive (ms), newest first
   */
  async getConversationsByDateRange(start: number, end: number): Promise<SessionInfo[]> {
    const store = this.open();
    if (!Number.isFinite(start) || !Number.isFinite(end) || start > end) {
      throw new ValidationError(`Invalid date range: ${start} to ${end}`);
    }
    return store.listByStartTime(start, end);
  }

  // ===== Messages =====

  /**
   * Append a message to an active conversation
   */
  async addMessage(conversationId: string, role: string, content: string, timestamp?: number): Promise<Message> {
    const store = this.open();
    const at = timestamp ?? this.config.clock();
    return store.transaction(() => store.addMessage(conversationId, role, content, at));
  }

  async getMessages(conversationId: string): Promise<Message[]> {
    return this.open().getMessages(conversationId);
  }

  async getEvictionLog(limit: number = 100): Promise<EvictionLogEntry[]> {
    return this.open().getEvictionLog(limit);
  }

  async getStats(): Promise<ConversationStats> {
    return this.open().getStats();
  }
}

export function createSessionManager(config: CortexConfig, db?: BetterDatabase): SessionManager {
  return new SessionManager(config, db);
}
