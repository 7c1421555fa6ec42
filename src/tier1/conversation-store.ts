/**
 * ConversationStore - Tier 1 working memory repository
 *
 * Synchronous data access for conversations, messages and the eviction
 * log. Callers compose these methods inside `transaction()` so that
 * read-modify-write sequences (boundary close, FIFO eviction) are atomic.
 *
 * @module cortex-memory/tier1/conversation-store
 */

import type { Clock } from '../config.js';
import type { BetterDatabase } from '../database.js';
import { ValidationError } from '../errors.js';
import type {
  Conversation,
  ConversationStats,
  ConversationStatus,
  EvictionLogEntry,
  Message,
  SessionInfo,
} from '../types.js';

interface ConversationRow {
  conversation_id: string;
  start_time: number;
  end_time: number | null;
  intent: string | null;
  status: string;
  last_activity: number;
  message_count: number;
}

interface MessageRow {
  message_id: number;
  conversation_id: string;
  timestamp: number;
  role: string;
  content: string;
}

interface EvictionRow {
  conversation_id: string;
  evicted_at: number;
  start_time: number;
  message_count: number;
  reason: string;
}

/**
 * Conversation columns, aliased `c`. last_activity is never earlier than
 * the newest message or the start time.
 */
const CONVERSATION_COLUMNS = `
  c.conversation_id, c.start_time, c.end_time, c.intent, c.status,
  MAX(
    c.last_activity,
    COALESCE((SELECT MAX(m.timestamp) FROM messages m WHERE m.conversation_id = c.conversation_id), c.start_time)
  ) AS last_activity,
  (SELECT COUNT(*) FROM messages m WHERE m.conversation_id = c.conversation_id) AS message_count
`;

function toStatus(value: string): ConversationStatus {
  return value === 'completed' ? 'completed' : 'active';
}

function rowToSessionInfo(row: ConversationRow): SessionInfo {
  return {
    conversationId: row.conversation_id,
    status: toStatus(row.status),
    intent: row.intent,
    startTime: row.start_time,
    endTime: row.end_time,
    lastActivity: row.last_activity,
    messageCount: row.message_count,
  };
}

function rowToConversation(row: ConversationRow): Conversation {
  return {
    conversationId: row.conversation_id,
    startTime: row.start_time,
    endTime: row.end_time,
    intent: row.intent,
    status: toStatus(row.status),
    lastActivity: row.last_activity,
  };
}

export interface NewConversation {
  conversationId: string;
  intent: string | null;
  startTime: number;
}

export class ConversationStore {
  constructor(
    private readonly db: BetterDatabase,
    private readonly clock: Clock
  ) {
    this.createSchema();
  }

  private createSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS conversations (
        conversation_id TEXT PRIMARY KEY,
        start_time INTEGER NOT NULL,
        end_time INTEGER,
        intent TEXT,
        status TEXT NOT NULL DEFAULT 'active'
          CHECK (status IN ('active', 'completed')),
        last_activity INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS messages (
        message_id INTEGER PRIMARY KEY AUTOINCREMENT,
        conversation_id TEXT NOT NULL REFERENCES conversations(conversation_id),
        timestamp INTEGER NOT NULL,
        role TEXT NOT NULL,
        content TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS conversation_eviction_log (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        conversation_id TEXT NOT NULL,
        evicted_at INTEGER NOT NULL,
        start_time INTEGER NOT NULL,
        message_count INTEGER NOT NULL,
        reason TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_conversations_status ON conversations(status, start_time);
      CREATE INDEX IF NOT EXISTS idx_messages_conversation ON messages(conversation_id, timestamp);
    `);
  }

  /**
   * Run `fn` under an immediate (write-locking) transaction
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn).immediate();
  }

  // ===== Conversations =====

  create(input: NewConversation): Conversation {
    if (!input.conversationId.trim()) {
      throw new ValidationError('conversationId must not be empty');
    }
    if (this.get(input.conversationId)) {
      throw new ValidationError(`Conversation ${input.conversationId} already exists`);
    }

    this.db.prepare(`
      INSERT INTO conversations (conversation_id, start_time, end_time, intent, status, last_activity)
      VALUES (?, ?, NULL, ?, 'active', ?)
    `).run(input.conversationId, input.startTime, input.intent, input.startTime);

    return {
      conversationId: input.conversationId,
      startTime: input.startTime,
      endTime: null,
      intent: input.intent,
      status: 'active',
      lastActivity: input.startTime,
    };
  }

  get(conversationId: string): Conversation | null {
    const row = this.getRow(conversationId);
    return row ? rowToConversation(row) : null;
  }

  getInfo(conversationId: string): SessionInfo | null {
    const row = this.getRow(conversationId);
    return row ? rowToSessionInfo(row) : null;
  }

  private getRow(conversationId: string): ConversationRow | undefined {
    return this.db
      .prepare<[string], ConversationRow>(`SELECT ${CONVERSATION_COLUMNS} FROM conversations c WHERE c.conversation_id = ?`)
      .get(conversationId);
  }

  /**
   * Most recently started active conversation
   */
  getLatestActive(): Conversation | null {
    const row = this.db
      .prepare<[], ConversationRow>(`
        SELECT ${CONVERSATION_COLUMNS}
        FROM conversations c
        WHERE c.status = 'active'
        ORDER BY c.start_time DESC, c.rowid DESC
        LIMIT 1
      `)
      .get();
    return row ? rowToConversation(row) : null;
  }

  listActive(): Conversation[] {
    return this.db
      .prepare<[], ConversationRow>(`
        SELECT ${CONVERSATION_COLUMNS}
        FROM conversations c
        WHERE c.status = 'active'
        ORDER BY c.start_time, c.rowid
      `)
      .all()
      .map(rowToConversation);
  }

  /**
   * Newest first
   */
  list(status?: ConversationStatus, limit: number = -1): SessionInfo[] {
    const rows = status
      ? this.db
          .prepare<[string, number], ConversationRow>(`
            SELECT ${CONVERSATION_COLUMNS} FROM conversations c
            WHERE c.status = ?
            ORDER BY c.start_time DESC, c.rowid DESC
            LIMIT ?
          `)
          .all(status, limit)
      : this.db
          .prepare<[number], ConversationRow>(`
            SELECT ${CONVERSATION_COLUMNS} FROM conversations c
            ORDER BY c.start_time DESC, c.rowid DESC
            LIMIT ?
          `)
          .all(limit);
    return rows.map(rowToSessionInfo);
  }

  /**
   * Conversations whose intent or any message contains `keyword`
   * (case-insensitive for ASCII), newest first
   */
  search(keyword: string): SessionInfo[] {
    const pattern = `%${keyword.replace(/[\\%_]/g, (ch) => `\\${ch}`)}%`;
    return this.db
      .prepare<[string, string], ConversationRow>(`
        SELECT ${CONVERSATION_COLUMNS}
        FROM conversations c
        WHERE c.intent LIKE ? ESCAPE '\\'
          OR EXISTS (
            SELECT 1 FROM messages m
            WHERE m.conversation_id = c.conversation_id AND m.content LIKE ? ESCAPE '\\'
          )
        ORDER BY c.start_time DESC, c.rowid DESC
      `)
      .all(pattern, pattern)
      .map(rowToSessionInfo);
  }

  /**
   * Conversations started within [start, end], newest first
   */
  listByStartTime(start: number, end: number): SessionInfo[] {
    return this.db
      .prepare<[number, number], ConversationRow>(`
        SELECT ${CONVERSATION_COLUMNS}
        FROM conversations c
        WHERE c.start_time BETWEEN ? AND ?
        ORDER BY c.start_time DESC, c.rowid DESC
      `)
      .all(start, end)
      .map(rowToSessionInfo);
  }

  /**
   * active -> completed. Returns false when already completed or unknown.
   */
  complete(conversationId: string, endTime: number): boolean {
    const result = this.db
      .prepare(`UPDATE conversations SET status = 'completed', end_time = ? WHERE conversation_id = ? AND status = 'active'`)
      .run(endTime, conversationId);
    return result.changes > 0;
  }

  count(): number {
    const row = this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM conversations').get();
    return row?.count ?? 0;
  }

  // ===== Messages =====

  addMessage(conversationId: string, role: string, content: string, timestamp: number): Message {
    const conversation = this.get(conversationId);
    if (!conversation) {
      throw new ValidationError(`Unknown conversation: ${conversationId}`);
    }
    if (conversation.status === 'completed') {
      throw new ValidationError(`Conversation ${conversationId} is completed`);
    }
    if (!role.trim()) {
      throw new ValidationError('role must not be empty');
    }

    const result = this.db
      .prepare('INSERT INTO messages (conversation_id, timestamp, role, content) VALUES (?, ?, ?, ?)')
      .run(conversationId, timestamp, role, content);
    this.db
      .prepare('UPDATE conversations SET last_activity = MAX(last_activity, ?) WHERE conversation_id = ?')
      .run(timestamp, conversationId);

    return {
      messageId: Number(result.lastInsertRowid),
      conversationId,
      timestamp,
      role,
      content,
    };
  }

  getMessages(conversationId: string): Message[] {
    return this.db
      .prepare<[string], MessageRow>(`
        SELECT message_id, conversation_id, timestamp, role, content
        FROM messages
        WHERE conversation_id = ?
        ORDER BY timestamp, message_id
      `)
      .all(conversationId)
      .map((row) => ({
        messageId: row.message_id,
        conversationId: row.conversation_id,
        timestamp: row.timestamp,
        role: row.role,
        content: row.content,
      }));
  }

  // ===== Retention =====

  /**
   * Delete the oldest completed conversations until at most `capacity`
   * remain. Active conversations are never candidates, so the count may
   * stay above capacity. Call inside `transaction()`.
   */
  evictOverCapacity(capacity: number, reason: string): EvictionLogEntry[] {
    const excess = this.count() - capacity;
    if (excess <= 0) return [];

    const candidates = this.db
      .prepare<[number], { conversation_id: string; start_time: number; message_count: number }>(`
        SELECT c.conversation_id, c.start_time,
          (SELECT COUNT(*) FROM messages m WHERE m.conversation_id = c.conversation_id) AS message_count
        FROM conversations c
        WHERE c.status = 'completed'
        ORDER BY c.start_time ASC, c.rowid ASC
        LIMIT ?
      `)
      .all(excess);

    const deleteMessages = this.db.prepare('DELETE FROM messages WHERE conversation_id = ?');
    const deleteConversation = this.db.prepare('DELETE FROM conversations WHERE conversation_id = ?');
    const logEviction = this.db.prepare(`
      INSERT INTO conversation_eviction_log (conversation_id, evicted_at, start_time, message_count, reason)
      VALUES (?, ?, ?, ?, ?)
    `);

    const evictedAt = this.clock();
    return candidates.map((candidate) => {
      deleteMessages.run(candidate.conversation_id);
      deleteConversation.run(candidate.conversation_id);
      logEviction.run(candidate.conversation_id, evictedAt, candidate.start_time, candidate.message_count, reason);
      return {
        conversationId: candidate.conversation_id,
        evictedAt,
        startTime: candidate.start_time,
        messageCount: candidate.message_count,
        reason,
      };
    });
  }

  /**
   * Newest first
   */
  getEvictionLog(limit: number = 100): EvictionLogEntry[] {
    return this.db
      .prepare<[number], EvictionRow>(`
        SELECT conversation_id, evicted_at, start_time, message_count, reason
        FROM conversation_eviction_log
        ORDER BY evicted_at DESC, id DESC
        LIMIT ?
      `)
      .all(limit)
      .map((row) => ({
        conversationId: row.conversation_id,
        evictedAt: row.evicted_at,
        startTime: row.start_time,
        messageCount: row.message_count,
        reason: row.reason,
      }));
  }

  getStats(): ConversationStats {
    const row = this.db
      .prepare<[], { total: number; active: number | null; completed: number | null; messages: number }>(`
        SELECT
          COUNT(*) AS total,
          SUM(CASE WHEN status = 'active' THEN 1 ELSE 0 END) AS active,
          SUM(CASE WHEN status = 'completed' THEN 1 ELSE 0 END) AS completed,
          (SELECT COUNT(*) FROM messages) AS messages
        FROM conversations
      `)
      .get();

    return {
      total: row?.total ?? 0,
      active: row?.active ?? 0,
      completed: row?.completed ?? 0,
      messages: row?.messages ?? 0,
    };
  }
}
