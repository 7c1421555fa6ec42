/**
 * Tests for SessionManager: FIFO retention and idle boundaries
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { ConfigOverrides, createConfig } from '../../config.js';
import { NotInitializedError, ValidationError } from '../../errors.js';
import { DAY_MS } from '../../types.js';
import { SessionManager } from '../session-manager.js';

const T0 = Date.UTC(2026, 0, 15, 9, 0, 0);
const MINUTE = 60_000;

describe('SessionManager', () => {
  let manager: SessionManager;
  let now: number;

  function createManager(overrides: ConfigOverrides = {}): SessionManager {
    return new SessionManager(createConfig({ dbFilename: ':memory:', clock: () => now, ...overrides }));
  }

  beforeEach(async () => {
    now = T0;
    manager = createManager();
    await manager.initialize();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await manager.shutdown();
  });

  describe('startSession', () => {
    it('should create an active session with a generated id', async () => {
      const id = await manager.startSession({ intent: 'fix login bug' });
      const info = await manager.getSessionInfo(id);

      expect(id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
      expect(info).toEqual({
        conversationId: id,
        status: 'active',
        intent: 'fix login bug',
        startTime: T0,
        endTime: null,
        lastActivity: T0,
        messageCount: 0,
      });
    });

    it('should accept a supplied id once', async () => {
      await manager.startSession({ conversationId: 'conv-1' });
      await expect(manager.startSession({ conversationId: 'conv-1' })).rejects.toThrow(ValidationError);
    });

    it('should emit session:started', async () => {
      const listener = vi.fn();
      manager.on('session:started', listener);

      await manager.startSession({ conversationId: 'conv-1' });

      expect(listener).toHaveBeenCalledWith({ conversationId: 'conv-1', intent: null, startTime: T0 });
    });
  });

  describe('FIFO capacity', () => {
    it('should keep at most 50 conversations, evicting the oldest completed', async () => {
      const evicted = vi.fn();
      manager.on('conversation:evicted', evicted);

      for (let i = 1; i <= 55; i++) {
        now = T0 + i * 1000;
        await manager.startSession({ conversationId: `conv-${i}` });
        expect((await manager.getStats()).total).toBeLessThanOrEqual(50);
        if (i < 55) await manager.endSession(`conv-${i}`);
      }

      const remaining = (await manager.getAllSessions()).map((s) => s.conversationId);
      expect(remaining).toHaveLength(50);
      for (let i = 1; i <= 5; i++) {
        expect(remaining).not.toContain(`conv-${i}`);
      }
      expect(remaining[0]).toBe('conv-55');
      expect(remaining[49]).toBe('conv-6');
      expect(evicted).toHaveBeenCalledTimes(5);

      const log = await manager.getEvictionLog();
      expect(log.map((e) => e.conversationId)).toEqual(['conv-5', 'conv-4', 'conv-3', 'conv-2', 'conv-1']);
    });

    it('should never evict active conversations', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      await manager.shutdown();
      manager = createManager({ conversationCapacity: 3 });

      for (const id of ['a', 'b', 'c', 'd']) {
        await manager.startSession({ conversationId: id });
      }

      expect((await manager.getStats()).total).toBe(4);
      expect(await manager.getEvictionLog()).toEqual([]);
      expect(warn).toHaveBeenCalledWith(
        '[SessionManager] 4 conversations exceed capacity 3; the excess are all active'
      );

      await manager.endSession('b');
      now = T0 + 1000;
      await manager.startSession({ conversationId: 'e' });

      const remaining = (await manager.getAllSessions()).map((s) => s.conversationId);
      expect(remaining).toEqual(['e', 'd', 'c', 'a']);
    });

    it('should log evicted conversations and drop their messages', async () => {
      await manager.shutdown();
      manager = createManager({ conversationCapacity: 2 });

      await manager.startSession({ conversationId: 'a' });
      await manager.addMessage('a', 'user', 'hello');
      await manager.addMessage('a', 'agent', 'hi');
      await manager.endSession('a');

      now = T0 + 1000;
      await manager.startSession({ conversationId: 'b' });
      await manager.endSession('b');

      now = T0 + 2000;
      await manager.startSession({ conversationId: 'c' });

      expect(await manager.getEvictionLog()).toEqual([
        { conversationId: 'a', evictedAt: T0 + 2000, startTime: T0, messageCount: 2, reason: 'FIFO capacity' },
      ]);
      expect(await manager.getMessages('a')).toEqual([]);
      expect(await manager.getSessionInfo('a')).toBeNull();
    });
  });

  describe('getActiveSession', () => {
    it('should return null when nothing is active', async () => {
      expect(await manager.getActiveSession()).toBeNull();
    });

    it('should return the most recently started active session', async () => {
      await manager.startSession({ conversationId: 'first' });
      now = T0 + MINUTE;
      await manager.startSession({ conversationId: 'second' });

      now = T0 + 2 * MINUTE;
      expect(await manager.getActiveSession()).toBe('second');
    });

    it('should keep a session idle for 29 minutes', async () => {
      await manager.startSession({ conversationId: 'conv' });

      now = T0 + 29 * MINUTE;

      expect(await manager.getActiveSession()).toBe('conv');
      expect((await manager.getSessionInfo('conv'))?.status).toBe('active');
    });

    it('should keep a session idle for exactly the timeout', async () => {
      await manager.startSession({ conversationId: 'conv' });
      now = T0 + 30 * MINUTE;
      expect(await manager.getActiveSession()).toBe('conv');
    });

    it('should close a session idle for 31 minutes', async () => {
      const boundary = vi.fn();
      manager.on('session:boundary', boundary);
      await manager.startSession({ conversationId: 'conv' });

      now = T0 + 31 * MINUTE;

      expect(await manager.getActiveSession()).toBeNull();
      const info = await manager.getSessionInfo('conv');
      expect(info?.status).toBe('completed');
      expect(info?.endTime).toBe(T0 + 31 * MINUTE);
      expect(boundary).toHaveBeenCalledWith({ conversationId: 'conv', idleMs: 31 * MINUTE });
    });

    it('should measure idle time from the last message', async () => {
      await manager.startSession({ conversationId: 'conv' });
      await manager.addMessage('conv', 'user', 'first', T0);
      await manager.addMessage('conv', 'agent', 'second', T0 + 5 * MINUTE);
      await manager.addMessage('conv', 'user', 'third', T0 + 10 * MINUTE);

      now = T0 + 39 * MINUTE;
      expect(await manager.getActiveSession()).toBe('conv');

      now = T0 + 41 * MINUTE;
      expect(await manager.getActiveSession()).toBeNull();

      const info = await manager.getSessionInfo('conv');
      expect(info?.status).toBe('completed');
      expect(info?.lastActivity).toBe(T0 + 10 * MINUTE);
      expect(info?.messageCount).toBe(3);
    });

    it('should honour a configured timeout', async () => {
      await manager.shutdown();
      manager = createManager({ sessionTimeoutMs: 5 * MINUTE });
      await manager.startSession({ conversationId: 'conv' });

      now = T0 + 6 * MINUTE;

      expect(await manager.getActiveSession()).toBeNull();
    });
  });

  describe('endSession', () => {
    it('should be idempotent', async () => {
      const ended = vi.fn();
      manager.on('session:ended', ended);
      await manager.startSession({ conversationId: 'conv' });

      now = T0 + MINUTE;
      await manager.endSession('conv');
      now = T0 + 2 * MINUTE;
      await manager.endSession('conv');
      await manager.endSession('unknown');

      expect(ended).toHaveBeenCalledTimes(1);
      expect((await manager.getSessionInfo('conv'))?.endTime).toBe(T0 + MINUTE);
    });
  });

  describe('closeStaleSessions', () => {
    it('should close only sessions past the boundary', async () => {
      await manager.startSession({ conversationId: 'stale' });
      now = T0 + 20 * MINUTE;
      await manager.startSession({ conversationId: 'fresh' });

      now = T0 + 45 * MINUTE;

      expect(await manager.closeStaleSessions()).toEqual(['stale']);
      expect((await manager.getSessionInfo('fresh'))?.status).toBe('active');
    });
  });

  describe('messages', () => {
    it('should order messages by timestamp', async () => {
      await manager.startSession({ conversationId: 'conv' });
      await manager.addMessage('conv', 'user', 'later', T0 + 2000);
      await manager.addMessage('conv', 'user', 'earlier', T0 + 1000);

      const contents = (await manager.getMessages('conv')).map((m) => m.content);
      expect(contents).toEqual(['earlier', 'later']);
    });

    it('should stamp messages with the clock by default', async () => {
      await manager.startSession({ conversationId: 'conv' });
      now = T0 + 3000;

      const message = await manager.addMessage('conv', 'agent', 'done');

      expect(message.timestamp).toBe(T0 + 3000);
      expect(message.conversationId).toBe('conv');
    });

    it('should reject unknown and completed conversations', async () => {
      await expect(manager.addMessage('missing', 'user', 'x')).rejects.toThrow('Unknown conversation: missing');

      await manager.startSession({ conversationId: 'conv' });
      await manager.endSession('conv');
      await expect(manager.addMessage('conv', 'user', 'x')).rejects.toThrow(ValidationError);
    });

    it('should reject an empty role', async () => {
      await manager.startSession({ conversationId: 'conv' });
      await expect(manager.addMessage('conv', ' ', 'x')).rejects.toThrow('role must not be empty');
    });
  });

  describe('getAllSessions', () => {
    beforeEach(async () => {
      await manager.startSession({ conversationId: 'one' });
      await manager.endSession('one');
      now = T0 + 1000;
      await manager.startSession({ conversationId: 'two' });
      now = T0 + 2000;
      await manager.startSession({ conversationId: 'three' });
    });

    it('should list newest first', async () => {
      const ids = (await manager.getAllSessions()).map((s) => s.conversationId);
      expect(ids).toEqual(['three', 'two', 'one']);
    });

    it('should filter by status and limit', async () => {
      const active = (await manager.getAllSessions({ status: 'active', limit: 1 })).map((s) => s.conversationId);
      const completed = (await manager.getAllSessions({ status: 'completed' })).map((s) => s.conversationId);

      expect(active).toEqual(['three']);
      expect(completed).toEqual(['one']);
    });

    it('should reject a non-positive limit', async () => {
      await expect(manager.getAllSessions({ limit: 0 })).rejects.toThrow(ValidationError);
    });

    it('should count sessions and messages', async () => {
      await manager.addMessage('two', 'user', 'x');
      expect(await manager.getStats()).toEqual({ total: 3, active: 2, completed: 1, messages: 1 });
    });
  });

  describe('searchConversations', () => {
    beforeEach(async () => {
      await manager.startSession({ conversationId: 'login', intent: 'Fix login redirect' });
      await manager.addMessage('login', 'user', 'The 100% case fails');
      now = T0 + MINUTE;
      await manager.startSession({ conversationId: 'cache', intent: 'Tune cache' });
      await manager.addMessage('cache', 'agent', 'Raised the TTL after the login change');
      now = T0 + 2 * MINUTE;
      await manager.startSession({ conversationId: 'docs', intent: 'Write docs' });
    });

    it('should match intent or message content, newest first', async () => {
      const ids = (await manager.searchConversations('LOGIN')).map((s) => s.conversationId);
      expect(ids).toEqual(['cache', 'login']);
    });

    it('should treat wildcard characters literally', async () => {
      expect((await manager.searchConversations('100%')).map((s) => s.conversationId)).toEqual(['login']);
      expect(await manager.searchConversations('_')).toEqual([]);
    });

    it('should return nothing for a blank keyword', async () => {
      expect(await manager.searchConversations('   ')).toEqual([]);
    });
  });

  describe('getConversationsByDateRange', () => {
    beforeEach(async () => {
      await manager.startSession({ conversationId: 'day1' });
      now = T0 + DAY_MS;
      await manager.startSession({ conversationId: 'day2' });
      now = T0 + 2 * DAY_MS;
      await manager.startSession({ conversationId: 'day3' });
    });

    it('should include both ends, newest first', async () => {
      const ids = (await manager.getConversationsByDateRange(T0, T0 + DAY_MS)).map((s) => s.conversationId);
      expect(ids).toEqual(['day2', 'day1']);
    });

    it('should reject an inverted range', async () => {
      await expect(manager.getConversationsByDateRange(T0 + DAY_MS, T0)).rejects.toThrow(ValidationError);
    });
  });

  describe('lifecycle', () => {
    it('should refuse use after shutdown', async () => {
      await manager.shutdown();
      await expect(manager.getActiveSession()).rejects.toThrow(NotInitializedError);
    });
  });
});

describe('SessionManager on a shared database file', () => {
  let tempDir: string;
  let now: number;
  let first: SessionManager;
  let second: SessionManager;

  beforeEach(async () => {
    tempDir = mkdtempSync(path.join(os.tmpdir(), 'cortex-sessions-'));
    now = T0;
    const config = createConfig({ brainDir: tempDir, clock: () => now });
    first = new SessionManager(config);
    second = new SessionManager(config);
    await first.initialize();
    await second.initialize();
  });

  afterEach(async () => {
    await first.shutdown();
    await second.shutdown();
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should close a stale session exactly once across connections', async () => {
    const boundary = vi.fn();
    first.on('session:boundary', boundary);
    second.on('session:boundary', boundary);
    await first.startSession({ conversationId: 'conv' });

    now = T0 + 31 * MINUTE;
    const results = await Promise.all([first.getActiveSession(), second.getActiveSession()]);

    expect(results).toEqual([null, null]);
    expect(boundary).toHaveBeenCalledTimes(1);
    expect((await second.getSessionInfo('conv'))?.endTime).toBe(T0 + 31 * MINUTE);

    now = T0 + 40 * MINUTE;
    expect(await second.getActiveSession()).toBeNull();
    expect(await second.closeStaleSessions()).toEqual([]);
    await first.endSession('conv');

    expect(boundary).toHaveBeenCalledTimes(1);
    expect((await first.getSessionInfo('conv'))?.endTime).toBe(T0 + 31 * MINUTE);
  });
});
