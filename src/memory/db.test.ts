import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { ConversationDatabase, isMessageRole, type MessageRole } from './db.js';
import { StorageError } from '../utils/errors.js';

const OWNER = 42;

describe('ConversationDatabase', () => {
  let db: ConversationDatabase;
  let clock: Date;

  beforeEach(() => {
    clock = new Date('2026-03-01T12:00:00.000Z');
    db = new ConversationDatabase(':memory:', { now: () => clock });
  });

  afterEach(() => {
    db.close();
  });

  describe('sessions', () => {
    it('has no active session before the first insert', () => {
      expect(db.findActiveSession(OWNER)).toBeNull();
    });

    it('inserts an active session with a server timestamp', () => {
      const session = db.insertActiveSession(OWNER);

      expect(session).toEqual({
        id: 1,
        ownerId: OWNER,
        createdAt: '2026-03-01T12:00:00.000Z',
        isActive: true,
      });
      expect(db.findActiveSession(OWNER)).toEqual(session);
    });

    it('refuses a second active session for the same owner', () => {
      db.insertActiveSession(OWNER);
      expect(() => db.insertActiveSession(OWNER)).toThrow(StorageError);
    });

    it('deactivates and reports how many sessions changed', () => {
      db.insertActiveSession(OWNER);
      expect(db.deactivateSessions(OWNER)).toBe(1);
      expect(db.deactivateSessions(OWNER)).toBe(0);
      expect(db.findActiveSession(OWNER)).toBeNull();
      expect(db.getSession(1)?.isActive).toBe(false);
    });

    it('keeps owners apart', () => {
      const mine = db.insertActiveSession(OWNER);
      const theirs = db.insertActiveSession(7);

      expect(db.findActiveSession(OWNER)?.id).toBe(mine.id);
      expect(db.findActiveSession(7)?.id).toBe(theirs.id);
      expect(db.listSessions(OWNER)).toHaveLength(1);
    });

    it('rolls back a transaction that throws', () => {
      db.insertActiveSession(OWNER);
      expect(() =>
        db.transaction(() => {
          db.deactivateSessions(OWNER);
          throw new Error('boom');
        })
      ).toThrow('boom');
      expect(db.findActiveSession(OWNER)?.id).toBe(1);
    });
  });

  describe('messages', () => {
    let sessionId: number;

    beforeEach(() => {
      sessionId = db.insertActiveSession(OWNER).id;
    });

    it('assigns increasing ids', () => {
      const first = db.append(sessionId, 'user', 'hello');
      const second = db.append(sessionId, 'assistant', 'hi there');
      expect(second).toBeGreaterThan(first);
    });

    it('returns the context window oldest first', () => {
      db.append(sessionId, 'user', 'hello');
      db.append(sessionId, 'assistant', 'hi there');
      db.append(sessionId, 'user', 'how are you?');

      expect(db.recentContext(sessionId, 40)).toEqual([
        { role: 'user', content: 'hello' },
        { role: 'assistant', content: 'hi there' },
        { role: 'user', content: 'how are you?' },
      ]);
    });

    it('keeps only the newest messages when the window is smaller', () => {
      for (let i = 1; i <= 5; i++) {
        db.append(sessionId, i % 2 === 1 ? 'user' : 'assistant', `m${i}`);
      }

      expect(db.recentContext(sessionId, 2)).toEqual([
        { role: 'assistant', content: 'm4' },
        { role: 'user', content: 'm5' },
      ]);
    });

    it('leaves system messages out of the context window', () => {
      db.append(sessionId, 'system', 'note');
      db.append(sessionId, 'user', 'hello');

      expect(db.recentContext(sessionId, 40)).toEqual([{ role: 'user', content: 'hello' }]);
    });

    it('only includes messages of the given session', () => {
      db.append(sessionId, 'user', 'old');
      db.transaction(() => {
        db.deactivateSessions(OWNER);
        db.insertActiveSession(OWNER);
      });
      const fresh = db.findActiveSession(OWNER);

      expect(fresh?.id).not.toBe(sessionId);
      expect(db.recentContext(fresh?.id ?? -1, 40)).toEqual([]);
    });

    it('stores metadata and the proactive flag', () => {
      const id = db.append(sessionId, 'assistant', 'checking in', {
        proactive: true,
        metadata: { latencyMs: 12, trigger: 'inactivity' },
      });

      expect(db.getMessage(id)).toEqual({
        id,
        sessionId,
        role: 'assistant',
        content: 'checking in',
        createdAt: '2026-03-01T12:00:00.000Z',
        metadata: { latencyMs: 12, trigger: 'inactivity' },
        isProactive: true,
      });
    });

    it('stores empty metadata as null', () => {
      const id = db.append(sessionId, 'user', 'hello', { metadata: {} });
      expect(db.getMessage(id)?.metadata).toBeNull();
      expect(db.getMessage(id)?.isProactive).toBe(false);
    });

    it('fails with StorageError for an unknown session', () => {
      expect(() => db.append(999, 'user', 'hello')).toThrow(StorageError);
      expect(() => db.append(999, 'user', 'hello')).toThrow(/^append: /);
    });

    it('rejects an unknown role', () => {
      expect(() => db.append(sessionId, 'tool' as MessageRole, 'hello')).toThrow(
        'append: Unknown message role: tool'
      );
    });

    it('finds the last user message with its timestamp', () => {
      db.append(sessionId, 'user', 'first');
      clock = new Date('2026-03-01T13:00:00.000Z');
      const id = db.append(sessionId, 'user', 'second');
      db.append(sessionId, 'assistant', 'reply');

      expect(db.lastUserMessage(sessionId)).toEqual({
        id,
        content: 'second',
        createdAt: new Date('2026-03-01T13:00:00.000Z'),
      });
    });

    it('returns null when the session has no user message', () => {
      db.append(sessionId, 'assistant', 'hi');
      expect(db.lastUserMessage(sessionId)).toBeNull();
    });

    it('detects a proactive message after a given id', () => {
      const userId = db.append(sessionId, 'user', 'hello');
      db.append(sessionId, 'assistant', 'normal reply');
      expect(db.hasProactiveAfter(sessionId, userId)).toBe(false);

      db.append(sessionId, 'assistant', 'nudge', { proactive: true });
      expect(db.hasProactiveAfter(sessionId, userId)).toBe(true);

      const nextUser = db.append(sessionId, 'user', 'back again');
      expect(db.hasProactiveAfter(sessionId, nextUser)).toBe(false);
    });

    it('exports the newest messages of any role oldest first', () => {
      db.append(sessionId, 'system', 'note');
      db.append(sessionId, 'user', 'hello');
      db.append(sessionId, 'assistant', 'hi there');

      expect(db.exportRecent(sessionId, 2)).toEqual([
        { role: 'user', content: 'hello', createdAt: '2026-03-01T12:00:00.000Z' },
        { role: 'assistant', content: 'hi there', createdAt: '2026-03-01T12:00:00.000Z' },
      ]);
    });
  });

  describe('healthSnapshot', () => {
    it('reports no active session on a fresh database', () => {
      expect(db.healthSnapshot(OWNER)).toEqual({
        activeSessionId: null,
        activeSessionCreatedAt: null,
        totalMessages: 0,
      });
    });

    it('counts messages across all sessions', () => {
      const first = db.insertActiveSession(OWNER);
      db.append(first.id, 'user', 'a');
      db.deactivateSessions(OWNER);
      const second = db.insertActiveSession(OWNER);
      db.append(second.id, 'user', 'b');

      expect(db.healthSnapshot(OWNER)).toEqual({
        activeSessionId: second.id,
        activeSessionCreatedAt: '2026-03-01T12:00:00.000Z',
        totalMessages: 2,
      });
    });
  });
});

describe('ConversationDatabase migrations', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'companion-db-test-'));
  });

  afterEach(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  it('creates the parent directory of the database file', () => {
    const dbPath = path.join(testDir, 'nested', 'dir', 'bot.db');
    const db = new ConversationDatabase(dbPath);

    expect(fs.existsSync(dbPath)).toBe(true);
    expect(db.getPath()).toBe(dbPath);
    db.close();
  });

  it('refuses a last user message with an unreadable timestamp', () => {
    const dbPath = path.join(testDir, 'bad-stamp.db');
    const db = new ConversationDatabase(dbPath);
    const sessionId = db.insertActiveSession(OWNER).id;
    db.append(sessionId, 'user', 'hello');
    db.close();

    const raw = new Database(dbPath);
    raw.prepare("UPDATE messages SET created_at = 'yesterday-ish'").run();
    raw.close();

    const reopened = new ConversationDatabase(dbPath);
    expect(() => reopened.lastUserMessage(sessionId)).toThrow(
      new StorageError('Unreadable timestamp on message 1: yesterday-ish')
    );
    reopened.close();
  });

  it('opens a database from before the proactive flag existed', () => {
    const dbPath = path.join(testDir, 'legacy.db');
    const legacy = new Database(dbPath);
    legacy.exec(`
      CREATE TABLE sessions (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        owner_telegram_id INTEGER NOT NULL,
        created_at TEXT NOT NULL,
        is_active INTEGER NOT NULL DEFAULT 1
      );
      CREATE TABLE messages (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        session_id INTEGER NOT NULL,
        role TEXT NOT NULL,
        content TEXT NOT NULL,
        created_at TEXT NOT NULL,
        meta_json TEXT,
        FOREIGN KEY (session_id) REFERENCES sessions(id)
      );
      INSERT INTO sessions (owner_telegram_id, created_at, is_active) VALUES (42, '2025-01-01T00:00:00.000Z', 1);
      INSERT INTO messages (session_id, role, content, created_at) VALUES (1, 'user', 'old hello', '2025-01-01T00:00:01.000Z');
    `);
    legacy.close();

    const db = new ConversationDatabase(dbPath);

    expect(db.getMessage(1)).toEqual({
      id: 1,
      sessionId: 1,
      role: 'user',
      content: 'old hello',
      createdAt: '2025-01-01T00:00:01.000Z',
      metadata: null,
      isProactive: false,
    });
    const id = db.append(1, 'assistant', 'nudge', { proactive: true });
    expect(db.hasProactiveAfter(1, 1)).toBe(true);
    expect(db.getMessage(id)?.isProactive).toBe(true);
    db.close();
  });

  it('keeps only the newest active session per owner', () => {
    const dbPath = path.join(testDir, 'duplicates.db');
    const legacy = new Database(dbPath);
    legacy.exec(`
      CREATE TABLE sessions (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        owner_telegram_id INTEGER NOT NULL,
        created_at TEXT NOT NULL,
        is_active INTEGER NOT NULL DEFAULT 1
      );
      INSERT INTO sessions (owner_telegram_id, created_at, is_active) VALUES (42, '2025-01-01T00:00:00.000Z', 1);
      INSERT INTO sessions (owner_telegram_id, created_at, is_active) VALUES (42, '2025-01-02T00:00:00.000Z', 1);
    `);
    legacy.close();

    const db = new ConversationDatabase(dbPath);

    expect(db.findActiveSession(42)?.id).toBe(2);
    expect(db.getSession(1)?.isActive).toBe(false);
    db.close();
  });

  it('wraps open failures in StorageError', () => {
    const blocker = path.join(testDir, 'file');
    fs.writeFileSync(blocker, 'not a directory');

    expect(() => new ConversationDatabase(path.join(blocker, 'bot.db'))).toThrow(StorageError);
  });
});

describe('isMessageRole', () => {
  it('accepts the three stored roles only', () => {
    expect(isMessageRole('user')).toBe(true);
    expect(isMessageRole('assistant')).toBe(true);
    expect(isMessageRole('system')).toBe(true);
    expect(isMessageRole('tool')).toBe(false);
  });
});
