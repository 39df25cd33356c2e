/**
 * SQLite Database Layer for the conversation log
 *
 * Provides persistent storage with:
 * - Sessions per owner, exactly one of them active
 * - Append-only messages with globally increasing ids
 * - Additive schema migrations for databases created by older versions
 */

import Database from 'better-sqlite3';
import * as path from 'path';
import * as fs from 'fs';
import type { Logger } from 'pino';
import { StorageError, errorMessage } from '../utils/errors.js';

export const MESSAGE_ROLES = ['user', 'assistant', 'system'] as const;

export type MessageRole = (typeof MESSAGE_ROLES)[number];

/** Roles that make up the context window sent to the model */
export type ContextRole = Extract<MessageRole, 'user' | 'assistant'>;

/** Opaque per-message payload: latency, token usage, upstream request id, trigger diagnostics */
export type MessageMetadata = Record<string, unknown>;

export function isMessageRole(value: string): value is MessageRole {
  return MESSAGE_ROLES.some((role) => role === value);
}

/**
 * Session entry
 */
export interface SessionRow {
  id: number;
  ownerId: number;
  createdAt: string;
  isActive: boolean;
}

/**
 * Message entry
 */
export interface MessageRow {
  id: number;
  sessionId: number;
  role: MessageRole;
  content: string;
  createdAt: string;
  metadata: MessageMetadata | null;
  isProactive: boolean;
}

export interface ContextMessage {
  role: ContextRole;
  content: string;
}

export interface LastUserMessage {
  id: number;
  content: string;
  createdAt: Date;
}

export interface ExportedMessage {
  role: MessageRole;
  content: string;
  createdAt: string;
}

export interface HealthSnapshot {
  activeSessionId: number | null;
  activeSessionCreatedAt: string | null;
  totalMessages: number;
}

export interface AppendOptions {
  metadata?: MessageMetadata;
  proactive?: boolean;
}

export interface ConversationDatabaseOptions {
  logger?: Logger;
  /** Clock for server-assigned timestamps */
  now?: () => Date;
}

interface SessionRecord {
  id: number;
  owner_telegram_id: number;
  created_at: string;
  is_active: number;
}

interface MessageRecord {
  id: number;
  session_id: number;
  role: string;
  content: string;
  created_at: string;
  meta_json: string | null;
  is_proactive: number;
}

/**
 * Conversation store backed by SQLite. The only owner of persisted state.
 *
 * Every write commits before returning. Column names match the layout used by
 * earlier deployments, so an existing database file opens unchanged.
 */
export class ConversationDatabase {
  private db: Database.Database;
  private dbPath: string;
  private logger?: Logger;
  private now: () => Date;

  constructor(dbPath: string, options: ConversationDatabaseOptions = {}) {
    this.dbPath = dbPath;
    this.logger = options.logger?.child({ component: 'conversation-db' });
    this.now = options.now ?? (() => new Date());

    try {
      if (dbPath !== ':memory:') {
        const dir = path.dirname(dbPath);
        if (!fs.existsSync(dir)) {
          fs.mkdirSync(dir, { recursive: true });
        }
      }

      this.db = new Database(dbPath);
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('foreign_keys = ON');
    } catch (error) {
      throw new StorageError(errorMessage(error), 'open', error);
    }

    this.initializeSchema();
  }

  /**
   * Initialize database schema
   */
  private initializeSchema(): void {
    this.guard('initializeSchema', () => {
      this.db.exec(`
        CREATE TABLE IF NOT EXISTS sessions (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          owner_telegram_id INTEGER NOT NULL,
          created_at TEXT NOT NULL,
          is_active INTEGER NOT NULL DEFAULT 1
        );

        CREATE TABLE IF NOT EXISTS messages (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          session_id INTEGER NOT NULL,
          role TEXT NOT NULL CHECK (role IN ('user', 'assistant', 'system')),
          content TEXT NOT NULL,
          created_at TEXT NOT NULL,
          meta_json TEXT,
          is_proactive INTEGER NOT NULL DEFAULT 0,
          FOREIGN KEY (session_id) REFERENCES sessions(id)
        );

        CREATE INDEX IF NOT EXISTS idx_messages_session ON messages(session_id, id);
        CREATE INDEX IF NOT EXISTS idx_sessions_owner_active ON sessions(owner_telegram_id, is_active);
      `);
    });

    // Migration: proactive flag was added after the first release
    this.ensureMessageColumn('is_proactive', 'INTEGER NOT NULL DEFAULT 0');

    // Migration: enforce one active session per owner
    this.migrateSingleActiveSession();
  }

  /**
   * Add a column to messages if an older database lacks it. Existing rows get the default.
   */
  private ensureMessageColumn(name: string, ddl: string): void {
    this.guard('ensureMessageColumn', () => {
      const columns = this.db.prepare<[], { name: string }>('PRAGMA table_info(messages)').all();
      if (columns.some((col) => col.name === name)) {
        return;
      }
      this.db.exec(`ALTER TABLE messages ADD COLUMN ${name} ${ddl}`);
      this.logger?.info({ column: name }, 'Added missing messages column');
    });
  }

  /**
   * Keep only the newest active session per owner, then let a partial unique
   * index hold the invariant from here on.
   */
  private migrateSingleActiveSession(): void {
    this.guard('migrateSingleActiveSession', () => {
      const repair = this.db.transaction(() => {
        const result = this.db.prepare(`
          UPDATE sessions SET is_active = 0
          WHERE is_active = 1 AND id NOT IN (
            SELECT MAX(id) FROM sessions WHERE is_active = 1 GROUP BY owner_telegram_id
          )
        `).run();
        if (result.changes > 0) {
          this.logger?.warn({ deactivated: result.changes }, 'Deactivated duplicate active sessions');
        }
        this.db.exec(`
          CREATE UNIQUE INDEX IF NOT EXISTS idx_sessions_one_active
          ON sessions(owner_telegram_id) WHERE is_active = 1
        `);
      });
      repair();
    });
  }

  // ============ Session Operations ============

  findActiveSession(ownerId: number): SessionRow | null {
    return this.guard('findActiveSession', () => {
      const row = this.db.prepare<[number], SessionRecord>(`
        SELECT id, owner_telegram_id, created_at, is_active
        FROM sessions
        WHERE owner_telegram_id = ? AND is_active = 1
        ORDER BY id DESC
        LIMIT 1
      `).get(ownerId);
      return row ? this.rowToSession(row) : null;
    });
  }

  getSession(id: number): SessionRow | null {
    return this.guard('getSession', () => {
      const row = this.db.prepare<[number], SessionRecord>(
        'SELECT id, owner_telegram_id, created_at, is_active FROM sessions WHERE id = ?'
      ).get(id);
      return row ? this.rowToSession(row) : null;
    });
  }

  listSessions(ownerId: number): SessionRow[] {
    return this.guard('listSessions', () => {
      const rows = this.db.prepare<[number], SessionRecord>(
        'SELECT id, owner_telegram_id, created_at, is_active FROM sessions WHERE owner_telegram_id = ? ORDER BY id'
      ).all(ownerId);
      return rows.map((row) => this.rowToSession(row));
    });
  }

  /** Mark every active session of the owner inactive. Returns how many changed. */
  deactivateSessions(ownerId: number): number {
    return this.guard('deactivateSessions', () => {
      const result = this.db.prepare<[number]>(
        'UPDATE sessions SET is_active = 0 WHERE owner_telegram_id = ? AND is_active = 1'
      ).run(ownerId);
      return result.changes;
    });
  }

  /** Insert a new active session. Callers deactivate the previous one in the same transaction. */
  insertActiveSession(ownerId: number): SessionRow {
    return this.guard('insertActiveSession', () => {
      const createdAt = this.timestamp();
      const result = this.db.prepare<[number, string]>(
        'INSERT INTO sessions (owner_telegram_id, created_at, is_active) VALUES (?, ?, 1)'
      ).run(ownerId, createdAt);
      return { id: Number(result.lastInsertRowid), ownerId, createdAt, isActive: true };
    });
  }

  // ============ Message Operations ============

  /**
   * Append a message with a server-assigned timestamp.
   * Fails with StorageError if the session does not exist.
   */
  append(sessionId: number, role: MessageRole, content: string, options: AppendOptions = {}): number {
    return this.guard('append', () => {
      if (!isMessageRole(role)) {
        throw new StorageError(`Unknown message role: ${String(role)}`, 'append');
      }
      const { metadata, proactive = false } = options;
      const metaJson = metadata && Object.keys(metadata).length > 0 ? JSON.stringify(metadata) : null;
      const result = this.db.prepare<[number, string, string, string, string | null, number]>(`
        INSERT INTO messages (session_id, role, content, created_at, meta_json, is_proactive)
        VALUES (?, ?, ?, ?, ?, ?)
      `).run(sessionId, role, content, this.timestamp(), metaJson, proactive ? 1 : 0);
      return Number(result.lastInsertRowid);
    });
  }

  /**
   * Up to `limit` most recent user/assistant messages, oldest first.
   */
  recentContext(sessionId: number, limit: number): ContextMessage[] {
    return this.guard('recentContext', () => {
      const rows = this.db.prepare<[number, number], { role: string; content: string }>(`
        SELECT role, content
        FROM messages
        WHERE session_id = ? AND role IN ('user', 'assistant')
        ORDER BY id DESC
        LIMIT ?
      `).all(sessionId, limit);
      rows.reverse();
      return rows.map((row) => ({ role: this.toContextRole(row.role), content: row.content }));
    });
  }

  lastUserMessage(sessionId: number): LastUserMessage | null {
    return this.guard('lastUserMessage', () => {
      const row = this.db.prepare<[number], { id: number; content: string; created_at: string }>(`
        SELECT id, content, created_at
        FROM messages
        WHERE session_id = ? AND role = 'user'
        ORDER BY id DESC
        LIMIT 1
      `).get(sessionId);
      if (!row) return null;
      const createdAt = new Date(row.created_at);
      if (isNaN(createdAt.getTime())) {
        throw new StorageError(`Unreadable timestamp on message ${row.id}: ${row.created_at}`);
      }
      return { id: row.id, content: row.content, createdAt };
    });
  }

  /** True if a proactive assistant message newer than `messageId` exists in the session */
  hasProactiveAfter(sessionId: number, messageId: number): boolean {
    return this.guard('hasProactiveAfter', () => {
      const row = this.db.prepare<[number, number], { id: number }>(`
        SELECT id
        FROM messages
        WHERE session_id = ? AND role = 'assistant' AND is_proactive = 1 AND id > ?
        ORDER BY id DESC
        LIMIT 1
      `).get(sessionId, messageId);
      return row !== undefined;
    });
  }

  /**
   * Up to `limit` most recent messages of any role, oldest first. Callers clamp `limit`.
   */
  exportRecent(sessionId: number, limit: number): ExportedMessage[] {
    return this.guard('exportRecent', () => {
      const rows = this.db.prepare<[number, number], { role: string; content: string; created_at: string }>(`
        SELECT role, content, created_at
        FROM messages
        WHERE session_id = ?
        ORDER BY id DESC
        LIMIT ?
      `).all(sessionId, limit);
      rows.reverse();
      return rows.map((row) => ({
        role: this.toRole(row.role),
        content: row.content,
        createdAt: row.created_at,
      }));
    });
  }

  getMessage(id: number): MessageRow | null {
    return this.guard('getMessage', () => {
      const row = this.db.prepare<[number], MessageRecord>('SELECT * FROM messages WHERE id = ?').get(id);
      return row ? this.rowToMessage(row) : null;
    });
  }

  healthSnapshot(ownerId: number): HealthSnapshot {
    return this.guard('healthSnapshot', () => {
      const active = this.findActiveSession(ownerId);
      const count = this.db.prepare<[], { c: number }>('SELECT COUNT(*) AS c FROM messages').get();
      return {
        activeSessionId: active?.id ?? null,
        activeSessionCreatedAt: active?.createdAt ?? null,
        totalMessages: count?.c ?? 0,
      };
    });
  }

  /**
   * Run `fn` in a single SQLite transaction; any throw rolls everything back.
   */
  transaction<T>(fn: () => T): T {
    return this.guard('transaction', () => this.db.transaction(fn)());
  }

  /**
   * Close the database
   */
  close(): void {
    this.db.close();
  }

  /**
   * Get database path
   */
  getPath(): string {
    return this.dbPath;
  }

  // ============ Helpers ============

  private timestamp(): string {
    return this.now().toISOString();
  }

  /** Wrap driver failures as StorageError, leaving ones already wrapped untouched */
  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof StorageError) throw error;
      throw new StorageError(errorMessage(error), operation, error);
    }
  }

  private toRole(value: string): MessageRole {
    if (!isMessageRole(value)) {
      throw new StorageError(`Unknown message role in database: ${value}`);
    }
    return value;
  }

  private toContextRole(value: string): ContextRole {
    const role = this.toRole(value);
    if (role === 'system') {
      throw new StorageError('System message in context query');
    }
    return role;
  }

  private parseMetadata(json: string | null): MessageMetadata | null {
    if (!json) return null;
    const parsed: unknown = JSON.parse(json);
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      return null;
    }
    return Object.fromEntries(Object.entries(parsed));
  }

  private rowToSession(row: SessionRecord): SessionRow {
    return {
      id: row.id,
      ownerId: row.owner_telegram_id,
      createdAt: row.created_at,
      isActive: row.is_active === 1,
    };
  }

  private rowToMessage(row: MessageRecord): MessageRow {
    return {
      id: row.id,
      sessionId: row.session_id,
      role: this.toRole(row.role),
      content: row.content,
      createdAt: row.created_at,
      metadata: this.parseMetadata(row.meta_json),
      isProactive: row.is_proactive === 1,
    };
  }
}

