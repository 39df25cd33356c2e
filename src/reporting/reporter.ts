/**
 * Read-only views over the conversation log for /export and /health
 */

import type { ConversationDatabase, ExportedMessage, HealthSnapshot } from '../memory/db.js';
import type { SessionManager } from '../agent/session.js';

export const DEFAULT_EXPORT_LIMIT = 20;
export const MIN_EXPORT_LIMIT = 1;
export const MAX_EXPORT_LIMIT = 200;

/** Output budget; keeps the reply below Telegram's message size */
export const EXPORT_CHAR_BUDGET = 3500;
export const TRUNCATION_MARKER = '\n... (truncated)';

export const EMPTY_HISTORY_MESSAGE = 'History is empty';
export const INVALID_LIMIT_MESSAGE = 'N must be an integer';

export type ExportLimitResult = { ok: true; limit: number } | { ok: false; error: string };

export function clampExportLimit(requested: number): number {
  return Math.max(MIN_EXPORT_LIMIT, Math.min(requested, MAX_EXPORT_LIMIT));
}

/**
 * Parse the optional N of `/export [N]`. Missing means the default;
 * anything that is not an integer is rejected.
 */
export function parseExportLimit(arg: string | undefined): ExportLimitResult {
  const raw = arg?.trim();
  if (!raw) {
    return { ok: true, limit: DEFAULT_EXPORT_LIMIT };
  }
  if (!/^[-+]?\d+$/.test(raw)) {
    return { ok: false, error: INVALID_LIMIT_MESSAGE };
  }
  return { ok: true, limit: clampExportLimit(parseInt(raw, 10)) };
}

export function truncateText(text: string, budget: number = EXPORT_CHAR_BUDGET): string {
  if (text.length <= budget) return text;
  return text.slice(0, budget) + TRUNCATION_MARKER;
}

export function formatExport(messages: ExportedMessage[]): string {
  if (messages.length === 0) {
    return EMPTY_HISTORY_MESSAGE;
  }
  const lines = messages.map((m) => `[${m.createdAt}] ${m.role}: ${m.content}`);
  return truncateText(lines.join('\n'));
}

export interface HealthReport extends HealthSnapshot {
  db: 'ok';
}

export class Reporter {
  constructor(
    private db: ConversationDatabase,
    private sessions: SessionManager
  ) {}

  /** Latest messages of the active session, clamped to [1, 200], as display text */
  exportText(ownerId: number, limit: number): string {
    const sessionId = this.sessions.getOrCreateActive(ownerId);
    const rows = this.db.exportRecent(sessionId, clampExportLimit(limit));
    return formatExport(rows);
  }

  health(ownerId: number): HealthReport {
    return { db: 'ok', ...this.db.healthSnapshot(ownerId) };
  }

  healthText(ownerId: number): string {
    return JSON.stringify(this.health(ownerId), null, 2);
  }
}
