import type { Logger } from 'pino';
import type { ConversationDatabase, SessionRow } from '../memory/db.js';

/**
 * Tracks which session is active for an owner.
 *
 * Holds no state of its own: every answer comes from the database, and every
 * transition runs in one transaction so an owner never has zero or two active
 * sessions in between.
 */
export class SessionManager {
  private db: ConversationDatabase;
  private logger: Logger;

  constructor(db: ConversationDatabase, logger: Logger) {
    this.db = db;
    this.logger = logger.child({ component: 'session-manager' });
  }

  /**
   * Id of the owner's active session, creating one on first contact.
   */
  getOrCreateActive(ownerId: number): number {
    return this.db.transaction(() => {
      const active = this.db.findActiveSession(ownerId);
      if (active) {
        return active.id;
      }
      const session = this.db.insertActiveSession(ownerId);
      this.logger.info({ ownerId, sessionId: session.id }, 'Created first session');
      return session.id;
    });
  }

  /**
   * Reset: deactivate the current session and open a fresh one.
   * Nothing is deleted; later messages simply attach to the new session.
   */
  startNew(ownerId: number): number {
    return this.db.transaction(() => {
      const deactivated = this.db.deactivateSessions(ownerId);
      const session = this.db.insertActiveSession(ownerId);
      this.logger.info({ ownerId, sessionId: session.id, deactivated }, 'Started new session');
      return session.id;
    });
  }

  getActive(ownerId: number): SessionRow | null {
    return this.db.findActiveSession(ownerId);
  }
}
