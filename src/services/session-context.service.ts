import { logger } from '../core/logger';
import type { ActivityFilters, ContactFilters, SessionContext } from '../types';

export interface SessionContextUpdate {
  account?: string | null;
  activity?: ActivityFilters;
  contacts?: ContactFilters;
}

/**
 * Per-session filter state. Sessions never hold table data; every session
 * reads the same cached snapshot.
 */
export class SessionContextService {
  private sessions: Map<string, SessionContext> = new Map();

  get(sessionId: string): SessionContext {
    return this.sessions.get(sessionId) ?? {
      sessionId,
      account: null,
      activity: {},
      contacts: {},
      updatedAt: new Date(),
    };
  }

  /**
   * Merge `update` into the session's context. Filter groups are replaced
   * as a whole, so clearing a filter means sending the group without it.
   */
  update(sessionId: string, update: SessionContextUpdate): SessionContext {
    const current = this.get(sessionId);
    const next: SessionContext = {
      sessionId,
      account: update.account !== undefined ? update.account : current.account,
      activity: update.activity ?? current.activity,
      contacts: update.contacts ?? current.contacts,
      updatedAt: new Date(),
    };

    this.sessions.set(sessionId, next);
    logger.debug('Session context updated', {
      sessionId,
      account: next.account,
      activityFilters: Object.keys(next.activity),
      contactFilters: Object.keys(next.contacts),
    });
    return next;
  }

  clear(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  size(): number {
    return this.sessions.size;
  }
}

export const sessionContextService = new SessionContextService();
