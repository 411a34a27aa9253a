/**
 * SessionService Database Adapter
 * In-memory store keyed by session id
 */

import type { ConversationTurn } from '../types/index.js';

import type { SessionServiceDb } from './session.service.js';

/**
 * Default cap on live sessions; the least recently used is evicted first
 */
export const DEFAULT_MAX_SESSIONS = 1000;

/**
 * Default cap on turns kept per session; the oldest are dropped first
 */
export const DEFAULT_MAX_TURNS_PER_SESSION = 100;

export interface SessionStoreLimits {
  maxSessions?: number;
  maxTurnsPerSession?: number;
}

export function createSessionServiceDb(
  limits: SessionStoreLimits = {}
): SessionServiceDb {
  const maxSessions = limits.maxSessions ?? DEFAULT_MAX_SESSIONS;
  const maxTurns = limits.maxTurnsPerSession ?? DEFAULT_MAX_TURNS_PER_SESSION;
  // Map iteration follows insertion order, so the first key is the stalest
  const sessions = new Map<string, ConversationTurn[]>();

  function evictOverflow(): void {
    for (const sessionId of sessions.keys()) {
      if (sessions.size <= maxSessions) {
        return;
      }
      sessions.delete(sessionId);
    }
  }

  return {
    createSession(sessionId) {
      sessions.delete(sessionId);
      sessions.set(sessionId, []);
      evictOverflow();
    },

    hasSession(sessionId) {
      return sessions.has(sessionId);
    },

    getTurns(sessionId) {
      const turns = sessions.get(sessionId);
      return turns === undefined ? null : [...turns];
    },

    appendTurns(sessionId, turns) {
      const existing = sessions.get(sessionId);
      if (existing === undefined) {
        return false;
      }
      const kept = [...existing, ...turns];
      sessions.delete(sessionId);
      sessions.set(
        sessionId,
        kept.length > maxTurns ? kept.slice(kept.length - maxTurns) : kept
      );
      return true;
    },

    deleteSession(sessionId) {
      return sessions.delete(sessionId);
    },
  };
}
