/**
 * SessionService Implementation
 *
 * Purpose: Per-session conversation history for orchestrator chat.
 * Owns: sessions and their turns
 *
 * GUARDRAILS:
 * - Histories never leak between sessions
 * - Turns are only ever appended; the store may drop the oldest turns and
 *   evict idle sessions once its limits are reached
 */

import { nanoid } from 'nanoid';

import type { ConversationTurn, Result } from '../types/index.js';
import { success, failure } from '../types/index.js';

/**
 * Storage abstraction for SessionService
 */
export interface SessionServiceDb {
  createSession: (sessionId: string) => void;
  hasSession: (sessionId: string) => boolean;
  getTurns: (sessionId: string) => ConversationTurn[] | null;
  appendTurns: (sessionId: string, turns: ConversationTurn[]) => boolean;
  deleteSession: (sessionId: string) => boolean;
}

/**
 * SessionService interface
 */
export interface SessionService {
  /**
   * Return the given session id if it exists, or create a new session.
   * An unknown id is adopted as a new session so clients can pick their own.
   */
  openSession(sessionId?: string): Result<string>;
  getHistory(sessionId: string): Result<ConversationTurn[]>;
  appendTurns(
    sessionId: string,
    turns: ConversationTurn[]
  ): Result<{ length: number }>;
  deleteSession(sessionId: string): Result<void>;
}

/**
 * Create SessionService instance
 */
export function createSessionService(deps: {
  db: SessionServiceDb;
  generateId?: () => string;
}): SessionService {
  const { db } = deps;
  const generateId = deps.generateId ?? (() => nanoid());

  return {
    openSession(sessionId?: string): Result<string> {
      if (sessionId !== undefined && sessionId.trim() === '') {
        return failure('VALIDATION_ERROR', 'Session ID cannot be blank');
      }

      const id = sessionId ?? generateId();
      if (!db.hasSession(id)) {
        db.createSession(id);
      }
      return success(id);
    },

    getHistory(sessionId: string): Result<ConversationTurn[]> {
      const turns = db.getTurns(sessionId);
      if (turns === null) {
        return failure('NOT_FOUND', 'Session not found');
      }
      return success(turns);
    },

    appendTurns(
      sessionId: string,
      turns: ConversationTurn[]
    ): Result<{ length: number }> {
      if (!db.appendTurns(sessionId, turns)) {
        return failure('NOT_FOUND', 'Session not found');
      }
      const history = db.getTurns(sessionId) ?? [];
      return success({ length: history.length });
    },

    deleteSession(sessionId: string): Result<void> {
      if (!db.deleteSession(sessionId)) {
        return failure('NOT_FOUND', 'Session not found');
      }
      return success(undefined);
    },
  };
}
