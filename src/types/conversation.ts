/**
 * Conversation Types
 * History passed into orchestrator chat calls
 */

import { z } from 'zod';

export type ConversationRole = 'user' | 'assistant';

export interface ConversationTurn {
  role: ConversationRole;
  content: string;
}

/**
 * Shape a history entry must have to be forwarded to the provider
 */
export const conversationTurnSchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string(),
});

/**
 * Keep only well-formed turns; anything else is dropped silently
 */
export function filterHistory(
  history: readonly unknown[]
): ConversationTurn[] {
  const turns: ConversationTurn[] = [];
  for (const entry of history) {
    const parsed = conversationTurnSchema.safeParse(entry);
    if (parsed.success) {
      turns.push({ role: parsed.data.role, content: parsed.data.content });
    }
  }
  return turns;
}
