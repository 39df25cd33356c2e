import type { ConversationDatabase } from '../memory/db.js';
import type { ChatTurn } from '../providers/types.js';

export interface PromptOptions {
  systemPrompt: string;
  maxContextMessages: number;
}

/**
 * System prompt, then the session's context window oldest first, then any
 * trailing turns (the proactive opener instruction).
 */
export function buildPrompt(
  db: ConversationDatabase,
  sessionId: number,
  options: PromptOptions,
  trailing: ChatTurn[] = []
): ChatTurn[] {
  const history = db.recentContext(sessionId, options.maxContextMessages);
  return [
    { role: 'system', content: options.systemPrompt },
    ...history,
    ...trailing,
  ];
}
