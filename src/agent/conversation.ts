import type { Logger } from 'pino';
import type { ConversationDatabase } from '../memory/db.js';
import type { GenerationClient, GenerationResult } from '../providers/types.js';
import type { SessionManager } from './session.js';
import type { TypingIndicator } from '../channels/typing-indicator.js';
import { buildPrompt, type PromptOptions } from './prompt.js';
import { GenerationError } from '../utils/errors.js';

export const UNAVAILABLE_MESSAGE = 'The service is temporarily unavailable, please try again.';

export type ReplyOutcome =
  | { kind: 'ignored' }
  | { kind: 'reply'; sessionId: number; messageId: number; text: string }
  | { kind: 'unavailable'; sessionId: number };

export interface ConversationServiceOptions {
  db: ConversationDatabase;
  sessions: SessionManager;
  llm: GenerationClient;
  prompt: PromptOptions;
  logger: Logger;
}

/**
 * One user turn: store it, ask the model with the current context window,
 * store the answer.
 */
export class ConversationService {
  private db: ConversationDatabase;
  private sessions: SessionManager;
  private llm: GenerationClient;
  private prompt: PromptOptions;
  private logger: Logger;

  constructor(options: ConversationServiceOptions) {
    this.db = options.db;
    this.sessions = options.sessions;
    this.llm = options.llm;
    this.prompt = options.prompt;
    this.logger = options.logger.child({ component: 'conversation' });
  }

  /**
   * @param startIndicator starts a "working" heartbeat for the duration of generation
   */
  async reply(
    ownerId: number,
    rawText: string,
    startIndicator?: () => TypingIndicator
  ): Promise<ReplyOutcome> {
    const text = rawText.trim();
    if (!text) {
      return { kind: 'ignored' };
    }

    // The session is fixed here; a reset during generation does not move the reply
    const sessionId = this.sessions.getOrCreateActive(ownerId);
    this.db.append(sessionId, 'user', text);

    const turns = buildPrompt(this.db, sessionId, this.prompt);
    const indicator = startIndicator?.();

    let result: GenerationResult;
    try {
      result = await this.llm.generate(turns);
    } catch (error) {
      if (error instanceof GenerationError) {
        this.logger.error({ sessionId, error: error.message }, 'Reply generation failed');
        return { kind: 'unavailable', sessionId };
      }
      throw error;
    } finally {
      await indicator?.stop();
    }

    const messageId = this.db.append(sessionId, 'assistant', result.text, {
      metadata: result.metadata,
    });
    this.logger.debug(
      { sessionId, messageId, latencyMs: result.metadata.latencyMs, contextTurns: turns.length - 1 },
      'Reply stored'
    );

    return { kind: 'reply', sessionId, messageId, text: result.text };
  }
}
