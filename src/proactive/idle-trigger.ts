/**
 * Inactivity trigger: decides whether to speak first after a silence.
 *
 * Each idle period gets its own threshold between the configured bounds,
 * derived from the id of the last user message. The same message always
 * yields the same threshold, so repeated ticks agree with each other while
 * different conversations wake up at different times.
 */

import type { Logger } from 'pino';
import type { ConversationDatabase } from '../memory/db.js';
import type { SessionManager } from '../agent/session.js';
import type { ChatTurn, GenerationClient } from '../providers/types.js';
import { buildPrompt, type PromptOptions } from '../agent/prompt.js';
import { GenerationError, errorMessage } from '../utils/errors.js';

/** Knuth multiplicative hash constant */
export const IDLE_HASH_MULTIPLIER = 2654435761n;
export const IDLE_HASH_BUCKETS = 1000n;

const SECONDS_PER_HOUR = 3600;

export const PROACTIVE_INSTRUCTION =
  'There has been a long pause in the conversation. ' +
  'Write a short, warm message to start the conversation again (1-2 sentences, not pushy).';

/**
 * Seconds of silence required after message `messageId` before a proactive message.
 */
export function requiredIdleSeconds(messageId: number, minHours: number, maxHours: number): number {
  if (minHours === maxHours) {
    return minHours * SECONDS_PER_HOUR;
  }
  const span = maxHours - minHours;
  const hashed = Number((BigInt(messageId) * IDLE_HASH_MULTIPLIER) % IDLE_HASH_BUCKETS);
  const ratio = hashed / Number(IDLE_HASH_BUCKETS - 1n);
  return (minHours + span * ratio) * SECONDS_PER_HOUR;
}

/**
 * Handler for sending messages to the owner
 */
export type DeliveryHandler = (ownerId: number, message: string) => Promise<boolean>;

interface IdleState {
  sessionId: number;
  lastUserMessageId: number;
  idleSeconds: number;
  requiredIdleSeconds: number;
}

export type TriggerDecision =
  | { state: 'no_session' }
  | { state: 'no_user_message'; sessionId: number }
  | { state: 'already_fired'; sessionId: number; lastUserMessageId: number }
  | ({ state: 'waiting' } & IdleState)
  | ({ state: 'eligible' } & IdleState);

export type TickOutcome =
  | Exclude<TriggerDecision, { state: 'eligible' }>
  | ({ state: 'generation_failed' } & IdleState)
  | ({ state: 'superseded' } & IdleState)
  | ({ state: 'fired'; messageId: number; delivered: boolean } & IdleState);

export interface IdleTriggerOptions {
  db: ConversationDatabase;
  sessions: SessionManager;
  llm: GenerationClient;
  deliver: DeliveryHandler;
  ownerId: number;
  prompt: PromptOptions;
  idleHoursMin: number;
  idleHoursMax: number;
  logger: Logger;
}

export class IdleTrigger {
  private db: ConversationDatabase;
  private sessions: SessionManager;
  private llm: GenerationClient;
  private deliver: DeliveryHandler;
  private ownerId: number;
  private prompt: PromptOptions;
  private idleHoursMin: number;
  private idleHoursMax: number;
  private logger: Logger;

  constructor(options: IdleTriggerOptions) {
    this.db = options.db;
    this.sessions = options.sessions;
    this.llm = options.llm;
    this.deliver = options.deliver;
    this.ownerId = options.ownerId;
    this.prompt = options.prompt;
    this.idleHoursMin = options.idleHoursMin;
    this.idleHoursMax = options.idleHoursMax;
    this.logger = options.logger.child({ component: 'idle-trigger' });
  }

  /**
   * Pure read of where the active session stands. Nothing is written.
   */
  evaluate(now: Date = new Date()): TriggerDecision {
    const session = this.sessions.getActive(this.ownerId);
    if (!session) {
      return { state: 'no_session' };
    }

    const lastUser = this.db.lastUserMessage(session.id);
    if (!lastUser) {
      return { state: 'no_user_message', sessionId: session.id };
    }

    // One proactive message per idle period; a new user message opens the next one
    if (this.db.hasProactiveAfter(session.id, lastUser.id)) {
      return { state: 'already_fired', sessionId: session.id, lastUserMessageId: lastUser.id };
    }

    const idle: IdleState = {
      sessionId: session.id,
      lastUserMessageId: lastUser.id,
      idleSeconds: (now.getTime() - lastUser.createdAt.getTime()) / 1000,
      requiredIdleSeconds: requiredIdleSeconds(lastUser.id, this.idleHoursMin, this.idleHoursMax),
    };

    return idle.idleSeconds < idle.requiredIdleSeconds
      ? { state: 'waiting', ...idle }
      : { state: 'eligible', ...idle };
  }

  /**
   * One scheduler tick: evaluate, and if eligible generate, store and deliver.
   * A generation failure only ends this tick; the next one starts over.
   */
  async tick(now: Date = new Date()): Promise<TickOutcome> {
    const decision = this.evaluate(now);
    if (decision.state !== 'eligible') {
      this.logger.debug({ decision }, 'Proactive check: nothing to do');
      return decision;
    }

    const idle: IdleState = {
      sessionId: decision.sessionId,
      lastUserMessageId: decision.lastUserMessageId,
      idleSeconds: decision.idleSeconds,
      requiredIdleSeconds: decision.requiredIdleSeconds,
    };
    const instruction: ChatTurn = { role: 'user', content: PROACTIVE_INSTRUCTION };
    const turns = buildPrompt(this.db, idle.sessionId, this.prompt, [instruction]);

    let text: string;
    let metadata: Record<string, unknown>;
    try {
      const result = await this.llm.generate(turns);
      text = result.text;
      metadata = result.metadata;
    } catch (error) {
      if (!(error instanceof GenerationError)) throw error;
      this.logger.error({ ...idle, error: error.message }, 'Failed to generate proactive message');
      return { state: 'generation_failed', ...idle };
    }

    // The owner may have written or reset while the model was working
    if (!this.isStillIdle(idle)) {
      this.logger.info({ ...idle }, 'Proactive message discarded, conversation moved on');
      return { state: 'superseded', ...idle };
    }

    const messageId = this.db.append(idle.sessionId, 'assistant', text, {
      proactive: true,
      metadata: {
        ...metadata,
        proactive: true,
        trigger: 'inactivity',
        idleSeconds: Math.trunc(idle.idleSeconds),
        requiredIdleSeconds: Math.trunc(idle.requiredIdleSeconds),
      },
    });

    // Stored before delivery: a transport failure does not undo it
    let delivered = false;
    try {
      delivered = await this.deliver(this.ownerId, text);
    } catch (error) {
      this.logger.warn({ messageId, error: errorMessage(error) }, 'Unable to send proactive message to owner');
    }
    if (!delivered) {
      this.logger.warn({ messageId }, 'Proactive message stored but not delivered');
    }

    this.logger.info(
      {
        messageId,
        sessionId: idle.sessionId,
        idleSeconds: Math.trunc(idle.idleSeconds),
        requiredIdleSeconds: Math.trunc(idle.requiredIdleSeconds),
        delivered,
      },
      'Proactive message fired'
    );

    return { state: 'fired', messageId, delivered, ...idle };
  }

  private isStillIdle(idle: IdleState): boolean {
    const session = this.sessions.getActive(this.ownerId);
    if (!session || session.id !== idle.sessionId) {
      return false;
    }
    return this.db.lastUserMessage(idle.sessionId)?.id === idle.lastUserMessageId;
  }
}
