import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { pino } from 'pino';
import { ConversationDatabase } from '../memory/db.js';
import { SessionManager } from '../agent/session.js';
import type { ChatTurn, GenerationResult } from '../providers/types.js';
import { GenerationError } from '../utils/errors.js';
import {
  IdleTrigger,
  PROACTIVE_INSTRUCTION,
  requiredIdleSeconds,
  type DeliveryHandler,
} from './idle-trigger.js';

const OWNER = 42;
const T0 = new Date('2026-03-01T12:00:00.000Z');

const at = (seconds: number) => new Date(T0.getTime() + seconds * 1000);

describe('requiredIdleSeconds', () => {
  it('maps message ids into the configured range', () => {
    expect(requiredIdleSeconds(1, 1, 3)).toBeCloseTo(9084.6847, 3);
    expect(requiredIdleSeconds(2, 1, 3)).toBeCloseTo(7362.1622, 3);
    expect(requiredIdleSeconds(3, 1, 3)).toBeCloseTo(5639.6396, 3);
  });

  it('is stable for the same message', () => {
    expect(requiredIdleSeconds(17, 1, 3)).toBe(requiredIdleSeconds(17, 1, 3));
  });

  it('stays within the bounds', () => {
    for (let id = 1; id <= 2000; id++) {
      const seconds = requiredIdleSeconds(id, 2, 5);
      expect(seconds).toBeGreaterThanOrEqual(2 * 3600);
      expect(seconds).toBeLessThanOrEqual(5 * 3600);
    }
  });

  it('uses the single value when both bounds are equal', () => {
    expect(requiredIdleSeconds(1, 2, 2)).toBe(7200);
    expect(requiredIdleSeconds(999, 2, 2)).toBe(7200);
  });

  it('handles ids whose product exceeds the safe integer range', () => {
    // 10^7 * 2654435761 is above 2^53; exact modulo gives bucket 0
    expect(requiredIdleSeconds(10_000_000, 1, 3)).toBe(3600);
  });
});

describe('IdleTrigger', () => {
  let clock: Date;
  let db: ConversationDatabase;
  let sessions: SessionManager;
  let generate: Mock<(turns: ChatTurn[]) => Promise<GenerationResult>>;
  let deliver: Mock<DeliveryHandler>;
  let trigger: IdleTrigger;

  beforeEach(() => {
    clock = T0;
    db = new ConversationDatabase(':memory:', { now: () => clock });
    sessions = new SessionManager(db, pino({ level: 'silent' }));
    generate = vi.fn<(turns: ChatTurn[]) => Promise<GenerationResult>>().mockResolvedValue({
      text: 'Hey, how did your day go?',
      metadata: { model: 'test-model', latencyMs: 7, tokenUsage: null, requestId: null },
    });
    deliver = vi.fn<DeliveryHandler>().mockResolvedValue(true);
    trigger = new IdleTrigger({
      db,
      sessions,
      llm: { generate },
      deliver,
      ownerId: OWNER,
      prompt: { systemPrompt: 'Be warm.', maxContextMessages: 40 },
      idleHoursMin: 1,
      idleHoursMax: 3,
      logger: pino({ level: 'silent' }),
    });
  });

  afterEach(() => {
    db.close();
  });

  /** Active session with one user message (id 1) at T0 */
  const seedConversation = (): number => {
    const sessionId = sessions.getOrCreateActive(OWNER);
    db.append(sessionId, 'user', 'hello');
    return sessionId;
  };

  describe('evaluate', () => {
    it('does nothing without a session and does not create one', () => {
      expect(trigger.evaluate(at(99999))).toEqual({ state: 'no_session' });
      expect(sessions.getActive(OWNER)).toBeNull();
    });

    it('does nothing before the owner has written', () => {
      const sessionId = sessions.getOrCreateActive(OWNER);
      expect(trigger.evaluate(at(99999))).toEqual({ state: 'no_user_message', sessionId });
    });

    it('waits until the threshold of the last user message', () => {
      const sessionId = seedConversation();

      expect(trigger.evaluate(at(9000))).toEqual({
        state: 'waiting',
        sessionId,
        lastUserMessageId: 1,
        idleSeconds: 9000,
        requiredIdleSeconds: requiredIdleSeconds(1, 1, 3),
      });
    });

    it('becomes eligible once the threshold has passed', () => {
      seedConversation();
      expect(trigger.evaluate(at(9085)).state).toBe('eligible');
    });

    it('measures idle time from the last user message, not the last reply', () => {
      const sessionId = seedConversation();
      clock = at(9000);
      db.append(sessionId, 'assistant', 'sorry for the delay');

      expect(trigger.evaluate(at(9085)).state).toBe('eligible');
    });

    it('writes nothing', () => {
      seedConversation();
      trigger.evaluate(at(9085));
      expect(db.healthSnapshot(OWNER).totalMessages).toBe(1);
    });
  });

  describe('tick', () => {
    it('generates, stores and delivers a proactive message', async () => {
      const sessionId = seedConversation();

      const outcome = await trigger.tick(at(9085));

      expect(outcome).toEqual({
        state: 'fired',
        messageId: 2,
        delivered: true,
        sessionId,
        lastUserMessageId: 1,
        idleSeconds: 9085,
        requiredIdleSeconds: requiredIdleSeconds(1, 1, 3),
      });
      expect(generate).toHaveBeenCalledWith([
        { role: 'system', content: 'Be warm.' },
        { role: 'user', content: 'hello' },
        { role: 'user', content: PROACTIVE_INSTRUCTION },
      ]);
      expect(deliver).toHaveBeenCalledWith(OWNER, 'Hey, how did your day go?');
      expect(db.getMessage(2)).toEqual({
        id: 2,
        sessionId,
        role: 'assistant',
        content: 'Hey, how did your day go?',
        createdAt: T0.toISOString(),
        metadata: {
          model: 'test-model',
          latencyMs: 7,
          tokenUsage: null,
          requestId: null,
          proactive: true,
          trigger: 'inactivity',
          idleSeconds: 9085,
          requiredIdleSeconds: 9084,
        },
        isProactive: true,
      });
    });

    it('does not store the instruction turn', async () => {
      const sessionId = seedConversation();
      await trigger.tick(at(9085));

      expect(db.recentContext(sessionId, 40)).toEqual([
        { role: 'user', content: 'hello' },
        { role: 'assistant', content: 'Hey, how did your day go?' },
      ]);
    });

    it('fires once per idle period', async () => {
      const sessionId = seedConversation();
      await trigger.tick(at(9085));

      expect(await trigger.tick(at(20000))).toEqual({
        state: 'already_fired',
        sessionId,
        lastUserMessageId: 1,
      });
      expect(generate).toHaveBeenCalledTimes(1);
    });

    it('opens a new idle period when the owner writes again', async () => {
      const sessionId = seedConversation();
      await trigger.tick(at(9085));

      clock = at(10000);
      const nextUser = db.append(sessionId, 'user', 'I am back');

      expect(await trigger.tick(at(10001))).toMatchObject({
        state: 'waiting',
        lastUserMessageId: nextUser,
        idleSeconds: 1,
      });
    });

    it('does not call the model while waiting', async () => {
      seedConversation();
      expect((await trigger.tick(at(60))).state).toBe('waiting');
      expect(generate).not.toHaveBeenCalled();
    });

    it('stores nothing when generation fails and retries next tick', async () => {
      seedConversation();
      generate.mockRejectedValueOnce(new GenerationError('LLM request failed'));

      expect((await trigger.tick(at(9085))).state).toBe('generation_failed');
      expect(db.healthSnapshot(OWNER).totalMessages).toBe(1);
      expect(deliver).not.toHaveBeenCalled();

      expect((await trigger.tick(at(9685))).state).toBe('fired');
    });

    it('keeps the message when delivery reports failure', async () => {
      seedConversation();
      deliver.mockResolvedValue(false);

      const outcome = await trigger.tick(at(9085));

      expect(outcome).toMatchObject({ state: 'fired', messageId: 2, delivered: false });
      expect(db.getMessage(2)?.isProactive).toBe(true);
      expect((await trigger.tick(at(9685))).state).toBe('already_fired');
    });

    it('keeps the message when delivery throws', async () => {
      seedConversation();
      deliver.mockRejectedValue(new Error('network down'));

      const outcome = await trigger.tick(at(9085));

      expect(outcome).toMatchObject({ state: 'fired', delivered: false });
      expect(db.getMessage(2)?.content).toBe('Hey, how did your day go?');
    });

    it('discards the message when the owner writes during generation', async () => {
      const sessionId = seedConversation();
      generate.mockImplementationOnce(async () => {
        clock = at(9000);
        db.append(sessionId, 'user', 'I am back');
        return { text: 'Miss me?', metadata: { model: 'test-model', latencyMs: 7, tokenUsage: null, requestId: null } };
      });

      expect(await trigger.tick(at(9085))).toMatchObject({ state: 'superseded', sessionId, lastUserMessageId: 1 });
      expect(db.healthSnapshot(OWNER).totalMessages).toBe(2);
      expect(deliver).not.toHaveBeenCalled();
      expect(trigger.evaluate(at(9000 + 7363))).toMatchObject({ state: 'eligible', lastUserMessageId: 2 });
    });

    it('discards the message when the session is reset during generation', async () => {
      const sessionId = seedConversation();
      generate.mockImplementationOnce(async () => {
        sessions.startNew(OWNER);
        return { text: 'Miss me?', metadata: { model: 'test-model', latencyMs: 7, tokenUsage: null, requestId: null } };
      });

      expect(await trigger.tick(at(9085))).toMatchObject({ state: 'superseded', sessionId });
      expect(db.healthSnapshot(OWNER).totalMessages).toBe(1);
      expect(deliver).not.toHaveBeenCalled();
    });

    it('watches only the active session after a reset', async () => {
      seedConversation();
      const fresh = sessions.startNew(OWNER);

      expect(await trigger.tick(at(99999))).toEqual({ state: 'no_user_message', sessionId: fresh });
    });
  });
});
