/**
 * Proactive messaging: one inactivity check per tick, at most one opener per
 * idle period.
 */

export {
  IdleTrigger,
  requiredIdleSeconds,
  PROACTIVE_INSTRUCTION,
  type IdleTriggerOptions,
  type DeliveryHandler,
  type TriggerDecision,
  type TickOutcome,
} from './idle-trigger.js';

export { ProactiveScheduler, FIRST_CHECK_DELAY_MS, type ProactiveSchedulerOptions } from './scheduler.js';
