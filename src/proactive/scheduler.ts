/**
 * Proactive Scheduler - runs the inactivity check on a fixed cadence
 *
 * Ticks run independently of live chat traffic; both go through the same
 * session manager and database.
 */

import type { Logger } from 'pino';
import type { IdleTrigger, TickOutcome } from './idle-trigger.js';
import { errorMessage } from '../utils/errors.js';

/** Delay before the first check after startup */
export const FIRST_CHECK_DELAY_MS = 30 * 1000;

/**
 * Options for ProactiveScheduler
 */
export interface ProactiveSchedulerOptions {
  trigger: Pick<IdleTrigger, 'tick'>;
  logger: Logger;
  /** Check interval in milliseconds */
  interval: number;
  /** Delay before the first check (default: 30 seconds) */
  firstDelay?: number;
}

export class ProactiveScheduler {
  private trigger: Pick<IdleTrigger, 'tick'>;
  private logger: Logger;
  private interval: number;
  private firstDelay: number;

  private firstHandle: ReturnType<typeof setTimeout> | null = null;
  private intervalHandle: ReturnType<typeof setInterval> | null = null;
  private isRunning = false;
  private inFlight: Promise<TickOutcome | null> | null = null;

  constructor(options: ProactiveSchedulerOptions) {
    this.trigger = options.trigger;
    this.logger = options.logger.child({ component: 'proactive-scheduler' });
    this.interval = options.interval;
    this.firstDelay = options.firstDelay ?? FIRST_CHECK_DELAY_MS;
  }

  /**
   * Start the scheduler
   */
  start(): void {
    if (this.isRunning) {
      this.logger.warn('ProactiveScheduler already running');
      return;
    }

    this.isRunning = true;
    this.logger.info({ intervalMs: this.interval, firstDelayMs: this.firstDelay }, 'Starting ProactiveScheduler');

    this.firstHandle = setTimeout(() => {
      this.firstHandle = null;
      void this.runTick();
      this.intervalHandle = setInterval(() => {
        void this.runTick();
      }, this.interval);
    }, this.firstDelay);
  }

  /**
   * Stop the scheduler and wait for a tick that is still running
   */
  async stop(): Promise<void> {
    if (this.firstHandle) {
      clearTimeout(this.firstHandle);
      this.firstHandle = null;
    }
    if (this.intervalHandle) {
      clearInterval(this.intervalHandle);
      this.intervalHandle = null;
    }
    this.isRunning = false;
    if (this.inFlight) {
      await this.inFlight;
    }
    this.logger.info('ProactiveScheduler stopped');
  }

  /**
   * Run one tick unless the previous one is still waiting on the model.
   * Never rejects; failures are logged.
   */
  async runTick(now: Date = new Date()): Promise<TickOutcome | null> {
    if (this.inFlight) {
      this.logger.debug('Skipping proactive tick, previous evaluation still running');
      return null;
    }

    this.inFlight = this.execute(now);
    try {
      return await this.inFlight;
    } finally {
      this.inFlight = null;
    }
  }

  private async execute(now: Date): Promise<TickOutcome | null> {
    try {
      return await this.trigger.tick(now);
    } catch (error) {
      this.logger.error({ error: errorMessage(error) }, 'Proactive tick failed');
      return null;
    }
  }

  get running(): boolean {
    return this.isRunning;
  }
}
