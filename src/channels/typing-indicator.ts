import type { Logger } from 'pino';
import { errorMessage } from '../utils/errors.js';

/** Telegram shows "typing…" for about five seconds per chat action */
export const TYPING_INTERVAL_MS = 4000;

export interface TypingIndicator {
  /** Cancel the heartbeat, including a send still in flight. Safe to call twice. */
  stop(): Promise<void>;
}

export interface TypingIndicatorOptions {
  intervalMs?: number;
  logger?: Logger;
}

/**
 * Send a chat action now and then on every interval until stopped.
 *
 * Runs beside a long request as its own task; failures to send are logged
 * and never reach the caller.
 */
export function startTypingIndicator(
  send: (signal: AbortSignal) => Promise<unknown>,
  options: TypingIndicatorOptions = {}
): TypingIndicator {
  const intervalMs = options.intervalMs ?? TYPING_INTERVAL_MS;
  const controller = new AbortController();
  const { signal } = controller;
  const aborted = new Promise<void>((resolve) => signal.addEventListener('abort', () => resolve(), { once: true }));

  const loop = (async () => {
    while (!signal.aborted) {
      const attempt = send(signal).catch((error: unknown) => {
        options.logger?.debug({ error: errorMessage(error) }, 'Unable to send typing action');
      });
      // A hung request must not hold up stop()
      await Promise.race([attempt, aborted]);
      await sleep(intervalMs, signal);
    }
  })();

  return {
    async stop() {
      controller.abort();
      await loop;
    },
  };
}

/** Resolves after `ms`, or as soon as `signal` aborts */
function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });
}
