import type { UnauthorizedMode } from '../config/index.js';

export type GuardVerdict = 'allow' | 'deny' | 'ignore';

/**
 * Only the configured owner talks to the bot. Anyone else is answered with
 * the refusal message (`deny`) or dropped without a reply (`ignore`).
 */
export function checkOwner(
  senderId: number | undefined,
  ownerId: number,
  mode: UnauthorizedMode
): GuardVerdict {
  if (senderId !== undefined && senderId === ownerId) {
    return 'allow';
  }
  return mode === 'deny' ? 'deny' : 'ignore';
}
