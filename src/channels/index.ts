// Channel types and interfaces
export type { Channel, ChannelStatus } from './types.js';

// Telegram
export {
  TelegramChannel,
  splitMessage,
  START_MESSAGE,
  HELP_MESSAGE,
  type TelegramChannelOptions,
} from './telegram.js';

export { checkOwner, type GuardVerdict } from './owner-guard.js';
export {
  startTypingIndicator,
  TYPING_INTERVAL_MS,
  type TypingIndicator,
  type TypingIndicatorOptions,
} from './typing-indicator.js';
