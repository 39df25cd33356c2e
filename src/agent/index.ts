export { SessionManager } from './session.js';
export { buildPrompt, type PromptOptions } from './prompt.js';
export {
  ConversationService,
  UNAVAILABLE_MESSAGE,
  type ConversationServiceOptions,
  type ReplyOutcome,
} from './conversation.js';
