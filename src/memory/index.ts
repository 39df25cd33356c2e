export {
  ConversationDatabase,
  isMessageRole,
  MESSAGE_ROLES,
  type MessageRole,
  type ContextRole,
  type MessageMetadata,
  type SessionRow,
  type MessageRow,
  type ContextMessage,
  type LastUserMessage,
  type ExportedMessage,
  type HealthSnapshot,
  type AppendOptions,
  type ConversationDatabaseOptions,
} from './db.js';
