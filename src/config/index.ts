export {
  loadConfig,
  loadConfigFromProcess,
  sqlitePath,
  configSchema,
  type Config,
  type Env,
  type TelegramConfig,
  type LLMConfig,
  type ConversationConfig,
  type ProactiveConfig,
  type LoggingConfig,
  type UnauthorizedMode,
} from './config.js';
