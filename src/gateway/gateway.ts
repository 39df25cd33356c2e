import type { Logger } from 'pino';
import type { Config } from '../config/config.js';
import { sqlitePath } from '../config/config.js';
import { ConversationDatabase } from '../memory/db.js';
import { SessionManager } from '../agent/session.js';
import { ConversationService } from '../agent/conversation.js';
import { OpenAICompatibleClient } from '../providers/openai.js';
import type { GenerationClient } from '../providers/types.js';
import { Reporter } from '../reporting/reporter.js';
import { errorMessage } from '../utils/errors.js';
import { TelegramChannel } from '../channels/telegram.js';
import type { Channel } from '../channels/types.js';
import { IdleTrigger } from '../proactive/idle-trigger.js';
import { ProactiveScheduler } from '../proactive/scheduler.js';

/**
 * Everything a request handler or scheduler tick needs, built once at startup
 * and passed explicitly.
 */
export interface Services {
  config: Config;
  logger: Logger;
  db: ConversationDatabase;
  sessions: SessionManager;
  llm: GenerationClient;
  conversation: ConversationService;
  reporter: Reporter;
}

export interface ServiceOverrides {
  db?: ConversationDatabase;
  llm?: GenerationClient;
}

export function createServices(config: Config, logger: Logger, overrides: ServiceOverrides = {}): Services {
  const db = overrides.db ?? new ConversationDatabase(sqlitePath(config.storage.databaseUrl), { logger });
  const sessions = new SessionManager(db, logger);
  const llm =
    overrides.llm ??
    new OpenAICompatibleClient(
      {
        apiKey: config.llm.apiKey,
        baseUrl: config.llm.baseUrl,
        model: config.llm.model,
        timeoutMs: config.llm.timeoutSeconds * 1000,
        maxTokens: config.llm.maxTokens,
      },
      logger
    );
  const conversation = new ConversationService({
    db,
    sessions,
    llm,
    prompt: config.conversation,
    logger,
  });
  const reporter = new Reporter(db, sessions);

  return { config, logger, db, sessions, llm, conversation, reporter };
}

export interface GatewayOptions {
  config: Config;
  logger: Logger;
  services?: Services;
  /** Replaces the Telegram channel (tests, alternative transports) */
  channel?: Channel;
}

export class Gateway {
  private config: Config;
  private logger: Logger;
  private services: Services;
  private channel: Channel;
  private scheduler: ProactiveScheduler | null = null;
  private isRunning = false;

  constructor(options: GatewayOptions) {
    this.config = options.config;
    this.logger = options.logger;
    this.services = options.services ?? createServices(options.config, options.logger);

    this.channel =
      options.channel ??
      new TelegramChannel({
        botToken: this.config.telegram.botToken,
        ownerId: this.config.telegram.ownerId,
        unauthorizedMode: this.config.telegram.unauthorizedMode,
        unauthorizedMessage: this.config.telegram.unauthorizedMessage,
        conversation: this.services.conversation,
        sessionManager: this.services.sessions,
        reporter: this.services.reporter,
        logger: this.logger,
      });

    const proactive = this.config.proactive;
    if (proactive.enabled) {
      const trigger = new IdleTrigger({
        db: this.services.db,
        sessions: this.services.sessions,
        llm: this.services.llm,
        deliver: (ownerId, message) => this.channel.sendMessage(ownerId, message),
        ownerId: this.config.telegram.ownerId,
        prompt: this.config.conversation,
        idleHoursMin: proactive.idleHoursMin,
        idleHoursMax: proactive.idleHoursMax,
        logger: this.logger,
      });
      this.scheduler = new ProactiveScheduler({
        trigger,
        logger: this.logger,
        interval: proactive.checkMinutes * 60 * 1000,
      });
    }
  }

  async start(): Promise<void> {
    if (this.isRunning) {
      return;
    }

    await this.channel.start();

    if (this.scheduler) {
      this.scheduler.start();
      this.logger.info(
        {
          idleHoursMin: this.config.proactive.idleHoursMin,
          idleHoursMax: this.config.proactive.idleHoursMax,
          checkMinutes: this.config.proactive.checkMinutes,
        },
        'Auto message enabled'
      );
    }

    this.isRunning = true;
    this.logger.info({ channel: this.channel.name }, 'Gateway started');
  }

  async stop(): Promise<void> {
    if (!this.isRunning) {
      return;
    }

    // A tick still writing must finish before the store closes
    await this.scheduler?.stop();
    await this.channel.stop();
    this.services.db.close();
    this.isRunning = false;
    this.logger.info('Gateway stopped');
  }

  getScheduler(): ProactiveScheduler | null {
    return this.scheduler;
  }
}

export function setupGracefulShutdown(gateway: Gateway, logger: Logger): void {
  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Received shutdown signal');
    try {
      await gateway.stop();
      logger.info('Graceful shutdown complete');
      process.exit(0);
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}
