import { Bot, type BotConfig, type Context } from 'grammy';
import type { Update } from 'grammy/types';
import type { Logger } from 'pino';
import type { Channel, ChannelStatus } from './types.js';
import type { ConversationService } from '../agent/conversation.js';
import type { SessionManager } from '../agent/session.js';
import type { Reporter } from '../reporting/reporter.js';
import type { UnauthorizedMode } from '../config/index.js';
import { UNAVAILABLE_MESSAGE } from '../agent/conversation.js';
import { parseExportLimit } from '../reporting/reporter.js';
import { checkOwner } from './owner-guard.js';
import { startTypingIndicator } from './typing-indicator.js';
import { DeliveryError, errorMessage } from '../utils/errors.js';

const MAX_MESSAGE_LENGTH = 4096;

export const START_MESSAGE =
  'Hi. This is a private companion bot.\n' +
  'Commands: /help, /reset, /export [N], /health';

export const HELP_MESSAGE =
  'Available commands:\n' +
  '/start - greeting\n' +
  '/help - this help\n' +
  '/reset - new session, context starts empty\n' +
  '/export [N] - last N messages (default 20)\n' +
  '/health - database and active session status';

export interface TelegramChannelOptions {
  botToken: string;
  ownerId: number;
  unauthorizedMode: UnauthorizedMode;
  unauthorizedMessage: string;
  conversation: ConversationService;
  sessionManager: SessionManager;
  reporter: Reporter;
  logger: Logger;
  /** Passed through to grammy; `botInfo` here skips the getMe call */
  botConfig?: BotConfig<Context>;
}

export function splitMessage(text: string): string[] {
  if (text.length <= MAX_MESSAGE_LENGTH) {
    return [text];
  }

  const chunks: string[] = [];
  let remaining = text;

  while (remaining.length > 0) {
    if (remaining.length <= MAX_MESSAGE_LENGTH) {
      chunks.push(remaining);
      break;
    }

    // Try to split at paragraph boundary
    let splitIndex = remaining.lastIndexOf('\n\n', MAX_MESSAGE_LENGTH);

    // If no paragraph, try line boundary
    if (splitIndex === -1 || splitIndex < MAX_MESSAGE_LENGTH / 2) {
      splitIndex = remaining.lastIndexOf('\n', MAX_MESSAGE_LENGTH);
    }

    // If no line boundary, try space
    if (splitIndex === -1 || splitIndex < MAX_MESSAGE_LENGTH / 2) {
      splitIndex = remaining.lastIndexOf(' ', MAX_MESSAGE_LENGTH);
    }

    // Force split if no good boundary found
    if (splitIndex === -1 || splitIndex < MAX_MESSAGE_LENGTH / 2) {
      splitIndex = MAX_MESSAGE_LENGTH;
    }

    chunks.push(remaining.substring(0, splitIndex).trim());
    remaining = remaining.substring(splitIndex).trim();
  }

  return chunks;
}

export class TelegramChannel implements Channel {
  public readonly name = 'telegram';

  private bot: Bot;
  private ownerId: number;
  private unauthorizedMode: UnauthorizedMode;
  private unauthorizedMessage: string;
  private conversation: ConversationService;
  private sessionManager: SessionManager;
  private reporter: Reporter;
  private logger: Logger;
  private running = false;
  private lastActivity?: Date;

  constructor(options: TelegramChannelOptions) {
    this.bot = new Bot(options.botToken, options.botConfig);
    this.ownerId = options.ownerId;
    this.unauthorizedMode = options.unauthorizedMode;
    this.unauthorizedMessage = options.unauthorizedMessage;
    this.conversation = options.conversation;
    this.sessionManager = options.sessionManager;
    this.reporter = options.reporter;
    this.logger = options.logger.child({ channel: 'telegram' });

    this.setupHandlers();
  }

  private setupHandlers(): void {
    // Owner guard runs before every handler
    this.bot.use(async (ctx, next) => {
      const verdict = checkOwner(ctx.from?.id, this.ownerId, this.unauthorizedMode);
      if (verdict === 'allow') {
        this.lastActivity = new Date();
        await next();
        return;
      }
      this.logger.warn({ userId: ctx.from?.id, verdict }, 'Unauthorized access attempt');
      if (verdict === 'deny' && ctx.message) {
        await this.safeReply(ctx, this.unauthorizedMessage);
      }
    });

    this.bot.command('start', async (ctx) => {
      this.sessionManager.getOrCreateActive(this.ownerId);
      await this.safeReply(ctx, START_MESSAGE);
    });

    this.bot.command('help', async (ctx) => {
      await this.safeReply(ctx, HELP_MESSAGE);
    });

    this.bot.command('reset', async (ctx) => {
      const sessionId = this.sessionManager.startNew(this.ownerId);
      await this.safeReply(ctx, `Context cleared. New session: ${sessionId}.`);
    });

    this.bot.command('export', async (ctx) => {
      const [firstArg] = ctx.match.trim().split(/\s+/);
      const parsed = parseExportLimit(firstArg);
      if (!parsed.ok) {
        await this.safeReply(ctx, parsed.error);
        return;
      }
      await this.safeReply(ctx, this.reporter.exportText(this.ownerId, parsed.limit));
    });

    this.bot.command('health', async (ctx) => {
      await this.safeReply(ctx, this.reporter.healthText(this.ownerId));
    });

    this.bot.on('message:text', async (ctx) => {
      // Unknown commands are not conversation turns
      const isCommand = ctx.message.entities?.some((e) => e.type === 'bot_command' && e.offset === 0);
      if (isCommand) return;

      await this.handleTextMessage(ctx, ctx.message.text);
    });

    this.bot.catch((err) => {
      this.logger.error(
        { updateId: err.ctx.update.update_id, error: errorMessage(err.error) },
        'Unhandled error while processing update'
      );
    });
  }

  private async handleTextMessage(ctx: Context, text: string): Promise<void> {
    const outcome = await this.conversation.reply(this.ownerId, text, () =>
      startTypingIndicator((signal) => ctx.replyWithChatAction('typing', undefined, signal), {
        logger: this.logger,
      })
    );

    switch (outcome.kind) {
      case 'ignored':
        return;
      case 'unavailable':
        await this.safeReply(ctx, UNAVAILABLE_MESSAGE);
        return;
      case 'reply':
        await this.safeReply(ctx, outcome.text);
        return;
    }
  }

  /** Reply in as many chunks as Telegram needs; failures are logged, not thrown */
  private async safeReply(ctx: Context, text: string): Promise<void> {
    try {
      for (const chunk of splitMessage(text).filter((c) => c.trim())) {
        await ctx.reply(chunk);
      }
    } catch (error) {
      this.logger.warn(
        { chatId: ctx.chat?.id, err: new DeliveryError(errorMessage(error), ctx.chat?.id, error) },
        'Failed to send reply'
      );
    }
  }

  async start(): Promise<void> {
    if (this.running) {
      return;
    }

    this.logger.info('Starting Telegram bot...');
    this.running = true;

    // Register bot commands with Telegram (makes them show in menu)
    await this.bot.api.setMyCommands([
      { command: 'help', description: 'Show available commands' },
      { command: 'reset', description: 'Start a new session' },
      { command: 'export', description: 'Export recent messages' },
      { command: 'health', description: 'Database and session status' },
    ]);

    // bot.start() runs grammy's long-polling loop and only settles when the bot stops
    this.bot
      .start({
        onStart: (botInfo) => {
          this.logger.info({ username: botInfo.username }, 'Telegram bot started');
        },
      })
      .catch((error: unknown) => {
        this.running = false;
        this.logger.error({ error: errorMessage(error) }, 'Telegram polling stopped with an error');
      });
  }

  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }

    this.logger.info('Stopping Telegram bot...');
    await this.bot.stop();
    this.running = false;
    this.logger.info('Telegram bot stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  getStatus(): ChannelStatus {
    return { connected: this.running, lastActivity: this.lastActivity };
  }

  /**
   * Send a message to a chat (not as a reply).
   * Used for proactive messages.
   */
  async sendMessage(chatId: number, message: string): Promise<boolean> {
    try {
      for (const chunk of splitMessage(message)) {
        await this.bot.api.sendMessage(chatId, chunk);
      }
      this.logger.debug({ chatId, length: message.length }, 'Sent proactive message');
      return true;
    } catch (error) {
      this.logger.error(
        { chatId, err: new DeliveryError(errorMessage(error), chatId, error) },
        'Failed to send proactive message'
      );
      return false;
    }
  }

  /** Feed one update through the handlers, as long polling would */
  handleUpdate(update: Update): Promise<void> {
    return this.bot.handleUpdate(update);
  }

  /**
   * Get the bot API for advanced operations
   */
  getBotApi() {
    return this.bot.api;
  }
}
