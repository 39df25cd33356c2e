#!/usr/bin/env node

import { Command } from 'commander';
import { pino } from 'pino';
import { loadConfigFromProcess, sqlitePath, type Config } from './config/index.js';
import { Gateway, setupGracefulShutdown } from './gateway/index.js';
import { ConversationDatabase } from './memory/db.js';
import { SessionManager } from './agent/session.js';
import { Reporter, parseExportLimit } from './reporting/reporter.js';
import { createLogger } from './utils/logger.js';
import { ConfigurationError, errorMessage } from './utils/errors.js';

const VERSION = '0.1.0';

const program = new Command();

program
  .name('companion-bot')
  .description('Private one-owner Telegram companion bot')
  .version(VERSION);

function loadConfigOrExit(): Config {
  try {
    return loadConfigFromProcess();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(error.message);
    } else {
      console.error('Failed to load config:', errorMessage(error));
    }
    process.exit(1);
  }
}

/** Open the database and hand a reporter to `fn`; the database is closed afterwards */
function withReporter(config: Config, fn: (reporter: Reporter) => string): void {
  const logger = pino({ level: 'silent' });
  const db = new ConversationDatabase(sqlitePath(config.storage.databaseUrl), { logger });
  try {
    console.log(fn(new Reporter(db, new SessionManager(db, logger))));
  } finally {
    db.close();
  }
}

// Start command - runs the bot
program
  .command('start')
  .description('Start the bot (long polling)')
  .option('-v, --verbose', 'Enable verbose logging')
  .option('--pretty', 'Human-readable log output (requires pino-pretty)')
  .action(async (options: { verbose?: boolean; pretty?: boolean }) => {
    const config = loadConfigOrExit();
    if (options.verbose) {
      config.logging.level = 'debug';
    }

    const logger = createLogger({ level: config.logging.level, pretty: options.pretty });

    try {
      logger.info({ version: VERSION, model: config.llm.model }, 'Starting companion bot...');

      const gateway = new Gateway({ config, logger });
      setupGracefulShutdown(gateway, logger);
      await gateway.start();

      logger.info('Bot is running. Press Ctrl+C to stop.');
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Failed to start');
      process.exit(1);
    }
  });

// Health command - same report as /health, without Telegram
program
  .command('health')
  .description('Print database and active session status')
  .action(() => {
    const config = loadConfigOrExit();
    try {
      withReporter(config, (reporter) => reporter.healthText(config.telegram.ownerId));
    } catch (error) {
      console.error('Health check failed:', errorMessage(error));
      process.exit(1);
    }
  });

// Export command - same output as /export [N]
program
  .command('export')
  .description('Print the latest messages of the active session')
  .option('-n, --count <n>', 'Number of messages (1-200, default 20)')
  .action((options: { count?: string }) => {
    const parsed = parseExportLimit(options.count);
    if (!parsed.ok) {
      console.error(parsed.error);
      process.exit(1);
    }

    const config = loadConfigOrExit();
    try {
      withReporter(config, (reporter) => reporter.exportText(config.telegram.ownerId, parsed.limit));
    } catch (error) {
      console.error('Export failed:', errorMessage(error));
      process.exit(1);
    }
  });

program.parse();
