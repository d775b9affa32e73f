import 'dotenv/config';

import process from 'node:process';
import path from 'node:path';
import type { Server } from 'node:http';
import { Bot } from 'grammy';

import { createTelegramAdapter, type TelegramAdapter, type TelegramBotLike } from './bot.js';
import { listenForWebhooks } from './webhookServer.js';
import { loadBotConfig } from '../../runtime/botConfig.js';
import { createBotServices } from '../../runtime/botServices.js';
import { reportStartupError } from '../../runtime/startupErrors.js';
import type { ConversationRetentionScheduler } from '../../conversations/conversationRetentionScheduler.js';
import type { RuntimeLogger } from '../../utils/runtimeLogger.js';

let mode: 'polling' | 'webhook' | 'unknown' = 'unknown';
let dataDir = process.env.DATA_DIR || 'data';
let logDir = process.env.LOG_DIR || path.join(dataDir, 'logs');

const stopOnSignals = (
  adapter: TelegramAdapter,
  retention: ConversationRetentionScheduler,
  logger: RuntimeLogger,
  server?: Server,
) => {
  const shutdown = async (signal: string) => {
    logger.info('shutting down', { signal });
    retention.stop();
    await adapter.stop();
    server?.close();
    await logger.flush();
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logger.error('shutdown failed', { signal, error: String(err) });
        process.exit(1);
      });
    });
  }
};

const start = async () => {
  const config = loadBotConfig(process.env);
  dataDir = config.storage.dataDir;
  logDir = config.logging.logDir;
  mode = config.telegram.webhookUrl ? 'webhook' : 'polling';

  const services = createBotServices(config);
  const { logger, chat } = services;

  const llmReady = await chat.initializeLlm();
  const stats = await chat.getStats('startup');
  logger.info('services ready', {
    llm: stats.llm,
    llmReady,
    storage: services.store.kind,
    maxHistory: config.llm.maxHistory,
    imageGeneration: services.images !== null,
    rateLimit: config.rateLimit,
    conversationMaxAgeDays: config.storage.maxAgeDays,
  });
  services.retention.start();

  const bot = new Bot(config.telegram.botToken);
  const adapter = createTelegramAdapter({
    token: config.telegram.botToken,
    chat,
    images: services.images,
    rateLimiter: services.rateLimiter,
    logDir,
    logger: logger.child('telegram'),
    bot: bot as unknown as TelegramBotLike,
  });

  await adapter.registerCommands();

  const webhookUrl = config.telegram.webhookUrl;
  if (webhookUrl) {
    await bot.init();
    const server = await listenForWebhooks({
      bot,
      host: config.telegram.webhookHost,
      port: config.telegram.webhookPort,
      webhookUrl,
      logger,
    });
    await adapter.setWebhook(webhookUrl, config.telegram.maxConnections);
    stopOnSignals(adapter, services.retention, logger, server);
    console.log(`alice bot (webhook) listening on ${config.telegram.webhookHost}:${config.telegram.webhookPort}`);
    return;
  }

  stopOnSignals(adapter, services.retention, logger);
  console.log('alice bot (polling) starting…');
  await adapter.startPolling((username) => {
    console.log(`alice bot running as @${username}`);
  });
};

start().catch((err) => {
  reportStartupError(err, { mode, dataDir, logDir });
  process.exit(1);
});
