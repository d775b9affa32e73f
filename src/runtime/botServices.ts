import { ChatService } from '../chat/chatService.js';
import {
  createConversationRetentionScheduler,
  type ConversationRetentionScheduler,
} from '../conversations/conversationRetentionScheduler.js';
import { createConversationStore } from '../conversations/createConversationStore.js';
import type { ConversationStore } from '../conversations/types.js';
import { createImageService } from '../images/createImageService.js';
import type { ImageService } from '../images/imageService.js';
import { createLlmClient } from '../llm/createLlmClient.js';
import type { FetchLike, LlmClient } from '../llm/types.js';
import { FallbackResponder } from '../persona/fallbackResponder.js';
import { RateLimiter } from '../policies/rateLimiter.js';
import { createRuntimeLogger, type RuntimeLogger } from '../utils/runtimeLogger.js';
import type { BotConfig } from './botConfig.js';

export type BotServices = {
  logger: RuntimeLogger;
  store: ConversationStore;
  retention: ConversationRetentionScheduler;
  llm: LlmClient;
  chat: ChatService;
  images: ImageService | null;
  rateLimiter: RateLimiter;
};

type BotServicesDeps = {
  logger?: RuntimeLogger;
  fetch?: FetchLike;
  fallback?: FallbackResponder;
};

export function createBotServices(config: BotConfig, deps: BotServicesDeps = {}): BotServices {
  const logger =
    deps.logger ??
    createRuntimeLogger({
      logDir: config.logging.logDir,
      component: 'alice',
      level: config.logging.level,
    });

  const store = createConversationStore({
    storage: config.storage,
    maxHistory: config.llm.maxHistory,
    logger: logger.child('conversations'),
  });

  const retention = createConversationRetentionScheduler({
    store,
    maxAgeDays: config.storage.maxAgeDays,
    intervalMinutes: config.storage.cleanupIntervalMinutes,
    logger: logger.child('retention'),
  });

  const llm = createLlmClient(config.llm, logger.child('llm'), { fetch: deps.fetch });

  const images = createImageService({
    image: config.image,
    openaiApiKey: config.llm.openaiApiKey,
    openaiBaseUrl: config.llm.openaiBaseUrl,
    logger: logger.child('images'),
    fetch: deps.fetch,
  });

  const chat = new ChatService({
    store,
    llm,
    fallback: deps.fallback ?? new FallbackResponder(),
    generation: { temperature: config.llm.temperature, maxTokens: config.llm.maxTokens },
    imageGeneration: images !== null,
    logger: logger.child('chat'),
  });

  return {
    logger,
    store,
    retention,
    llm,
    chat,
    images,
    rateLimiter: new RateLimiter({ maxEvents: config.rateLimit }),
  };
}
