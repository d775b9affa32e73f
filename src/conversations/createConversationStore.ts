import path from 'node:path';

import type { BotConfig } from '../runtime/botConfig.js';
import type { RuntimeLogger } from '../utils/runtimeLogger.js';
import { FileConversationStore } from './fileConversationStore.js';
import { MemoryConversationStore } from './memoryConversationStore.js';
import type { ConversationStore } from './types.js';

export type CreateConversationStoreOptions = {
  storage: BotConfig['storage'];
  maxHistory: number;
  logger: RuntimeLogger;
};

export function createConversationStore(options: CreateConversationStoreOptions): ConversationStore {
  const { storage, maxHistory, logger } = options;

  switch (storage.type) {
    case 'file':
      return new FileConversationStore({
        baseDir: path.join(storage.dataDir, 'conversations'),
        maxHistory,
        maxConversations: storage.maxConversations,
        logger,
      });
    case 'redis':
      // No redis client is bundled; conversations stay in process memory.
      logger.warn('STORAGE_TYPE=redis is not supported, using in-memory storage');
      return new MemoryConversationStore({
        maxHistory,
        maxConversations: storage.maxConversations,
        logger,
      });
    case 'memory':
      return new MemoryConversationStore({
        maxHistory,
        maxConversations: storage.maxConversations,
        logger,
      });
  }
}
