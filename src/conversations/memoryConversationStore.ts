import { KeyedLock } from '../utils/keyedLock.js';
import type { RuntimeLogger } from '../utils/runtimeLogger.js';
import {
  DAY_MS,
  truncateHistory,
  type ConversationStore,
  type ConversationStoreStats,
  type ConversationTurn,
} from './types.js';

export type MemoryConversationStoreOptions = {
  maxHistory: number;
  maxConversations: number;
  logger?: RuntimeLogger;
  now?: () => number;
};

type Entry = {
  turns: ConversationTurn[];
  updatedAtMs: number;
};

export class MemoryConversationStore implements ConversationStore {
  readonly kind = 'memory' as const;
  readonly maxHistory: number;
  private readonly maxConversations: number;
  private readonly conversations = new Map<string, Entry>();
  private readonly lock = new KeyedLock();
  private readonly logger?: RuntimeLogger;
  private readonly now: () => number;

  constructor(options: MemoryConversationStoreOptions) {
    this.maxHistory = options.maxHistory;
    this.maxConversations = options.maxConversations;
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
  }

  async getHistory(chatId: string): Promise<ConversationTurn[]> {
    return this.lock.run(chatId, async () => [...(this.conversations.get(chatId)?.turns ?? [])]);
  }

  async append(chatId: string, turns: readonly ConversationTurn[]): Promise<ConversationTurn[]> {
    const history = await this.lock.run(chatId, async () => {
      const existing = this.conversations.get(chatId)?.turns ?? [];
      const next = truncateHistory([...existing, ...turns], this.maxHistory);
      this.conversations.set(chatId, { turns: next, updatedAtMs: this.now() });
      return [...next];
    });

    this.evictOverflow();
    return history;
  }

  async clear(chatId: string): Promise<void> {
    await this.lock.run(chatId, async () => {
      const entry = this.conversations.get(chatId);
      if (!entry) return;
      this.conversations.set(chatId, { turns: [], updatedAtMs: this.now() });
      this.logger?.info('conversation cleared', { chatId });
    });
  }

  async listChatIds(): Promise<string[]> {
    return [...this.conversations.keys()];
  }

  async getStats(): Promise<ConversationStoreStats> {
    const activeSince = this.now() - DAY_MS;
    let turns = 0;
    let activeToday = 0;
    for (const entry of this.conversations.values()) {
      turns += entry.turns.length;
      if (entry.updatedAtMs > activeSince) activeToday += 1;
    }
    return { conversations: this.conversations.size, turns, activeToday };
  }

  async expireIdle(maxIdleMs: number): Promise<number> {
    const cutoff = this.now() - maxIdleMs;
    const stale = [...this.conversations.entries()]
      .filter(([, entry]) => entry.updatedAtMs < cutoff)
      .map(([chatId]) => chatId);

    let removed = 0;
    for (const chatId of stale) {
      await this.lock.run(chatId, async () => {
        const entry = this.conversations.get(chatId);
        // Skip chats written to while waiting for the lock.
        if (entry && entry.updatedAtMs < cutoff) {
          this.conversations.delete(chatId);
          removed += 1;
        }
      });
    }

    if (removed > 0) {
      this.logger?.info('expired idle conversations', { expired: removed, maxIdleMs });
    }
    return removed;
  }

  // Drops the least recently updated conversations once over the limit.
  private evictOverflow(): void {
    const overflow = this.conversations.size - this.maxConversations;
    if (overflow <= 0) return;

    const oldest = [...this.conversations.entries()]
      .sort((a, b) => a[1].updatedAtMs - b[1].updatedAtMs)
      .slice(0, overflow);

    for (const [chatId] of oldest) {
      this.conversations.delete(chatId);
    }

    this.logger?.info('evicted old conversations', {
      evicted: oldest.length,
      maxConversations: this.maxConversations,
    });
  }
}
