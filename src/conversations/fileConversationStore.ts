import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';

import { KeyedLock } from '../utils/keyedLock.js';
import type { RuntimeLogger } from '../utils/runtimeLogger.js';
import { hashChatId } from './chatHash.js';
import {
  DAY_MS,
  truncateHistory,
  type ConversationStore,
  type ConversationStoreStats,
  type ConversationTurn,
} from './types.js';

export type FileConversationStoreOptions = {
  /** Directory holding one JSONL file per chat plus `index.json`. */
  baseDir: string;
  maxHistory: number;
  maxConversations: number;
  logger?: RuntimeLogger;
  now?: () => number;
};

const TURN_SCHEMA = z.object({
  role: z.enum(['user', 'assistant']),
  text: z.string(),
  timestamp: z.string(),
});

const INDEX_SCHEMA = z.record(
  z.string(),
  z.object({
    chatId: z.string(),
    turns: z.number().int().nonnegative(),
    updatedAtMs: z.number(),
  }),
);

type IndexEntry = z.infer<typeof INDEX_SCHEMA>[string];

const INDEX_LOCK_KEY = '__index__';

function isMissingFileError(err: unknown): boolean {
  return (err as NodeJS.ErrnoException).code === 'ENOENT';
}

function parseJsonLine(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return null;
  }
}

/**
 * Durable conversation store. Each chat lives in
 * `<baseDir>/<sha256(chatId)>.jsonl`; `index.json` maps hashes back to chat ids
 * and tracks recency for eviction.
 */
export class FileConversationStore implements ConversationStore {
  readonly kind = 'file' as const;
  readonly maxHistory: number;
  private readonly baseDir: string;
  private readonly maxConversations: number;
  private readonly lock = new KeyedLock();
  private readonly logger?: RuntimeLogger;
  private readonly now: () => number;
  private index: Record<string, IndexEntry> | null = null;

  constructor(options: FileConversationStoreOptions) {
    this.baseDir = options.baseDir;
    this.maxHistory = options.maxHistory;
    this.maxConversations = options.maxConversations;
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
  }

  async getHistory(chatId: string): Promise<ConversationTurn[]> {
    return this.lock.run(chatId, () => this.readTurns(chatId));
  }

  async append(chatId: string, turns: readonly ConversationTurn[]): Promise<ConversationTurn[]> {
    const history = await this.lock.run(chatId, async () => {
      const existing = await this.readTurns(chatId);
      const next = truncateHistory([...existing, ...turns], this.maxHistory);
      await this.writeTurns(chatId, next);
      return next;
    });

    await this.updateIndex(chatId, history.length);
    return history;
  }

  async clear(chatId: string): Promise<void> {
    await this.lock.run(chatId, async () => {
      await rm(this.chatPath(chatId), { force: true });
    });

    await this.lock.run(INDEX_LOCK_KEY, async () => {
      const index = await this.loadIndex();
      const key = hashChatId(chatId);
      const entry = index[key];
      if (!entry) return;
      index[key] = { ...entry, turns: 0, updatedAtMs: this.now() };
      await this.flushIndex(index);
    });
    this.logger?.info('conversation cleared', { chatId });
  }

  async listChatIds(): Promise<string[]> {
    return this.lock.run(INDEX_LOCK_KEY, async () => {
      const index = await this.loadIndex();
      return Object.values(index).map((entry) => entry.chatId);
    });
  }

  async getStats(): Promise<ConversationStoreStats> {
    return this.lock.run(INDEX_LOCK_KEY, async () => {
      const entries = Object.values(await this.loadIndex());
      const activeSince = this.now() - DAY_MS;
      return {
        conversations: entries.length,
        turns: entries.reduce((sum, entry) => sum + entry.turns, 0),
        activeToday: entries.filter((entry) => entry.updatedAtMs > activeSince).length,
      };
    });
  }

  async expireIdle(maxIdleMs: number): Promise<number> {
    const cutoff = this.now() - maxIdleMs;
    const stale = await this.lock.run(INDEX_LOCK_KEY, async () =>
      Object.values(await this.loadIndex())
        .filter((entry) => entry.updatedAtMs < cutoff)
        .map((entry) => entry.chatId),
    );

    let removed = 0;
    for (const chatId of stale) {
      await this.lock.run(chatId, async () => {
        const dropped = await this.lock.run(INDEX_LOCK_KEY, async () => {
          const index = await this.loadIndex();
          const key = hashChatId(chatId);
          const entry = index[key];
          // Skip chats written to since the scan.
          if (!entry || entry.updatedAtMs >= cutoff) return false;
          delete index[key];
          await this.flushIndex(index);
          return true;
        });
        if (!dropped) return;
        await rm(this.chatPath(chatId), { force: true });
        removed += 1;
      });
    }

    if (removed > 0) {
      this.logger?.info('expired idle conversations', { expired: removed, maxIdleMs });
    }
    return removed;
  }

  private chatPath(chatId: string): string {
    return path.join(this.baseDir, `${hashChatId(chatId)}.jsonl`);
  }

  private indexPath(): string {
    return path.join(this.baseDir, 'index.json');
  }

  private async readTurns(chatId: string): Promise<ConversationTurn[]> {
    let data: string;
    try {
      data = await readFile(this.chatPath(chatId), 'utf8');
    } catch (err) {
      if (isMissingFileError(err)) return [];
      throw err;
    }

    const turns: ConversationTurn[] = [];
    for (const line of data.split(/\r?\n/)) {
      if (!line.trim()) continue;
      const parsed = TURN_SCHEMA.safeParse(parseJsonLine(line));
      if (!parsed.success) {
        this.logger?.warn('skipping malformed conversation line', { chatId });
        continue;
      }
      turns.push(Object.freeze(parsed.data));
    }
    return turns;
  }

  private async writeTurns(chatId: string, turns: readonly ConversationTurn[]): Promise<void> {
    await mkdir(this.baseDir, { recursive: true });
    const target = this.chatPath(chatId);
    const payload = turns.map((turn) => JSON.stringify(turn)).join('\n');
    const tmp = `${target}.tmp`;
    await writeFile(tmp, payload ? `${payload}\n` : '', 'utf8');
    await rename(tmp, target);
  }

  private async loadIndex(): Promise<Record<string, IndexEntry>> {
    if (this.index) return this.index;

    let raw: string;
    try {
      raw = await readFile(this.indexPath(), 'utf8');
    } catch (err) {
      if (!isMissingFileError(err)) throw err;
      this.index = {};
      return this.index;
    }

    const parsed = INDEX_SCHEMA.safeParse(parseJsonLine(raw));
    if (!parsed.success) {
      this.logger?.warn('conversation index is corrupt, starting a new one', {
        indexPath: this.indexPath(),
        error: parsed.error.message,
      });
      this.index = {};
      return this.index;
    }

    this.index = parsed.data;
    return this.index;
  }

  private async flushIndex(index: Record<string, IndexEntry>): Promise<void> {
    await mkdir(this.baseDir, { recursive: true });
    const tmp = `${this.indexPath()}.tmp`;
    await writeFile(tmp, JSON.stringify(index, null, 2), 'utf8');
    await rename(tmp, this.indexPath());
  }

  private async updateIndex(chatId: string, turns: number): Promise<void> {
    const evicted = await this.lock.run(INDEX_LOCK_KEY, async () => {
      const index = await this.loadIndex();
      index[hashChatId(chatId)] = { chatId, turns, updatedAtMs: this.now() };

      const overflow = Object.keys(index).length - this.maxConversations;
      const oldest =
        overflow > 0
          ? Object.entries(index)
              .sort((a, b) => a[1].updatedAtMs - b[1].updatedAtMs)
              .slice(0, overflow)
          : [];
      for (const [key] of oldest) {
        delete index[key];
      }

      await this.flushIndex(index);
      return oldest.map(([, entry]) => entry.chatId);
    });

    for (const evictedChatId of evicted) {
      await this.lock.run(evictedChatId, async () => {
        await rm(this.chatPath(evictedChatId), { force: true });
      });
    }

    if (evicted.length > 0) {
      this.logger?.info('evicted old conversations', {
        evicted: evicted.length,
        maxConversations: this.maxConversations,
      });
    }
  }
}
