export type TurnRole = 'user' | 'assistant';

export type ConversationTurn = Readonly<{
  role: TurnRole;
  text: string;
  /** ISO-8601 creation time. */
  timestamp: string;
}>;

export type ConversationStoreStats = {
  conversations: number;
  turns: number;
  /** Conversations updated within the last 24 hours. */
  activeToday: number;
};

export const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Chat id -> bounded, ordered list of turns.
 *
 * Implementations serialize operations per chat id and truncate to the most
 * recent `maxHistory` turns on every append (oldest first out).
 */
export interface ConversationStore {
  readonly kind: 'memory' | 'file';
  readonly maxHistory: number;
  getHistory(chatId: string): Promise<ConversationTurn[]>;
  append(chatId: string, turns: readonly ConversationTurn[]): Promise<ConversationTurn[]>;
  clear(chatId: string): Promise<void>;
  listChatIds(): Promise<string[]>;
  getStats(): Promise<ConversationStoreStats>;
  /** Removes conversations not updated within `maxIdleMs`; resolves to the number removed. */
  expireIdle(maxIdleMs: number): Promise<number>;
}

export function createTurn(role: TurnRole, text: string, at: Date = new Date()): ConversationTurn {
  return Object.freeze({ role, text, timestamp: at.toISOString() });
}

export function truncateHistory(
  turns: readonly ConversationTurn[],
  maxHistory: number,
): ConversationTurn[] {
  if (turns.length <= maxHistory) return [...turns];
  return turns.slice(turns.length - maxHistory);
}
