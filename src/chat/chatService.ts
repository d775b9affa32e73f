import { createTurn, type ConversationStore } from '../conversations/types.js';
import type { GenerationOptions, LlmClient } from '../llm/types.js';
import type { LlmProvider } from '../runtime/botConfig.js';
import { buildSystemPrompt, renderTranscript } from '../persona/alice.js';
import type { FallbackResponder } from '../persona/fallbackResponder.js';
import { KeyedLock } from '../utils/keyedLock.js';
import type { RuntimeLogger } from '../utils/runtimeLogger.js';

export type LlmStatus = 'available' | 'unavailable' | 'disabled' | 'unknown';

export type ChatReplyInput = {
  chatId: string;
  text: string;
  userName?: string;
};

export type ChatReply = {
  text: string;
  source: 'llm' | 'fallback';
  /** Set when an LLM call was attempted and failed. */
  llmError?: string;
  historyLength: number;
};

export type ChatStats = {
  conversations: number;
  activeToday: number;
  totalTurns: number;
  chatTurns: number;
  maxHistory: number;
  llm: {
    provider: LlmProvider;
    model: string;
    status: LlmStatus;
  };
  imageGeneration: boolean;
};

export type ChatServiceOptions = {
  store: ConversationStore;
  llm: LlmClient;
  fallback: FallbackResponder;
  generation: GenerationOptions;
  imageGeneration: boolean;
  logger?: RuntimeLogger;
  now?: () => Date;
};

/**
 * One reply per inbound message: LLM first, templated fallback on any
 * `unavailable` result. A failure affects only the message that hit it.
 */
export class ChatService {
  private readonly options: ChatServiceOptions;
  private readonly now: () => Date;
  private readonly lock = new KeyedLock();
  private llmStatus: LlmStatus;

  constructor(options: ChatServiceOptions) {
    this.options = options;
    this.now = options.now ?? (() => new Date());
    this.llmStatus = options.llm.provider === 'none' ? 'disabled' : 'unknown';
  }

  get llmProvider(): LlmProvider {
    return this.options.llm.provider;
  }

  get imageGeneration(): boolean {
    return this.options.imageGeneration;
  }

  get llmActive(): boolean {
    return this.llmStatus === 'available' || this.llmStatus === 'unknown';
  }

  async initializeLlm(): Promise<boolean> {
    if (this.options.llm.provider === 'none') return false;
    const ready = await this.options.llm.initialize();
    this.llmStatus = ready ? 'available' : 'unavailable';
    return ready;
  }

  async reply(input: ChatReplyInput): Promise<ChatReply> {
    // Serialized per chat: replies follow arrival order.
    return this.lock.run(input.chatId, async () => {
      const { store, llm, fallback, logger } = this.options;
      const history = await store.getHistory(input.chatId);

      let text: string | undefined;
      let llmError: string | undefined;

      if (llm.provider !== 'none') {
        const request = {
          system: buildSystemPrompt({ userName: input.userName, turnCount: history.length }),
          history,
          message: input.text,
          options: this.options.generation,
        };
        logger?.debug('llm request', { chatId: input.chatId, transcript: renderTranscript(request) });

        const result = await llm.generate(request);
        if (result.ok) {
          this.llmStatus = 'available';
          text = result.text;
        } else {
          this.llmStatus = 'unavailable';
          llmError = result.message;
          logger?.warn('llm unavailable, using fallback reply', {
            chatId: input.chatId,
            error: result.message,
          });
        }
      }

      const source: ChatReply['source'] = text === undefined ? 'fallback' : 'llm';
      const replyText = text ?? fallback.respond(input.text, input.userName).text;

      const at = this.now();
      const updated = await store.append(input.chatId, [
        createTurn('user', input.text, at),
        createTurn('assistant', replyText, at),
      ]);

      return {
        text: replyText,
        source,
        ...(llmError ? { llmError } : {}),
        historyLength: updated.length,
      };
    });
  }

  async clear(chatId: string): Promise<void> {
    await this.lock.run(chatId, () => this.options.store.clear(chatId));
  }

  async getStats(chatId: string): Promise<ChatStats> {
    const { store, llm } = this.options;
    const [totals, history] = await Promise.all([store.getStats(), store.getHistory(chatId)]);
    return {
      conversations: totals.conversations,
      activeToday: totals.activeToday,
      totalTurns: totals.turns,
      chatTurns: history.length,
      maxHistory: store.maxHistory,
      llm: { provider: llm.provider, model: llm.model, status: this.llmStatus },
      imageGeneration: this.options.imageGeneration,
    };
  }
}
