import { describe, expect, it, vi } from 'vitest';

import { MemoryConversationStore } from '../conversations/memoryConversationStore.js';
import type { GenerationResult, LlmClient } from '../llm/types.js';
import { FallbackResponder, type ReplyTable } from '../persona/fallbackResponder.js';
import type { LlmProvider } from '../runtime/botConfig.js';
import { ChatService } from './chatService.js';

const table: ReplyTable = {
  rules: [{ id: 'greeting', keywords: ['hello'], replies: ['Hi {name}! 😊 How are you?'] }],
  defaultReplies: ['Tell me more!'],
};

const makeLlm = (
  generate: LlmClient['generate'],
  provider: LlmProvider = 'ollama',
  initialize: LlmClient['initialize'] = vi.fn().mockResolvedValue(true),
): LlmClient => ({
  provider,
  model: 'llama3.2:3b',
  initialize,
  generate,
});

const makeService = (llm: LlmClient, maxHistory = 10) => {
  const store = new MemoryConversationStore({ maxHistory, maxConversations: 100 });
  const service = new ChatService({
    store,
    llm,
    fallback: new FallbackResponder({ table, random: () => 0 }),
    generation: { temperature: 0.7, maxTokens: 200 },
    imageGeneration: false,
    now: () => new Date('2026-03-01T10:00:00.000Z'),
  });
  return { store, service };
};

const ok = (text: string): GenerationResult => ({ ok: true, text, model: 'llama3.2:3b' });
const down: GenerationResult = { ok: false, kind: 'unavailable', message: 'Ollama chat error (500)' };

describe('ChatService', () => {
  it('sends the prior history plus the new message and stores both turns', async () => {
    const generate = vi.fn().mockResolvedValue(ok('Hi! How is your day going?'));
    const { store, service } = makeService(makeLlm(generate));

    const reply = await service.reply({ chatId: '42', text: 'hello', userName: 'Maria' });

    expect(reply).toEqual({ text: 'Hi! How is your day going?', source: 'llm', historyLength: 2 });
    const request = generate.mock.calls[0][0];
    expect(request.history).toEqual([]);
    expect(request.message).toBe('hello');
    expect(request.options).toEqual({ temperature: 0.7, maxTokens: 200 });
    expect(request.system).toContain("The user's name is Maria.");

    expect((await store.getHistory('42')).map((turn) => [turn.role, turn.text])).toEqual([
      ['user', 'hello'],
      ['assistant', 'Hi! How is your day going?'],
    ]);
  });

  it('passes earlier turns on the next message', async () => {
    const generate = vi.fn().mockResolvedValueOnce(ok('first')).mockResolvedValueOnce(ok('second'));
    const { service } = makeService(makeLlm(generate));

    await service.reply({ chatId: '42', text: 'one' });
    await service.reply({ chatId: '42', text: 'two' });

    expect(generate.mock.calls[1][0].history.map((turn: { text: string }) => turn.text)).toEqual([
      'one',
      'first',
    ]);
  });

  it('falls back for one message and tries the LLM again on the next', async () => {
    const generate = vi.fn().mockResolvedValueOnce(down).mockResolvedValueOnce(ok('back online'));
    const { service } = makeService(makeLlm(generate));

    const first = await service.reply({ chatId: '42', text: 'hello', userName: 'Sam' });
    expect(first).toEqual({
      text: 'Hi Sam! 😊 How are you?',
      source: 'fallback',
      llmError: 'Ollama chat error (500)',
      historyLength: 2,
    });
    expect((await service.getStats('42')).llm.status).toBe('unavailable');

    const second = await service.reply({ chatId: '42', text: 'anyway' });
    expect(second.source).toBe('llm');
    expect(second.text).toBe('back online');
    expect(generate).toHaveBeenCalledTimes(2);
    expect((await service.getStats('42')).llm.status).toBe('available');
  });

  it('never calls generate when the provider is none', async () => {
    const generate = vi.fn();
    const { service } = makeService(makeLlm(generate, 'none'));

    const replies = await Promise.all([
      service.reply({ chatId: '1', text: 'hello' }),
      service.reply({ chatId: '1', text: 'random words' }),
    ]);

    expect(replies.map((reply) => reply.source)).toEqual(['fallback', 'fallback']);
    expect(replies[1].text).toBe('Tell me more!');
    expect(generate).not.toHaveBeenCalled();
    expect((await service.getStats('1')).llm.status).toBe('disabled');
  });

  it('keeps history within maxHistory', async () => {
    const { service } = makeService(makeLlm(vi.fn().mockResolvedValue(ok('sure'))), 3);

    for (let i = 0; i < 4; i += 1) {
      const reply = await service.reply({ chatId: '7', text: `m${i}` });
      expect(reply.historyLength).toBeLessThanOrEqual(3);
    }
  });

  it('reports zero turns for a chat after clear', async () => {
    const { service } = makeService(makeLlm(vi.fn().mockResolvedValue(ok('hey'))));

    await service.reply({ chatId: '42', text: 'hello' });
    await service.reply({ chatId: '43', text: 'hello' });
    await service.clear('42');

    expect(await service.getStats('42')).toEqual({
      conversations: 2,
      activeToday: 2,
      totalTurns: 2,
      chatTurns: 0,
      maxHistory: 10,
      llm: { provider: 'ollama', model: 'llama3.2:3b', status: 'available' },
      imageGeneration: false,
    });
  });

  it('records the startup availability check', async () => {
    const initialize = vi.fn().mockResolvedValue(false);
    const { service } = makeService(makeLlm(vi.fn(), 'ollama', initialize));

    expect((await service.getStats('1')).llm.status).toBe('unknown');
    expect(await service.initializeLlm()).toBe(false);
    expect((await service.getStats('1')).llm.status).toBe('unavailable');
    expect(service.llmActive).toBe(false);
  });
});
