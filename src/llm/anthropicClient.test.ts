import { describe, expect, it, vi } from 'vitest';

import { createTurn } from '../conversations/types.js';
import { AnthropicClient, toAnthropicMessages } from './anthropicClient.js';
import type { GenerationRequest } from './types.js';

const at = new Date('2026-03-01T10:00:00.000Z');

const request: GenerationRequest = {
  system: 'You are Alice.',
  history: [createTurn('assistant', 'welcome back!', at), createTurn('user', 'hi', at), createTurn('assistant', 'hey!', at)],
  message: 'what are you up to?',
  options: { temperature: 0.4, maxTokens: 120 },
};

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });

describe('toAnthropicMessages', () => {
  it('drops leading assistant turns', () => {
    expect(toAnthropicMessages(request)).toEqual([
      { role: 'user', content: 'hi' },
      { role: 'assistant', content: 'hey!' },
      { role: 'user', content: 'what are you up to?' },
    ]);
  });
});

describe('AnthropicClient', () => {
  it('posts to the messages endpoint with the API headers', async () => {
    const fetchMock = vi.fn().mockResolvedValue(
      jsonResponse({
        model: 'claude-3-5-haiku-20241022',
        content: [{ type: 'text', text: 'Reading a novel!' }],
      }),
    );
    const client = new AnthropicClient(
      { apiKey: 'test-key', baseUrl: 'https://anthropic.test/', model: 'auto', timeoutMs: 1000 },
      { fetch: fetchMock },
    );

    expect(client.model).toBe('claude-3-5-haiku-latest');
    expect(await client.generate(request)).toEqual({
      ok: true,
      text: 'Reading a novel!',
      model: 'claude-3-5-haiku-20241022',
    });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://anthropic.test/v1/messages');
    expect(init.headers).toMatchObject({
      'x-api-key': 'test-key',
      'anthropic-version': '2023-06-01',
    });
    expect(JSON.parse(init.body)).toMatchObject({
      model: 'claude-3-5-haiku-latest',
      system: 'You are Alice.',
      max_tokens: 120,
      temperature: 0.4,
    });
  });

  it('is unavailable without an API key and never calls fetch', async () => {
    const fetchMock = vi.fn();
    const client = new AnthropicClient(
      { baseUrl: 'https://anthropic.test', model: 'auto', timeoutMs: 1000 },
      { fetch: fetchMock },
    );

    expect(await client.initialize()).toBe(false);
    expect(await client.generate(request)).toEqual({
      ok: false,
      kind: 'unavailable',
      message: 'ANTHROPIC_API_KEY is not set',
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('maps HTTP errors to unavailable', async () => {
    const client = new AnthropicClient(
      { apiKey: 'test-key', baseUrl: 'https://anthropic.test', model: 'auto', timeoutMs: 1000 },
      { fetch: vi.fn().mockResolvedValue(jsonResponse({ type: 'error' }, 529)) },
    );

    expect(await client.generate(request)).toEqual({
      ok: false,
      kind: 'unavailable',
      message: 'Anthropic messages error (529)',
    });
  });
});
