import { describe, expect, it, vi } from 'vitest';

import { createTurn } from '../conversations/types.js';
import { OllamaClient } from './ollamaClient.js';
import type { GenerationRequest } from './types.js';

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });

const request: GenerationRequest = {
  system: 'You are Alice.',
  history: [
    createTurn('user', 'hi', new Date('2026-03-01T10:00:00.000Z')),
    createTurn('assistant', 'hello!', new Date('2026-03-01T10:00:01.000Z')),
  ],
  message: 'how are you?',
  options: { temperature: 3, maxTokens: 0 },
};

const makeClient = (fetchMock: ReturnType<typeof vi.fn>, model = 'auto', autoSelect = true) =>
  new OllamaClient(
    { baseUrl: 'http://ollama.test/', model, autoSelect, timeoutMs: 1000 },
    { fetch: fetchMock },
  );

describe('OllamaClient', () => {
  it('auto-selects an installed model on initialize', async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValue(jsonResponse({ models: [{ name: 'phi3:mini' }, { name: 'mistral:7b' }] }));
    const client = makeClient(fetchMock);

    expect(await client.initialize()).toBe(true);
    expect(client.model).toBe('mistral:7b');
    expect(fetchMock.mock.calls[0][0]).toBe('http://ollama.test/api/tags');
  });

  it('reports unavailable when the server cannot be reached', async () => {
    const fetchMock = vi.fn().mockRejectedValue(new Error('connect ECONNREFUSED'));
    const client = makeClient(fetchMock, 'llama3.2:3b');

    expect(await client.initialize()).toBe(false);
    expect(client.model).toBe('llama3.2:3b');
  });

  it('reports unavailable when no model is installed', async () => {
    const client = makeClient(vi.fn().mockResolvedValue(jsonResponse({ models: [] })));

    expect(await client.initialize()).toBe(false);
    expect(client.model).toBe('llama3.2:3b');
  });

  it('posts the chat transcript with clamped options', async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValue(jsonResponse({ message: { role: 'assistant', content: '  I am great!  ' } }));
    const client = makeClient(fetchMock, 'mistral:7b', false);

    const result = await client.generate(request);

    expect(result).toEqual({ ok: true, text: 'I am great!', model: 'mistral:7b' });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://ollama.test/api/chat');
    expect(init.method).toBe('POST');
    expect(JSON.parse(init.body)).toEqual({
      model: 'mistral:7b',
      messages: [
        { role: 'system', content: 'You are Alice.' },
        { role: 'user', content: 'hi' },
        { role: 'assistant', content: 'hello!' },
        { role: 'user', content: 'how are you?' },
      ],
      stream: false,
      options: { temperature: 1, num_predict: 1, top_p: 0.9, top_k: 40 },
    });
  });

  it('maps HTTP errors to unavailable', async () => {
    const client = makeClient(vi.fn().mockResolvedValue(jsonResponse({ error: 'boom' }, 500)), 'mistral:7b', false);

    expect(await client.generate(request)).toEqual({
      ok: false,
      kind: 'unavailable',
      message: 'Ollama chat error (500)',
    });
  });

  it('maps malformed and empty payloads to unavailable', async () => {
    const malformed = makeClient(vi.fn().mockResolvedValue(jsonResponse({ done: true })), 'mistral:7b', false);
    const empty = makeClient(
      vi.fn().mockResolvedValue(jsonResponse({ message: { content: '   ' } })),
      'mistral:7b',
      false,
    );

    expect(await malformed.generate(request)).toMatchObject({ ok: false, kind: 'unavailable' });
    expect(await empty.generate(request)).toEqual({
      ok: false,
      kind: 'unavailable',
      message: 'Ollama returned an empty reply',
    });
  });

  it('maps transport failures to unavailable', async () => {
    const client = makeClient(vi.fn().mockRejectedValue(new Error('timeout')), 'mistral:7b', false);

    expect(await client.generate(request)).toEqual({
      ok: false,
      kind: 'unavailable',
      message: 'Ollama request failed: timeout',
    });
  });

  it('picks a model on the first message when the server was down at startup', async () => {
    const fetchMock = vi
      .fn()
      .mockRejectedValueOnce(new Error('connect ECONNREFUSED'))
      .mockResolvedValueOnce(jsonResponse({ models: [{ name: 'qwen2.5:7b' }] }))
      .mockResolvedValueOnce(jsonResponse({ message: { content: 'Back online!' } }));
    const client = makeClient(fetchMock);

    expect(await client.initialize()).toBe(false);
    expect(client.model).toBe('auto');

    const result = await client.generate(request);

    expect(result).toEqual({ ok: true, text: 'Back online!', model: 'qwen2.5:7b' });
    expect(fetchMock.mock.calls.map(([url]) => url)).toEqual([
      'http://ollama.test/api/tags',
      'http://ollama.test/api/tags',
      'http://ollama.test/api/chat',
    ]);
    expect(JSON.parse(fetchMock.mock.calls[2][1].body).model).toBe('qwen2.5:7b');
  });

  it('stays unavailable without sending a chat while the server is still down', async () => {
    const fetchMock = vi.fn().mockRejectedValue(new Error('connect ECONNREFUSED'));
    const client = makeClient(fetchMock);

    expect(await client.generate(request)).toEqual({
      ok: false,
      kind: 'unavailable',
      message: 'Ollama request failed: connect ECONNREFUSED',
    });
    expect(fetchMock.mock.calls.map(([url]) => url)).toEqual(['http://ollama.test/api/tags']);
  });

  it('looks the model up only once after it has been resolved', async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(jsonResponse({ models: [{ name: 'mistral:7b' }] }))
      .mockResolvedValue(jsonResponse({ message: { content: 'ok' } }));
    const client = makeClient(fetchMock);

    await client.generate(request);
    await client.generate(request);

    expect(fetchMock.mock.calls.map(([url]) => url)).toEqual([
      'http://ollama.test/api/tags',
      'http://ollama.test/api/chat',
      'http://ollama.test/api/chat',
    ]);
  });
});
