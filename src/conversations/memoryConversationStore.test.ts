import { describe, expect, it } from 'vitest';

import { MemoryConversationStore } from './memoryConversationStore.js';
import { createTurn, DAY_MS } from './types.js';

const at = new Date('2026-03-01T10:00:00.000Z');
const user = (text: string) => createTurn('user', text, at);
const assistant = (text: string) => createTurn('assistant', text, at);

const makeClock = () => {
  let tick = 0;
  return () => {
    tick += 1;
    return tick;
  };
};

describe('MemoryConversationStore', () => {
  it('returns an empty history for unknown chats', async () => {
    const store = new MemoryConversationStore({ maxHistory: 10, maxConversations: 10 });

    expect(await store.getHistory('123')).toEqual([]);
    expect(await store.getStats()).toEqual({ conversations: 0, turns: 0, activeToday: 0 });
  });

  it('appends turns in order', async () => {
    const store = new MemoryConversationStore({ maxHistory: 10, maxConversations: 10 });

    await store.append('123', [user('hello'), assistant('hi!')]);
    await store.append('123', [user('how are you?')]);

    const history = await store.getHistory('123');
    expect(history.map((turn) => `${turn.role}:${turn.text}`)).toEqual([
      'user:hello',
      'assistant:hi!',
      'user:how are you?',
    ]);
    expect(history[0].timestamp).toBe('2026-03-01T10:00:00.000Z');
  });

  it('never keeps more than maxHistory turns and drops the oldest first', async () => {
    const store = new MemoryConversationStore({ maxHistory: 3, maxConversations: 10 });

    for (let i = 1; i <= 5; i += 1) {
      const history = await store.append('123', [user(`m${i}`)]);
      expect(history.length).toBeLessThanOrEqual(3);
    }

    const history = await store.getHistory('123');
    expect(history.map((turn) => turn.text)).toEqual(['m3', 'm4', 'm5']);
  });

  it('truncates a single oversized append', async () => {
    const store = new MemoryConversationStore({ maxHistory: 2, maxConversations: 10 });

    const history = await store.append('123', [user('a'), assistant('b'), user('c')]);

    expect(history.map((turn) => turn.text)).toEqual(['b', 'c']);
  });

  it('keeps chats independent', async () => {
    const store = new MemoryConversationStore({ maxHistory: 10, maxConversations: 10 });

    await Promise.all([
      store.append('1', [user('one')]),
      store.append('2', [user('two'), assistant('dos')]),
    ]);

    expect((await store.getHistory('1')).map((turn) => turn.text)).toEqual(['one']);
    expect((await store.getHistory('2')).map((turn) => turn.text)).toEqual(['two', 'dos']);
    expect(await store.getStats()).toEqual({ conversations: 2, turns: 3, activeToday: 2 });
  });

  it('serializes concurrent appends to the same chat', async () => {
    const store = new MemoryConversationStore({ maxHistory: 100, maxConversations: 10 });

    await Promise.all(
      Array.from({ length: 20 }, (_, i) => store.append('123', [user(`m${i}`)])),
    );

    const history = await store.getHistory('123');
    expect(history).toHaveLength(20);
    expect(history.map((turn) => turn.text)).toEqual(
      Array.from({ length: 20 }, (_, i) => `m${i}`),
    );
  });

  it('clears a chat without touching others', async () => {
    const store = new MemoryConversationStore({ maxHistory: 10, maxConversations: 10 });

    await store.append('1', [user('one')]);
    await store.append('2', [user('two')]);
    await store.clear('1');

    expect(await store.getHistory('1')).toEqual([]);
    expect((await store.getHistory('2')).map((turn) => turn.text)).toEqual(['two']);
    expect(await store.getStats()).toEqual({ conversations: 2, turns: 1, activeToday: 2 });
  });

  it('evicts the least recently updated conversations over the limit', async () => {
    const store = new MemoryConversationStore({
      maxHistory: 10,
      maxConversations: 2,
      now: makeClock(),
    });

    await store.append('a', [user('a1')]);
    await store.append('b', [user('b1')]);
    await store.append('a', [user('a2')]);
    await store.append('c', [user('c1')]);

    expect((await store.listChatIds()).sort()).toEqual(['a', 'c']);
  });

  it('returns copies that do not alias stored history', async () => {
    const store = new MemoryConversationStore({ maxHistory: 10, maxConversations: 10 });

    await store.append('123', [user('hello')]);
    const history = await store.getHistory('123');
    history.push(user('injected'));

    expect(await store.getHistory('123')).toHaveLength(1);
    expect(Object.isFrozen(history[0])).toBe(true);
  });

  it('counts only conversations updated within the last day as active', async () => {
    let nowMs = 0;
    const store = new MemoryConversationStore({ maxHistory: 10, maxConversations: 10, now: () => nowMs });

    await store.append('old', [user('hello')]);
    nowMs = DAY_MS + 1000;
    await store.append('new', [user('hi')]);

    expect(await store.getStats()).toEqual({ conversations: 2, turns: 2, activeToday: 1 });
  });

  it('expires conversations idle for longer than the given age', async () => {
    let nowMs = 0;
    const store = new MemoryConversationStore({ maxHistory: 10, maxConversations: 10, now: () => nowMs });

    await store.append('idle', [user('hello')]);
    nowMs = 5 * DAY_MS;
    await store.append('recent', [user('hi')]);
    nowMs = 8 * DAY_MS;

    expect(await store.expireIdle(7 * DAY_MS)).toBe(1);
    expect(await store.listChatIds()).toEqual(['recent']);
    expect(await store.getHistory('idle')).toEqual([]);
    expect(await store.expireIdle(7 * DAY_MS)).toBe(0);
  });
});
