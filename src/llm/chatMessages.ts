import type { GenerationRequest } from './types.js';

export type ChatMessage = {
  role: 'system' | 'user' | 'assistant';
  content: string;
};

/** System prompt first, then history oldest first, then the new user message. */
export function toChatMessages(request: GenerationRequest): ChatMessage[] {
  return [
    { role: 'system', content: request.system },
    ...request.history.map((turn) => ({ role: turn.role, content: turn.text })),
    { role: 'user', content: request.message },
  ];
}
