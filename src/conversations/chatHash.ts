import { createHash } from 'node:crypto';

export function hashChatId(chatId: string): string {
  return createHash('sha256').update(chatId).digest('hex');
}
