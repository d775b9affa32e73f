import { appendFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';

export type EventLogRecord = {
  ts: string;
  type:
    | 'telegram.update'
    | 'chat.reply'
    | 'chat.fallback'
    | 'chat.error'
    | 'command'
    | 'image.generate'
    | 'rate.limited'
    | 'bot.error';
  data: Record<string, unknown>;
};

export async function appendJsonl(path: string, record: EventLogRecord) {
  await mkdir(dirname(path), { recursive: true });
  await appendFile(path, JSON.stringify(record) + '\n', 'utf8');
}
