import { readFileSync } from 'node:fs';
import { z } from 'zod';

import { displayName } from './alice.js';

const REPLY_TABLE_SCHEMA = z.object({
  rules: z.array(
    z.object({
      id: z.string().min(1),
      keywords: z.array(z.string().min(1)).min(1),
      replies: z.array(z.string().min(1)).min(1),
    }),
  ),
  defaultReplies: z.array(z.string().min(1)).min(1),
});

export type ReplyTable = z.infer<typeof REPLY_TABLE_SCHEMA>;

export type FallbackReply = {
  text: string;
  /** Id of the matched rule, or `default`. */
  ruleId: string;
};

export const DEFAULT_REPLY_TABLE_URL = new URL('../../config/fallbackReplies.json', import.meta.url);

export function parseReplyTable(raw: unknown): ReplyTable {
  const parsed = REPLY_TABLE_SCHEMA.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid fallback reply table: ${details}`);
  }
  return parsed.data;
}

export function loadReplyTable(source: URL | string = DEFAULT_REPLY_TABLE_URL): ReplyTable {
  return parseReplyTable(JSON.parse(readFileSync(source, 'utf8')));
}

type FallbackResponderOptions = {
  table?: ReplyTable;
  /** Returns a number in [0, 1). */
  random?: () => number;
};

/**
 * Keyword-matched templated replies used when no LLM answer is available.
 * Rules are tried in order; the first rule with a keyword contained in the
 * lowercased message, punctuation read as spaces, wins.
 */
export class FallbackResponder {
  private readonly table: ReplyTable;
  private readonly random: () => number;

  constructor(options: FallbackResponderOptions = {}) {
    this.table = options.table ?? loadReplyTable();
    this.random = options.random ?? Math.random;
  }

  respond(message: string, userName?: string): FallbackReply {
    // Punctuation counts as a word break so " hi " matches "hi!" and "hi,".
    const words = message
      .toLowerCase()
      .replace(/[^\p{L}\p{N}]+/gu, ' ')
      .trim();
    const lowered = ` ${words} `;
    const rule = this.table.rules.find((candidate) =>
      candidate.keywords.some((keyword) => lowered.includes(keyword.toLowerCase())),
    );

    const templates = rule?.replies ?? this.table.defaultReplies;
    const index = Math.min(templates.length - 1, Math.floor(this.random() * templates.length));
    const template = templates[Math.max(0, index)] ?? this.table.defaultReplies[0];

    return {
      text: template.replaceAll('{name}', displayName(userName)),
      ruleId: rule?.id ?? 'default',
    };
  }
}
