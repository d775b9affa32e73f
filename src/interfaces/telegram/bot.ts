import path from 'node:path';
import { Bot, InputFile } from 'grammy';

import type { ChatService } from '../../chat/chatService.js';
import type { ImageService } from '../../images/imageService.js';
import type { RateLimiter } from '../../policies/rateLimiter.js';
import { appendJsonl, type EventLogRecord } from '../../utils/logging.js';
import { createRuntimeLogger, serializeError, type RuntimeLogger } from '../../utils/runtimeLogger.js';
import { BOT_COMMANDS, runCommand, type CommandOutcome } from './commands.js';

export type TelegramContext = {
  chat: { id: number; type: string };
  message: {
    text?: string;
    message_id: number;
  };
  from?: { id?: number | string; first_name?: string; username?: string };
  reply: (text: string) => Promise<unknown>;
  replyWithPhoto: (photo: InputFile, other?: { caption?: string }) => Promise<unknown>;
  replyWithChatAction: (action: 'typing' | 'upload_photo') => Promise<unknown>;
};

type TelegramMessageEvent = 'message:text';

type TelegramStartOptions = {
  drop_pending_updates?: boolean;
  onStart?: (botInfo: { username: string }) => void;
};

export type TelegramBotLike = {
  on: (event: TelegramMessageEvent, handler: (ctx: TelegramContext) => Promise<void> | void) => void;
  catch: (handler: (err: unknown) => Promise<void> | void) => void;
  start: (options?: TelegramStartOptions) => Promise<void>;
  stop: () => Promise<void>;
  api: {
    setMyCommands: (commands: Array<{ command: string; description: string }>) => Promise<unknown>;
    setWebhook: (
      url: string,
      other?: { max_connections?: number; drop_pending_updates?: boolean },
    ) => Promise<unknown>;
    getMe: () => Promise<{ username: string }>;
  };
};

type TelegramAdapterDeps = {
  appendJsonl: typeof appendJsonl;
};

export type TelegramAdapterOptions = {
  token: string;
  chat: ChatService;
  images: ImageService | null;
  rateLimiter: RateLimiter;
  logDir: string;
  logger?: RuntimeLogger;
  bot?: TelegramBotLike;
  now?: () => Date;
  deps?: Partial<TelegramAdapterDeps>;
};

export type TelegramAdapter = {
  bot: TelegramBotLike;
  registerCommands: () => Promise<void>;
  startPolling: (onStart?: (username: string) => void) => Promise<void>;
  setWebhook: (url: string, maxConnections: number) => Promise<void>;
  stop: () => Promise<void>;
};

export const MAX_MESSAGE_LENGTH = 4096;
export const GENERIC_ERROR_REPLY = 'Oops! 🙈 Something went wrong on my side. Could you try again?';
export const MESSAGE_TOO_LONG_REPLY = `That message is a bit too long for me. 😅 Could you keep it under ${MAX_MESSAGE_LENGTH} characters?`;

export const buildRateLimitedReply = (retryAfterSeconds: number) =>
  `Whoa, slow down a little! 😅 Try again in ${retryAfterSeconds} s.`;

type TelegramSlashCommand = {
  commandName: string;
  addressedBotUsername?: string;
  args: string;
};

export function parseTelegramSlashCommand(text: string): TelegramSlashCommand | null {
  const match = text.match(/^\/([a-zA-Z0-9_]+)(?:@([a-zA-Z0-9_]+))?(?:\s+([\s\S]+))?$/i);
  if (!match) return null;

  return {
    commandName: match[1].toLowerCase(),
    addressedBotUsername: match[2],
    args: match[3]?.trim() ?? '',
  };
}

// Control characters other than tab and newline are dropped; CRLF becomes LF.
export function normalizeIncomingText(text: string): string {
  return text
    .replace(/\r\n?/g, '\n')
    .replace(/[\u0000-\u0008\u000b-\u001f\u007f]/g, '')
    .trim();
}

export function createTelegramAdapter(options: TelegramAdapterOptions): TelegramAdapter {
  const {
    token,
    chat,
    images,
    rateLimiter,
    logDir,
    bot: providedBot,
    now = () => new Date(),
    deps = {},
  } = options;

  if (!token) {
    throw new Error('Missing BOT_TOKEN in environment');
  }

  const { appendJsonl: appendJsonlImpl } = { appendJsonl, ...deps };

  const logPath = path.join(logDir, 'events.jsonl');
  const runtimeLogger =
    options.logger ??
    createRuntimeLogger({
      logDir,
      component: 'telegram.bot',
    });
  const bot = providedBot ?? (new Bot(token) as unknown as TelegramBotLike);
  let botUsername: string | undefined;

  runtimeLogger.info('adapter initialized', {
    llmProvider: chat.llmProvider,
    imageGeneration: images !== null,
    rateLimit: rateLimiter.enabled,
  });

  // A failed event-log write must not cost the user their reply.
  const writeLog = async (record: EventLogRecord) => {
    try {
      await appendJsonlImpl(logPath, record);
    } catch (err) {
      runtimeLogger.warn('event log append failed', { type: record.type, error: serializeError(err) });
    }

    if (record.type === 'chat.error' || record.type === 'bot.error') {
      runtimeLogger.error(record.type, record.data);
      return;
    }

    if (record.type === 'chat.fallback' || record.type === 'rate.limited') {
      runtimeLogger.warn(record.type, record.data);
      return;
    }

    if (record.type === 'image.generate' && record.data.ok === false) {
      runtimeLogger.warn('image.generate.failed', record.data);
    }
  };

  const sendChatAction = async (ctx: TelegramContext, action: 'typing' | 'upload_photo') => {
    try {
      await ctx.replyWithChatAction(action);
    } catch (err) {
      runtimeLogger.debug('chat action failed', { chatId: ctx.chat.id, error: serializeError(err) });
    }
  };

  const deliverCommandOutcome = async (ctx: TelegramContext, outcome: CommandOutcome) => {
    if (outcome.kind === 'text') {
      await ctx.reply(outcome.text);
      return;
    }

    await sendChatAction(ctx, 'upload_photo');
    await ctx.replyWithPhoto(new InputFile(outcome.image.bytes, outcome.image.fileName), {
      caption: outcome.caption,
    });
  };

  const handleCommand = async (
    ctx: TelegramContext,
    chatId: string,
    userName: string | undefined,
    command: TelegramSlashCommand,
  ) => {
    const outcome = await runCommand(
      command.commandName,
      {
        chatId,
        userName,
        args: command.args,
        sendProgress: async (text) => {
          await ctx.reply(text);
        },
      },
      { chat, images },
    );

    await writeLog({
      ts: now().toISOString(),
      type: 'command',
      data: { chatId, command: command.commandName, outcome: outcome.kind },
    });

    if (outcome.kind === 'text' && outcome.imageError) {
      await writeLog({
        ts: now().toISOString(),
        type: 'image.generate',
        data: { chatId, ok: false, ...outcome.imageError },
      });
    }

    if (outcome.kind === 'photo') {
      await writeLog({
        ts: now().toISOString(),
        type: 'image.generate',
        data: {
          chatId,
          ok: true,
          fileName: outcome.image.fileName,
          model: outcome.image.model,
          durationMs: outcome.image.durationMs,
        },
      });
    }

    await deliverCommandOutcome(ctx, outcome);
  };

  const handleChat = async (ctx: TelegramContext, chatId: string, userName: string | undefined, text: string) => {
    await sendChatAction(ctx, 'typing');

    const reply = await chat.reply({ chatId, text, userName });

    await writeLog({
      ts: now().toISOString(),
      type: reply.source === 'llm' ? 'chat.reply' : 'chat.fallback',
      data: {
        chatId,
        source: reply.source,
        historyLength: reply.historyLength,
        ...(reply.llmError ? { llmError: reply.llmError } : {}),
      },
    });

    await ctx.reply(reply.text);
  };

  bot.on('message:text', async (ctx) => {
    const rawText = ctx.message.text;
    if (!rawText?.trim()) return;

    const chatId = String(ctx.chat.id);
    const userId = String(ctx.from?.id ?? 'unknown');
    const userName = ctx.from?.first_name;

    await writeLog({
      ts: now().toISOString(),
      type: 'telegram.update',
      data: {
        chatId,
        userId,
        messageId: ctx.message.message_id,
        length: rawText.length,
      },
    });

    const limit = rateLimiter.consume(chatId);
    if (!limit.allowed) {
      const retryAfterSeconds = Math.max(1, Math.ceil((limit.resetAt.getTime() - now().getTime()) / 1000));
      await writeLog({
        ts: now().toISOString(),
        type: 'rate.limited',
        data: { chatId, userId, retryAfterSeconds },
      });
      await ctx.reply(buildRateLimitedReply(retryAfterSeconds));
      return;
    }

    if (rawText.length > MAX_MESSAGE_LENGTH) {
      await ctx.reply(MESSAGE_TOO_LONG_REPLY);
      return;
    }

    const text = normalizeIncomingText(rawText);
    if (!text) return;

    try {
      const command = parseTelegramSlashCommand(text);
      if (command) {
        // Commands addressed to another bot in a group are not ours.
        if (
          command.addressedBotUsername &&
          botUsername &&
          command.addressedBotUsername.toLowerCase() !== botUsername.toLowerCase()
        ) {
          return;
        }
        await handleCommand(ctx, chatId, userName, command);
        return;
      }

      await handleChat(ctx, chatId, userName, text);
    } catch (err) {
      await ctx.reply(GENERIC_ERROR_REPLY);

      await writeLog({
        ts: now().toISOString(),
        type: 'chat.error',
        data: {
          chatId,
          userId,
          error: serializeError(err),
        },
      });
    }
  });

  bot.catch(async (err) => {
    const e = err as { error?: { message?: string } | string };
    await writeLog({
      ts: now().toISOString(),
      type: 'bot.error',
      data: {
        error: {
          message: e?.error && typeof e.error === 'object' ? e.error.message : String(e?.error ?? err),
        },
      },
    });
  });

  return {
    bot,
    registerCommands: async () => {
      await bot.api.setMyCommands(
        BOT_COMMANDS.map((entry) => ({ command: entry.command, description: entry.description })),
      );
    },
    startPolling: async (onStart) => {
      await bot.start({
        drop_pending_updates: true,
        onStart: (botInfo) => {
          botUsername = botInfo.username;
          runtimeLogger.info('polling started', { username: botInfo.username });
          onStart?.(botInfo.username);
        },
      });
    },
    setWebhook: async (url, maxConnections) => {
      botUsername = (await bot.api.getMe()).username;
      await bot.api.setWebhook(url, { max_connections: maxConnections, drop_pending_updates: true });
      runtimeLogger.info('webhook registered', { url, maxConnections });
    },
    stop: () => bot.stop(),
  };
}
