import type { ChatService, ChatStats } from '../../chat/chatService.js';
import type { ImageService } from '../../images/imageService.js';
import type { GeneratedImage, ImageErrorKind } from '../../images/types.js';
import { buildInfoMessage, buildWelcomeMessage } from '../../persona/alice.js';
import { REJECTED_IMAGE_PROMPT_MESSAGE } from '../../policies/contentFilter.js';

export const MAX_IMAGE_DESCRIPTION_LENGTH = 500;
const MIN_IMAGE_DESCRIPTION_LENGTH = 3;

export const BOT_COMMANDS = [
  { command: 'start', description: 'Meet Alice' },
  { command: 'help', description: 'What I can do' },
  { command: 'info', description: 'About Alice' },
  { command: 'clear', description: 'Forget our conversation' },
  { command: 'stats', description: 'Bot statistics' },
  { command: 'image', description: 'Draw a picture: /image <description>' },
] as const;

export const IMAGE_DISABLED_REPLY = '🎨 Image generation is turned off right now.';
export const IMAGE_USAGE_REPLY = [
  'Usage: /image <description>',
  'Example: /image a cat reading a book by the window',
].join('\n');

export const buildImageCaption = (description: string, durationMs: number) =>
  `🎨 ${description}\n⏱️ ${(durationMs / 1000).toFixed(1)}s`;

export const IMAGE_PROGRESS_REPLY = '🎨 Drawing it now, this can take a minute...';
export const IMAGE_FAILED_REPLY = "Sorry, I couldn't draw that right now. 😔 Please try again later.";
export const CLEARED_REPLY = "🧹 Done! I've forgotten our conversation. Let's start fresh, what's on your mind?";
export const UNKNOWN_COMMAND_REPLY = "I don't know that command. 🤔 See /help for what I can do.";

export type CommandOutcome =
  | { kind: 'text'; text: string; imageError?: { kind: ImageErrorKind; message: string } }
  | { kind: 'photo'; image: GeneratedImage; caption: string };

export type CommandInput = {
  chatId: string;
  userName?: string;
  args: string;
  /** Sends an interim message while a slow command runs. */
  sendProgress: (text: string) => Promise<void>;
};

export type CommandServices = {
  chat: ChatService;
  images: ImageService | null;
};

type CommandHandler = (input: CommandInput, services: CommandServices) => Promise<CommandOutcome>;

const text = (value: string): CommandOutcome => ({ kind: 'text', text: value });

export function buildHelpMessage(options: { llmActive: boolean; imageGeneration: boolean }): string {
  const lines = [
    '🤖 Help',
    '',
    "Hi! I'm Alice, nice to have you here!",
    '',
    '📋 Commands:',
    '/start - Meet me',
    '/help - This help',
    '/info - About me',
    '/clear - Forget our conversation',
    '/stats - Bot statistics',
  ];
  if (options.imageGeneration) {
    lines.push('/image <description> - Draw a picture');
  }
  lines.push('', '💬 Just write to me and I will answer!', '');
  lines.push(options.llmActive ? '🧠 Smart replies are on' : '📝 Running on reply templates');
  if (options.imageGeneration) {
    lines.push('🎨 Image generation is available');
  }
  return lines.join('\n');
}

const LLM_STATUS_LABEL: Record<ChatStats['llm']['status'], string> = {
  available: '✅',
  unavailable: '❌ unavailable',
  disabled: '⏸ disabled',
  unknown: '❔ not checked yet',
};

export function formatStats(stats: ChatStats): string {
  const llmLine =
    stats.llm.provider === 'none'
      ? `🧠 LLM: ${LLM_STATUS_LABEL.disabled}`
      : `🧠 LLM: ${stats.llm.provider} / ${stats.llm.model} ${LLM_STATUS_LABEL[stats.llm.status]}`;

  return [
    '📊 Statistics',
    '',
    `💬 Active conversations: ${stats.conversations}`,
    `📅 Active today: ${stats.activeToday}`,
    `🗂 Messages in this chat: ${stats.chatTurns} of ${stats.maxHistory}`,
    `📚 Messages stored in total: ${stats.totalTurns}`,
    llmLine,
    `🎨 Image generation: ${stats.imageGeneration ? '✅ on' : '❌ off'}`,
  ].join('\n');
}

const handleImage: CommandHandler = async (input, services) => {
  if (!services.images) {
    return text(IMAGE_DISABLED_REPLY);
  }

  const description = input.args.trim();
  if (description.length < MIN_IMAGE_DESCRIPTION_LENGTH) {
    return text(IMAGE_USAGE_REPLY);
  }
  if (description.length > MAX_IMAGE_DESCRIPTION_LENGTH) {
    return text(
      `That description is too long (${description.length} characters). Please keep it under ${MAX_IMAGE_DESCRIPTION_LENGTH}.`,
    );
  }

  await input.sendProgress(IMAGE_PROGRESS_REPLY);
  const result = await services.images.generate(description);
  if (result.ok) {
    return { kind: 'photo', image: result.image, caption: buildImageCaption(description, result.image.durationMs) };
  }
  return {
    kind: 'text',
    text: result.kind === 'rejected_content' ? REJECTED_IMAGE_PROMPT_MESSAGE : IMAGE_FAILED_REPLY,
    imageError: { kind: result.kind, message: result.message },
  };
};

const COMMAND_HANDLERS: Record<string, CommandHandler> = {
  start: async (input) => text(buildWelcomeMessage(input.userName)),
  help: async (_input, services) =>
    text(
      buildHelpMessage({
        llmActive: services.chat.llmActive,
        imageGeneration: services.images !== null,
      }),
    ),
  info: async () => text(buildInfoMessage()),
  clear: async (input, services) => {
    await services.chat.clear(input.chatId);
    return text(CLEARED_REPLY);
  },
  stats: async (input, services) => text(formatStats(await services.chat.getStats(input.chatId))),
  image: handleImage,
};

export const isKnownCommand = (name: string): boolean => Object.hasOwn(COMMAND_HANDLERS, name);

export async function runCommand(
  name: string,
  input: CommandInput,
  services: CommandServices,
): Promise<CommandOutcome> {
  const handler = isKnownCommand(name) ? COMMAND_HANDLERS[name] : undefined;
  if (!handler) {
    return text(UNKNOWN_COMMAND_REPLY);
  }
  return handler(input, services);
}
