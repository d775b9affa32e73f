import path from 'node:path';
import { z } from 'zod';

import { normalizeLogLevel } from '../utils/runtimeLogger.js';

export const LLM_PROVIDERS = ['ollama', 'openai', 'anthropic', 'none'] as const;
export const IMAGE_PROVIDERS = ['stable_diffusion', 'openai'] as const;
export const STORAGE_TYPES = ['memory', 'file', 'redis'] as const;

export type LlmProvider = (typeof LLM_PROVIDERS)[number];
export type ImageProvider = (typeof IMAGE_PROVIDERS)[number];
export type StorageType = (typeof STORAGE_TYPES)[number];

export class ConfigError extends Error {
  readonly kind = 'ConfigInvalid';

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const positiveInt = z.number().int().positive();

const BOT_CONFIG_SCHEMA = z.object({
  telegram: z.object({
    botToken: z.string().min(1),
    webhookUrl: z.string().url().optional(),
    webhookHost: z.string().min(1),
    webhookPort: positiveInt.max(65535),
    maxConnections: positiveInt,
  }),
  llm: z.object({
    provider: z.enum(LLM_PROVIDERS),
    model: z.string().min(1),
    temperature: z.number(),
    maxTokens: z.number().int(),
    autoSelect: z.boolean(),
    maxHistory: positiveInt,
    timeoutMs: positiveInt,
    ollamaBaseUrl: z.string().url(),
    openaiApiKey: z.string().optional(),
    openaiBaseUrl: z.string().url().optional(),
    anthropicApiKey: z.string().optional(),
    anthropicBaseUrl: z.string().url(),
  }),
  image: z.object({
    enabled: z.boolean(),
    provider: z.enum(IMAGE_PROVIDERS),
    model: z.string().min(1),
    outputDir: z.string().min(1),
    safetyCheck: z.boolean(),
    stableDiffusionUrl: z.string().url(),
    timeoutMs: positiveInt,
  }),
  storage: z.object({
    type: z.enum(STORAGE_TYPES),
    dataDir: z.string().min(1),
    maxConversations: positiveInt,
    maxAgeDays: z.number().int().nonnegative(),
    cleanupIntervalMinutes: positiveInt,
  }),
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']),
    logDir: z.string().min(1),
  }),
  debug: z.boolean(),
  rateLimit: z.number().int().nonnegative(),
});

export type BotConfig = z.infer<typeof BOT_CONFIG_SCHEMA>;

const readString = (env: NodeJS.ProcessEnv, key: string): string | undefined => {
  const value = env[key]?.trim();
  return value ? value : undefined;
};

const readBoolean = (env: NodeJS.ProcessEnv, key: string, defaultValue: boolean): boolean => {
  const value = readString(env, key)?.toLowerCase();
  if (value === undefined) return defaultValue;
  if (value === '1' || value === 'true' || value === 'yes' || value === 'on') return true;
  if (value === '0' || value === 'false' || value === 'no' || value === 'off') return false;
  throw new ConfigError(`${key} must be a boolean (true/false), got "${env[key]}"`);
};

const readNumber = (env: NodeJS.ProcessEnv, key: string, defaultValue: number): number => {
  const value = readString(env, key);
  if (value === undefined) return defaultValue;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigError(`${key} must be a number, got "${value}"`);
  }
  return parsed;
};

const readInteger = (env: NodeJS.ProcessEnv, key: string, defaultValue: number): number => {
  const parsed = readNumber(env, key, defaultValue);
  if (!Number.isInteger(parsed)) {
    throw new ConfigError(`${key} must be an integer, got "${env[key]}"`);
  }
  return parsed;
};

const deepFreeze = <T>(value: T): T => {
  if (value && typeof value === 'object') {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
};

/**
 * Builds the process-wide configuration from environment variables.
 *
 * The returned value is frozen. Components receive it (or the slice they need)
 * at construction time and never consult `process.env` themselves.
 */
export function loadBotConfig(env: NodeJS.ProcessEnv = process.env): BotConfig {
  const botToken = readString(env, 'BOT_TOKEN');
  if (!botToken) {
    throw new ConfigError('Missing BOT_TOKEN in environment');
  }

  const debug = readBoolean(env, 'DEBUG', false);
  const rawLevel = readString(env, 'LOG_LEVEL');
  const level = normalizeLogLevel(rawLevel);
  if (rawLevel && !level) {
    throw new ConfigError(`LOG_LEVEL must be one of debug, info, warn, error; got "${rawLevel}"`);
  }

  const dataDir = readString(env, 'DATA_DIR') ?? 'data';

  const candidate = {
    telegram: {
      botToken,
      webhookUrl: readString(env, 'WEBHOOK_URL'),
      webhookHost: readString(env, 'WEBHOOK_HOST') ?? '0.0.0.0',
      webhookPort: readInteger(env, 'WEBHOOK_PORT', 8080),
      maxConnections: readInteger(env, 'MAX_CONNECTIONS', 40),
    },
    llm: {
      provider: (readString(env, 'LLM_PROVIDER') ?? 'ollama').toLowerCase(),
      model: readString(env, 'LLM_MODEL') ?? 'auto',
      temperature: readNumber(env, 'LLM_TEMPERATURE', 0.7),
      maxTokens: readInteger(env, 'LLM_MAX_TOKENS', 200),
      autoSelect: readBoolean(env, 'LLM_AUTO_SELECT', true),
      maxHistory: readInteger(env, 'MAX_HISTORY', 10),
      timeoutMs: readInteger(env, 'LLM_TIMEOUT_MS', 60_000),
      ollamaBaseUrl: readString(env, 'OLLAMA_BASE_URL') ?? 'http://127.0.0.1:11434',
      openaiApiKey: readString(env, 'OPENAI_API_KEY'),
      openaiBaseUrl: readString(env, 'OPENAI_BASE_URL'),
      anthropicApiKey: readString(env, 'ANTHROPIC_API_KEY'),
      anthropicBaseUrl: readString(env, 'ANTHROPIC_BASE_URL') ?? 'https://api.anthropic.com',
    },
    image: {
      enabled: readBoolean(env, 'IMAGE_GENERATION', false),
      provider: (readString(env, 'IMAGE_PROVIDER') ?? 'stable_diffusion').toLowerCase(),
      model: readString(env, 'IMAGE_MODEL') ?? 'runwayml/stable-diffusion-v1-5',
      outputDir: readString(env, 'IMAGE_OUTPUT_DIR') ?? path.join('data', 'generated_images'),
      safetyCheck: readBoolean(env, 'IMAGE_SAFETY_CHECK', true),
      stableDiffusionUrl: readString(env, 'STABLE_DIFFUSION_URL') ?? 'http://127.0.0.1:7860',
      timeoutMs: readInteger(env, 'IMAGE_TIMEOUT_MS', 300_000),
    },
    storage: {
      type: (readString(env, 'STORAGE_TYPE') ?? 'memory').toLowerCase(),
      dataDir,
      maxConversations: readInteger(env, 'MAX_CONVERSATIONS', 1000),
      maxAgeDays: readInteger(env, 'CONVERSATION_MAX_AGE_DAYS', 7),
      cleanupIntervalMinutes: readInteger(env, 'CONVERSATION_CLEANUP_INTERVAL_MINUTES', 60),
    },
    logging: {
      level: debug ? 'debug' : (level ?? 'info'),
      logDir: readString(env, 'LOG_DIR') ?? path.join(dataDir, 'logs'),
    },
    debug,
    rateLimit: readInteger(env, 'RATE_LIMIT', 60),
  };

  const res = BOT_CONFIG_SCHEMA.safeParse(candidate);
  if (!res.success) {
    const details = res.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid bot configuration: ${details}`);
  }

  return deepFreeze(res.data);
}
