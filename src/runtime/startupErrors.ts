import path from 'node:path';

type StartupMode = 'polling' | 'webhook' | 'unknown';

type StartupErrorContext = {
  mode: StartupMode;
  dataDir: string;
  logDir: string;
};

const normalizeMessage = (err: unknown): string => {
  if (err instanceof Error) return err.message;
  return String(err);
};

const uniqueSteps = (steps: string[]): string[] => {
  return Array.from(new Set(steps));
};

export const buildNextSteps = (message: string): string[] => {
  const steps: string[] = [];
  const lower = message.toLowerCase();

  if (lower.includes('bot_token')) {
    steps.push('Set BOT_TOKEN in your environment or .env file.');
  }
  if (lower.includes('llm.provider') || lower.includes('llm_provider')) {
    steps.push('Set LLM_PROVIDER to one of ollama, openai, anthropic, none.');
  }
  if (lower.includes('storage.type') || lower.includes('storage_type')) {
    steps.push('Set STORAGE_TYPE to one of memory, file, redis.');
  }
  if (lower.includes('webhook')) {
    steps.push('Check WEBHOOK_URL, WEBHOOK_HOST and WEBHOOK_PORT, or unset WEBHOOK_URL to use long polling.');
  }
  if (lower.includes('401') || lower.includes('unauthorized')) {
    steps.push('Telegram rejected the token; create a fresh one with @BotFather.');
  }

  steps.push('Compare your .env with .env.example.');
  return uniqueSteps(steps);
};

export function reportStartupError(err: unknown, context: StartupErrorContext): void {
  const message = normalizeMessage(err);

  console.error(`alice bot (${context.mode}) failed to start.`);
  console.error(`Reason: ${message}`);
  console.error('Relevant paths:');
  console.error(`- DATA_DIR: ${context.dataDir}`);
  console.error(`- Logs (runtime): ${path.join(context.logDir, 'runtime.jsonl')}`);
  console.error(`- Logs (events): ${path.join(context.logDir, 'events.jsonl')}`);
  console.error('Next steps:');
  for (const step of buildNextSteps(message)) {
    console.error(`- ${step}`);
  }
}
