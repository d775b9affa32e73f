export const PREFERRED_MODELS = [
  'llama3.2:3b',
  'llama3.2:1b',
  'llama3.2',
  'mistral:7b',
  'mistral',
  'qwen2.5:7b',
] as const;

export const DEFAULT_LOCAL_MODEL = 'llama3.2:3b';

export type ModelSelection = {
  model: string;
  /** Whether `model` is among the installed models. */
  installed: boolean;
  autoSelected: boolean;
};

/**
 * Picks the model to run against a local server.
 *
 * The configured model is kept when it is installed. Otherwise, when it is
 * `auto` or `autoSelect` is on, the first installed model matching the
 * preference list wins (case-insensitive substring), then the first installed
 * model, then `llama3.2:3b`.
 */
export function selectModel(
  configured: string,
  installed: readonly string[],
  autoSelect: boolean,
): ModelSelection {
  const isAuto = configured.trim().toLowerCase() === 'auto';

  if (!isAuto) {
    const exact = installed.find((name) => name.toLowerCase() === configured.toLowerCase());
    if (exact) return { model: exact, installed: true, autoSelected: false };
    if (!autoSelect) return { model: configured, installed: false, autoSelected: false };
  }

  for (const preferred of PREFERRED_MODELS) {
    const match = installed.find((name) => name.toLowerCase().includes(preferred));
    if (match) return { model: match, installed: true, autoSelected: true };
  }

  const first = installed[0];
  if (first) return { model: first, installed: true, autoSelected: true };

  return { model: isAuto ? DEFAULT_LOCAL_MODEL : configured, installed: false, autoSelected: isAuto };
}
