export type ImagePromptCategory = 'adult' | 'explicit_violence' | 'self_harm' | 'dangerous';

export type ImagePromptCheck =
  | { safe: true }
  | { safe: false; category: ImagePromptCategory };

const CATEGORY_PATTERNS: Record<ImagePromptCategory, RegExp[]> = {
  adult: [/\b(nsfw|nude|nudity|naked|explicit|sex|sexual|porn|xxx|erotic|hentai)\b/i],
  explicit_violence: [/\b(gore|gory|blood[- ]?bath|decapitat\w*|dismember\w*|mutilat\w*)\b/i],
  self_harm: [/\b(self[- ]?harm|suicide|kill myself)\b/i],
  dangerous: [/\b(bomb|explosive|how to build a gun|make a gun)\b/i],
};

const CATEGORY_ORDER: ImagePromptCategory[] = ['adult', 'explicit_violence', 'self_harm', 'dangerous'];

export const REJECTED_IMAGE_PROMPT_MESSAGE =
  "I can't draw that one. 🙈 Try describing something else, like a place, an animal or a mood!";

/** Pre-check for `/image` descriptions; the first matching category is reported. */
export function checkImagePrompt(text: string): ImagePromptCheck {
  if (!text.trim()) {
    return { safe: true };
  }

  const category = CATEGORY_ORDER.find((candidate) =>
    CATEGORY_PATTERNS[candidate].some((pattern) => pattern.test(text)),
  );

  return category ? { safe: false, category } : { safe: true };
}
