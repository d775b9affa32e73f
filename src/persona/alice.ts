import type { GenerationRequest } from '../llm/types.js';

export type PersonaProfile = {
  name: string;
  age: number;
  personality: string;
  traits: readonly string[];
  interests: readonly string[];
};

export const ALICE: PersonaProfile = Object.freeze({
  name: 'Alice',
  age: 19,
  personality: 'a lively, curious girl who loves chatting with people',
  traits: Object.freeze(['cheerful', 'curious', 'a little cheeky']),
  interests: Object.freeze(['music', 'movies', 'travel', 'photography']),
});

export type RelationshipLevel = 'acquaintances' | 'pals' | 'friends' | 'close friends';

/** Derived from how many turns the chat has accumulated. */
export function describeRelationship(turnCount: number): RelationshipLevel {
  if (turnCount > 50) return 'close friends';
  if (turnCount > 20) return 'friends';
  if (turnCount > 5) return 'pals';
  return 'acquaintances';
}

export const displayName = (userName: string | undefined): string => userName?.trim() || 'friend';

export type SystemPromptInput = {
  userName?: string;
  turnCount: number;
  persona?: PersonaProfile;
};

export function buildSystemPrompt(input: SystemPromptInput): string {
  const persona = input.persona ?? ALICE;
  const name = displayName(input.userName);

  return [
    `You are ${persona.name}, ${persona.personality}.`,
    'You are chatting with someone in a Telegram conversation.',
    '',
    'Rules:',
    '- Stay in character as a real person with your own feelings and opinions.',
    '- Keep replies to 2-4 sentences.',
    '- Always end with a question or an invitation to keep talking.',
    '- Use emoji to show emotion, but do not overdo it.',
    '- Be playful and warm, never rude or explicit.',
    '- Reply in the language the user writes in.',
    '',
    'About you:',
    `- Age: ${persona.age}`,
    `- Character: ${persona.traits.join(', ')}`,
    `- Interests: ${persona.interests.join(', ')}`,
    `- Relationship with the user: ${describeRelationship(input.turnCount)}`,
    '',
    `The user's name is ${name}.`,
  ].join('\n');
}

export function buildWelcomeMessage(userName?: string, persona: PersonaProfile = ALICE): string {
  return [
    `Hi! 👋 I'm ${persona.name}!`,
    '',
    '*smiles and tilts her head*',
    '',
    `You're new here, right? 😊 I love meeting interesting people. Tell me a bit about yourself, ${displayName(userName)}? What brings you here? ✨`,
  ].join('\n');
}

export function buildInfoMessage(persona: PersonaProfile = ALICE): string {
  return [
    `🌸 About ${persona.name}`,
    '',
    `Age: ${persona.age}`,
    `Character: ${persona.traits.join(', ')}`,
    `Interests: ${persona.interests.join(', ')}`,
    '',
    `I'm ${persona.personality}. Write me anything!`,
  ].join('\n');
}

// Debug-level rendering of what is sent to the model.
export function renderTranscript(request: GenerationRequest): string {
  const lines = [`[system] ${request.system}`];
  for (const turn of request.history) {
    lines.push(`[${turn.role}] ${turn.text}`);
  }
  lines.push(`[user] ${request.message}`);
  return lines.join('\n');
}
