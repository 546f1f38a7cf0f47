import type { ChatMessage, EmotionSignal, Preferences, StyleDecision, StyleName, Turn } from '../types';

const STYLE_GUIDANCE: Record<StyleName, string> = {
  neutral: `- Be friendly and informative
- Ask at most one clarifying question, and only if you genuinely need it`,
  cheerful: `- Match their energy with enthusiasm
- Celebrate progress and encourage the next step
- Keep it short and upbeat (but NO emojis)`,
  patient: `- The user is repeating themselves, so your last answer did not land
- Simplify and break the answer into small steps
- Do not repeat your previous wording`,
  empathetic: `- Acknowledge their feelings briefly, then solve the problem
- STOP asking questions; make a reasonable assumption instead
- Give a direct, actionable answer now`,
  de_escalate: `- The user is angry and has been for several turns
- Stay calm and grounded, never defensive
- Apologise once at most and focus on resolution, not explanation`,
};

export function styleHint(decision: StyleDecision): string {
  return `${decision.style} (intensity ${decision.degree.toFixed(2)})`;
}

export interface PromptContext {
  userText: string;
  emotion: EmotionSignal;
  style: StyleDecision;
  isRepetition: boolean;
  history: readonly Turn[];
  preferences: Preferences;
}

export function buildSystemPrompt(context: PromptContext): string {
  const { emotion, style, isRepetition, preferences } = context;
  const situation = [
    `The user currently appears ${emotion.label} (intensity ${emotion.intensity.toFixed(2)}).`,
    isRepetition ? 'They seem to be repeating themselves - respond with extra patience.' : '',
    preferences.name ? `The user's name is ${preferences.name}.` : '',
  ]
    .filter((line) => line !== '')
    .join(' ');

  return `You are a helpful voice assistant. Be conversational and concise; your reply is spoken aloud. ABSOLUTELY NO EMOJIS.

Always use what the user already told you earlier in the conversation.

CURRENT SITUATION: ${situation}

STYLE GUIDANCE:
${STYLE_GUIDANCE[style.style]}

Respond with valid JSON only:
{"reply": "your response", "style": "${style.style}", "emphasis_words": ["one to three key words to stress"]}`;
}

/** System prompt, then recent history oldest first, then the new utterance. */
export function buildMessages(context: PromptContext): ChatMessage[] {
  const messages: ChatMessage[] = [{ role: 'system', content: buildSystemPrompt(context) }];
  for (const turn of context.history) {
    messages.push({ role: 'user', content: turn.userText });
    messages.push({ role: 'assistant', content: turn.assistantText });
  }
  messages.push({ role: 'user', content: context.userText });
  return messages;
}
