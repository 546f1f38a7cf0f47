import lexiconData from '../data/lexicon.json';
import type { Logger } from '../logger';
import type { EmotionSignal, EmotionType, Turn } from '../types';

export interface Lexicon {
  emotions: Partial<Record<EmotionType, Record<string, number>>>;
  carryOverWords: string[];
  negations: string[];
  superlatives: string[];
  emphasisKeywords: string[];
}

export const DEFAULT_LEXICON: Lexicon = lexiconData;

export interface EmotionAnalyzer {
  classify(text: string, history?: readonly Turn[]): EmotionSignal;
}

export const NEUTRAL_SIGNAL: EmotionSignal = { label: 'neutral', intensity: 0 };

const NEGATIVE_EMOTIONS: ReadonlySet<EmotionType> = new Set(['angry', 'frustrated', 'sad']);

// Tie-break order when two labels score the same.
const LABEL_PRIORITY: readonly EmotionType[] = ['angry', 'frustrated', 'sad', 'confused', 'happy'];

export function isNegativeEmotion(label: EmotionType): boolean {
  return NEGATIVE_EMOTIONS.has(label);
}

export function clampIntensity(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/[‘’]/g, "'")
    .match(/[a-z0-9']+/g) ?? [];
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Keyword-lexicon emotion classifier. Scores every label by summed keyword
 * weight, then derives intensity from the score, exclamation marks and
 * shouted words.
 */
export class EmotionClassifier implements EmotionAnalyzer {
  private readonly lexicon: Lexicon;
  private readonly logger?: Logger;

  constructor(lexicon: Lexicon = DEFAULT_LEXICON, logger?: Logger) {
    this.lexicon = lexicon;
    this.logger = logger;
  }

  classify(text: string, history: readonly Turn[] = []): EmotionSignal {
    try {
      return this.score(text, history);
    } catch (error) {
      this.logger?.warn({ error }, 'Emotion classification failed, using neutral');
      return NEUTRAL_SIGNAL;
    }
  }

  private score(text: string, history: readonly Turn[]): EmotionSignal {
    const tokens = tokenize(text);
    if (tokens.length === 0) return NEUTRAL_SIGNAL;

    const tokenSet = new Set(tokens);
    const padded = ` ${tokens.join(' ')} `;

    let best: EmotionType | null = null;
    let bestScore = 0;
    for (const label of LABEL_PRIORITY) {
      const keywords = this.lexicon.emotions[label] ?? {};
      let score = 0;
      for (const [keyword, weight] of Object.entries(keywords)) {
        const hit = keyword.includes(' ') ? padded.includes(` ${keyword} `) : tokenSet.has(keyword);
        if (hit) score += weight;
      }
      if (score > bestScore) {
        best = label;
        bestScore = score;
      }
    }

    if (best === null) {
      return this.carryOver(tokenSet, history);
    }

    const exclamations = Math.min(3, (text.match(/!/g) ?? []).length);
    const shouted = (text.match(/\b[A-Z]{3,}\b/g) ?? []).length >= 2 ? 0.15 : 0;
    const intensity = 0.3 + 0.2 * bestScore + 0.1 * exclamations + shouted;

    return { label: best, intensity: round2(clampIntensity(intensity)) };
  }

  // "again", "still", ... after a negative turn keeps the user frustrated.
  private carryOver(tokens: ReadonlySet<string>, history: readonly Turn[]): EmotionSignal {
    const previous = history[history.length - 1];
    if (!previous || !isNegativeEmotion(previous.emotion.label)) return NEUTRAL_SIGNAL;
    if (!this.lexicon.carryOverWords.some((word) => tokens.has(word))) return NEUTRAL_SIGNAL;

    return { label: 'frustrated', intensity: round2(clampIntensity(Math.max(0.5, previous.emotion.intensity))) };
  }
}
