import type { EmotionSignal, StyleDecision, Turn } from '../types';
import { clampIntensity, isNegativeEmotion } from './emotionClassifier';

export const MODERATE_INTENSITY = 0.4;
export const MAX_STYLE_DEGREE = 2;
export const NEUTRAL_STYLE: StyleDecision = { style: 'neutral', degree: 1.0 };

export interface StyleInput {
  emotion: EmotionSignal;
  isRepetition: boolean;
  escalationCount: number;
}

export interface StyleSelectorOptions {
  escalationThreshold: number;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Number of consecutive most recent turns, the current one included,
 * that carried a negative emotion.
 */
export function countEscalation(history: readonly Turn[], current: EmotionSignal): number {
  if (!isNegativeEmotion(current.label)) return 0;
  let count = 1;
  for (let i = history.length - 1; i >= 0; i--) {
    if (!isNegativeEmotion(history[i].emotion.label)) break;
    count++;
  }
  return count;
}

/**
 * Rules are evaluated in order and the first match wins:
 * de_escalate, empathetic, patient, cheerful, then neutral.
 */
export class StyleSelector {
  private readonly escalationThreshold: number;

  constructor(options: StyleSelectorOptions) {
    this.escalationThreshold = options.escalationThreshold;
  }

  select({ emotion, isRepetition, escalationCount }: StyleInput): StyleDecision {
    const intensity = clampIntensity(emotion.intensity);

    if (
      escalationCount >= this.escalationThreshold &&
      (emotion.label === 'angry' || emotion.label === 'frustrated')
    ) {
      return { style: 'de_escalate', degree: round2(Math.min(MAX_STYLE_DEGREE, 1 + 0.25 * escalationCount)) };
    }

    if ((emotion.label === 'frustrated' || emotion.label === 'sad') && intensity >= MODERATE_INTENSITY) {
      return { style: 'empathetic', degree: round2(MAX_STYLE_DEGREE * intensity) };
    }

    if (isRepetition) {
      return { style: 'patient', degree: 1.2 };
    }

    if (emotion.label === 'happy' && intensity >= MODERATE_INTENSITY) {
      return { style: 'cheerful', degree: round2(MAX_STYLE_DEGREE * intensity) };
    }

    return { ...NEUTRAL_STYLE };
  }
}
