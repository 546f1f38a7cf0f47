import { z } from 'zod';
import type { CompletionResult } from '../types';

const replySchema = z.object({
  reply: z.string(),
  style: z.string().optional(),
  emphasis_words: z.array(z.string()).optional().catch([]),
});

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Reads the `{reply, style, emphasis_words}` object the model is asked for.
 * Anything that is not such an object is taken as the reply itself.
 */
export function parseReply(raw: string): CompletionResult {
  const trimmed = raw.trim();
  const start = trimmed.indexOf('{');
  const end = trimmed.lastIndexOf('}');

  if (start !== -1 && end > start) {
    const parsed = replySchema.safeParse(tryParseJson(trimmed.slice(start, end + 1)));
    if (parsed.success) {
      return { text: parsed.data.reply.trim(), emphasisWords: parsed.data.emphasis_words ?? [] };
    }
  }

  return { text: trimmed, emphasisWords: [] };
}
