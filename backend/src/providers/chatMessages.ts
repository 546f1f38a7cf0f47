import type { ChatMessage, CompletionRequest } from '../types';

/** Request messages with the style hint folded into the system prompt. */
export function withStyleHint(request: CompletionRequest): ChatMessage[] {
  const hint = request.styleHint.trim();
  if (hint === '') return request.messages;

  const line = `RESPONSE STYLE: ${hint}`;
  const [first, ...rest] = request.messages;
  if (first?.role === 'system') {
    return [{ role: 'system', content: `${first.content}\n\n${line}` }, ...rest];
  }
  return [{ role: 'system', content: line }, ...request.messages];
}
