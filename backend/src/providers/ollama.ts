import { z } from 'zod';
import { ProviderError } from '../errors';
import type { CompletionRequest, CompletionResult, Provider } from '../types';
import { createHttpClient, type HttpClient } from './http';
import { withStyleHint } from './chatMessages';
import { parseReply } from './replyParser';

const responseSchema = z.object({
  message: z.object({ content: z.string() }),
});

/** Local completion through an Ollama server. */
export class OllamaCompleter implements Provider<CompletionRequest, CompletionResult> {
  readonly name = 'ollama';
  private readonly model: string;
  private readonly http: HttpClient;

  constructor(options: { host: string; model: string }) {
    this.model = options.model;
    this.http = createHttpClient({ baseURL: options.host });
  }

  async call(request: CompletionRequest, signal: AbortSignal): Promise<CompletionResult> {
    const response = await this.http.client.post(
      '/api/chat',
      {
        model: this.model,
        messages: withStyleHint(request),
        stream: false,
        format: 'json',
        options: { temperature: 0.7, num_predict: 300 },
      },
      { signal }
    );

    const parsed = responseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new ProviderError('completion', this.name, 'unexpected response shape', parsed.error);
    }
    return parseReply(parsed.data.message.content);
  }

  close(): Promise<void> {
    return this.http.close();
  }
}
