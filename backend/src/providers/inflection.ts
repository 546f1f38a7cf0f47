import { z } from 'zod';
import { ProviderError } from '../errors';
import type { CompletionRequest, CompletionResult, Provider } from '../types';
import { createHttpClient, type HttpClient } from './http';
import { withStyleHint } from './chatMessages';
import { parseReply } from './replyParser';

const responseSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string() }) }))
    .min(1),
});

export interface InflectionOptions {
  apiKey?: string;
  model: string;
}

/** Cloud completion through Inflection's chat completions endpoint. */
export class InflectionCompleter implements Provider<CompletionRequest, CompletionResult> {
  readonly name = 'inflection';
  private readonly options: InflectionOptions;
  private readonly http: HttpClient;

  constructor(options: InflectionOptions) {
    this.options = options;
    this.http = createHttpClient({ baseURL: 'https://api.inflection.ai/v1' });
  }

  async call(request: CompletionRequest, signal: AbortSignal): Promise<CompletionResult> {
    if (!this.options.apiKey) {
      throw new ProviderError('completion', this.name, 'INFLECTION_API_KEY is not set');
    }

    const response = await this.http.client.post(
      '/chat/completions',
      {
        model: this.options.model,
        messages: withStyleHint(request),
        temperature: 0.7,
        max_tokens: 300,
      },
      {
        headers: {
          Authorization: `Bearer ${this.options.apiKey}`,
          'Content-Type': 'application/json',
        },
        signal,
      }
    );

    const parsed = responseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new ProviderError('completion', this.name, 'unexpected response shape', parsed.error);
    }
    return parseReply(parsed.data.choices[0].message.content);
  }

  close(): Promise<void> {
    return this.http.close();
  }
}
