import { createClient, type DeepgramClient } from '@deepgram/sdk';
import { ProviderError } from '../errors';
import type { Provider, TranscriptionRequest, TranscriptionResult } from '../types';

export interface DeepgramOptions {
  apiKey?: string;
  model: string;
  language: string;
}

/** Cloud transcription through Deepgram's prerecorded API. */
export class DeepgramTranscriber implements Provider<TranscriptionRequest, TranscriptionResult> {
  readonly name = 'deepgram';
  private readonly options: DeepgramOptions;
  private client: DeepgramClient | null = null;

  constructor(options: DeepgramOptions) {
    this.options = options;
  }

  async call(request: TranscriptionRequest): Promise<TranscriptionResult> {
    const { result, error } = await this.getClient().listen.prerecorded.transcribeFile(request.audio, {
      model: this.options.model,
      language: this.options.language,
      punctuate: true,
      smart_format: true,
    });

    if (error) {
      throw new ProviderError('transcription', this.name, error.message, error);
    }

    const alternative = result?.results?.channels?.[0]?.alternatives?.[0];
    return {
      text: alternative?.transcript ?? '',
      confidence: typeof alternative?.confidence === 'number' ? alternative.confidence : null,
    };
  }

  private getClient(): DeepgramClient {
    if (!this.client) {
      if (!this.options.apiKey) {
        throw new ProviderError('transcription', this.name, 'DEEPGRAM_API_KEY is not set');
      }
      this.client = createClient(this.options.apiKey);
    }
    return this.client;
  }
}
