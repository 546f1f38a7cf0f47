import { z } from 'zod';
import { ProviderError } from '../errors';
import type { AudioEncoding, Provider, TranscriptionRequest, TranscriptionResult } from '../types';
import { createHttpClient, type HttpClient } from './http';

const MIME_TYPES: Record<AudioEncoding, string> = {
  wav: 'audio/wav',
  webm: 'audio/webm',
  ogg: 'audio/ogg',
  mp3: 'audio/mpeg',
  flac: 'audio/flac',
};

const responseSchema = z.object({
  text: z.string(),
  segments: z.array(z.object({ avg_logprob: z.number() })).optional(),
});

/**
 * Local transcription against a Whisper server exposing the
 * OpenAI-compatible `/v1/audio/transcriptions` endpoint.
 */
export class WhisperTranscriber implements Provider<TranscriptionRequest, TranscriptionResult> {
  readonly name = 'whisper';
  private readonly http: HttpClient;

  constructor(options: { url: string }) {
    this.http = createHttpClient({ baseURL: options.url });
  }

  async call(request: TranscriptionRequest, signal: AbortSignal): Promise<TranscriptionResult> {
    const form = new FormData();
    form.append('file', new Blob([request.audio], { type: MIME_TYPES[request.encoding] }), `audio.${request.encoding}`);
    form.append('response_format', 'verbose_json');

    const response = await this.http.client.post('/v1/audio/transcriptions', form, { signal });
    const parsed = responseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new ProviderError('transcription', this.name, 'unexpected response shape', parsed.error);
    }

    const { text, segments } = parsed.data;
    // Per-segment average log-probability, as a 0..1 confidence.
    const confidence =
      segments && segments.length > 0
        ? segments.reduce((sum, s) => sum + Math.exp(s.avg_logprob), 0) / segments.length
        : null;

    return { text, confidence };
  }

  close(): Promise<void> {
    return this.http.close();
  }
}
