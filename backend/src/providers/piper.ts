import { markupToPlainText, STYLE_PROSODY } from '../services/markupBuilder';
import type { Provider, SynthesisRequest, SynthesisResult } from '../types';
import { createHttpClient, type HttpClient } from './http';

/**
 * Local synthesis through a Piper HTTP server. Piper has no voice styles,
 * so only the text and the style's speaking rate survive.
 */
export class PiperSynthesizer implements Provider<SynthesisRequest, SynthesisResult> {
  readonly name = 'piper';
  private readonly http: HttpClient;

  constructor(options: { url: string }) {
    this.http = createHttpClient({ baseURL: options.url });
  }

  async call(request: SynthesisRequest, signal: AbortSignal): Promise<SynthesisResult> {
    const rate = STYLE_PROSODY[request.style.style].speakingRate;
    const response = await this.http.client.post<ArrayBuffer>('/', markupToPlainText(request.markup), {
      headers: { 'Content-Type': 'text/plain; charset=utf-8' },
      params: { length_scale: (1 / rate).toFixed(2) },
      responseType: 'arraybuffer',
      signal,
    });

    return { audio: Buffer.from(response.data), contentType: 'audio/wav' };
  }

  close(): Promise<void> {
    return this.http.close();
  }
}
