import { ProviderError } from '../errors';
import type { Provider, SynthesisRequest, SynthesisResult } from '../types';
import { createHttpClient, type HttpClient } from './http';

export interface AzureSpeechOptions {
  key?: string;
  region?: string;
}

const OUTPUT_FORMAT = 'audio-16khz-32kbitrate-mono-mp3';

/** Cloud synthesis: posts the SSML document to Azure Speech. */
export class AzureSpeechSynthesizer implements Provider<SynthesisRequest, SynthesisResult> {
  readonly name = 'azure-speech';
  private readonly options: AzureSpeechOptions;
  private readonly http: HttpClient;

  constructor(options: AzureSpeechOptions) {
    this.options = options;
    this.http = createHttpClient();
  }

  async call(request: SynthesisRequest, signal: AbortSignal): Promise<SynthesisResult> {
    const { key, region } = this.options;
    if (!key || !region) {
      throw new ProviderError('synthesis', this.name, 'AZURE_SPEECH_KEY / AZURE_SPEECH_REGION are not set');
    }

    const response = await this.http.client.post<ArrayBuffer>(
      `https://${region}.tts.speech.microsoft.com/cognitiveservices/v1`,
      request.markup,
      {
        headers: {
          'Ocp-Apim-Subscription-Key': key,
          'Content-Type': 'application/ssml+xml',
          'X-Microsoft-OutputFormat': OUTPUT_FORMAT,
          'User-Agent': 'empathic-voice',
        },
        responseType: 'arraybuffer',
        signal,
      }
    );

    return { audio: Buffer.from(response.data), contentType: 'audio/mpeg' };
  }

  close(): Promise<void> {
    return this.http.close();
  }
}
