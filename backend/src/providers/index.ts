import { hasCloudCredentials, type AppConfig, type Backend } from '../config';
import type { Logger } from '../logger';
import type { FallbackManager } from '../services/fallbackManager';
import { ProviderGateway } from '../services/providerGateway';
import type {
  Capability,
  CompletionRequest,
  CompletionResult,
  Provider,
  ProviderRole,
  SynthesisRequest,
  SynthesisResult,
  TranscriptionRequest,
  TranscriptionResult,
} from '../types';
import { AzureSpeechSynthesizer } from './azureSpeech';
import { DeepgramTranscriber } from './deepgram';
import { InflectionCompleter } from './inflection';
import { OllamaCompleter } from './ollama';
import { PiperSynthesizer } from './piper';
import { WhisperTranscriber } from './whisper';

export interface Gateways {
  transcription: ProviderGateway<TranscriptionRequest, TranscriptionResult>;
  completion: ProviderGateway<CompletionRequest, CompletionResult>;
  synthesis: ProviderGateway<SynthesisRequest, SynthesisResult>;
}

/**
 * The configured backend becomes the primary. A cloud backend without
 * credentials is demoted so the local provider is tried first.
 */
export function resolvePrimary(config: AppConfig, capability: Capability, logger?: Logger): Backend {
  const requested = config.backends[capability];
  if (requested === 'cloud' && !hasCloudCredentials(config, capability)) {
    logger?.warn({ capability }, 'Cloud credentials missing, using local provider as primary');
    return 'local';
  }
  return requested;
}

function order<Req, Res>(
  primary: Backend,
  providers: Record<Backend, Provider<Req, Res>>
): Record<ProviderRole, Provider<Req, Res>> {
  return primary === 'cloud'
    ? { primary: providers.cloud, fallback: providers.local }
    : { primary: providers.local, fallback: providers.cloud };
}

export function createGateways(config: AppConfig, fallbackManager: FallbackManager, logger: Logger): Gateways {
  const log = logger.child({ component: 'gateway' });

  const transcription = new ProviderGateway<TranscriptionRequest, TranscriptionResult>({
    capability: 'transcription',
    providers: order(resolvePrimary(config, 'transcription', log), {
      cloud: new DeepgramTranscriber(config.deepgram),
      local: new WhisperTranscriber(config.whisper),
    }),
    fallbackManager,
    timeoutMs: config.timeouts.transcription,
    validate: (result) => (result.text.trim() === '' ? 'empty transcript' : null),
    logger: log,
  });

  const completion = new ProviderGateway<CompletionRequest, CompletionResult>({
    capability: 'completion',
    providers: order(resolvePrimary(config, 'completion', log), {
      cloud: new InflectionCompleter(config.inflection),
      local: new OllamaCompleter(config.ollama),
    }),
    fallbackManager,
    timeoutMs: config.timeouts.completion,
    validate: (result) => (result.text.trim() === '' ? 'empty reply' : null),
    logger: log,
  });

  const synthesis = new ProviderGateway<SynthesisRequest, SynthesisResult>({
    capability: 'synthesis',
    providers: order(resolvePrimary(config, 'synthesis', log), {
      cloud: new AzureSpeechSynthesizer(config.azure),
      local: new PiperSynthesizer(config.piper),
    }),
    fallbackManager,
    timeoutMs: config.timeouts.synthesis,
    validate: (result) => (result.audio.length === 0 ? 'no audio returned' : null),
    logger: log,
  });

  return { transcription, completion, synthesis };
}
