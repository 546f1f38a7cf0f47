import pino from 'pino';
import { InMemoryMemoryStore } from '../memory/memoryStore';
import { EmotionClassifier } from '../services/emotionClassifier';
import { FallbackManager } from '../services/fallbackManager';
import { MarkupBuilder } from '../services/markupBuilder';
import { Orchestrator, type OrchestratorDeps } from '../services/orchestrator';
import { ProviderGateway } from '../services/providerGateway';
import { StyleSelector } from '../services/styleSelector';
import type {
  CompletionRequest,
  CompletionResult,
  Provider,
  ProviderRole,
  SynthesisRequest,
  SynthesisResult,
  TranscriptionRequest,
  TranscriptionResult,
} from '../types';

export const silentLogger = pino({ level: 'silent' });

/** Scripted provider: each call runs the next handler, repeating the last one. */
export class FakeProvider<Req, Res> implements Provider<Req, Res> {
  readonly name: string;
  readonly requests: Req[] = [];
  closed = false;
  private readonly handlers: Array<Handler<Req, Res>>;

  constructor(name: string, ...handlers: Array<Handler<Req, Res>>) {
    this.name = name;
    this.handlers = handlers;
  }

  async call(request: Req, signal: AbortSignal): Promise<Res> {
    this.requests.push(request);
    const handler = this.handlers[Math.min(this.requests.length, this.handlers.length) - 1];
    return handler(request, signal);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

type Handler<Req, Res> = (request: Req, signal: AbortSignal) => Promise<Res>;

export function sttProvider(name: string, ...handlers: Array<Handler<TranscriptionRequest, TranscriptionResult>>) {
  return new FakeProvider<TranscriptionRequest, TranscriptionResult>(name, ...handlers);
}

export function llmProvider(name: string, ...handlers: Array<Handler<CompletionRequest, CompletionResult>>) {
  return new FakeProvider<CompletionRequest, CompletionResult>(name, ...handlers);
}

export function ttsProvider(name: string, ...handlers: Array<Handler<SynthesisRequest, SynthesisResult>>) {
  return new FakeProvider<SynthesisRequest, SynthesisResult>(name, ...handlers);
}

export function succeed<Res>(value: Res): () => Promise<Res> {
  return async () => value;
}

export function fail(message: string): () => Promise<never> {
  return async () => {
    throw new Error(message);
  };
}

/** Never settles on its own; rejects once the provider signal aborts. */
export function hang(): (request: unknown, signal: AbortSignal) => Promise<never> {
  return (_request, signal) =>
    new Promise<never>((_resolve, reject) => {
      signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
    });
}

export const FALLBACK_SETTINGS = {
  failureThreshold: 3,
  cooldownMs: 1_000,
  cooldownBackoff: 2,
  cooldownMaxMs: 8_000,
};

export interface Harness {
  orchestrator: Orchestrator;
  memory: InMemoryMemoryStore;
  fallbackManager: FallbackManager;
  providers: {
    transcription: Record<ProviderRole, FakeProvider<TranscriptionRequest, TranscriptionResult>>;
    completion: Record<ProviderRole, FakeProvider<CompletionRequest, CompletionResult>>;
    synthesis: Record<ProviderRole, FakeProvider<SynthesisRequest, SynthesisResult>>;
  };
  states: string[];
}

export interface HarnessOptions {
  providers?: Partial<Harness['providers']>;
  overrides?: Partial<OrchestratorDeps>;
  escalationThreshold?: number;
}

export const AUDIO = Buffer.from('fake-audio');

export function createHarness(options: HarnessOptions = {}): Harness {
  const providers: Harness['providers'] = {
    transcription: options.providers?.transcription ?? {
      primary: sttProvider('cloud-stt', succeed({ text: 'hello there', confidence: 0.9 })),
      fallback: sttProvider('local-stt', succeed({ text: 'hello there', confidence: null })),
    },
    completion: options.providers?.completion ?? {
      primary: llmProvider('cloud-llm', succeed({ text: 'Happy to help.', emphasisWords: [] })),
      fallback: llmProvider('local-llm', succeed({ text: 'Local help.', emphasisWords: [] })),
    },
    synthesis: options.providers?.synthesis ?? {
      primary: ttsProvider('cloud-tts', succeed({ audio: AUDIO, contentType: 'audio/mpeg' })),
      fallback: ttsProvider('local-tts', succeed({ audio: AUDIO, contentType: 'audio/wav' })),
    },
  };

  const fallbackManager = new FallbackManager(FALLBACK_SETTINGS);
  const memory = new InMemoryMemoryStore({ repetitionThreshold: 0.8, repetitionWindow: 5 });
  const states: string[] = [];

  const orchestrator = new Orchestrator({
    transcription: new ProviderGateway({
      capability: 'transcription',
      providers: providers.transcription,
      fallbackManager,
      timeoutMs: 1_000,
      validate: (result) => (result.text.trim() === '' ? 'empty transcript' : null),
    }),
    completion: new ProviderGateway({
      capability: 'completion',
      providers: providers.completion,
      fallbackManager,
      timeoutMs: 1_000,
      validate: (result) => (result.text.trim() === '' ? 'empty reply' : null),
    }),
    synthesis: new ProviderGateway({
      capability: 'synthesis',
      providers: providers.synthesis,
      fallbackManager,
      timeoutMs: 1_000,
    }),
    memory,
    classifier: new EmotionClassifier(),
    styleSelector: new StyleSelector({ escalationThreshold: options.escalationThreshold ?? 2 }),
    markup: new MarkupBuilder({ voice: 'en-US-TestNeural' }),
    historyTurns: 10,
    logger: silentLogger,
    onStateChange: (_sessionId, state) => states.push(state),
    ...options.overrides,
  });

  return { orchestrator, memory, fallbackManager, providers, states };
}
