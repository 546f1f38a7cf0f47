import { v4 as uuidv4 } from 'uuid';
import { MarkupBuildError, MemoryWriteError, PipelineError, TurnCancelledError, describeError } from '../errors';
import type { Logger } from '../logger';
import type { MemoryStore, SessionInfo } from '../memory/memoryStore';
import type {
  Capability,
  CompletionRequest,
  CompletionResult,
  EmotionSignal,
  OrchestratorResult,
  PipelineState,
  Preferences,
  ProvidersUsed,
  StyleDecision,
  SynthesisRequest,
  SynthesisResult,
  TranscriptionRequest,
  TranscriptionResult,
  Turn,
  TurnFailure,
  TurnInput,
} from '../types';
import { NEUTRAL_SIGNAL, clampIntensity, type EmotionAnalyzer } from './emotionClassifier';
import type { MarkupRenderer } from './markupBuilder';
import { buildMessages, styleHint } from './prompt';
import type { GatewayResult } from './providerGateway';
import { NEUTRAL_STYLE, countEscalation, type StyleSelector } from './styleSelector';

export interface CapabilityGateway<Req, Res> {
  readonly capability: Capability;
  call(request: Req, signal?: AbortSignal): Promise<GatewayResult<Res>>;
  close?(): Promise<void>;
}

export interface OrchestratorDeps {
  transcription: CapabilityGateway<TranscriptionRequest, TranscriptionResult>;
  completion: CapabilityGateway<CompletionRequest, CompletionResult>;
  synthesis: CapabilityGateway<SynthesisRequest, SynthesisResult>;
  memory: MemoryStore;
  classifier: EmotionAnalyzer;
  styleSelector: StyleSelector;
  markup: MarkupRenderer;
  logger: Logger;
  /** How many past turns feed the classifier, the style rules and the prompt. */
  historyTurns: number;
  onStateChange?: (sessionId: string, state: PipelineState) => void;
  now?: () => number;
}

export interface ProcessOptions {
  signal?: AbortSignal;
}

interface TurnRun {
  sessionId: string;
  state: PipelineState;
  signal?: AbortSignal;
  providers: ProvidersUsed;
  errors: TurnFailure[];
  log: Logger;
}

/**
 * Runs one conversational turn at a time per session:
 * transcribe, analyze, recall, pick a style, generate, mark up,
 * synthesize, persist.
 *
 * Callers must not run two turns for the same session concurrently.
 */
export class Orchestrator {
  private readonly deps: OrchestratorDeps;
  private readonly logger: Logger;
  private readonly now: () => number;
  private closed = false;

  constructor(deps: OrchestratorDeps) {
    this.deps = deps;
    this.logger = deps.logger.child({ component: 'orchestrator' });
    this.now = deps.now ?? Date.now;
  }

  /** Creates the session on first contact, otherwise resumes it. */
  async initialize(sessionId: string = `session_${uuidv4()}`): Promise<SessionInfo> {
    const info = await this.deps.memory.ensureSession(sessionId);
    this.logger.info({ sessionId, created: info.created, turns: info.turnCount }, 'Session ready');
    return info;
  }

  /** Forgets the session's turns and preferences. */
  async endSession(sessionId: string): Promise<boolean> {
    const removed = await this.deps.memory.deleteSession(sessionId);
    this.logger.info({ sessionId, removed }, 'Session ended');
    return removed;
  }

  async process(sessionId: string, input: TurnInput, options: ProcessOptions = {}): Promise<OrchestratorResult> {
    if (this.closed) {
      throw new Error('Orchestrator has been shut down');
    }

    const started = this.now();
    const run: TurnRun = {
      sessionId,
      state: 'idle',
      signal: options.signal,
      providers: {},
      errors: [],
      log: this.logger.child({ sessionId }),
    };

    try {
      let userText: string;
      let transcriptionConfidence: number | null = null;

      if ('text' in input) {
        userText = input.text.trim();
        if (userText === '') throw new Error('Turn text is empty');
      } else {
        this.enter(run, 'transcribing');
        const transcript = await this.dispatch(run, this.deps.transcription, {
          audio: input.audio,
          encoding: input.encoding,
        });
        userText = transcript.text.trim();
        transcriptionConfidence = transcript.confidence;
      }

      this.enter(run, 'analyzing');
      const history = await this.recentHistory(run);
      const emotion = this.analyze(run, userText, history);

      this.enter(run, 'fetching_memory');
      const isRepetition = await this.repetition(run, userText);
      const preferences = await this.preferences(run);

      this.enter(run, 'selecting_style');
      const style = this.selectStyle(run, emotion, isRepetition, countEscalation(history, emotion));

      this.enter(run, 'generating_response');
      const completion = await this.dispatch(run, this.deps.completion, {
        messages: buildMessages({ userText, emotion, style, isRepetition, history, preferences }),
        styleHint: styleHint(style),
      });
      const assistantResponse = completion.text.trim();

      this.enter(run, 'building_markup');
      const markup = this.buildMarkup(assistantResponse, style, completion.emphasisWords, preferences);

      this.enter(run, 'synthesizing');
      const speech = await this.dispatch(run, this.deps.synthesis, { markup, style });

      this.enter(run, 'persisting');
      const latencyMs = this.now() - started;
      await this.persist(run, {
        userText,
        emotion,
        style,
        assistantText: assistantResponse,
        latencyMs,
        timestamp: this.now(),
      });

      this.transition(run, 'done');
      run.log.info(
        { style: style.style, emotion: emotion.label, latencyMs, providers: run.providers, partial: run.errors.length > 0 },
        'Turn complete'
      );

      return {
        status: 'done',
        sessionId,
        userText,
        assistantResponse,
        emotion,
        style,
        markup,
        audio: speech.audio,
        audioContentType: speech.contentType,
        transcriptionConfidence,
        latencyMs,
        providers: run.providers,
        partial: run.errors.length > 0,
        errors: run.errors,
      };
    } catch (error) {
      if (!(error instanceof PipelineError)) {
        run.log.error({ err: error, state: run.state }, 'Turn failed unexpectedly');
        this.transition(run, 'aborted');
        throw error;
      }

      const failedIn = run.state;
      this.transition(run, 'aborted');
      run.log.warn({ kind: error.kind, capability: error.capability, state: failedIn }, error.message);

      return {
        status: 'aborted',
        sessionId,
        error: error.toFailure(),
        latencyMs: this.now() - started,
        providers: run.providers,
      };
    }
  }

  /** Releases provider connections and the memory store. */
  async shutdown(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    const { transcription, completion, synthesis, memory } = this.deps;
    await Promise.all([transcription.close?.(), completion.close?.(), synthesis.close?.()]);
    await memory.close();
    this.logger.info('Orchestrator shut down');
  }

  // Stops the turn before any further work once the caller cancels.
  private enter(run: TurnRun, state: PipelineState): void {
    if (run.signal?.aborted) {
      throw new TurnCancelledError();
    }
    this.transition(run, state);
  }

  private transition(run: TurnRun, state: PipelineState): void {
    run.state = state;
    run.log.debug({ state }, 'Pipeline state');
    this.deps.onStateChange?.(run.sessionId, state);
  }

  private async dispatch<Req, Res>(run: TurnRun, gateway: CapabilityGateway<Req, Res>, request: Req): Promise<Res> {
    const result = await gateway.call(request, run.signal);
    run.providers[gateway.capability] = result.role;
    for (const failure of result.recovered) {
      run.errors.push(failure.toFailure());
    }
    if (result.role === 'fallback') {
      run.log.info({ capability: gateway.capability, provider: result.provider }, 'Served by fallback provider');
    }
    return result.value;
  }

  private async recentHistory(run: TurnRun): Promise<Turn[]> {
    try {
      return await this.deps.memory.fetchRecent(run.sessionId, this.deps.historyTurns);
    } catch (error) {
      run.log.warn({ err: describeError(error) }, 'Could not read history, continuing without it');
      return [];
    }
  }

  private analyze(run: TurnRun, text: string, history: readonly Turn[]): EmotionSignal {
    try {
      const signal = this.deps.classifier.classify(text, history);
      return { label: signal.label, intensity: clampIntensity(signal.intensity) };
    } catch (error) {
      run.log.warn({ err: describeError(error) }, 'Emotion analysis failed, assuming neutral');
      return { ...NEUTRAL_SIGNAL };
    }
  }

  private async repetition(run: TurnRun, text: string): Promise<boolean> {
    try {
      return await this.deps.memory.detectRepetition(run.sessionId, text);
    } catch (error) {
      run.log.warn({ err: describeError(error) }, 'Repetition check failed');
      return false;
    }
  }

  private async preferences(run: TurnRun): Promise<Preferences> {
    try {
      return await this.deps.memory.getPreferences(run.sessionId);
    } catch (error) {
      run.log.warn({ err: describeError(error) }, 'Could not read preferences');
      return {};
    }
  }

  private selectStyle(run: TurnRun, emotion: EmotionSignal, isRepetition: boolean, escalationCount: number): StyleDecision {
    try {
      return this.deps.styleSelector.select({ emotion, isRepetition, escalationCount });
    } catch (error) {
      run.log.warn({ err: describeError(error) }, 'Style selection failed, using neutral');
      return { ...NEUTRAL_STYLE };
    }
  }

  private buildMarkup(text: string, style: StyleDecision, emphasisWords: string[], preferences: Preferences): string {
    try {
      return this.deps.markup.build(text, style, { emphasisWords, voice: preferences.voice });
    } catch (error) {
      throw error instanceof MarkupBuildError ? error : new MarkupBuildError(describeError(error));
    }
  }

  private async persist(run: TurnRun, turn: Turn): Promise<void> {
    try {
      await this.deps.memory.append(run.sessionId, turn);
    } catch (error) {
      const failure = new MemoryWriteError(run.sessionId, error);
      run.log.warn({ err: failure.message }, 'Turn not persisted');
      run.errors.push(failure.toFailure());
    }
  }
}
