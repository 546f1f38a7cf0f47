export type EmotionType = 'neutral' | 'happy' | 'frustrated' | 'confused' | 'angry' | 'sad';

export interface EmotionSignal {
  label: EmotionType;
  /** Always within [0, 1]. */
  intensity: number;
}

export type StyleName = 'neutral' | 'cheerful' | 'empathetic' | 'patient' | 'de_escalate';

export interface StyleDecision {
  style: StyleName;
  degree: number;
}

export interface Turn {
  userText: string;
  emotion: EmotionSignal;
  style: StyleDecision;
  assistantText: string;
  latencyMs: number;
  timestamp: number;
}

export type Preferences = Record<string, string>;

export type Capability = 'transcription' | 'completion' | 'synthesis';

export const CAPABILITIES: readonly Capability[] = ['transcription', 'completion', 'synthesis'];

export type ProviderRole = 'primary' | 'fallback';

export interface ProviderHealth {
  consecutiveFailures: number;
  lastFailureAt: number | null;
  disabled: boolean;
  /** Epoch ms after which a disabled provider may be probed again. */
  disabledUntil: number | null;
  cooldownMs: number;
  probing: boolean;
}

export type AudioEncoding = 'wav' | 'webm' | 'ogg' | 'mp3' | 'flac';

export type TurnInput =
  | { text: string }
  | { audio: Buffer; encoding: AudioEncoding };

// Provider contracts

export interface TranscriptionRequest {
  audio: Buffer;
  encoding: AudioEncoding;
}

export interface TranscriptionResult {
  text: string;
  confidence: number | null;
}

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionRequest {
  messages: ChatMessage[];
  styleHint: string;
}

export interface CompletionResult {
  text: string;
  emphasisWords: string[];
}

export interface SynthesisRequest {
  markup: string;
  style: StyleDecision;
}

export interface SynthesisResult {
  audio: Buffer;
  contentType: string;
}

export interface Provider<Req, Res> {
  readonly name: string;
  call(request: Req, signal: AbortSignal): Promise<Res>;
  close?(): Promise<void>;
}

export type PipelineState =
  | 'idle'
  | 'transcribing'
  | 'analyzing'
  | 'fetching_memory'
  | 'selecting_style'
  | 'generating_response'
  | 'building_markup'
  | 'synthesizing'
  | 'persisting'
  | 'done'
  | 'aborted';

export type ErrorKind =
  | 'ProviderTimeout'
  | 'ProviderError'
  | 'MarkupBuildFailure'
  | 'MemoryWriteFailure'
  | 'BothProvidersFailed'
  | 'TurnCancelled';

export type ProvidersUsed = Partial<Record<Capability, ProviderRole>>;

export interface TurnFailure {
  kind: ErrorKind;
  capability?: Capability;
  message: string;
}

export interface CompletedTurn {
  status: 'done';
  sessionId: string;
  userText: string;
  assistantResponse: string;
  emotion: EmotionSignal;
  style: StyleDecision;
  markup: string;
  audio: Buffer;
  audioContentType: string;
  transcriptionConfidence: number | null;
  latencyMs: number;
  providers: ProvidersUsed;
  partial: boolean;
  errors: TurnFailure[];
}

export interface AbortedTurn {
  status: 'aborted';
  sessionId: string;
  error: TurnFailure;
  latencyMs: number;
  providers: ProvidersUsed;
}

export type OrchestratorResult = CompletedTurn | AbortedTurn;
