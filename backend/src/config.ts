import { z } from 'zod';
import { ConfigError } from './errors';
import type { Capability } from './types';

const backend = z.enum(['cloud', 'local']);
const optionalSecret = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value.trim() : undefined));

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ORIGIN: z.string().default('http://localhost:5001'),

  TRANSCRIPTION_BACKEND: backend.default('cloud'),
  COMPLETION_BACKEND: backend.default('cloud'),
  SYNTHESIS_BACKEND: backend.default('cloud'),

  DEEPGRAM_API_KEY: optionalSecret,
  DEEPGRAM_MODEL: z.string().default('nova-2'),
  DEEPGRAM_LANGUAGE: z.string().default('en-US'),
  WHISPER_URL: z.string().url().default('http://localhost:8000'),

  INFLECTION_API_KEY: optionalSecret,
  INFLECTION_MODEL: z.string().default('Pi-3.1'),
  OLLAMA_HOST: z.string().url().default('http://localhost:11434'),
  OLLAMA_MODEL: z.string().default('llama3.2'),

  AZURE_SPEECH_KEY: optionalSecret,
  AZURE_SPEECH_REGION: optionalSecret,
  AZURE_VOICE: z.string().default('en-US-JennyNeural'),
  PIPER_URL: z.string().url().default('http://localhost:5000'),

  FAILURE_THRESHOLD: z.coerce.number().int().min(1).default(3),
  COOLDOWN_MS: z.coerce.number().int().min(0).default(30_000),
  COOLDOWN_BACKOFF: z.coerce.number().min(1).default(2),
  COOLDOWN_MAX_MS: z.coerce.number().int().min(0).default(300_000),

  TRANSCRIPTION_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  COMPLETION_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  SYNTHESIS_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),

  REPETITION_THRESHOLD: z.coerce.number().min(0).max(1).default(0.8),
  REPETITION_WINDOW: z.coerce.number().int().min(1).default(5),
  SESSION_TTL_MS: z.coerce.number().int().positive().default(1_800_000),
  MAX_SESSIONS: z.coerce.number().int().min(1).default(1_000),
  MAX_TURNS_PER_SESSION: z.coerce.number().int().min(1).default(500),
  ESCALATION_THRESHOLD: z.coerce.number().int().min(1).default(2),
  HISTORY_TURNS: z.coerce.number().int().min(0).default(10),
  MAX_EMPHASIS: z.coerce.number().int().min(0).default(3),
});

export type Backend = z.infer<typeof backend>;

export interface FallbackSettings {
  failureThreshold: number;
  cooldownMs: number;
  cooldownBackoff: number;
  cooldownMaxMs: number;
}

export interface AppConfig {
  port: number;
  logLevel: string;
  corsOrigin: string;
  backends: Record<Capability, Backend>;
  timeouts: Record<Capability, number>;
  fallback: FallbackSettings;
  deepgram: { apiKey?: string; model: string; language: string };
  whisper: { url: string };
  inflection: { apiKey?: string; model: string };
  ollama: { host: string; model: string };
  azure: { key?: string; region?: string; voice: string };
  piper: { url: string };
  memory: {
    repetitionThreshold: number;
    repetitionWindow: number;
    sessionTtlMs: number;
    maxSessions: number;
    maxTurns: number;
  };
  dialogue: { escalationThreshold: number; historyTurns: number; maxEmphasis: number };
}

/**
 * Parses an environment record into an AppConfig.
 * Throws ConfigError listing every invalid key.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error);
  }
  const e = parsed.data;

  return {
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    corsOrigin: e.CORS_ORIGIN,
    backends: {
      transcription: e.TRANSCRIPTION_BACKEND,
      completion: e.COMPLETION_BACKEND,
      synthesis: e.SYNTHESIS_BACKEND,
    },
    timeouts: {
      transcription: e.TRANSCRIPTION_TIMEOUT_MS,
      completion: e.COMPLETION_TIMEOUT_MS,
      synthesis: e.SYNTHESIS_TIMEOUT_MS,
    },
    fallback: {
      failureThreshold: e.FAILURE_THRESHOLD,
      cooldownMs: e.COOLDOWN_MS,
      cooldownBackoff: e.COOLDOWN_BACKOFF,
      cooldownMaxMs: Math.max(e.COOLDOWN_MAX_MS, e.COOLDOWN_MS),
    },
    deepgram: { apiKey: e.DEEPGRAM_API_KEY, model: e.DEEPGRAM_MODEL, language: e.DEEPGRAM_LANGUAGE },
    whisper: { url: e.WHISPER_URL },
    inflection: { apiKey: e.INFLECTION_API_KEY, model: e.INFLECTION_MODEL },
    ollama: { host: e.OLLAMA_HOST, model: e.OLLAMA_MODEL },
    azure: { key: e.AZURE_SPEECH_KEY, region: e.AZURE_SPEECH_REGION, voice: e.AZURE_VOICE },
    piper: { url: e.PIPER_URL },
    memory: {
      repetitionThreshold: e.REPETITION_THRESHOLD,
      repetitionWindow: e.REPETITION_WINDOW,
      sessionTtlMs: e.SESSION_TTL_MS,
      maxSessions: e.MAX_SESSIONS,
      maxTurns: e.MAX_TURNS_PER_SESSION,
    },
    dialogue: {
      escalationThreshold: e.ESCALATION_THRESHOLD,
      historyTurns: e.HISTORY_TURNS,
      maxEmphasis: e.MAX_EMPHASIS,
    },
  };
}

/** Whether the cloud provider for a capability has the credentials it needs. */
export function hasCloudCredentials(config: AppConfig, capability: Capability): boolean {
  switch (capability) {
    case 'transcription':
      return Boolean(config.deepgram.apiKey);
    case 'completion':
      return Boolean(config.inflection.apiKey);
    case 'synthesis':
      return Boolean(config.azure.key && config.azure.region);
  }
}
