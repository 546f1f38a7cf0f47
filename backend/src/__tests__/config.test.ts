import { describe, it, expect } from 'vitest';
import { loadConfig } from '../config';
import { ConfigError } from '../errors';

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    const config = loadConfig({});

    expect(config.port).toBe(3001);
    expect(config.backends).toEqual({ transcription: 'cloud', completion: 'cloud', synthesis: 'cloud' });
    expect(config.timeouts).toEqual({ transcription: 15_000, completion: 30_000, synthesis: 20_000 });
    expect(config.fallback).toEqual({
      failureThreshold: 3,
      cooldownMs: 30_000,
      cooldownBackoff: 2,
      cooldownMaxMs: 300_000,
    });
    expect(config.memory).toEqual({
      repetitionThreshold: 0.8,
      repetitionWindow: 5,
      sessionTtlMs: 1_800_000,
      maxSessions: 1_000,
      maxTurns: 500,
    });
    expect(config.dialogue).toEqual({ escalationThreshold: 2, historyTurns: 10, maxEmphasis: 3 });
    expect(config.azure).toEqual({ key: undefined, region: undefined, voice: 'en-US-JennyNeural' });
  });

  it('coerces numeric strings and trims secrets', () => {
    const config = loadConfig({ PORT: '8080', FAILURE_THRESHOLD: '5', DEEPGRAM_API_KEY: ' test-secret ' });

    expect(config.port).toBe(8080);
    expect(config.fallback.failureThreshold).toBe(5);
    expect(config.deepgram.apiKey).toBe('test-secret');
  });

  it('treats blank secrets as missing', () => {
    expect(loadConfig({ INFLECTION_API_KEY: '   ' }).inflection.apiKey).toBeUndefined();
  });

  it('never lets the maximum cool-down drop below the base cool-down', () => {
    const config = loadConfig({ COOLDOWN_MS: '60000', COOLDOWN_MAX_MS: '1000' });
    expect(config.fallback.cooldownMaxMs).toBe(60_000);
  });

  it('throws ConfigError naming every invalid key', () => {
    let caught: unknown;
    try {
      loadConfig({ PORT: 'abc', COMPLETION_BACKEND: 'remote' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (!(caught instanceof ConfigError)) return;
    expect(caught.zodError.issues.map((i) => i.path.join('.'))).toEqual(['PORT', 'COMPLETION_BACKEND']);
    expect(caught.message).toContain('[PORT]');
  });
});
