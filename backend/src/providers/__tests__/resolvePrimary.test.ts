import { describe, it, expect } from 'vitest';
import { loadConfig } from '../../config';
import { resolvePrimary } from '../index';

describe('resolvePrimary', () => {
  it('demotes cloud backends that have no credentials', () => {
    const config = loadConfig({});
    expect(resolvePrimary(config, 'transcription')).toBe('local');
    expect(resolvePrimary(config, 'completion')).toBe('local');
    expect(resolvePrimary(config, 'synthesis')).toBe('local');
  });

  it('keeps cloud as primary once credentials are present', () => {
    const config = loadConfig({
      DEEPGRAM_API_KEY: 'test-secret',
      INFLECTION_API_KEY: 'test-secret',
      AZURE_SPEECH_KEY: 'test-secret',
      AZURE_SPEECH_REGION: 'westus',
    });
    expect(resolvePrimary(config, 'transcription')).toBe('cloud');
    expect(resolvePrimary(config, 'completion')).toBe('cloud');
    expect(resolvePrimary(config, 'synthesis')).toBe('cloud');
  });

  it('needs both key and region for cloud synthesis', () => {
    expect(resolvePrimary(loadConfig({ AZURE_SPEECH_KEY: 'test-secret' }), 'synthesis')).toBe('local');
  });

  it('honours an explicit local backend', () => {
    const config = loadConfig({ COMPLETION_BACKEND: 'local', INFLECTION_API_KEY: 'test-secret' });
    expect(resolvePrimary(config, 'completion')).toBe('local');
  });
});
