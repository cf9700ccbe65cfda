import { describe, it, expect } from 'vitest';
import { DEFAULT_POLL_INTERVAL_MS, DEFAULT_POLL_TIMEOUT_MS, DEFAULT_TRANSCRIPTION_URL, loadConfig } from '../../src/config/env';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      transcription: {
        apiKey: undefined,
        baseURL: DEFAULT_TRANSCRIPTION_URL,
        pollIntervalMs: DEFAULT_POLL_INTERVAL_MS,
        pollTimeoutMs: DEFAULT_POLL_TIMEOUT_MS,
      },
      generation: { apiKey: undefined, models: undefined },
      port: 3000,
      host: '127.0.0.1',
      apiKey: undefined,
    });
  });

  it('reads keys from their legacy spellings', () => {
    const config = loadConfig({ Assemby_api_key: 'test-secret', gemini_api_key: 'test-gemini' });

    expect(config.transcription.apiKey).toBe('test-secret');
    expect(config.generation.apiKey).toBe('test-gemini');
  });

  it('prefers the canonical name over an alias', () => {
    const config = loadConfig({ ASSEMBLYAI_API_KEY: 'canonical', assemblyai_api_key: 'alias' });

    expect(config.transcription.apiKey).toBe('canonical');
  });

  it('parses numbers and model lists', () => {
    const config = loadConfig({
      POLL_INTERVAL_MS: '500',
      POLL_TIMEOUT_MS: '0',
      PORT: '8080',
      GEMINI_MODELS: ' gemini-2.0-flash , ,gemini-1.5-pro',
    });

    expect(config.transcription.pollIntervalMs).toBe(500);
    expect(config.transcription.pollTimeoutMs).toBe(0);
    expect(config.port).toBe(8080);
    expect(config.generation.models).toEqual(['gemini-2.0-flash', 'gemini-1.5-pro']);
  });

  it('ignores unparseable or negative numbers', () => {
    const config = loadConfig({ POLL_INTERVAL_MS: 'soon', POLL_TIMEOUT_MS: '-5' });

    expect(config.transcription.pollIntervalMs).toBe(DEFAULT_POLL_INTERVAL_MS);
    expect(config.transcription.pollTimeoutMs).toBe(DEFAULT_POLL_TIMEOUT_MS);
  });
});
