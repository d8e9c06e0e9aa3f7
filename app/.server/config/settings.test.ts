import { afterEach, describe, expect, it } from 'vitest';
import {
  GROQ_DEFAULT_BASE_URL,
  GROQ_DEFAULT_MODEL,
  getSettings,
  loadSettings,
  resetSettingsCache,
} from './settings';

describe('loadSettings', () => {
  afterEach(() => {
    resetSettingsCache();
  });

  it('falls back to defaults when nothing is set', () => {
    expect(loadSettings({})).toEqual({
      groq: {
        apiKey: undefined,
        baseUrl: GROQ_DEFAULT_BASE_URL,
        model: GROQ_DEFAULT_MODEL,
        timeoutMs: 30000,
      },
      server: { host: '0.0.0.0', port: 8000 },
      logging: { level: 'info', errorFile: undefined },
    });
  });

  it('reads values from the environment', () => {
    const settings = loadSettings({
      GROQ_API_KEY: 'test-key',
      GROQ_BASE_URL: 'http://localhost:9999/v1/',
      GROQ_MODEL: 'llama-3.1-8b-instant',
      GROQ_TIMEOUT_MS: '5000',
      HOST: '127.0.0.1',
      PORT: '3001',
      LOG_LEVEL: 'debug',
      LOG_ERROR_FILE: 'logs/error.log',
    });

    expect(settings.groq).toEqual({
      apiKey: 'test-key',
      baseUrl: 'http://localhost:9999/v1',
      model: 'llama-3.1-8b-instant',
      timeoutMs: 5000,
    });
    expect(settings.server).toEqual({ host: '127.0.0.1', port: 3001 });
    expect(settings.logging).toEqual({ level: 'debug', errorFile: 'logs/error.log' });
  });

  it('treats blank values as unset', () => {
    const settings = loadSettings({ GROQ_API_KEY: '   ', PORT: '' });
    expect(settings.groq.apiKey).toBeUndefined();
    expect(settings.server.port).toBe(8000);
  });

  it('rejects a non-numeric port', () => {
    expect(() => loadSettings({ PORT: 'eighty' })).toThrow(/^Invalid configuration: PORT:/);
  });

  it('rejects an unknown log level', () => {
    expect(() => loadSettings({ LOG_LEVEL: 'verbose' })).toThrow(/^Invalid configuration: LOG_LEVEL:/);
  });

  it('rejects a base URL that is not a URL', () => {
    expect(() => loadSettings({ GROQ_BASE_URL: 'not a url' })).toThrow(/^Invalid configuration: GROQ_BASE_URL:/);
  });

  it('caches the loaded settings for getSettings', () => {
    loadSettings({ GROQ_MODEL: 'cached-model' });
    expect(getSettings().groq.model).toBe('cached-model');
  });
});
