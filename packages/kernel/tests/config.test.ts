import { describe, it, expect } from 'vitest';
import {
  loadConfig,
  DEFAULT_OPAYO_BASE_URL,
  DEFAULT_AUTHORIZEDOTNET_BASE_URL,
} from '../src/config.js';

describe('loadConfig', () => {
  it('falls back to sandbox endpoints and defaults', () => {
    const result = loadConfig({});
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value).toEqual({
        logLevel: 'info',
        http: { timeoutMs: 30000 },
        connectors: {
          opayo: { baseUrl: DEFAULT_OPAYO_BASE_URL },
          authorizedotnet: { baseUrl: DEFAULT_AUTHORIZEDOTNET_BASE_URL },
        },
      });
    }
  });

  it('reads overrides from the environment', () => {
    const result = loadConfig({
      LOG_LEVEL: 'debug',
      HTTP_TIMEOUT_MS: '5000',
      OPAYO_BASE_URL: 'https://opayo.example.test/api/v1/',
    });
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.logLevel).toBe('debug');
      expect(result.value.http.timeoutMs).toBe(5000);
      expect(result.value.connectors.opayo.baseUrl).toBe('https://opayo.example.test/api/v1/');
    }
  });

  it('rejects non-https connector endpoints', () => {
    const result = loadConfig({ OPAYO_BASE_URL: 'http://opayo.example.test/' });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.issues[0]?.path).toEqual(['connectors', 'opayo', 'baseUrl']);
    }
  });

  it('rejects a non-numeric timeout', () => {
    const result = loadConfig({ HTTP_TIMEOUT_MS: 'soon' });
    expect(result.ok).toBe(false);
  });

  it('rejects an unknown log level', () => {
    const result = loadConfig({ LOG_LEVEL: 'chatty' });
    expect(result.ok).toBe(false);
  });
});
