import { describe, it, expect } from 'vitest';
import { loadConfig, describeConfig, DEFAULT_USER_AGENT } from '../config.js';
import { ConfigError } from '../errors.js';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      weather: { baseUrl: 'https://api.weather.gov', userAgent: DEFAULT_USER_AGENT, timeoutMs: 5000 },
      engine: { kind: 'openai', baseUrl: 'https://api.openai.com/v1', model: 'gpt-4o-mini', apiKey: undefined },
      maxRounds: 8,
      logLevel: 'info',
      color: true,
    });
  });

  it('selects the Azure deployment when endpoint and deployment are set', () => {
    const config = loadConfig({
      AZURE_OPENAI_ENDPOINT: 'https://example.openai.azure.com',
      AZURE_OPENAI_DEPLOYMENT: 'gpt4o',
      AZURE_OPENAI_API_KEY: 'test-key',
      OPENAI_API_KEY: 'ignored',
    });
    expect(config.engine).toEqual({
      kind: 'azure',
      endpoint: 'https://example.openai.azure.com',
      deployment: 'gpt4o',
      apiVersion: '2024-06-01',
      apiKey: 'test-key',
    });
  });

  it('coerces numbers and treats blank values as unset', () => {
    const config = loadConfig({ WEATHER_TIMEOUT_MS: '2500', MAX_AGENT_ROUNDS: '3', MODEL: '   ', QUIET: '1', NO_COLOR: '1' });
    expect(config.weather.timeoutMs).toBe(2500);
    expect(config.maxRounds).toBe(3);
    expect(config.engine.kind === 'openai' && config.engine.model).toBe('gpt-4o-mini');
    expect(config.logLevel).toBe('silent');
    expect(config.color).toBe(false);
  });

  it('reports every invalid key', () => {
    try {
      loadConfig({ WEATHER_TIMEOUT_MS: 'soon', LOG_LEVEL: 'chatty' });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ConfigError);
      const keys = e instanceof ConfigError ? e.issues.map(i => i.split(':')[0]).sort() : [];
      expect(keys).toEqual(['LOG_LEVEL', 'WEATHER_TIMEOUT_MS']);
    }
  });
});

describe('describeConfig', () => {
  it('masks the api key', () => {
    const lines = describeConfig(loadConfig({ OPENAI_API_KEY: 'test-secret-value' }));
    expect(lines).toContain('api key       : test****alue');
    expect(lines).toContain('engine        : openai https://api.openai.com/v1 model=gpt-4o-mini');
  });
});
