import { describe, it, expect } from 'vitest';
import { DEFAULT_MODELS, loadConfig } from '../config.js';
import { ConfigError } from '../errors.js';

describe('loadConfig', () => {
  it('applies defaults around a single OpenRouter key', () => {
    const config = loadConfig({ OPENROUTER_API_KEY: 'test-secret' });

    expect(config).toEqual({
      maxIterations: 5,
      qualityThreshold: 5,
      finder: { provider: 'openrouter', model: DEFAULT_MODELS.openrouter, apiKey: 'test-secret' },
      critic: { provider: 'openrouter', model: DEFAULT_MODELS.openrouter, apiKey: 'test-secret' },
      llmTimeoutMs: 120000,
      resultInlineLimitBytes: 65536,
      resultTtlMs: 3600000,
    });
  });

  it('reads overrides from strings', () => {
    const config = loadConfig({
      RESEARCH_MAX_ITERATIONS: '3',
      RESEARCH_QUALITY_THRESHOLD: '7',
      FINDER_PROVIDER: 'perplexity',
      PERPLEXITY_API_KEY: 'test-secret-pplx',
      CRITIC_PROVIDER: 'anthropic',
      CRITIC_MODEL: 'custom-critic',
      ANTHROPIC_API_KEY: 'test-secret-anthropic',
      LLM_TIMEOUT_MS: '5000',
    });

    expect(config.maxIterations).toBe(3);
    expect(config.qualityThreshold).toBe(7);
    expect(config.finder).toEqual({ provider: 'perplexity', model: 'sonar', apiKey: 'test-secret-pplx' });
    expect(config.critic).toEqual({ provider: 'anthropic', model: 'custom-critic', apiKey: 'test-secret-anthropic' });
    expect(config.llmTimeoutMs).toBe(5000);
  });

  it('names the missing key for the finder', () => {
    expect(() => loadConfig({})).toThrow('OPENROUTER_API_KEY is required for the finder (provider: openrouter)');
  });

  it('names the missing key for the critic', () => {
    expect(() => loadConfig({ OPENROUTER_API_KEY: 'test-secret', CRITIC_PROVIDER: 'gemini' }))
      .toThrow('GEMINI_API_KEY is required for the critic (provider: gemini)');
  });

  it('treats a blank key as missing', () => {
    expect(() => loadConfig({ OPENROUTER_API_KEY: '   ' })).toThrow(ConfigError);
  });

  it('rejects invalid numbers with the offending variable', () => {
    try {
      loadConfig({ OPENROUTER_API_KEY: 'test-secret', RESEARCH_MAX_ITERATIONS: 'abc' });
      expect.fail('expected a ConfigError');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect(error instanceof ConfigError ? error.key : undefined).toBe('RESEARCH_MAX_ITERATIONS');
      expect(error instanceof Error ? error.message : '').toMatch(/^Invalid configuration for RESEARCH_MAX_ITERATIONS: /);
    }
  });

  it('rejects an unknown provider', () => {
    expect(() => loadConfig({ OPENROUTER_API_KEY: 'test-secret', CRITIC_PROVIDER: 'perplexity' }))
      .toThrow(/^Invalid configuration for CRITIC_PROVIDER/);
  });
});
