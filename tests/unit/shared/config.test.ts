/**
 * Unit tests for environment configuration
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

describe('unit: config', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    vi.resetModules();
    process.env = { ...originalEnv };
    for (const key of ['LLM_PROVIDER', 'OPENAI_API_KEY', 'OPENAI_BASE_URL', 'ANTHROPIC_API_KEY', 'MOCK_SEED', 'NUM_KEYWORDS']) {
      delete process.env[key];
    }
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it('defaults to the mock provider and passes validation', async () => {
    const config = await import('../../../src/shared/config.js');

    expect(config.LLM_PROVIDER).toBe('mock');
    expect(config.NUM_KEYWORDS).toBe(5);
    expect(config.MOCK_SEED).toBeUndefined();
    expect(config.validateConfig()).toEqual({ valid: true, errors: [] });
  });

  it('reports an unknown provider', async () => {
    process.env.LLM_PROVIDER = 'carrier-pigeon';

    const { validateConfig } = await import('../../../src/shared/config.js');

    expect(validateConfig().errors).toEqual([
      "LLM_PROVIDER must be 'mock', 'openai', or 'anthropic', got 'carrier-pigeon'",
    ]);
  });

  it('reports missing credentials for live providers', async () => {
    process.env.LLM_PROVIDER = 'anthropic';

    const { validateConfig } = await import('../../../src/shared/config.js');

    expect(validateConfig()).toEqual({
      valid: false,
      errors: ['ANTHROPIC_API_KEY is required when LLM_PROVIDER=anthropic'],
    });
  });

  it('reports invalid numeric settings', async () => {
    process.env.NUM_KEYWORDS = '0';
    process.env.MOCK_SEED = 'abc';

    const { validateConfig } = await import('../../../src/shared/config.js');

    expect(validateConfig().errors).toEqual([
      'NUM_KEYWORDS must be a positive integer, got 0',
      "MOCK_SEED must be an integer, got 'abc'",
    ]);
  });
});
