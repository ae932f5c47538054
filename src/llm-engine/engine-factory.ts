/**
 * Generation Backend Factory
 *
 * Creates the backend selected by LLM_PROVIDER. The caller builds it once and
 * hands it to the orchestration layer.
 */

import {
  ANTHROPIC_API_KEY,
  LLM_PROVIDER,
  MOCK_SEED,
  OPENAI_API_KEY,
  OPENAI_BASE_URL,
} from '../shared/config.js';
import { BackendConfigurationError } from '../shared/errors.js';
import type { BackendConfig, GenerationBackend } from '../shared/types/llm.js';
import type { PipelineSettings } from '../settings/types.js';
import { getSettingsLoader } from '../settings/settings-loader.js';
import { MockSynthesisEngine } from '../mock/mock-synthesis-engine.js';
import { SeededRandom } from '../mock/seeded-random.js';
import { AnthropicBackend } from './anthropic-backend.js';
import { MockBackend } from './mock-backend.js';
import { OpenAIBackend } from './openai-backend.js';

/**
 * Backend configuration from environment variables
 */
export function backendConfigFromEnv(): BackendConfig {
  return {
    provider: LLM_PROVIDER,
    openaiApiKey: OPENAI_API_KEY,
    openaiBaseUrl: OPENAI_BASE_URL,
    anthropicApiKey: ANTHROPIC_API_KEY,
    mockSeed: MOCK_SEED,
  };
}

/**
 * Create a generation backend
 *
 * @param settings - tables for the mock backend; the shared loader's when omitted
 * @param mockEngine - existing engine for the mock backend, so one seed drives one sequence
 */
export function createGenerationBackend(
  config: BackendConfig = backendConfigFromEnv(),
  settings?: PipelineSettings,
  mockEngine?: MockSynthesisEngine
): GenerationBackend {
  switch (config.provider) {
    case 'openai':
      if (!config.openaiApiKey && !config.openaiBaseUrl) {
        throw new BackendConfigurationError('openai', 'OPENAI_API_KEY or OPENAI_BASE_URL');
      }
      return new OpenAIBackend({ apiKey: config.openaiApiKey ?? '', baseUrl: config.openaiBaseUrl });

    case 'anthropic':
      if (!config.anthropicApiKey) {
        throw new BackendConfigurationError('anthropic', 'ANTHROPIC_API_KEY');
      }
      return new AnthropicBackend({ apiKey: config.anthropicApiKey });

    case 'mock': {
      if (mockEngine) {
        return new MockBackend(mockEngine);
      }
      const tables = settings ?? getSettingsLoader().getSettings();
      const engine = new MockSynthesisEngine(
        tables.mockResponses,
        tables.domains,
        new SeededRandom(config.mockSeed)
      );
      return new MockBackend(engine);
    }
  }
}

/**
 * Get current provider name
 */
export function getCurrentProvider(): string {
  return LLM_PROVIDER;
}
