/**
 * Centralized Configuration
 *
 * All configuration values loaded from environment variables with sensible defaults.
 * Modules import the constants they need instead of reading process.env directly.
 */

import * as path from 'path';
import { fileURLToPath } from 'url';
import { config as loadDotenv } from 'dotenv';

// Load .env file
loadDotenv();

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export type LLMProvider = 'mock' | 'openai' | 'anthropic';

const PROVIDERS: readonly LLMProvider[] = ['mock', 'openai', 'anthropic'];

function parseProvider(value: string | undefined): LLMProvider | null {
  const normalized = (value || 'mock').trim().toLowerCase();
  return PROVIDERS.find((p) => p === normalized) ?? null;
}

/**
 * Generation Backend Configuration
 */
const RAW_LLM_PROVIDER = process.env.LLM_PROVIDER || 'mock';
export const LLM_PROVIDER: LLMProvider = parseProvider(RAW_LLM_PROVIDER) ?? 'mock';
export const OPENAI_API_KEY = process.env.OPENAI_API_KEY || '';
export const OPENAI_BASE_URL = process.env.OPENAI_BASE_URL || '';
export const ANTHROPIC_API_KEY = process.env.ANTHROPIC_API_KEY || '';

export const MODEL_PROMPT_ENHANCER = process.env.MODEL_PROMPT_ENHANCER || 'gpt-4o-mini';
export const MODEL_PLANNER = process.env.MODEL_PLANNER || 'gpt-4o-mini';
export const MODEL_EXECUTOR = process.env.MODEL_EXECUTOR || 'gpt-4o-mini';

export const PLANNER_TEMPERATURE = parseFloat(process.env.PLANNER_TEMPERATURE || '0.3');
export const PLANNER_MAX_TOKENS = parseInt(process.env.PLANNER_MAX_TOKENS || '800', 10);

/**
 * Pipeline Configuration
 */
export const NUM_KEYWORDS = parseInt(process.env.NUM_KEYWORDS || '5', 10);

// Unset means a time-based seed
export const MOCK_SEED: number | undefined = process.env.MOCK_SEED
  ? parseInt(process.env.MOCK_SEED, 10)
  : undefined;

/**
 * File Paths
 * settings/ sits at the repository root, two levels above src/shared and dist/shared
 */
export const SETTINGS_DIR = process.env.SETTINGS_DIR || path.resolve(__dirname, '../../settings');

const TMP_DIR = process.env.TMP_DIR || '/tmp';
export const LOG_PATH = process.env.LOG_PATH || path.join(TMP_DIR, 'prompt-pipeline.log');

/**
 * Logging Configuration
 */
export const LOG_LEVEL = (process.env.LOG_LEVEL || 'INFO').toUpperCase();
export const SUPPRESS_TEST_LOGS = process.env.SUPPRESS_TEST_LOGS === 'true';

/**
 * Validate environment variables
 */
export function validateConfig(): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (parseProvider(RAW_LLM_PROVIDER) === null) {
    errors.push(`LLM_PROVIDER must be 'mock', 'openai', or 'anthropic', got '${RAW_LLM_PROVIDER}'`);
  }

  if (LLM_PROVIDER === 'openai' && !OPENAI_API_KEY && !OPENAI_BASE_URL) {
    errors.push('OPENAI_API_KEY or OPENAI_BASE_URL is required when LLM_PROVIDER=openai');
  }

  if (LLM_PROVIDER === 'anthropic' && !ANTHROPIC_API_KEY) {
    errors.push('ANTHROPIC_API_KEY is required when LLM_PROVIDER=anthropic');
  }

  if (!Number.isInteger(NUM_KEYWORDS) || NUM_KEYWORDS < 1) {
    errors.push(`NUM_KEYWORDS must be a positive integer, got ${NUM_KEYWORDS}`);
  }

  if (Number.isNaN(PLANNER_TEMPERATURE) || PLANNER_TEMPERATURE < 0 || PLANNER_TEMPERATURE > 1) {
    errors.push(`PLANNER_TEMPERATURE must be between 0 and 1, got ${PLANNER_TEMPERATURE}`);
  }

  if (Number.isNaN(PLANNER_MAX_TOKENS) || PLANNER_MAX_TOKENS < 1) {
    errors.push(`PLANNER_MAX_TOKENS must be >= 1, got ${PLANNER_MAX_TOKENS}`);
  }

  if (MOCK_SEED !== undefined && Number.isNaN(MOCK_SEED)) {
    errors.push(`MOCK_SEED must be an integer, got '${process.env.MOCK_SEED}'`);
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}
