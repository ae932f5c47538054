/**
 * Generation Backend Types
 *
 * Vendor-neutral contract the orchestration layer calls.
 */

export interface GenerationParams {
  temperature: number;
  maxTokens: number;
}

export interface GenerationRequest {
  /** Model id; ignored by the mock backend */
  model: string;
  systemPrompt: string;
  userPrompt: string;
  params: GenerationParams;
}

/**
 * Generation backend
 *
 * Resolves with generated text, rejects with BackendTransportError.
 */
export interface GenerationBackend {
  readonly provider: string;
  generate(request: GenerationRequest): Promise<string>;
}

export interface BackendConfig {
  provider: 'mock' | 'openai' | 'anthropic';
  openaiApiKey?: string;
  openaiBaseUrl?: string;
  anthropicApiKey?: string;
  /** Seed for the mock backend's template filling */
  mockSeed?: number;
}
