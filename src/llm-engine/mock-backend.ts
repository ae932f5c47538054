/**
 * Mock Generation Backend
 *
 * Answers every request with the mock synthesis of its user prompt.
 * Used when no live provider is configured.
 */

import type { GenerationBackend, GenerationRequest } from '../shared/types/llm.js';
import type { MockSynthesisEngine } from '../mock/mock-synthesis-engine.js';

export class MockBackend implements GenerationBackend {
  readonly provider = 'mock';

  constructor(private readonly engine: MockSynthesisEngine) {}

  async generate(request: GenerationRequest): Promise<string> {
    return this.engine.synthesize(request.userPrompt);
  }
}
