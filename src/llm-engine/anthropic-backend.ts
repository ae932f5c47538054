/**
 * Anthropic Generation Backend
 */

import Anthropic from '@anthropic-ai/sdk';
import { BackendTransportError, errorMessage } from '../shared/errors.js';
import { PipelineLogger } from '../shared/logger.js';
import type { GenerationBackend, GenerationRequest } from '../shared/types/llm.js';

export interface AnthropicBackendConfig {
  apiKey: string;
}

export class AnthropicBackend implements GenerationBackend {
  readonly provider = 'anthropic';
  private client: Anthropic;

  constructor(config: AnthropicBackendConfig) {
    this.client = new Anthropic({ apiKey: config.apiKey });
    PipelineLogger.info('Anthropic backend initialized');
  }

  async generate(request: GenerationRequest): Promise<string> {
    const parts: string[] = [];
    try {
      const message = await this.client.messages.create({
        model: request.model,
        max_tokens: request.params.maxTokens,
        temperature: request.params.temperature,
        system: request.systemPrompt,
        messages: [{ role: 'user', content: request.userPrompt }],
      });
      for (const block of message.content) {
        if (block.type === 'text') parts.push(block.text);
      }
    } catch (error) {
      PipelineLogger.backendFailure(this.provider, error);
      throw new BackendTransportError(this.provider, errorMessage(error));
    }

    const text = parts.join('');
    if (text.length === 0) {
      throw new BackendTransportError(this.provider, 'response contained no text');
    }
    return text;
  }
}
