/**
 * OpenAI-Compatible Generation Backend
 *
 * Chat completions against OpenAI or any compatible endpoint (Azure OpenAI,
 * LM Studio, OpenRouter) selected through the base URL.
 */

import OpenAI from 'openai';
import { BackendTransportError, errorMessage } from '../shared/errors.js';
import { PipelineLogger } from '../shared/logger.js';
import type { GenerationBackend, GenerationRequest } from '../shared/types/llm.js';

export interface OpenAIBackendConfig {
  apiKey: string;
  /** Base URL for OpenAI-compatible APIs; empty means api.openai.com */
  baseUrl?: string;
}

export class OpenAIBackend implements GenerationBackend {
  readonly provider = 'openai';
  private client: OpenAI;

  constructor(config: OpenAIBackendConfig) {
    this.client = new OpenAI({
      apiKey: config.apiKey || 'not-needed',
      baseURL: config.baseUrl || undefined,
    });

    PipelineLogger.info(`OpenAI backend initialized${config.baseUrl ? `: ${config.baseUrl}` : ''}`);
  }

  async generate(request: GenerationRequest): Promise<string> {
    let content: string | null | undefined;
    try {
      const completion = await this.client.chat.completions.create({
        model: request.model,
        temperature: request.params.temperature,
        max_tokens: request.params.maxTokens,
        messages: [
          { role: 'system', content: request.systemPrompt },
          { role: 'user', content: request.userPrompt },
        ],
      });
      content = completion.choices[0]?.message?.content;
    } catch (error) {
      PipelineLogger.backendFailure(this.provider, error);
      throw new BackendTransportError(this.provider, errorMessage(error));
    }

    if (!content) {
      throw new BackendTransportError(this.provider, 'completion contained no text');
    }
    return content;
  }
}
