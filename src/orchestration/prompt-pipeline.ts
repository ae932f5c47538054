/**
 * Prompt Pipeline
 *
 * End-to-end handling of a single user prompt:
 * skill tier -> keywords -> retrieval -> PQR prompt -> backend -> offers/docs appended.
 *
 * Backend failures come back as strings starting with ERROR_PREFIX.
 */

import { MODEL_PROMPT_ENHANCER, NUM_KEYWORDS } from '../shared/config.js';
import { ERROR_PREFIX, errorMessage } from '../shared/errors.js';
import { PipelineLogger } from '../shared/logger.js';
import type { GenerationBackend } from '../shared/types/llm.js';
import type { PromptEnvelope, RetrievalResult, SkillParameters } from '../shared/types/pipeline.js';
import { extractKeywords } from '../classification/keyword-extractor.js';
import { appendRetrievalExtras } from '../retrieval/extras-formatter.js';
import type { PipelineCore } from './pipeline-core.js';

export interface PromptPipelineOptions {
  model?: string;
  numKeywords?: number;
}

/**
 * Everything computed before the backend call
 */
export interface PreparedPrompt {
  userId: string;
  keywords: string[];
  retrieval: RetrievalResult;
  skill: SkillParameters;
  envelope: PromptEnvelope;
}

export class PromptPipeline {
  private readonly model: string;
  private readonly numKeywords: number;

  constructor(
    private readonly core: PipelineCore,
    private readonly backend: GenerationBackend,
    options: PromptPipelineOptions = {}
  ) {
    this.model = options.model || MODEL_PROMPT_ENHANCER;
    this.numKeywords = options.numKeywords ?? NUM_KEYWORDS;
  }

  prepare(userId: string, prompt: string): PreparedPrompt {
    const skill = this.core.skillResolver.resolve(userId);
    const keywords = extractKeywords(prompt, this.numKeywords);
    const retrieval = this.core.contextRetriever.retrieve(keywords);
    const envelope = this.core.promptAssembler.assemble(prompt, skill.guidance, retrieval);

    return { userId, keywords, retrieval, skill, envelope };
  }

  async processPromptRequest(userId: string, prompt: string): Promise<string> {
    if (!prompt || prompt.trim().length === 0) {
      return `${ERROR_PREFIX}Prompt must not be empty.`;
    }

    PipelineLogger.info(`Processing prompt for user '${userId}' via ${this.backend.provider}`);
    const prepared = this.prepare(userId, prompt);

    let response: string;
    try {
      response = await this.backend.generate({
        model: this.model,
        systemPrompt: prepared.envelope.systemPrompt,
        userPrompt: prepared.envelope.userPrompt,
        params: {
          temperature: prepared.skill.temperature,
          maxTokens: prepared.skill.maxTokens,
        },
      });
    } catch (error) {
      PipelineLogger.backendFailure(this.backend.provider, error);
      return `${ERROR_PREFIX}Could not process request due to LLM communication failure: ${errorMessage(error)}`;
    }

    return appendRetrievalExtras(response, prepared.retrieval);
  }
}
