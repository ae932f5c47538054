/**
 * Prompt Pipeline
 *
 * Request classification, domain detection, knowledge retrieval, skill-aware
 * PQR prompt assembly and a mock generation backend.
 *
 * The plain functions below run against the shared tables in settings/.
 * Construct PipelineCore directly to use other tables or a custom profile store.
 */

import type {
  DomainProfile,
  PromptEnvelope,
  RetrievalResult,
  SkillParameters,
} from './shared/types/pipeline.js';
import type { AssembleOptions } from './prompt/prompt-assembler.js';
import { getPipelineCore } from './orchestration/pipeline-core.js';

export function classify(text: string | null | undefined): string {
  return getPipelineCore().requestClassifier.classify(text);
}

export function detectDomain(text: string | null | undefined): DomainProfile | null {
  return getPipelineCore().domainSpecializer.detect(text);
}

export function classifySubtask(text: string | null | undefined, domain?: DomainProfile | null): string {
  return getPipelineCore().subtaskClassifier.classify(text, domain);
}

export function retrieve(keywords: readonly string[]): RetrievalResult {
  return getPipelineCore().contextRetriever.retrieve(keywords);
}

export function resolveSkill(userId: string | null | undefined): SkillParameters {
  return getPipelineCore().skillResolver.resolve(userId);
}

export function assemblePrompt(
  query: string,
  skillGuidance: string,
  retrieval: RetrievalResult,
  options?: AssembleOptions
): PromptEnvelope {
  return getPipelineCore().promptAssembler.assemble(query, skillGuidance, retrieval, options);
}

export function synthesizeMock(text: string | null | undefined): string {
  return getPipelineCore().mockEngine.synthesize(text);
}

export function getFallbackPlan(category: string | null | undefined, domain?: DomainProfile | null): string[] {
  return getPipelineCore().fallbackPlans.getPlan(category, domain);
}

export { extractKeywords } from './classification/keyword-extractor.js';
export { RequestClassifier } from './classification/request-classifier.js';
export { DomainSpecializer } from './classification/domain-specializer.js';
export { SubtaskClassifier } from './classification/subtask-classifier.js';
export { ContextRetriever, NO_CONTEXT, truncationLimit } from './retrieval/context-retriever.js';
export { appendRetrievalExtras, formatRetrievalExtras } from './retrieval/extras-formatter.js';
export { InMemoryProfileStore, type UserProfileStore } from './skills/profile-store.js';
export { SkillResolver } from './skills/skill-resolver.js';
export { PromptAssembler, type AssembleOptions } from './prompt/prompt-assembler.js';
export { DomainEnhancer } from './prompt/domain-enhancer.js';
export { MockSynthesisEngine } from './mock/mock-synthesis-engine.js';
export { SeededRandom, type RandomSource } from './mock/seeded-random.js';
export { FallbackPlanStore } from './plans/fallback-plan-store.js';
export { parsePlan } from './plans/plan-parser.js';
export { createGenerationBackend, backendConfigFromEnv } from './llm-engine/engine-factory.js';
export { PipelineCore, getPipelineCore } from './orchestration/pipeline-core.js';
export { PromptPipeline, type PreparedPrompt } from './orchestration/prompt-pipeline.js';
export { TaskPlanner, type GeneratedPlan } from './orchestration/task-planner.js';
export { SettingsLoader, getSettingsLoader, createSettingsLoader } from './settings/settings-loader.js';
export { validateConfig } from './shared/config.js';
export {
  BackendConfigurationError,
  BackendTransportError,
  ERROR_PREFIX,
  SettingsValidationError,
  isErrorResponse,
} from './shared/errors.js';
export { PipelineLogger } from './shared/logger.js';
export type * from './shared/types/pipeline.js';
export type * from './shared/types/llm.js';
export type { PipelineSettings } from './settings/types.js';
