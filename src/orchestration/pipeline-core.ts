/**
 * Pipeline Core
 *
 * Wires every pipeline stage to one frozen settings snapshot. Stages are pure
 * over those tables, so one instance can serve concurrent requests.
 */

import { MOCK_SEED } from '../shared/config.js';
import type { PipelineSettings } from '../settings/types.js';
import { getSettingsLoader } from '../settings/settings-loader.js';
import { RequestClassifier } from '../classification/request-classifier.js';
import { DomainSpecializer } from '../classification/domain-specializer.js';
import { SubtaskClassifier } from '../classification/subtask-classifier.js';
import { ContextRetriever } from '../retrieval/context-retriever.js';
import { InMemoryProfileStore, type UserProfileStore } from '../skills/profile-store.js';
import { SkillResolver } from '../skills/skill-resolver.js';
import { PromptAssembler } from '../prompt/prompt-assembler.js';
import { DomainEnhancer } from '../prompt/domain-enhancer.js';
import { MockSynthesisEngine } from '../mock/mock-synthesis-engine.js';
import { SeededRandom, type RandomSource } from '../mock/seeded-random.js';
import { FallbackPlanStore } from '../plans/fallback-plan-store.js';

export interface PipelineCoreOptions {
  /** Defaults to the profiles in settings/user-profiles.json */
  profileStore?: UserProfileStore;
  /** Random source for mock synthesis; seeded from MOCK_SEED by default */
  random?: RandomSource;
}

export class PipelineCore {
  readonly requestClassifier: RequestClassifier;
  readonly domainSpecializer: DomainSpecializer;
  readonly subtaskClassifier: SubtaskClassifier;
  readonly contextRetriever: ContextRetriever;
  readonly skillResolver: SkillResolver;
  readonly promptAssembler: PromptAssembler;
  readonly domainEnhancer: DomainEnhancer;
  readonly mockEngine: MockSynthesisEngine;
  readonly fallbackPlans: FallbackPlanStore;

  constructor(
    readonly settings: PipelineSettings,
    options: PipelineCoreOptions = {}
  ) {
    const profileStore = options.profileStore ?? new InMemoryProfileStore(settings.userProfiles);
    const random = options.random ?? new SeededRandom(MOCK_SEED);

    this.requestClassifier = new RequestClassifier(settings.requestCategories);
    this.domainSpecializer = new DomainSpecializer(settings.domains);
    this.subtaskClassifier = new SubtaskClassifier(settings.domains);
    this.contextRetriever = new ContextRetriever(settings.knowledgeBase);
    this.skillResolver = new SkillResolver(settings.skillTiers, profileStore);
    this.promptAssembler = new PromptAssembler(settings.promptTemplates);
    this.domainEnhancer = new DomainEnhancer(settings.promptTemplates);
    this.mockEngine = new MockSynthesisEngine(settings.mockResponses, settings.domains, random);
    this.fallbackPlans = new FallbackPlanStore(settings.fallbackPlans);
  }
}

let coreInstance: PipelineCore | null = null;

/**
 * Get the shared PipelineCore built from the default settings directory
 */
export function getPipelineCore(): PipelineCore {
  if (!coreInstance) {
    coreInstance = new PipelineCore(getSettingsLoader().getSettings());
  }
  return coreInstance;
}
