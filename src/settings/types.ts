/**
 * Settings Types
 *
 * Validated, frozen shape of the JSON tables under settings/.
 */

import type {
  DomainDefinition,
  KnowledgeEntry,
  SkillParameters,
  SubtaskPattern,
  UserProfile,
} from '../shared/types/pipeline.js';

export interface CategoryTrigger {
  name: string;
  triggers: readonly string[];
}

export interface RequestCategoryTable {
  defaultCategory: string;
  /** Returned by the complex-task path when no category matched */
  complexFallbackCategory: string;
  complexWordThreshold: number;
  scaleIndicators: readonly string[];
  /** Declared order is the tie-break order */
  categories: readonly CategoryTrigger[];
}

export interface DomainTable {
  terminalSubtaskType: string;
  genericSubtasks: readonly SubtaskPattern[];
  domains: readonly DomainDefinition[];
}

export interface SkillTierTable {
  defaultTier: string;
  tiers: readonly string[];
  parameters: Readonly<Record<string, SkillParameters>>;
}

export interface FallbackPlanTable {
  defaultPlan: string;
  plans: Readonly<Record<string, readonly string[]>>;
}

export type SlotSpec =
  | { kind: 'int'; min: number; max: number }
  | { kind: 'float'; min: number; max: number; precision: number }
  | { kind: 'choice'; options: readonly string[] };

export interface DomainTemplate {
  subtask: string;
  patterns: readonly string[];
  template: string;
  slots: Readonly<Record<string, SlotSpec>>;
}

export interface TechnicalTerm {
  term: string;
  category: string;
}

export interface KeywordBucket {
  category: string;
  cues: readonly string[];
}

export interface MockResponseTable {
  marker: string;
  defaultCategory: string;
  entityCategory: string;
  fallbackTopic: string;
  templates: Readonly<Record<string, readonly string[]>>;
  technicalTerms: readonly TechnicalTerm[];
  keywordBuckets: readonly KeywordBucket[];
  topicStopWords: readonly string[];
  domainTemplates: Readonly<Record<string, readonly DomainTemplate[]>>;
}

export interface StageGuidance {
  subtaskCues: readonly string[];
  /** When present, the request must also contain one of these */
  requestCues?: readonly string[];
  instruction: string;
}

export interface PromptTemplates {
  persona: string;
  /** Contains the [topic] placeholder */
  restrictions: string;
  genericTopic: string;
  contextInstruction: string;
  formalTone: { cues: readonly string[]; instruction: string };
  plannerTemplate: string;
  executorTemplate: string;
  categoryGuidance: Readonly<Record<string, string>>;
  subtaskGuidance: Readonly<Record<string, string>>;
  /** Checked in declared order, first match wins */
  stageGuidance: Readonly<Record<string, StageGuidance>>;
}

/**
 * All static tables, loaded once and shared read-only
 */
export interface PipelineSettings {
  requestCategories: RequestCategoryTable;
  domains: DomainTable;
  knowledgeBase: readonly KnowledgeEntry[];
  skillTiers: SkillTierTable;
  userProfiles: Readonly<Record<string, UserProfile>>;
  fallbackPlans: FallbackPlanTable;
  mockResponses: MockResponseTable;
  promptTemplates: PromptTemplates;
}
