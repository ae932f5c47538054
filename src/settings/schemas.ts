/**
 * Zod schemas for the JSON tables under settings/.
 *
 * File-level schemas take list and map entries as `unknown` so the loader can
 * validate each entry on its own and skip the malformed ones.
 */

import { z } from 'zod';

const Phrase = z.string().min(1);
const PhraseList = z.array(Phrase).min(1);

// ============================================================================
// Request categories
// ============================================================================

export const CategoryTriggerSchema = z.object({
  name: Phrase,
  triggers: PhraseList,
});

export const RequestCategoriesFileSchema = z.object({
  defaultCategory: Phrase,
  complexFallbackCategory: Phrase,
  complexWordThreshold: z.number().int().min(0),
  scaleIndicators: z.array(Phrase),
  categories: z.array(z.unknown()),
});

// ============================================================================
// Domains and subtask taxonomies
// ============================================================================

export const SubtaskPatternSchema = z.object({
  type: Phrase,
  patterns: PhraseList,
});

export const DomainSchema = z.object({
  name: Phrase,
  keywords: PhraseList,
  subtasks: z.array(SubtaskPatternSchema),
  guidance: z.string(),
  preferredCategory: Phrase,
});

export const DomainsFileSchema = z.object({
  terminalSubtaskType: Phrase,
  genericSubtasks: z.array(z.unknown()),
  domains: z.array(z.unknown()),
});

// ============================================================================
// Knowledge base
// ============================================================================

export const KnowledgeEntrySchema = z.object({
  topic: Phrase,
  keywords: PhraseList,
  context: Phrase,
  tips: z.array(Phrase).default([]),
  offers: z.array(Phrase).default([]),
  relatedDocs: z.array(Phrase).default([]),
});

export const KnowledgeBaseFileSchema = z.object({
  topics: z.array(z.unknown()),
});

// ============================================================================
// Skill tiers and user profiles
// ============================================================================

export const SkillParametersSchema = z.object({
  guidance: z.string(),
  temperature: z.number().min(0).max(1),
  maxTokens: z.number().int().positive(),
});

export const SkillTiersFileSchema = z.object({
  defaultTier: Phrase,
  tiers: PhraseList,
  parameters: z.record(z.unknown()),
});

export const UserProfileSchema = z.object({
  name: z.string().optional(),
  skillLevel: z.string().optional(),
});

export const UserProfilesFileSchema = z.object({
  profiles: z.record(z.unknown()),
});

// ============================================================================
// Fallback plans
// ============================================================================

export const PlanStepsSchema = z.array(Phrase).min(3).max(7);

export const FallbackPlansFileSchema = z.object({
  defaultPlan: Phrase,
  plans: z.record(z.unknown()),
});

// ============================================================================
// Mock responses
// ============================================================================

export const SlotSpecSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('int'),
    min: z.number().int(),
    max: z.number().int(),
  }),
  z.object({
    kind: z.literal('float'),
    min: z.number(),
    max: z.number(),
    precision: z.number().int().min(0).max(6),
  }),
  z.object({
    kind: z.literal('choice'),
    options: PhraseList,
  }),
]).refine((slot) => slot.kind === 'choice' || slot.min <= slot.max, {
  message: 'min must not exceed max',
});

export const DomainTemplateSchema = z.object({
  subtask: Phrase,
  patterns: PhraseList,
  template: Phrase,
  slots: z.record(SlotSpecSchema).default({}),
});

export const TemplateListSchema = PhraseList;

export const TechnicalTermSchema = z.object({
  term: Phrase,
  category: Phrase,
});

export const KeywordBucketSchema = z.object({
  category: Phrase,
  cues: PhraseList,
});

export const MockResponsesFileSchema = z.object({
  marker: Phrase,
  defaultCategory: Phrase,
  entityCategory: Phrase,
  fallbackTopic: Phrase,
  templates: z.record(z.unknown()),
  technicalTerms: z.array(z.unknown()),
  keywordBuckets: z.array(z.unknown()),
  topicStopWords: z.array(Phrase),
  domainTemplates: z.record(z.array(z.unknown())),
});

// ============================================================================
// Prompt templates
// ============================================================================

export const StageGuidanceSchema = z.object({
  subtaskCues: PhraseList,
  requestCues: PhraseList.optional(),
  instruction: Phrase,
});

export const PromptTemplatesFileSchema = z.object({
  persona: Phrase,
  restrictions: Phrase,
  genericTopic: Phrase,
  contextInstruction: Phrase,
  formalTone: z.object({
    cues: z.array(Phrase),
    instruction: Phrase,
  }),
  plannerTemplate: Phrase.refine((t) => t.includes('{request}'), {
    message: 'plannerTemplate must contain {request}',
  }),
  executorTemplate: Phrase.refine((t) => t.includes('{subtask}'), {
    message: 'executorTemplate must contain {subtask}',
  }),
  categoryGuidance: z.record(z.string()),
  subtaskGuidance: z.record(z.string()),
  stageGuidance: z.record(StageGuidanceSchema),
});
