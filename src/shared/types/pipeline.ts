/**
 * Pipeline Types
 *
 * Data passed between classification, retrieval, skill resolution and prompt assembly.
 * Category and subtask labels are plain strings because the tables that declare
 * them live in settings/.
 */

/**
 * Knowledge base entry, keyed by topic id
 */
export interface KnowledgeEntry {
  topic: string;
  /** Compared case-insensitively */
  keywords: readonly string[];
  context: string;
  tips: readonly string[];
  offers: readonly string[];
  relatedDocs: readonly string[];
}

/**
 * Subtask type with its trigger terms (substring match)
 */
export interface SubtaskPattern {
  type: string;
  patterns: readonly string[];
}

/**
 * Static domain table row
 */
export interface DomainDefinition {
  name: string;
  keywords: readonly string[];
  subtasks: readonly SubtaskPattern[];
  guidance: string;
  preferredCategory: string;
}

/**
 * Result of domain detection; absence is `null`
 */
export interface DomainProfile {
  name: string;
  /** First keyword in table order found in the text */
  matchedKeyword: string;
  subtasks: readonly SubtaskPattern[];
  guidance: string;
  preferredCategory: string;
}

export interface ClassificationDetail {
  category: string;
  complex: boolean;
  counts: Record<string, number>;
}

/**
 * Retrieval output. `context` is NO_CONTEXT when nothing matched.
 */
export interface RetrievalResult {
  context: string;
  /**
   * Deduplicated, in knowledge base table order. This is not keyword order:
   * `['career', 'mortgage']` still lists home_financing before career_mobility.
   */
  matchedTopics: string[];
  offersByTopic: Record<string, string[]>;
  docsByTopic: Record<string, string[]>;
}

export interface SkillParameters {
  tier: string;
  guidance: string;
  temperature: number;
  maxTokens: number;
}

export interface UserProfile {
  name?: string;
  skillLevel?: string;
}

export type PromptSectionKind = 'persona' | 'skill-guidance' | 'context' | 'restrictions';

export interface PromptSection {
  kind: PromptSectionKind;
  text: string;
}

/**
 * Assembled PQR prompt
 */
export interface PromptEnvelope {
  sections: PromptSection[];
  systemPrompt: string;
  /** Original query, unmodified */
  userPrompt: string;
}

export interface SubtaskRecord {
  task: string;
  result: string;
  type: string;
}

export interface PlanAndResults {
  category: string;
  domain: DomainProfile | null;
  subtasks: string[];
  results: SubtaskRecord[];
  usedFallbackPlan: boolean;
}
