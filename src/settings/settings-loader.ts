/**
 * Settings Loader
 *
 * Loads the static pipeline tables from settings/*.json, validates them with zod
 * and freezes the result. Loading is the single initialization step; every
 * request afterwards only reads the frozen tables.
 *
 * Validation policy:
 * - a malformed list or map entry is logged and skipped
 * - a broken structural contract throws SettingsValidationError
 *   (unreadable file, missing default category/tier/plan, declared tier
 *   without parameters, duplicate topic ids)
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { SETTINGS_DIR } from '../shared/config.js';
import { SettingsValidationError } from '../shared/errors.js';
import { PipelineLogger } from '../shared/logger.js';
import type {
  DomainDefinition,
  KnowledgeEntry,
  SkillParameters,
  SubtaskPattern,
  UserProfile,
} from '../shared/types/pipeline.js';
import {
  CategoryTriggerSchema,
  DomainSchema,
  DomainTemplateSchema,
  DomainsFileSchema,
  FallbackPlansFileSchema,
  KeywordBucketSchema,
  KnowledgeBaseFileSchema,
  KnowledgeEntrySchema,
  MockResponsesFileSchema,
  PlanStepsSchema,
  PromptTemplatesFileSchema,
  RequestCategoriesFileSchema,
  SkillParametersSchema,
  SkillTiersFileSchema,
  SubtaskPatternSchema,
  TechnicalTermSchema,
  TemplateListSchema,
  UserProfileSchema,
  UserProfilesFileSchema,
} from './schemas.js';
import type {
  CategoryTrigger,
  DomainTable,
  DomainTemplate,
  FallbackPlanTable,
  MockResponseTable,
  PipelineSettings,
  PromptTemplates,
  RequestCategoryTable,
  SkillTierTable,
} from './types.js';

export const SETTINGS_FILES = {
  requestCategories: 'request-categories.json',
  domains: 'domains.json',
  knowledgeBase: 'knowledge-base.json',
  skillTiers: 'skill-tiers.json',
  userProfiles: 'user-profiles.json',
  fallbackPlans: 'fallback-plans.json',
  mockResponses: 'mock-responses.json',
  promptTemplates: 'prompt-templates.json',
} as const;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Settings Loader
 */
export class SettingsLoader {
  private settings: PipelineSettings | null = null;
  private readonly settingsDir: string;

  constructor(settingsDir?: string) {
    this.settingsDir = settingsDir || SETTINGS_DIR;
  }

  getSettingsDir(): string {
    return this.settingsDir;
  }

  /**
   * Load, validate and freeze every table
   */
  load(): PipelineSettings {
    const domains = this.loadDomains();
    const settings: PipelineSettings = {
      requestCategories: this.loadRequestCategories(),
      domains,
      knowledgeBase: this.loadKnowledgeBase(),
      skillTiers: this.loadSkillTiers(),
      userProfiles: this.loadUserProfiles(),
      fallbackPlans: this.loadFallbackPlans(),
      mockResponses: this.loadMockResponses(domains.domains.map((d) => d.name)),
      promptTemplates: this.loadPromptTemplates(),
    };

    this.settings = deepFreeze(settings);
    return this.settings;
  }

  /**
   * Get settings (loads if not loaded)
   */
  getSettings(): PipelineSettings {
    if (!this.settings) {
      return this.load();
    }
    return this.settings;
  }

  private loadRequestCategories(): RequestCategoryTable {
    const file = SETTINGS_FILES.requestCategories;
    const raw = this.parseFile(file, RequestCategoriesFileSchema);

    const categories = this.uniqueBy(
      file,
      this.parseList(file, 'categories', raw.categories, CategoryTriggerSchema),
      (c: CategoryTrigger) => c.name
    );
    if (categories.length === 0) {
      throw new SettingsValidationError(file, 'no valid categories declared');
    }

    PipelineLogger.settingsLoaded(file, categories.length);
    return {
      defaultCategory: raw.defaultCategory,
      complexFallbackCategory: raw.complexFallbackCategory,
      complexWordThreshold: raw.complexWordThreshold,
      scaleIndicators: raw.scaleIndicators,
      categories,
    };
  }

  private loadDomains(): DomainTable {
    const file = SETTINGS_FILES.domains;
    const raw = this.parseFile(file, DomainsFileSchema);

    const genericSubtasks: SubtaskPattern[] = this.parseList(
      file,
      'genericSubtasks',
      raw.genericSubtasks,
      SubtaskPatternSchema
    );
    const domains: DomainDefinition[] = this.uniqueBy(
      file,
      this.parseList(file, 'domains', raw.domains, DomainSchema),
      (d: DomainDefinition) => d.name
    );

    PipelineLogger.settingsLoaded(file, domains.length);
    return {
      terminalSubtaskType: raw.terminalSubtaskType,
      genericSubtasks,
      domains,
    };
  }

  private loadKnowledgeBase(): KnowledgeEntry[] {
    const file = SETTINGS_FILES.knowledgeBase;
    const raw = this.parseFile(file, KnowledgeBaseFileSchema);
    const entries = this.parseList(file, 'topics', raw.topics, KnowledgeEntrySchema);

    const seen = new Set<string>();
    for (const entry of entries) {
      if (seen.has(entry.topic)) {
        throw new SettingsValidationError(file, `duplicate topic id '${entry.topic}'`);
      }
      seen.add(entry.topic);
    }

    PipelineLogger.settingsLoaded(file, entries.length);
    return entries;
  }

  private loadSkillTiers(): SkillTierTable {
    const file = SETTINGS_FILES.skillTiers;
    const raw = this.parseFile(file, SkillTiersFileSchema);

    const tiers = [...new Set(raw.tiers.map((t) => t.trim().toUpperCase()))];
    const defaultTier = raw.defaultTier.trim().toUpperCase();
    if (!tiers.includes(defaultTier)) {
      throw new SettingsValidationError(file, `default tier '${defaultTier}' is not declared`);
    }

    const parameters: Record<string, SkillParameters> = {};
    for (const tier of tiers) {
      const entry = raw.parameters[tier];
      if (entry === undefined) {
        throw new SettingsValidationError(file, `declared tier '${tier}' has no parameters`);
      }
      const result = SkillParametersSchema.safeParse(entry);
      if (!result.success) {
        throw new SettingsValidationError(file, `parameters for '${tier}': ${formatIssues(result.error)}`);
      }
      parameters[tier] = { tier, ...result.data };
    }

    for (const key of Object.keys(raw.parameters)) {
      if (!tiers.includes(key)) {
        PipelineLogger.settingsEntrySkipped(file, `parameters.${key}`, 'tier is not declared');
      }
    }

    PipelineLogger.settingsLoaded(file, tiers.length);
    return { defaultTier, tiers, parameters };
  }

  private loadUserProfiles(): Record<string, UserProfile> {
    const file = SETTINGS_FILES.userProfiles;
    const raw = this.parseFile(file, UserProfilesFileSchema);
    const profiles = this.parseRecord(file, 'profiles', raw.profiles, UserProfileSchema);

    PipelineLogger.settingsLoaded(file, Object.keys(profiles).length);
    return profiles;
  }

  private loadFallbackPlans(): FallbackPlanTable {
    const file = SETTINGS_FILES.fallbackPlans;
    const raw = this.parseFile(file, FallbackPlansFileSchema);
    const plans = this.parseRecord(file, 'plans', raw.plans, PlanStepsSchema);

    if (plans[raw.defaultPlan] === undefined) {
      throw new SettingsValidationError(file, `default plan '${raw.defaultPlan}' is missing or invalid`);
    }

    PipelineLogger.settingsLoaded(file, Object.keys(plans).length);
    return { defaultPlan: raw.defaultPlan, plans };
  }

  private loadMockResponses(domainNames: string[]): MockResponseTable {
    const file = SETTINGS_FILES.mockResponses;
    const raw = this.parseFile(file, MockResponsesFileSchema);

    const templates = this.parseRecord(file, 'templates', raw.templates, TemplateListSchema);
    const defaults = templates[raw.defaultCategory];
    if (defaults === undefined) {
      throw new SettingsValidationError(file, `no templates for default category '${raw.defaultCategory}'`);
    }
    if (defaults.some((t) => !t.includes(raw.marker))) {
      throw new SettingsValidationError(file, `every '${raw.defaultCategory}' template must contain ${raw.marker}`);
    }

    const domainTemplates: Record<string, DomainTemplate[]> = {};
    for (const [domain, entries] of Object.entries(raw.domainTemplates)) {
      if (!domainNames.includes(domain)) {
        PipelineLogger.settingsEntrySkipped(file, `domainTemplates.${domain}`, 'unknown domain');
        continue;
      }
      domainTemplates[domain] = this.parseList(file, `domainTemplates.${domain}`, entries, DomainTemplateSchema);
    }

    PipelineLogger.settingsLoaded(file, Object.keys(templates).length);
    return {
      marker: raw.marker,
      defaultCategory: raw.defaultCategory,
      entityCategory: raw.entityCategory,
      fallbackTopic: raw.fallbackTopic,
      templates,
      technicalTerms: this.parseList(file, 'technicalTerms', raw.technicalTerms, TechnicalTermSchema),
      keywordBuckets: this.parseList(file, 'keywordBuckets', raw.keywordBuckets, KeywordBucketSchema),
      topicStopWords: raw.topicStopWords.map((w) => w.toLowerCase()),
      domainTemplates,
    };
  }

  private loadPromptTemplates(): PromptTemplates {
    const file = SETTINGS_FILES.promptTemplates;
    const templates = this.parseFile(file, PromptTemplatesFileSchema);
    PipelineLogger.settingsLoaded(file, Object.keys(templates).length);
    return templates;
  }

  /**
   * Read a file and validate its top-level shape; any failure throws
   */
  private parseFile<T>(file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
    const filePath = path.join(this.settingsDir, file);
    if (!fs.existsSync(filePath)) {
      throw new SettingsValidationError(file, `file not found at ${filePath}`);
    }

    let content: unknown;
    try {
      content = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
      throw new SettingsValidationError(file, error instanceof Error ? error.message : String(error));
    }

    const result = schema.safeParse(content);
    if (!result.success) {
      throw new SettingsValidationError(file, formatIssues(result.error));
    }
    return result.data;
  }

  private parseList<T>(
    file: string,
    field: string,
    entries: unknown[],
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): T[] {
    const valid: T[] = [];
    entries.forEach((entry, index) => {
      const result = schema.safeParse(entry);
      if (result.success) {
        valid.push(result.data);
      } else {
        PipelineLogger.settingsEntrySkipped(file, `${field}[${index}]`, formatIssues(result.error));
      }
    });
    return valid;
  }

  private parseRecord<T>(
    file: string,
    field: string,
    entries: Record<string, unknown>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Record<string, T> {
    const valid: Record<string, T> = {};
    for (const [key, entry] of Object.entries(entries)) {
      const result = schema.safeParse(entry);
      if (result.success) {
        valid[key] = result.data;
      } else {
        PipelineLogger.settingsEntrySkipped(file, `${field}.${key}`, formatIssues(result.error));
      }
    }
    return valid;
  }

  /**
   * Keep the first entry per key, skip later duplicates
   */
  private uniqueBy<T>(file: string, entries: T[], key: (entry: T) => string): T[] {
    const seen = new Set<string>();
    return entries.filter((entry) => {
      const k = key(entry);
      if (seen.has(k)) {
        PipelineLogger.settingsEntrySkipped(file, k, 'duplicate name');
        return false;
      }
      seen.add(k);
      return true;
    });
  }
}

let loaderInstance: SettingsLoader | null = null;

/**
 * Get the singleton SettingsLoader instance
 */
export function getSettingsLoader(): SettingsLoader {
  if (!loaderInstance) {
    loaderInstance = new SettingsLoader();
  }
  return loaderInstance;
}

/**
 * Create a SettingsLoader reading from a custom directory
 */
export function createSettingsLoader(settingsDir: string): SettingsLoader {
  return new SettingsLoader(settingsDir);
}
