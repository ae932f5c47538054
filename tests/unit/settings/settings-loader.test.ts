/**
 * Settings Loader - Unit Tests
 *
 * Loads the real tables, then breaks single files in a temp copy to check
 * which problems are skipped and which abort loading.
 */

import * as fs from 'fs';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SettingsLoader, SETTINGS_FILES, createSettingsLoader } from '../../../src/settings/settings-loader.js';
import { SettingsValidationError } from '../../../src/shared/errors.js';
import {
  SETTINGS_PATH,
  copySettingsToTemp,
  readSettingsFile,
  writeSettingsFile,
} from '../../setup.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read a settings file as a mutable object
 */
function readObject(dir: string, file: string): Record<string, unknown> {
  const data = readSettingsFile(dir, file);
  if (!isRecord(data)) {
    throw new Error(`${file} is not an object`);
  }
  return data;
}

describe('SettingsLoader', () => {
  describe('repository settings', () => {
    const loader = createSettingsLoader(SETTINGS_PATH);
    const settings = loader.load();

    it('loads categories in declared order', () => {
      expect(settings.requestCategories.categories.map((c) => c.name)).toEqual([
        'data-science',
        'analyze',
        'design',
        'write',
        'develop',
      ]);
      expect(settings.requestCategories.defaultCategory).toBe('default');
      expect(settings.requestCategories.complexFallbackCategory).toBe('data-science');
      expect(settings.requestCategories.complexWordThreshold).toBe(15);
    });

    it('loads every domain and knowledge topic', () => {
      expect(settings.domains.domains.map((d) => d.name)).toEqual([
        'cloud_computing',
        'ai_ml',
        'healthcare_tech',
        'cybersecurity',
        'web_development',
      ]);
      expect(settings.knowledgeBase.map((e) => e.topic)).toEqual([
        'home_financing',
        'savings_plans',
        'career_mobility',
        'learning_platform',
        'data_privacy',
        'developer_onboarding',
        'customer_support',
        'sustainability',
      ]);
    });

    it('gives every declared tier its parameters', () => {
      expect(settings.skillTiers.tiers).toEqual(['BEGINNER', 'INTERMEDIATE', 'EXPERT', 'AMBASSADOR_TRAINEE']);
      for (const tier of settings.skillTiers.tiers) {
        expect(settings.skillTiers.parameters[tier].tier).toBe(tier);
      }
    });

    it('keeps every fallback plan between 3 and 7 steps', () => {
      for (const steps of Object.values(settings.fallbackPlans.plans)) {
        expect(steps.length).toBeGreaterThanOrEqual(3);
        expect(steps.length).toBeLessThanOrEqual(7);
      }
    });

    it('freezes the loaded tables deeply', () => {
      expect(Object.isFrozen(settings)).toBe(true);
      expect(Object.isFrozen(settings.knowledgeBase)).toBe(true);
      expect(Object.isFrozen(settings.knowledgeBase[0].offers)).toBe(true);
      expect(Object.isFrozen(settings.skillTiers.parameters.EXPERT)).toBe(true);
    });

    it('caches the settings after the first load', () => {
      expect(loader.getSettings()).toBe(settings);
    });

    it('uses the configured directory by default', () => {
      expect(new SettingsLoader().getSettingsDir()).toBe(SETTINGS_PATH);
    });
  });

  describe('validation policy', () => {
    let dir: string;

    beforeEach(() => {
      dir = copySettingsToTemp();
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('skips a malformed knowledge entry', () => {
      const kb = readObject(dir, SETTINGS_FILES.knowledgeBase);
      const topics = Array.isArray(kb.topics) ? kb.topics : [];
      kb.topics = [...topics, { topic: 'broken', context: 'No keywords here.' }];
      writeSettingsFile(dir, SETTINGS_FILES.knowledgeBase, kb);

      const settings = createSettingsLoader(dir).load();

      expect(settings.knowledgeBase).toHaveLength(8);
      expect(settings.knowledgeBase.some((e) => e.topic === 'broken')).toBe(false);
    });

    it('rejects duplicate topic ids', () => {
      const kb = readObject(dir, SETTINGS_FILES.knowledgeBase);
      const topics = Array.isArray(kb.topics) ? kb.topics : [];
      kb.topics = [...topics, { topic: 'home_financing', keywords: ['house'], context: 'Again.' }];
      writeSettingsFile(dir, SETTINGS_FILES.knowledgeBase, kb);

      expect(() => createSettingsLoader(dir).load()).toThrow(
        "Invalid settings in knowledge-base.json: duplicate topic id 'home_financing'"
      );
    });

    it('rejects a declared tier without parameters', () => {
      const tiers = readObject(dir, SETTINGS_FILES.skillTiers);
      if (isRecord(tiers.parameters)) {
        delete tiers.parameters.EXPERT;
      }
      writeSettingsFile(dir, SETTINGS_FILES.skillTiers, tiers);

      expect(() => createSettingsLoader(dir).load()).toThrow(
        "Invalid settings in skill-tiers.json: declared tier 'EXPERT' has no parameters"
      );
    });

    it('rejects an undeclared default tier', () => {
      const tiers = readObject(dir, SETTINGS_FILES.skillTiers);
      tiers.defaultTier = 'novice';
      writeSettingsFile(dir, SETTINGS_FILES.skillTiers, tiers);

      expect(() => createSettingsLoader(dir).load()).toThrow("default tier 'NOVICE' is not declared");
    });

    it('skips plans outside 3 to 7 steps and fails when the default plan goes', () => {
      const plans = readObject(dir, SETTINGS_FILES.fallbackPlans);
      if (isRecord(plans.plans)) {
        plans.plans.write = ['1', '2', '3', '4', '5', '6', '7', '8'];
      }
      writeSettingsFile(dir, SETTINGS_FILES.fallbackPlans, plans);
      expect(createSettingsLoader(dir).load().fallbackPlans.plans.write).toBeUndefined();

      if (isRecord(plans.plans)) {
        plans.plans.default = ['Only', 'two'];
      }
      writeSettingsFile(dir, SETTINGS_FILES.fallbackPlans, plans);
      expect(() => createSettingsLoader(dir).load()).toThrow(
        "Invalid settings in fallback-plans.json: default plan 'default' is missing or invalid"
      );
    });

    it('rejects default mock templates without the marker', () => {
      const mock = readObject(dir, SETTINGS_FILES.mockResponses);
      if (isRecord(mock.templates)) {
        mock.templates.default = ['Plain answer about {topic}'];
      }
      writeSettingsFile(dir, SETTINGS_FILES.mockResponses, mock);

      expect(() => createSettingsLoader(dir).load()).toThrow(
        "every 'default' template must contain [MOCK]"
      );
    });

    it('skips domain templates for unknown domains', () => {
      const mock = readObject(dir, SETTINGS_FILES.mockResponses);
      if (isRecord(mock.domainTemplates)) {
        mock.domainTemplates.space_travel = [
          { subtask: 'research', patterns: ['orbit'], template: '[MOCK] {topic}' },
        ];
      }
      writeSettingsFile(dir, SETTINGS_FILES.mockResponses, mock);

      const settings = createSettingsLoader(dir).load();
      expect(Object.keys(settings.mockResponses.domainTemplates)).not.toContain('space_travel');
      expect(settings.mockResponses.domainTemplates.cloud_computing).toHaveLength(3);
    });

    it('fails on a missing file', () => {
      fs.rmSync(`${dir}/${SETTINGS_FILES.domains}`);

      expect(() => createSettingsLoader(dir).load()).toThrow(SettingsValidationError);
    });

    it('fails on invalid JSON', () => {
      fs.writeFileSync(`${dir}/${SETTINGS_FILES.promptTemplates}`, '{ not json');

      expect(() => createSettingsLoader(dir).load()).toThrow(/^Invalid settings in prompt-templates\.json: /);
    });

    it('fails when a planner template lacks its placeholder', () => {
      const templates = readObject(dir, SETTINGS_FILES.promptTemplates);
      templates.plannerTemplate = 'Make a plan.';
      writeSettingsFile(dir, SETTINGS_FILES.promptTemplates, templates);

      expect(() => createSettingsLoader(dir).load()).toThrow(
        'Invalid settings in prompt-templates.json: plannerTemplate: plannerTemplate must contain {request}'
      );
    });
  });
});
