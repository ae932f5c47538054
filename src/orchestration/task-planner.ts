/**
 * Task Planner
 *
 * Breaks a request into subtasks with the generation backend and executes
 * them one by one. An unparseable plan or a failed planner call falls back
 * to the canned plans; a failed subtask call records an error string and the
 * remaining subtasks still run.
 */

import {
  MODEL_EXECUTOR,
  MODEL_PLANNER,
  PLANNER_MAX_TOKENS,
  PLANNER_TEMPERATURE,
} from '../shared/config.js';
import { ERROR_PREFIX, errorMessage } from '../shared/errors.js';
import { PipelineLogger } from '../shared/logger.js';
import type { GenerationBackend, GenerationParams } from '../shared/types/llm.js';
import type { DomainProfile, PlanAndResults, SubtaskRecord } from '../shared/types/pipeline.js';
import { renderTemplate } from '../shared/utils/render-template.js';
import { parsePlan } from '../plans/plan-parser.js';
import type { PipelineCore } from './pipeline-core.js';

export interface TaskPlannerOptions {
  plannerModel?: string;
  executorModel?: string;
  temperature?: number;
  maxTokens?: number;
}

export interface GeneratedPlan {
  category: string;
  domain: DomainProfile | null;
  subtasks: string[];
  usedFallbackPlan: boolean;
}

export class TaskPlanner {
  private readonly plannerModel: string;
  private readonly executorModel: string;
  private readonly params: GenerationParams;

  constructor(
    private readonly core: PipelineCore,
    private readonly backend: GenerationBackend,
    options: TaskPlannerOptions = {}
  ) {
    this.plannerModel = options.plannerModel || MODEL_PLANNER;
    this.executorModel = options.executorModel || MODEL_EXECUTOR;
    this.params = {
      temperature: options.temperature ?? PLANNER_TEMPERATURE,
      maxTokens: options.maxTokens ?? PLANNER_MAX_TOKENS,
    };
  }

  async generatePlan(request: string): Promise<GeneratedPlan> {
    const category = this.core.requestClassifier.classify(request);
    const domain = this.core.domainSpecializer.detect(request);
    const templates = this.core.settings.promptTemplates;

    const systemPrompt = this.core.domainEnhancer.enhance(
      renderTemplate(templates.plannerTemplate, { request }),
      { request, category, domain }
    );

    let subtasks: string[] = [];
    let reason = 'plan output had no numbered steps';
    try {
      const planText = await this.backend.generate({
        model: this.plannerModel,
        systemPrompt,
        userPrompt: request,
        params: this.params,
      });
      subtasks = parsePlan(planText);
    } catch (error) {
      reason = `planner call failed: ${errorMessage(error)}`;
    }

    if (subtasks.length > 0) {
      return { category, domain, subtasks, usedFallbackPlan: false };
    }

    PipelineLogger.fallbackPlanUsed(this.core.fallbackPlans.resolveKey(category, domain), reason);
    return {
      category,
      domain,
      subtasks: this.core.fallbackPlans.getPlan(category, domain),
      usedFallbackPlan: true,
    };
  }

  async executeSubtasks(
    request: string,
    subtasks: readonly string[],
    context: { category: string; domain: DomainProfile | null }
  ): Promise<SubtaskRecord[]> {
    const templates = this.core.settings.promptTemplates;
    const records: SubtaskRecord[] = [];

    for (const task of subtasks) {
      const type = this.core.subtaskClassifier.classify(task, context.domain);
      const systemPrompt = this.core.domainEnhancer.enhanceSubtask(
        renderTemplate(templates.executorTemplate, { request, subtask: task }),
        { request, category: context.category, domain: context.domain, subtask: task, subtaskType: type }
      );

      let result: string;
      try {
        result = await this.backend.generate({
          model: this.executorModel,
          systemPrompt,
          userPrompt: task,
          params: this.params,
        });
      } catch (error) {
        PipelineLogger.backendFailure(this.backend.provider, error);
        result = `${ERROR_PREFIX}${errorMessage(error)}`;
      }

      records.push({ task, result, type });
    }

    return records;
  }

  async generatePlanAndResults(request: string): Promise<PlanAndResults> {
    const plan = await this.generatePlan(request);
    const results = await this.executeSubtasks(request, plan.subtasks, plan);
    return { ...plan, results };
  }
}
