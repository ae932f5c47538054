/**
 * Domain Enhancer
 *
 * Appends category, domain, tone, subtask and stage guidance to planner and
 * executor prompts.
 */

import type { DomainProfile } from '../shared/types/pipeline.js';
import type { PromptTemplates } from '../settings/types.js';

export interface EnhanceContext {
  request: string;
  category?: string;
  domain?: DomainProfile | null;
}

export interface SubtaskEnhanceContext extends EnhanceContext {
  subtask: string;
  subtaskType?: string;
}

function capitalize(label: string): string {
  return label.charAt(0).toUpperCase() + label.slice(1);
}

function containsAny(lowered: string, cues: readonly string[]): boolean {
  return cues.some((cue) => lowered.includes(cue.toLowerCase()));
}

export class DomainEnhancer {
  constructor(private readonly templates: PromptTemplates) {}

  enhance(prompt: string, context: EnhanceContext): string {
    return [prompt, ...this.requestBlocks(context)].join('\n\n');
  }

  enhanceSubtask(prompt: string, context: SubtaskEnhanceContext): string {
    const blocks = this.requestBlocks(context);

    if (context.subtaskType) {
      const guidance = this.templates.subtaskGuidance[context.subtaskType];
      if (guidance) {
        blocks.push(`Subtask Type: ${capitalize(context.subtaskType)}\n${guidance}`);
      }
    }

    const stage = this.stageInstruction(context.subtask, context.request);
    if (stage) {
      blocks.push(stage);
    }

    return [prompt, ...blocks].join('\n\n');
  }

  private requestBlocks(context: EnhanceContext): string[] {
    const blocks: string[] = [];

    if (context.category) {
      const guidance = this.templates.categoryGuidance[context.category];
      if (guidance) {
        blocks.push(`Task Category: ${capitalize(context.category)}\n${guidance}`);
      }
    }

    if (context.domain) {
      const lines = [`Domain Specialization: ${context.domain.name}`];
      if (context.domain.guidance) lines.push(context.domain.guidance);
      lines.push(`Topic keyword: ${context.domain.matchedKeyword}`);
      blocks.push(lines.join('\n'));
    }

    if (containsAny(context.request.toLowerCase(), this.templates.formalTone.cues)) {
      blocks.push(this.templates.formalTone.instruction);
    }

    return blocks;
  }

  /**
   * First stage (declared order) whose cues match wins
   */
  private stageInstruction(subtask: string, request: string): string | undefined {
    const subtaskLower = subtask.toLowerCase();
    const requestLower = request.toLowerCase();

    for (const stage of Object.values(this.templates.stageGuidance)) {
      if (!containsAny(subtaskLower, stage.subtaskCues)) continue;
      if (stage.requestCues && !containsAny(requestLower, stage.requestCues)) continue;
      return stage.instruction;
    }
    return undefined;
  }
}
