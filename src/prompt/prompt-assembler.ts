/**
 * Prompt Assembler (Persona-Query-Restrictions)
 *
 * Builds the system prompt from ordered sections:
 * 1. Persona (always)
 * 2. Skill level guidance (only when non-blank)
 * 3. Retrieved context plus a usage instruction (only when retrieval matched)
 * 4. Restrictions with the [topic] placeholder filled (always)
 *
 * Omitted sections leave no header behind. The user prompt is the query as given.
 */

import type { PromptEnvelope, PromptSection, RetrievalResult } from '../shared/types/pipeline.js';
import type { PromptTemplates } from '../settings/types.js';
import { isNoContext } from '../retrieval/context-retriever.js';

export const TOPIC_PLACEHOLDER = '[topic]';
export const SKILL_GUIDANCE_HEADER = '--- Skill Level Guidance ---';
export const CONTEXT_HEADER = '--- Relevant Context ---';
export const RESTRICTIONS_HEADER = '--- Restrictions ---';

export interface AssembleOptions {
  /** Replaces the default persona */
  persona?: string;
  /** Replaces the default restrictions template */
  restrictions?: string;
  /** Replaces the topic taken from the first matched knowledge topic */
  topic?: string;
}

/**
 * Knowledge topic ids use underscores; restrictions read better with spaces
 */
export function topicLabel(topicId: string): string {
  return topicId.replace(/_/g, ' ');
}

export class PromptAssembler {
  constructor(private readonly templates: PromptTemplates) {}

  assemble(
    query: string,
    skillGuidance: string,
    retrieval: RetrievalResult,
    options: AssembleOptions = {}
  ): PromptEnvelope {
    const sections: PromptSection[] = [];

    sections.push({ kind: 'persona', text: (options.persona?.trim() || this.templates.persona).trim() });

    const guidance = skillGuidance.trim();
    if (guidance.length > 0) {
      sections.push({ kind: 'skill-guidance', text: `${SKILL_GUIDANCE_HEADER}\n${guidance}` });
    }

    if (!isNoContext(retrieval)) {
      sections.push({
        kind: 'context',
        text: `${CONTEXT_HEADER}\n${retrieval.context}\n\n${this.templates.contextInstruction}`,
      });
    }

    sections.push({
      kind: 'restrictions',
      text: `${RESTRICTIONS_HEADER}\n${this.fillRestrictions(retrieval, options)}`,
    });

    return {
      sections,
      systemPrompt: sections.map((s) => s.text).join('\n\n'),
      userPrompt: query,
    };
  }

  private fillRestrictions(retrieval: RetrievalResult, options: AssembleOptions): string {
    const template = options.restrictions?.trim() || this.templates.restrictions;
    const firstTopic = retrieval.matchedTopics[0];
    const topic =
      options.topic?.trim() ||
      (firstTopic !== undefined ? topicLabel(firstTopic) : this.templates.genericTopic);
    return template.replaceAll(TOPIC_PLACEHOLDER, () => topic);
  }
}
