/**
 * Mock Synthesis Engine
 *
 * Stand-in for a generation backend. Produces a marker-tagged placeholder
 * narrative whose shape follows the input text:
 *
 * 1. domain template: a domain keyword plus one of that domain's template patterns
 * 2. technical term: first configured technology phrase
 * 3. named entity: capitalized multi-word span, else an acronym
 * 4. keyword buckets decide the category, else the default category
 * 5. topic is the last pair of adjacent significant words, else the last
 *    significant word, else the fallback topic
 *
 * Output is never empty and always carries the marker.
 */

import type { DomainTable, MockResponseTable } from '../settings/types.js';
import type { RandomSource } from './seeded-random.js';
import { renderTemplate } from '../shared/utils/render-template.js';
import { generateSlotValues } from './slot-generators.js';

const MULTI_WORD_ENTITY = /\b[A-Z][a-zA-Z]*(?:[\s-][A-Z][a-zA-Z]*)+\b/;
const ACRONYM = /\b[A-Z]{2,}\b/;
const SIGNIFICANT_WORD = /^[a-z]{4,}$/;
const EDGE_PUNCTUATION = /^[^a-z]+|[^a-z]+$/g;

export type MockStep = 'domain-template' | 'technical-term' | 'named-entity' | 'keyword' | 'default';

export interface MockSynthesis {
  text: string;
  step: MockStep;
  /** Template category; the domain name for domain templates */
  category: string;
  topic: string;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export class MockSynthesisEngine {
  private readonly technicalTerms: ReadonlyArray<{ pattern: RegExp; category: string }>;

  constructor(
    private readonly table: MockResponseTable,
    private readonly domains: DomainTable,
    private readonly random: RandomSource
  ) {
    this.technicalTerms = table.technicalTerms.map((t) => ({
      pattern: new RegExp(escapeRegExp(t.term), 'i'),
      category: t.category,
    }));
  }

  synthesize(text: string | null | undefined): string {
    return this.synthesizeDetailed(text).text;
  }

  synthesizeDetailed(text: string | null | undefined): MockSynthesis {
    const input = text ?? '';
    const lowered = input.toLowerCase();

    const fromDomain = this.tryDomainTemplate(lowered);
    if (fromDomain) {
      return fromDomain;
    }

    let step: MockStep;
    let category: string;
    let topic: string | undefined;

    const term = this.matchTechnicalTerm(input);
    const entity = term ? undefined : this.matchNamedEntity(input);

    if (term) {
      step = 'technical-term';
      category = term.category;
      topic = term.topic;
    } else if (entity !== undefined) {
      step = 'named-entity';
      category = this.table.entityCategory;
      topic = entity;
    } else {
      const bucket = this.table.keywordBuckets.find((b) => b.cues.some((cue) => lowered.includes(cue.toLowerCase())));
      step = bucket ? 'keyword' : 'default';
      category = bucket ? bucket.category : this.table.defaultCategory;
    }

    const finalTopic = topic ?? this.fallbackTopic(input);
    return { text: this.render(category, finalTopic), step, category, topic: finalTopic };
  }

  private tryDomainTemplate(lowered: string): MockSynthesis | undefined {
    for (const domain of this.domains.domains) {
      const keyword = domain.keywords.find((k) => lowered.includes(k.toLowerCase()));
      if (keyword === undefined) continue;

      const templates = this.table.domainTemplates[domain.name] ?? [];
      const template = templates.find((t) => t.patterns.some((p) => lowered.includes(p.toLowerCase())));
      if (!template) continue;

      const values = { ...generateSlotValues(template.slots, this.random), topic: keyword };
      const rendered = renderTemplate(template.template, values);
      return {
        text: this.isUsable(rendered) ? rendered : this.renderDefault(keyword),
        step: 'domain-template',
        category: domain.name,
        topic: keyword,
      };
    }
    return undefined;
  }

  private matchTechnicalTerm(input: string): { category: string; topic: string } | undefined {
    for (const { pattern, category } of this.technicalTerms) {
      const match = pattern.exec(input);
      if (match) {
        return { category, topic: match[0].toLowerCase() };
      }
    }
    return undefined;
  }

  private matchNamedEntity(input: string): string | undefined {
    const match = MULTI_WORD_ENTITY.exec(input) ?? ACRONYM.exec(input);
    return match ? match[0].trim().toLowerCase() : undefined;
  }

  private fallbackTopic(input: string): string {
    const significant = input
      .toLowerCase()
      .split(/\s+/)
      .map((w) => w.replace(EDGE_PUNCTUATION, ''))
      .map((w) => (SIGNIFICANT_WORD.test(w) && !this.table.topicStopWords.includes(w) ? w : undefined));

    for (let i = significant.length - 1; i > 0; i--) {
      const first = significant[i - 1];
      const second = significant[i];
      if (first !== undefined && second !== undefined) {
        return `${first} ${second}`;
      }
    }

    const words = significant.filter((w): w is string => w !== undefined);
    return words.length > 0 ? words[words.length - 1] : this.table.fallbackTopic;
  }

  private render(category: string, topic: string): string {
    const templates = this.table.templates[category] ?? this.table.templates[this.table.defaultCategory];
    const rendered = renderTemplate(this.random.choice(templates), { topic });
    return this.isUsable(rendered) ? rendered : this.renderDefault(topic);
  }

  private renderDefault(topic: string): string {
    return renderTemplate(this.random.choice(this.table.templates[this.table.defaultCategory]), { topic });
  }

  private isUsable(rendered: string): boolean {
    return rendered.trim().length > 0 && rendered.includes(this.table.marker);
  }
}
