/**
 * Context Retriever
 *
 * Keyword lookup against the knowledge base. Context and tips of every
 * matched topic are always returned in full; offers and related documents
 * are cut back as more topics match (see truncationLimit).
 */

import { PipelineLogger } from '../shared/logger.js';
import type { KnowledgeEntry, RetrievalResult } from '../shared/types/pipeline.js';

/** Context sentinel when no topic matched */
export const NO_CONTEXT = 'No specific context found.';

export const TIPS_HEADER = 'Relevant Tips for Context:';

/**
 * Per-topic cap on offers and docs for a given matched-topic count.
 * `undefined` means no cap.
 */
export function truncationLimit(matchedCount: number): number | undefined {
  if (matchedCount <= 1) return undefined;
  if (matchedCount === 2) return 2;
  return 1;
}

export function isNoContext(result: RetrievalResult): boolean {
  return result.matchedTopics.length === 0 || result.context === NO_CONTEXT;
}

export class ContextRetriever {
  constructor(private readonly entries: readonly KnowledgeEntry[]) {}

  /**
   * A topic matches when an input keyword is a substring of one of its stored
   * keywords (case-insensitive). Topics are reported in knowledge base order.
   */
  retrieve(keywords: readonly string[]): RetrievalResult {
    const needles = keywords.map((k) => k.trim().toLowerCase()).filter((k) => k.length > 0);
    const matched = this.entries.filter((entry) =>
      entry.keywords.some((stored) => {
        const haystack = stored.toLowerCase();
        return needles.some((needle) => haystack.includes(needle));
      })
    );

    PipelineLogger.retrievalMatched(matched.map((e) => e.topic), needles);

    if (matched.length === 0) {
      return { context: NO_CONTEXT, matchedTopics: [], offersByTopic: {}, docsByTopic: {} };
    }

    const limit = truncationLimit(matched.length);
    const offersByTopic: Record<string, string[]> = {};
    const docsByTopic: Record<string, string[]> = {};

    for (const entry of matched) {
      if (entry.offers.length > 0) {
        offersByTopic[entry.topic] = entry.offers.slice(0, limit);
      }
      if (entry.relatedDocs.length > 0) {
        docsByTopic[entry.topic] = entry.relatedDocs.slice(0, limit);
      }
    }

    return {
      context: this.buildContext(matched),
      matchedTopics: matched.map((e) => e.topic),
      offersByTopic,
      docsByTopic,
    };
  }

  private buildContext(matched: readonly KnowledgeEntry[]): string {
    let context = matched.map((e) => `Topic: ${e.topic}\nContext: ${e.context}`).join('\n\n');

    const tips = matched.flatMap((e) => e.tips);
    if (tips.length > 0) {
      context += `\n\n${TIPS_HEADER}\n` + tips.map((tip) => `- ${tip}`).join('\n');
    }
    return context;
  }
}
