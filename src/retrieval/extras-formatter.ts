/**
 * Appends the retrieved offers and related documents to a generated response.
 * The retrieval maps are already truncated, so everything in them is shown.
 */

import type { RetrievalResult } from '../shared/types/pipeline.js';

export const OFFERS_HEADER = '--- Relevant Offers ---';
export const DOCS_HEADER = '--- Related Documents & Links ---';

function formatGroup(header: string, topics: readonly string[], byTopic: Record<string, string[]>): string | null {
  const lines: string[] = [];
  for (const topic of topics) {
    const items = byTopic[topic];
    if (!items || items.length === 0) continue;
    lines.push(`From topic '${topic}':`, ...items.map((item) => `- ${item}`));
  }
  return lines.length > 0 ? [header, ...lines].join('\n') : null;
}

export function formatRetrievalExtras(retrieval: RetrievalResult): string {
  const blocks = [
    formatGroup(OFFERS_HEADER, retrieval.matchedTopics, retrieval.offersByTopic),
    formatGroup(DOCS_HEADER, retrieval.matchedTopics, retrieval.docsByTopic),
  ].filter((block): block is string => block !== null);

  return blocks.join('\n\n');
}

export function appendRetrievalExtras(response: string, retrieval: RetrievalResult): string {
  const extras = formatRetrievalExtras(retrieval);
  return extras.length > 0 ? `${response}\n\n${extras}` : response;
}
