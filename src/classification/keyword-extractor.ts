/**
 * Keyword Extractor
 *
 * Turns free text into a short list of salient lowercase terms used for
 * knowledge base lookup.
 */

import { NUM_KEYWORDS } from '../shared/config.js';
import { PipelineLogger } from '../shared/logger.js';

const STOP_WORDS: ReadonlySet<string> = new Set([
  'a', 'an', 'the', 'is', 'are', 'in', 'on', 'it', 'and', 'or',
  'for', 'to', 'of', 'how', 'what', 'why', 'tell', 'me', 'about',
]);

/** Tokens of this length or shorter are dropped */
const MIN_TOKEN_LENGTH = 2;

/** Runs of letters, digits and underscores in any script */
const WORD_TOKEN = /[\p{L}\p{N}_]+/gu;

/**
 * Extract up to `maxCount` keywords, first occurrence order, no duplicates
 */
export function extractKeywords(text: string | null | undefined, maxCount: number = NUM_KEYWORDS): string[] {
  if (!text || maxCount <= 0) {
    return [];
  }

  const tokens = text.toLowerCase().match(WORD_TOKEN) ?? [];
  const unique = new Set<string>();

  for (const token of tokens) {
    if (token.length <= MIN_TOKEN_LENGTH || STOP_WORDS.has(token)) continue;
    unique.add(token);
    if (unique.size >= maxCount) break;
  }

  const keywords = [...unique];
  PipelineLogger.debug(`Extracted keywords: [${keywords.join(', ')}]`);
  return keywords;
}
