/**
 * Request Classifier
 *
 * Maps request text to a single task category by counting trigger phrases.
 *
 * A request is complex when it mentions a scale indicator and is longer than
 * the word threshold, or when triggers from more than one category appear.
 * Complex requests go to the category with the most hits (declared order
 * breaks ties); simple requests go to the first category with any hit.
 */

import { PipelineLogger } from '../shared/logger.js';
import type { ClassificationDetail } from '../shared/types/pipeline.js';
import type { RequestCategoryTable } from '../settings/types.js';

export class RequestClassifier {
  constructor(private readonly table: RequestCategoryTable) {}

  classify(text: string | null | undefined): string {
    return this.classifyDetailed(text).category;
  }

  /**
   * Classification with per-category hit counts
   */
  classifyDetailed(text: string | null | undefined): ClassificationDetail {
    const lowered = (text ?? '').toLowerCase();
    const counts: Record<string, number> = {};

    for (const category of this.table.categories) {
      counts[category.name] = category.triggers.filter((t) => lowered.includes(t.toLowerCase())).length;
    }

    const matched = this.table.categories.filter((c) => counts[c.name] > 0);
    const complex = this.isExplicitlyComplex(lowered) || matched.length > 1;

    let category: string;
    if (complex) {
      category = this.pickHighest(matched, counts) ?? this.table.complexFallbackCategory;
    } else {
      category = matched.length > 0 ? matched[0].name : this.table.defaultCategory;
    }

    PipelineLogger.requestClassified(category, complex);
    return { category, complex, counts };
  }

  private isExplicitlyComplex(lowered: string): boolean {
    const wordCount = lowered.split(/\s+/).filter((w) => w.length > 0).length;
    return (
      wordCount > this.table.complexWordThreshold &&
      this.table.scaleIndicators.some((indicator) => lowered.includes(indicator.toLowerCase()))
    );
  }

  private pickHighest(
    matched: ReadonlyArray<{ name: string }>,
    counts: Record<string, number>
  ): string | undefined {
    let best: string | undefined;
    let bestCount = 0;
    // strict > keeps the earliest declared category on ties
    for (const { name } of matched) {
      if (counts[name] > bestCount) {
        best = name;
        bestCount = counts[name];
      }
    }
    return best;
  }
}
