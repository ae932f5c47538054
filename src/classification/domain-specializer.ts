/**
 * Domain Specializer
 *
 * Detects a narrower subject domain (cloud, AI/ML, healthcare, ...) from its
 * keyword vocabulary. The first domain in table order with any keyword hit wins.
 */

import { PipelineLogger } from '../shared/logger.js';
import type { DomainProfile } from '../shared/types/pipeline.js';
import type { DomainTable } from '../settings/types.js';

export class DomainSpecializer {
  constructor(private readonly table: DomainTable) {}

  /**
   * @returns the matching domain profile, or null when no domain vocabulary appears
   */
  detect(text: string | null | undefined): DomainProfile | null {
    const lowered = (text ?? '').toLowerCase();
    if (lowered.length === 0) {
      return null;
    }

    for (const domain of this.table.domains) {
      const matchedKeyword = domain.keywords.find((k) => lowered.includes(k.toLowerCase()));
      if (matchedKeyword !== undefined) {
        PipelineLogger.domainDetected(domain.name, matchedKeyword);
        return {
          name: domain.name,
          matchedKeyword,
          subtasks: domain.subtasks,
          guidance: domain.guidance,
          preferredCategory: domain.preferredCategory,
        };
      }
    }

    return null;
  }
}
