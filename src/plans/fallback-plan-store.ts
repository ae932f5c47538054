/**
 * Fallback Plan Store
 *
 * Canned subtask lists used when a generated plan cannot be parsed or the
 * backend fails. Resolution order: the domain's preferred category, the
 * classified category, then the default plan.
 */

import type { DomainProfile } from '../shared/types/pipeline.js';
import type { FallbackPlanTable } from '../settings/types.js';

export class FallbackPlanStore {
  constructor(private readonly table: FallbackPlanTable) {}

  resolveKey(category: string | null | undefined, domain?: DomainProfile | null): string {
    const candidates = [domain?.preferredCategory, category ?? undefined];
    for (const key of candidates) {
      if (key !== undefined && Object.hasOwn(this.table.plans, key)) {
        return key;
      }
    }
    return this.table.defaultPlan;
  }

  getPlan(category: string | null | undefined, domain?: DomainProfile | null): string[] {
    return [...this.table.plans[this.resolveKey(category, domain)]];
  }
}
