/**
 * Skill Profile Resolver
 *
 * user id -> skill tier -> generation parameters and guidance fragment.
 * Any id, including empty or unknown ones, resolves; unrecognized tiers fall
 * back to the default (lowest) tier.
 */

import { PipelineLogger } from '../shared/logger.js';
import type { SkillParameters } from '../shared/types/pipeline.js';
import type { SkillTierTable } from '../settings/types.js';
import type { UserProfileStore } from './profile-store.js';

export function normalizeTier(tier: string): string {
  return tier.trim().toUpperCase();
}

export class SkillResolver {
  constructor(
    private readonly table: SkillTierTable,
    private readonly profiles: UserProfileStore
  ) {}

  resolveTier(userId: string | null | undefined): string {
    const id = (userId ?? '').trim();
    const rawTier = id.length > 0 ? this.profiles.getProfile(id)?.skillLevel : undefined;

    if (rawTier !== undefined) {
      const tier = normalizeTier(rawTier);
      if (this.table.tiers.includes(tier)) {
        return tier;
      }
    }

    PipelineLogger.skillFallback(id, rawTier, this.table.defaultTier);
    return this.table.defaultTier;
  }

  resolve(userId: string | null | undefined): SkillParameters {
    return this.parametersFor(this.resolveTier(userId));
  }

  /**
   * Parameters for a tier name; unknown names get the default tier
   */
  parametersFor(tier: string): SkillParameters {
    const normalized = normalizeTier(tier);
    const key = this.table.tiers.includes(normalized) ? normalized : this.table.defaultTier;
    return { ...this.table.parameters[key] };
  }
}
