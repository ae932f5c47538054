/**
 * User profile sources. The pipeline only needs a read-only lookup by id;
 * an unknown id is a normal outcome, not an error.
 */

import type { UserProfile } from '../shared/types/pipeline.js';

export interface UserProfileStore {
  getProfile(userId: string): UserProfile | undefined;
}

/**
 * Profile store over a fixed map, fed from settings/user-profiles.json by default
 */
export class InMemoryProfileStore implements UserProfileStore {
  private readonly profiles: ReadonlyMap<string, UserProfile>;

  constructor(profiles: Readonly<Record<string, UserProfile>>) {
    this.profiles = new Map(Object.entries(profiles));
  }

  getProfile(userId: string): UserProfile | undefined {
    return this.profiles.get(userId);
  }
}
