/**
 * access-engine - Roles
 *
 * Resolves the roles assigned to an actor. Namespace filtering happens later,
 * in the permission matcher.
 */

import type { RoleId } from './types.js';
import type { DirectoryStore } from './store.js';

/**
 * Role Resolver backed by a DirectoryStore
 */
export class RoleResolver {
  private store: DirectoryStore;

  constructor(store: DirectoryStore) {
    this.store = store;
  }

  /**
   * Resolve the deduplicated role ids for a user.
   * Store failures propagate untouched.
   */
  async resolve(externalUserId: string): Promise<Set<RoleId>> {
    const roleIds = await this.store.getRoleIdsForUser(externalUserId);
    return new Set(roleIds);
  }
}
