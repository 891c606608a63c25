/**
 * access-engine - In-memory Directory Store
 *
 * Holds a directory snapshot in memory. Used for local runs and tests; the
 * snapshot is replaced wholesale, never mutated by the engine.
 */

import type { AccessRequest, DirectorySnapshot, Role, RoleId, User } from './types.js';
import type { DirectoryStore } from './store.js';
import { PermissionMatcher } from './matcher.js';

export class InMemoryDirectoryStore implements DirectoryStore {
  private usersByExternalId = new Map<string, User[]>();
  private roles = new Map<RoleId, Role>();
  private matcher: PermissionMatcher;

  constructor(snapshot: DirectorySnapshot = { users: [], roles: [] }) {
    this.matcher = new PermissionMatcher(async (roleIds) => this.rolesFor(roleIds));
    this.load(snapshot);
  }

  /**
   * Replace the whole directory with a new snapshot
   */
  load(snapshot: DirectorySnapshot): void {
    const usersByExternalId = new Map<string, User[]>();
    for (const user of snapshot.users) {
      const existing = usersByExternalId.get(user.externalUserId);
      if (existing) {
        existing.push(user);
      } else {
        usersByExternalId.set(user.externalUserId, [user]);
      }
    }

    this.usersByExternalId = usersByExternalId;
    this.roles = new Map(snapshot.roles.map(role => [role.id, role]));
  }

  async getRoleIdsForUser(externalUserId: string): Promise<Set<RoleId>> {
    const roleIds = new Set<RoleId>();
    for (const user of this.usersByExternalId.get(externalUserId) ?? []) {
      for (const roleId of user.roleIds) {
        roleIds.add(roleId);
      }
    }
    return roleIds;
  }

  getRolesMatchingRequest(
    roleIds: ReadonlySet<RoleId>,
    request: AccessRequest,
    namespace: string
  ): Promise<Set<RoleId>> {
    return this.matcher.match(roleIds, namespace, request);
  }

  async ping(): Promise<boolean> {
    return true;
  }

  private rolesFor(roleIds: ReadonlySet<RoleId>): Role[] {
    const roles: Role[] = [];
    for (const id of roleIds) {
      const role = this.roles.get(id);
      if (role) roles.push(role);
    }
    return roles;
  }
}
