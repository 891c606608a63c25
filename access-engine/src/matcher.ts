/**
 * access-engine - Permission Matcher
 *
 * Narrows a set of role ids to the roles that grant a request within a
 * namespace. Shared by every DirectoryStore so matching semantics never
 * depend on where the role documents come from.
 */

import type { AccessRequest, Permission, Role, RoleId } from './types.js';
import { matchAction, matchResource } from './resource.js';

/**
 * Check if a single permission grants the request
 */
export function permissionGrants(permission: Permission, request: AccessRequest): boolean {
  return matchAction(permission.action, request.action)
    && matchResource(permission.resource, request.resource);
}

/**
 * Check if a role grants the request in the given namespace.
 * Permissions within a role are OR'd; a role without permissions grants nothing.
 */
export function roleGrants(role: Role, request: AccessRequest, namespace: string): boolean {
  if (role.namespace !== namespace) {
    return false;
  }
  if (!role.permissions || role.permissions.length === 0) {
    return false;
  }
  return role.permissions.some(permission => permissionGrants(permission, request));
}

/**
 * Return the ids of the roles that grant the request.
 * Only ids present in `roleIds` are considered, whatever `roles` contains.
 *
 * @example
 * matchRoles(
 *   new Set(['r1']),
 *   [{ id: 'r1', namespace: 'billing', permissions: [{ action: 'read', resource: 'invoices/*' }] }],
 *   { action: 'read', resource: 'invoices/123' },
 *   'billing',
 * ) // Set { 'r1' }
 */
export function matchRoles(
  roleIds: ReadonlySet<RoleId>,
  roles: Iterable<Role>,
  request: AccessRequest,
  namespace: string
): Set<RoleId> {
  const matched = new Set<RoleId>();
  for (const role of roles) {
    if (roleIds.has(role.id) && roleGrants(role, request, namespace)) {
      matched.add(role.id);
    }
  }
  return matched;
}

/**
 * Loads candidate roles for a set of ids. A store may already restrict the
 * result to the namespace; the matcher filters again either way.
 */
export type RoleLoader = (roleIds: ReadonlySet<RoleId>, namespace: string) => Promise<Iterable<Role>>;

/**
 * Permission Matcher bound to a role loader
 */
export class PermissionMatcher {
  private loadRoles: RoleLoader;

  constructor(loadRoles: RoleLoader) {
    this.loadRoles = loadRoles;
  }

  async match(
    roleIds: ReadonlySet<RoleId>,
    namespace: string,
    request: AccessRequest
  ): Promise<Set<RoleId>> {
    if (roleIds.size === 0) {
      return new Set();
    }
    const roles = await this.loadRoles(roleIds, namespace);
    return matchRoles(roleIds, roles, request, namespace);
  }
}
