/**
 * access-engine - Directory Store
 *
 * The read side of the directory the engine depends on. Implementations
 * reject with StoreUnavailableError when the backend cannot answer and
 * resolve to an empty set when there is simply nothing to return.
 */

import type { AccessRequest, RoleId } from './types.js';

export interface DirectoryStore {
  /**
   * Role ids assigned to the user across all of its tenants.
   * Unknown users resolve to an empty set.
   */
  getRoleIdsForUser(externalUserId: string): Promise<Set<RoleId>>;

  /**
   * Subset of `roleIds` whose permissions grant the request in `namespace`
   */
  getRolesMatchingRequest(
    roleIds: ReadonlySet<RoleId>,
    request: AccessRequest,
    namespace: string
  ): Promise<Set<RoleId>>;

  /**
   * Optional liveness probe used by health checks
   */
  ping?(): Promise<boolean>;
}
