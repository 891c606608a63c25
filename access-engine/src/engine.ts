/**
 * access-engine - AccessEngine
 *
 * The decision pipeline: validate -> resolve roles -> match -> reduce.
 * Stateless; every call reads the store afresh.
 */

import type {
  AccessEngineConfig,
  EngineLogger,
  IsAllowedRequest,
  IsAllowedResult,
} from './types.js';
import type { DirectoryStore } from './store.js';
import { InvalidRequestError } from './errors.js';
import { RoleResolver } from './roles.js';

const REQUIRED_FIELDS = ['externalUserId', 'namespace', 'action', 'resource'] as const;

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0;
}

/**
 * Collect the names of required fields that are missing or empty
 */
export function findInvalidFields(request: Partial<IsAllowedRequest> | null | undefined): string[] {
  if (!request || typeof request !== 'object') {
    return [...REQUIRED_FIELDS];
  }
  return REQUIRED_FIELDS.filter(field => !isNonEmptyString(request[field]));
}

/**
 * AccessEngine - namespace-scoped RBAC decisions
 *
 * @example
 * ```typescript
 * const engine = new AccessEngine(new InMemoryDirectoryStore({
 *   users: [{ id: '1', externalUserId: 'u1', tenantIds: ['t1'], roleIds: ['r1'] }],
 *   roles: [{ id: 'r1', namespace: 'billing', permissions: [{ action: 'read', resource: 'invoices/*' }] }],
 * }));
 *
 * const { result } = await engine.isAllowed({
 *   externalUserId: 'u1',
 *   namespace: 'billing',
 *   action: 'read',
 *   resource: 'invoices/123',
 * });
 * console.log(result); // true
 * ```
 */
export class AccessEngine {
  private store: DirectoryStore;
  private roleResolver: RoleResolver;
  private logger: EngineLogger | undefined;

  constructor(store: DirectoryStore, config: AccessEngineConfig = {}) {
    this.store = store;
    this.roleResolver = new RoleResolver(store);
    this.logger = config.logger;
  }

  /**
   * Decide whether the actor may perform the action on the resource.
   *
   * @param request - The question being asked
   * @param namespace - Namespace to evaluate in; defaults to `request.namespace`
   * @throws InvalidRequestError before any store access when a field is empty
   * @throws StoreUnavailableError when the directory cannot answer
   */
  async isAllowed(
    request: IsAllowedRequest,
    namespace: string = request?.namespace
  ): Promise<IsAllowedResult> {
    const invalid = findInvalidFields({ ...request, namespace });
    if (invalid.length > 0) {
      throw new InvalidRequestError(invalid);
    }

    const roleIds = await this.roleResolver.resolve(request.externalUserId);
    const matched = await this.store.getRolesMatchingRequest(
      roleIds,
      { action: request.action, resource: request.resource },
      namespace
    );

    const result = matched.size > 0;
    this.logger?.debug('Access decision', {
      externalUserId: request.externalUserId,
      namespace,
      action: request.action,
      resource: request.resource,
      roles: roleIds.size,
      matchedRoles: matched.size,
      result,
    });

    return { result };
  }
}

/**
 * Create an AccessEngine over a store
 */
export function createAccessEngine(store: DirectoryStore, config?: AccessEngineConfig): AccessEngine {
  return new AccessEngine(store, config);
}
