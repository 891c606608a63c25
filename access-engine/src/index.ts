/**
 * access-engine
 *
 * A standalone, namespace-scoped RBAC decision engine.
 *
 * Features:
 * - Role resolution through a pluggable DirectoryStore
 * - Path-segment resource patterns (`*`, trailing `**`)
 * - Allow-if-any-match decisions, no deny statements
 * - Fail-closed errors: store failures are never reported as a deny
 * - In-memory store for tests and local runs
 *
 * @example
 * ```typescript
 * import { AccessEngine, InMemoryDirectoryStore } from 'access-engine';
 *
 * const store = new InMemoryDirectoryStore({
 *   users: [{ id: '1', externalUserId: 'u1', tenantIds: ['t1'], roleIds: ['r1'] }],
 *   roles: [{ id: 'r1', namespace: 'billing', permissions: [{ action: 'read', resource: 'invoices/*' }] }],
 * });
 *
 * const engine = new AccessEngine(store);
 * const { result } = await engine.isAllowed({
 *   externalUserId: 'u1',
 *   namespace: 'billing',
 *   action: 'read',
 *   resource: 'invoices/123',
 * });
 * console.log(result); // true
 * ```
 *
 * @packageDocumentation
 */

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  RoleId,
  Permission,
  Role,
  Tenant,
  User,
  IsAllowedRequest,
  IsAllowedResult,
  AccessRequest,
  AccessEngineConfig,
  EngineLogger,
  DirectorySnapshot,
} from './types.js';

export type { DirectoryStore } from './store.js';

// ─────────────────────────────────────────────────────────────────────────────
// Engine
// ─────────────────────────────────────────────────────────────────────────────

export {
  AccessEngine,
  createAccessEngine,
  findInvalidFields,
} from './engine.js';

export { RoleResolver } from './roles.js';

export {
  PermissionMatcher,
  matchRoles,
  roleGrants,
  permissionGrants,
  type RoleLoader,
} from './matcher.js';

export { InMemoryDirectoryStore } from './memory-store.js';

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────

export {
  AccessEngineError,
  InvalidRequestError,
  StoreUnavailableError,
} from './errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Resource Patterns
// ─────────────────────────────────────────────────────────────────────────────

export {
  matchResource,
  matchAction,
  isValidResourcePattern,
  splitSegments,
  SEGMENT_SEPARATOR,
  SINGLE_WILDCARD,
  TRAILING_WILDCARD,
} from './resource.js';
