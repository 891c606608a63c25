/**
 * access-engine - Type Definitions
 *
 * Core types for the namespace-scoped RBAC decision engine.
 */

/** Opaque role identifier as stored in the directory */
export type RoleId = string;

/**
 * Permission statement: an action on a resource pattern.
 *
 * `action` is exact (case-sensitive) or `*`. `resource` is a `/`-delimited
 * pattern whose segments are literals, `*` (one segment) or a trailing `**`.
 */
export interface Permission {
  action: string;
  resource: string;
}

/**
 * Role as seen by the matcher
 */
export interface Role {
  id: RoleId;
  /** Display name, not used for matching */
  name?: string;
  /** Owning tenant */
  tenantId?: string;
  /** The only namespace this role is ever evaluated in */
  namespace: string;
  permissions: Permission[];
}

/**
 * Tenant record (directory snapshot)
 */
export interface Tenant {
  id: string;
  name: string;
  /** Products the tenant is subscribed to */
  products?: string[];
}

/**
 * User record (directory snapshot)
 */
export interface User {
  /** Internal identifier */
  id: string;
  /** Identifier supplied by the upstream identity system */
  externalUserId: string;
  tenantIds: string[];
  roleIds: RoleId[];
}

/**
 * The question being asked
 */
export interface IsAllowedRequest {
  externalUserId: string;
  namespace: string;
  action: string;
  resource: string;
}

/** The part of a request the matcher evaluates */
export type AccessRequest = Pick<IsAllowedRequest, 'action' | 'resource'>;

/**
 * The answer. Carries no reason or matched role.
 */
export interface IsAllowedResult {
  result: boolean;
}

/**
 * Minimal logger accepted by the engine (structurally compatible with the
 * service logger)
 */
export interface EngineLogger {
  debug(message: string, data?: object): void;
}

/**
 * Configuration for the AccessEngine
 */
export interface AccessEngineConfig {
  /** Receives one debug entry per decision */
  logger?: EngineLogger;
}

/**
 * Full directory contents, used to seed the in-memory store
 */
export interface DirectorySnapshot {
  tenants?: Tenant[];
  users: User[];
  roles: Role[];
}
