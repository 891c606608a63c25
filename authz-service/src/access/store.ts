/**
 * Mongo Directory Store
 *
 * MongoDB read side of the directory. User lookups project role ids only;
 * role lookups push the id and namespace filter down to the database and
 * leave action/resource matching to the shared PermissionMatcher.
 */

// External packages
import type { Db, Document, Filter, FindOptions } from 'mongodb';
import { ArkErrors } from 'arktype';
import {
  PermissionMatcher,
  StoreUnavailableError,
  type AccessRequest,
  type DirectoryStore,
  type Role,
  type RoleId,
} from 'access-engine';

// Internal imports
import { DIRECTORY_COLLECTIONS, checkDatabaseHealth } from '../databases/mongodb/connection.js';
import { createChildLogger } from '../common/logger.js';
import { getErrorMessage } from '../common/errors.js';
import { roleSchema, userRoleIdsSchema } from './schemas.js';

const log = createChildLogger({ component: 'directory-store' });

// ═══════════════════════════════════════════════════════════════════
// Collection Seam
// ═══════════════════════════════════════════════════════════════════

/**
 * The part of a MongoDB collection the store reads through.
 * A driver `Collection` satisfies it as is.
 */
export interface DirectoryCollection {
  find(filter: Filter<Document>, options?: FindOptions): { toArray(): Promise<Document[]> };
}

export interface MongoDirectoryStoreOptions {
  users: DirectoryCollection;
  roles: DirectoryCollection;
  /** Target of health pings; without it `ping` reports unhealthy */
  database?: Pick<Db, 'command'>;
}

// ═══════════════════════════════════════════════════════════════════
// Store
// ═══════════════════════════════════════════════════════════════════

export class MongoDirectoryStore implements DirectoryStore {
  private users: DirectoryCollection;
  private roles: DirectoryCollection;
  private database: Pick<Db, 'command'> | undefined;
  private matcher: PermissionMatcher;

  constructor(options: MongoDirectoryStoreOptions) {
    this.users = options.users;
    this.roles = options.roles;
    this.database = options.database;
    this.matcher = new PermissionMatcher((roleIds, namespace) => this.loadRoles(roleIds, namespace));
  }

  static fromDatabase(db: Db): MongoDirectoryStore {
    return new MongoDirectoryStore({
      users: db.collection(DIRECTORY_COLLECTIONS.users),
      roles: db.collection(DIRECTORY_COLLECTIONS.roles),
      database: db,
    });
  }

  async getRoleIdsForUser(externalUserId: string): Promise<Set<RoleId>> {
    const docs = await this.query('users', () =>
      this.users
        .find({ externalUserId }, { projection: { _id: 0, roleIds: 1 } })
        .toArray()
    );

    const roleIds = new Set<RoleId>();
    for (const doc of docs) {
      const parsed = userRoleIdsSchema(doc);
      if (parsed instanceof ArkErrors) {
        log.warn('Skipping malformed user document', { externalUserId, error: parsed.summary });
        continue;
      }
      for (const roleId of parsed.roleIds ?? []) {
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
    if (!this.database) return false;
    const health = await checkDatabaseHealth(this.database);
    return health.healthy;
  }

  // ─────────────────────────────────────────────────────────────────
  // Internals
  // ─────────────────────────────────────────────────────────────────

  private async loadRoles(roleIds: ReadonlySet<RoleId>, namespace: string): Promise<Role[]> {
    const docs = await this.query('roles', () =>
      this.roles
        .find({ id: { $in: [...roleIds] }, namespace }, { projection: { _id: 0 } })
        .toArray()
    );

    const roles: Role[] = [];
    for (const doc of docs) {
      const parsed = roleSchema(doc);
      if (parsed instanceof ArkErrors) {
        log.warn('Skipping malformed role document', { namespace, error: parsed.summary });
        continue;
      }
      roles.push(parsed);
    }
    return roles;
  }

  private async query<T>(collection: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      const message = getErrorMessage(error);
      log.error('Directory query failed', { collection, error: message });
      throw new StoreUnavailableError(message, error);
    }
  }
}
