/**
 * Directory document schemas
 *
 * Shapes of the tenant, user and role records as stored in MongoDB or a
 * JSON seed file. Undeclared keys such as `_id` are ignored.
 */

import { type } from 'arktype';

export const permissionSchema = type({
  action: 'string',
  resource: 'string',
});

export const roleSchema = type({
  id: 'string',
  'name?': 'string',
  'tenantId?': 'string',
  namespace: 'string',
  permissions: permissionSchema.array(),
});

export const userSchema = type({
  id: 'string',
  externalUserId: 'string',
  tenantIds: 'string[]',
  roleIds: 'string[]',
});

export const tenantSchema = type({
  id: 'string',
  name: 'string',
  'products?': 'string[]',
});

export const snapshotSchema = type({
  'tenants?': tenantSchema.array(),
  users: userSchema.array(),
  roles: roleSchema.array(),
});

/** Role ids projected from a user document; a user without roles may omit the field */
export const userRoleIdsSchema = type({
  'roleIds?': 'string[]',
});
