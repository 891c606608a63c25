/**
 * Directory snapshot loader
 *
 * Reads a JSON seed file for the in-memory store.
 */

import { readFile } from 'node:fs/promises';
import type { DirectorySnapshot } from 'access-engine';
import { logger } from '../common/logger.js';
import { getErrorMessage } from '../common/errors.js';
import { validateInput, isValidationFailure } from '../common/validation/arktype.js';
import { snapshotSchema } from './schemas.js';

export class SnapshotError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SnapshotError';
  }
}

/**
 * Validate parsed JSON as a directory snapshot
 */
export function parseDirectorySnapshot(input: unknown, source = 'snapshot'): DirectorySnapshot {
  const result = validateInput(snapshotSchema(input));
  if (isValidationFailure(result)) {
    throw new SnapshotError(`Invalid directory ${source}: ${result.errors.join('; ')}`);
  }

  const roleIds = new Set(result.roles.map(role => role.id));
  const dangling = result.users.flatMap(user =>
    user.roleIds.filter(id => !roleIds.has(id)).map(id => `${user.externalUserId}->${id}`)
  );
  if (dangling.length > 0) {
    logger.warn('Directory snapshot references unknown roles', { source, dangling });
  }

  return result;
}

/**
 * Read and validate a JSON snapshot file
 */
export async function loadDirectorySnapshot(path: string): Promise<DirectorySnapshot> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (error) {
    throw new SnapshotError(`Cannot read directory snapshot ${path}: ${getErrorMessage(error)}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new SnapshotError(`Directory snapshot ${path} is not valid JSON: ${getErrorMessage(error)}`);
  }

  const snapshot = parseDirectorySnapshot(json, path);
  logger.info('Directory snapshot loaded', {
    path,
    tenants: snapshot.tenants?.length ?? 0,
    users: snapshot.users.length,
    roles: snapshot.roles.length,
  });
  return snapshot;
}
