/**
 * Service assembly
 *
 * Builds the directory store, engine and gateway from a loaded config.
 * Every dependency is created here once and passed down explicitly.
 */

import {
  AccessEngine,
  InMemoryDirectoryStore,
  type DirectoryStore,
} from 'access-engine';
import type { AuthzConfig } from './config.js';
import { connectDatabase, closeDatabase } from './databases/mongodb/connection.js';
import { MongoDirectoryStore } from './access/store.js';
import { loadDirectorySnapshot } from './access/snapshot.js';
import { createGateway, type GatewayInstance } from './gateway/server.js';
import { createChildLogger } from './common/logger.js';
import { registerServiceErrorCodes } from './common/errors.js';
import { AUTHZ_ERROR_CODES } from './error-codes.js';

export interface DirectoryStoreHandle {
  store: DirectoryStore;
  close(): Promise<void>;
}

export interface AuthzService {
  engine: AccessEngine;
  store: DirectoryStore;
  gateway: GatewayInstance;
  /** Stop accepting requests and release the directory store */
  stop(): Promise<void>;
}

/**
 * Open the directory store selected by DIRECTORY_STORE
 */
export async function openDirectoryStore(config: AuthzConfig): Promise<DirectoryStoreHandle> {
  if (config.directoryStore === 'memory') {
    if (!config.seedFile) {
      throw new Error('seedFile is required for the memory directory store');
    }
    const store = new InMemoryDirectoryStore(await loadDirectorySnapshot(config.seedFile));
    return { store, close: async () => {} };
  }

  if (!config.mongo) {
    throw new Error('mongo settings are required for the mongo directory store');
  }
  const connection = await connectDatabase(config.mongo);
  return {
    store: MongoDirectoryStore.fromDatabase(connection.db),
    close: () => closeDatabase(connection),
  };
}

/**
 * Build and start the service
 */
export async function startService(config: AuthzConfig): Promise<AuthzService> {
  registerServiceErrorCodes(AUTHZ_ERROR_CODES);

  const directory = await openDirectoryStore(config);
  const engine = new AccessEngine(directory.store, {
    logger: createChildLogger({ component: 'access-engine' }),
  });

  const gateway = createGateway({
    serviceName: config.serviceName,
    engine,
    store: directory.store,
    jwt: config.jwt,
    corsOrigins: config.corsOrigins,
  });

  try {
    await gateway.listen(config.port, config.host);
  } catch (error) {
    await directory.close();
    throw error;
  }

  return {
    engine,
    store: directory.store,
    gateway,
    stop: async () => {
      await gateway.close();
      await directory.close();
    },
  };
}
