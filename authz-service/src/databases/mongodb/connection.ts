/**
 * MongoDB Connection
 *
 * Features:
 * - Connection pooling with pool event logging
 * - Reads from the primary by default, so role changes are seen by the next decision
 * - Retry logic on reads
 * - Health checks
 * - Indexes for the directory lookups
 */

import { MongoClient, ReadPreference, type Db, type MongoClientOptions } from 'mongodb';
import { logger } from '../../common/logger.js';
import { getErrorMessage } from '../../common/errors.js';

// ═══════════════════════════════════════════════════════════════════
// Configuration
// ═══════════════════════════════════════════════════════════════════

export interface MongoConfig {
  uri: string;
  dbName: string;
  // Pool settings
  maxPoolSize?: number;
  minPoolSize?: number;
  // Timeouts
  connectTimeoutMS?: number;
  socketTimeoutMS?: number;
  serverSelectionTimeoutMS?: number;
  waitQueueTimeoutMS?: number;
  // Read settings
  readPreference?: 'primary' | 'secondary' | 'nearest';
  retryReads?: boolean;
}

export const DEFAULT_MONGO_CONFIG: Omit<Required<MongoConfig>, 'uri' | 'dbName'> = {
  maxPoolSize: 50,
  minPoolSize: 5,
  connectTimeoutMS: 10000,
  socketTimeoutMS: 45000,
  serverSelectionTimeoutMS: 10000,
  waitQueueTimeoutMS: 5000,
  readPreference: 'primary',
  retryReads: true,
};

export const DIRECTORY_COLLECTIONS = {
  tenants: 'tenants',
  users: 'users',
  roles: 'roles',
} as const;

// ═══════════════════════════════════════════════════════════════════
// Connection
// ═══════════════════════════════════════════════════════════════════

export interface DatabaseConnection {
  client: MongoClient;
  db: Db;
}

export async function connectDatabase(config: MongoConfig): Promise<DatabaseConnection> {
  const cfg = { ...DEFAULT_MONGO_CONFIG, ...config };

  const readPrefMap = {
    primary: ReadPreference.PRIMARY,
    secondary: ReadPreference.SECONDARY_PREFERRED,
    nearest: ReadPreference.NEAREST,
  };

  const clientOptions: MongoClientOptions = {
    maxPoolSize: cfg.maxPoolSize,
    minPoolSize: cfg.minPoolSize,
    connectTimeoutMS: cfg.connectTimeoutMS,
    socketTimeoutMS: cfg.socketTimeoutMS,
    serverSelectionTimeoutMS: cfg.serverSelectionTimeoutMS,
    waitQueueTimeoutMS: cfg.waitQueueTimeoutMS,
    readPreference: readPrefMap[cfg.readPreference],
    retryReads: cfg.retryReads,
  };

  const client = new MongoClient(cfg.uri, clientOptions);

  client.on('connectionPoolCreated', () => logger.debug('MongoDB pool created'));
  client.on('connectionPoolClosed', () => logger.debug('MongoDB pool closed'));
  client.on('connectionCheckOutFailed', (event) => {
    if (event.reason === 'timeout') {
      logger.warn('MongoDB pool wait queue timeout');
    }
  });

  let db: Db;
  try {
    await client.connect();
    db = client.db(cfg.dbName);
    await db.command({ ping: 1 });
    await ensureIndexes(db);
  } catch (error) {
    logger.error('MongoDB connection failed', { database: cfg.dbName, error: getErrorMessage(error) });
    await client.close();
    throw error;
  }

  logger.info('Connected to MongoDB', {
    database: cfg.dbName,
    maxPoolSize: cfg.maxPoolSize,
    readPreference: cfg.readPreference,
  });

  return { client, db };
}

export async function closeDatabase(connection: DatabaseConnection): Promise<void> {
  await connection.client.close();
  logger.info('MongoDB disconnected');
}

// ═══════════════════════════════════════════════════════════════════
// Health Check
// ═══════════════════════════════════════════════════════════════════

export interface DatabaseHealth {
  healthy: boolean;
  latencyMs: number;
  error?: string;
}

export async function checkDatabaseHealth(db: Pick<Db, 'command'>): Promise<DatabaseHealth> {
  const start = Date.now();
  try {
    await db.command({ ping: 1 });
    return { healthy: true, latencyMs: Date.now() - start };
  } catch (error) {
    const message = getErrorMessage(error);
    logger.warn('MongoDB health check failed', { error: message });
    return { healthy: false, latencyMs: -1, error: message };
  }
}

// ═══════════════════════════════════════════════════════════════════
// Indexes
// ═══════════════════════════════════════════════════════════════════

export const DIRECTORY_INDEXES: Record<string, Array<{ key: Record<string, 1 | -1>; unique?: boolean }>> = {
  [DIRECTORY_COLLECTIONS.users]: [
    { key: { externalUserId: 1 } },
  ],
  [DIRECTORY_COLLECTIONS.roles]: [
    { key: { id: 1 }, unique: true },
    { key: { namespace: 1, id: 1 } },
  ],
  [DIRECTORY_COLLECTIONS.tenants]: [
    { key: { id: 1 }, unique: true },
  ],
};

/**
 * Index creation failure is logged and does not block startup; lookups still work unindexed.
 */
async function ensureIndexes(database: Db): Promise<void> {
  for (const [collName, indexes] of Object.entries(DIRECTORY_INDEXES)) {
    try {
      await database.collection(collName).createIndexes(indexes);
      logger.debug(`Indexes ensured for ${collName}`);
    } catch (error) {
      logger.warn('Failed to ensure indexes', { collection: collName, error: getErrorMessage(error) });
    }
  }
}
