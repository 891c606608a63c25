/**
 * authz-service
 *
 * HTTP and GraphQL front end for the access-engine, backed by a MongoDB or
 * in-memory directory.
 */

// Assembly
export { startService, openDirectoryStore, type AuthzService, type DirectoryStoreHandle } from './service.js';
export { loadConfig, printConfigSummary, ConfigError, SERVICE_NAME, type AuthzConfig, type DirectoryStoreKind } from './config.js';

// Directory
export { MongoDirectoryStore, type DirectoryCollection, type MongoDirectoryStoreOptions } from './access/store.js';
export { loadDirectorySnapshot, parseDirectorySnapshot, SnapshotError } from './access/snapshot.js';
export {
  connectDatabase,
  closeDatabase,
  checkDatabaseHealth,
  DIRECTORY_COLLECTIONS,
  type MongoConfig,
  type DatabaseConnection,
} from './databases/mongodb/connection.js';

// Gateway
export { createGateway, corsHeaders, type GatewayOptions, type GatewayInstance } from './gateway/server.js';
export { createGraphQLSchema, type GatewayContext } from './gateway/graphql.js';
export { handleIsAllowed, handleHealth, authenticate, type HandlerResult } from './gateway/handlers.js';

// Error codes
export { AUTHZ_ERRORS, AUTHZ_ERROR_CODES, type AuthzErrorCode } from './error-codes.js';
