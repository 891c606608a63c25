/**
 * Authz Service Configuration
 *
 * Read from environment variables. An empty variable counts as unset.
 */

import { type } from 'arktype';
import type { JwtConfig } from './common/jwt.js';
import type { LogFormat, LogLevel } from './common/logger.js';
import { logger } from './common/logger.js';
import { validateInput, isValidationFailure } from './common/validation/arktype.js';

export const SERVICE_NAME = 'authz-service';

export const DEFAULT_HOST = '0.0.0.0';
export const DEFAULT_PORT = 3030;

export type DirectoryStoreKind = 'mongo' | 'memory';

export interface AuthzConfig {
  serviceName: string;
  host: string;
  port: number;
  directoryStore: DirectoryStoreKind;
  /** Set when directoryStore is 'mongo' */
  mongo?: { uri: string; dbName: string };
  /** Set when directoryStore is 'memory' */
  seedFile?: string;
  jwt: JwtConfig;
  corsOrigins: string[];
  logLevel: LogLevel;
  logFormat: LogFormat;
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

const envSchema = type({
  'HOST?': 'string',
  'PORT?': 'string',
  'DIRECTORY_STORE?': "'mongo' | 'memory'",
  'MONGO_URI?': 'string',
  'MONGO_DB_NAME?': 'string',
  'DIRECTORY_SEED_FILE?': 'string',
  'JWT_SECRET?': 'string',
  'JWT_AUDIENCE?': 'string',
  'JWT_ISSUER?': 'string',
  'CORS_ORIGINS?': 'string',
  'LOG_LEVEL?': "'debug' | 'info' | 'warn' | 'error'",
  'LOG_FORMAT?': "'json' | 'text' | 'pretty'",
});

function definedEntries(env: Record<string, string | undefined>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      out[key] = value.trim();
    }
  }
  return out;
}

function parsePort(value: string | undefined, issues: string[]): number {
  if (value === undefined) return DEFAULT_PORT;
  const port = /^\d+$/.test(value) ? Number.parseInt(value, 10) : NaN;
  if (!(port >= 1 && port <= 65535)) {
    issues.push(`PORT must be an integer between 1 and 65535 (was ${value})`);
    return DEFAULT_PORT;
  }
  return port;
}

/**
 * Build the service configuration from environment variables
 *
 * @throws ConfigError listing every invalid or missing variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AuthzConfig {
  const parsed = validateInput(envSchema(definedEntries(env)));
  if (isValidationFailure(parsed)) {
    throw new ConfigError(parsed.errors);
  }

  const issues: string[] = [];
  const port = parsePort(parsed.PORT, issues);
  const directoryStore = parsed.DIRECTORY_STORE ?? 'mongo';

  if (!parsed.JWT_SECRET) {
    issues.push('JWT_SECRET is required');
  }

  let mongo: AuthzConfig['mongo'];
  let seedFile: string | undefined;
  if (directoryStore === 'mongo') {
    if (!parsed.MONGO_URI) issues.push('MONGO_URI is required when DIRECTORY_STORE is mongo');
    if (!parsed.MONGO_DB_NAME) issues.push('MONGO_DB_NAME is required when DIRECTORY_STORE is mongo');
    if (parsed.MONGO_URI && parsed.MONGO_DB_NAME) {
      mongo = { uri: parsed.MONGO_URI, dbName: parsed.MONGO_DB_NAME };
    }
  } else {
    if (!parsed.DIRECTORY_SEED_FILE) issues.push('DIRECTORY_SEED_FILE is required when DIRECTORY_STORE is memory');
    seedFile = parsed.DIRECTORY_SEED_FILE;
  }

  if (issues.length > 0) {
    throw new ConfigError(issues);
  }

  return {
    serviceName: SERVICE_NAME,
    host: parsed.HOST ?? DEFAULT_HOST,
    port,
    directoryStore,
    ...(mongo && { mongo }),
    ...(seedFile && { seedFile }),
    jwt: {
      secret: parsed.JWT_SECRET ?? '',
      ...(parsed.JWT_AUDIENCE && { audience: parsed.JWT_AUDIENCE }),
      ...(parsed.JWT_ISSUER && { issuer: parsed.JWT_ISSUER }),
    },
    corsOrigins: (parsed.CORS_ORIGINS ?? '*')
      .split(',')
      .map(origin => origin.trim())
      .filter(origin => origin.length > 0),
    logLevel: parsed.LOG_LEVEL ?? 'info',
    logFormat: parsed.LOG_FORMAT ?? 'json',
  };
}

export function printConfigSummary(config: AuthzConfig): void {
  logger.info('Config', {
    host: config.host,
    port: config.port,
    directoryStore: config.directoryStore,
    database: config.mongo?.dbName,
    seedFile: config.seedFile,
    corsOrigins: config.corsOrigins,
    jwtAudience: config.jwt.audience,
    jwtIssuer: config.jwt.issuer,
  });
}
