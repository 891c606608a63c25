/**
 * Gateway - Test Suite
 *
 * Route handlers, authentication, CORS and the GraphQL schema, exercised
 * without opening a socket.
 */

import { describe, it, expect, vi } from 'vitest';
import jwt from 'jsonwebtoken';
import { graphql } from 'graphql';
import {
  AccessEngine,
  InMemoryDirectoryStore,
  StoreUnavailableError,
  type DirectorySnapshot,
  type DirectoryStore,
} from 'access-engine';
import { authenticate, handleHealth, handleIsAllowed } from '../src/gateway/handlers.js';
import { corsHeaders, CORS_HEADERS, CORS_METHODS } from '../src/gateway/server.js';
import { createGraphQLSchema, type GatewayContext } from '../src/gateway/graphql.js';
import { HttpError, registerServiceErrorCodes } from '../src/common/errors.js';
import { AUTHZ_ERROR_CODES } from '../src/error-codes.js';

// ═══════════════════════════════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════════════════════════════

const SECRET = 'test-secret';

const snapshot: DirectorySnapshot = {
  users: [
    { id: '1', externalUserId: 'u1', tenantIds: ['t1'], roleIds: ['r1'] },
  ],
  roles: [
    { id: 'r1', namespace: 'billing', permissions: [{ action: 'read', resource: 'invoices/*' }] },
  ],
};

function createEngine(store: DirectoryStore = new InMemoryDirectoryStore(snapshot)) {
  return new AccessEngine(store);
}

function failingStore(error: unknown): DirectoryStore {
  return {
    getRoleIdsForUser: vi.fn().mockRejectedValue(error),
    getRolesMatchingRequest: vi.fn().mockResolvedValue(new Set()),
  };
}

function catchHttpError(fn: () => unknown): HttpError {
  try {
    fn();
  } catch (error) {
    if (error instanceof HttpError) return error;
    throw error;
  }
  throw new Error('expected an HttpError');
}

// ═══════════════════════════════════════════════════════════════════
// AUTHENTICATION
// ═══════════════════════════════════════════════════════════════════

describe('authenticate', () => {
  it('should reject a missing Authorization header', () => {
    const error = catchHttpError(() => authenticate(undefined, { secret: SECRET }));

    expect(error.status).toBe(401);
    expect(error.code).toBe('MSAuthzUnauthorized');
  });

  it('should reject a non-bearer scheme as missing', () => {
    const error = catchHttpError(() => authenticate('Basic dXNlcjpwYXNz', { secret: SECRET }));

    expect(error.code).toBe('MSAuthzUnauthorized');
  });

  it('should reject a token signed with another secret', () => {
    const token = jwt.sign({ sub: 'svc-billing' }, 'other-secret', { algorithm: 'HS256' });

    const error = catchHttpError(() => authenticate(`Bearer ${token}`, { secret: SECRET }));

    expect(error.status).toBe(401);
    expect(error.code).toBe('MSAuthzInvalidToken');
  });

  it('should reject an expired token', () => {
    const token = jwt.sign({ sub: 'svc-billing', exp: Math.floor(Date.now() / 1000) - 60 }, SECRET);

    expect(catchHttpError(() => authenticate(`Bearer ${token}`, { secret: SECRET })).code).toBe('MSAuthzInvalidToken');
  });

  it('should enforce the configured audience', () => {
    const token = jwt.sign({ sub: 'svc-billing' }, SECRET, { audience: 'other-api' });

    const error = catchHttpError(() => authenticate(`Bearer ${token}`, { secret: SECRET, audience: 'authz-api' }));

    expect(error.code).toBe('MSAuthzInvalidToken');
  });

  it('should return the caller for a valid token', () => {
    const token = jwt.sign({ sub: 'svc-billing' }, SECRET, { audience: 'authz-api', issuer: 'test-issuer' });

    const caller = authenticate(`Bearer ${token}`, { secret: SECRET, audience: 'authz-api', issuer: 'test-issuer' });

    expect(caller.subject).toBe('svc-billing');
    expect(caller.claims.aud).toBe('authz-api');
  });
});

// ═══════════════════════════════════════════════════════════════════
// POST /v1/isallowed
// ═══════════════════════════════════════════════════════════════════

describe('handleIsAllowed', () => {
  const body = { external_user_id: 'u1', namespace: 'billing', action: 'read', resource: 'invoices/123' };

  it('should allow a granted request', async () => {
    expect(await handleIsAllowed(createEngine(), body)).toEqual({ status: 200, body: { result: true } });
  });

  it('should deny a resource outside the pattern', async () => {
    const result = await handleIsAllowed(createEngine(), { ...body, resource: 'payments/123' });

    expect(result).toEqual({ status: 200, body: { result: false } });
  });

  it('should deny the same request in another namespace', async () => {
    const result = await handleIsAllowed(createEngine(), { ...body, namespace: 'support' });

    expect(result).toEqual({ status: 200, body: { result: false } });
  });

  it('should answer 422 for a body with a missing field', async () => {
    const { external_user_id: _omitted, ...rest } = body;

    const result = await handleIsAllowed(createEngine(), rest);

    expect(result.status).toBe(422);
    expect(result.body).toMatchObject({ error: { code: 'MSAuthzValidationError' } });
  });

  it('should answer 422 for a body that is not an object', async () => {
    const result = await handleIsAllowed(createEngine(), 'read invoices');

    expect(result.status).toBe(422);
  });

  it('should answer 400 for an empty field without touching the store', async () => {
    const store = failingStore(new Error('should not be called'));

    const result = await handleIsAllowed(createEngine(store), { ...body, external_user_id: '' });

    expect(result).toEqual({
      status: 400,
      body: {
        error: {
          code: 'MSAuthzInvalidRequest',
          message: 'Invalid request: externalUserId must be a non-empty string',
        },
      },
    });
    expect(store.getRoleIdsForUser).not.toHaveBeenCalled();
  });

  it('should answer 503 rather than a deny when the store is unavailable', async () => {
    const result = await handleIsAllowed(createEngine(failingStore(new StoreUnavailableError('timeout'))), body);

    expect(result).toEqual({
      status: 503,
      body: {
        error: {
          code: 'MSAuthzStoreUnavailable',
          message: 'Directory store unavailable: timeout',
        },
      },
    });
  });

  it('should answer 500 with a generic message for unexpected failures', async () => {
    const result = await handleIsAllowed(createEngine(failingStore(new Error('bug'))), body);

    expect(result).toEqual({
      status: 500,
      body: { error: { code: 'MSAuthzServerError', message: 'Internal server error' } },
    });
  });
});

// ═══════════════════════════════════════════════════════════════════
// GET /healthz
// ═══════════════════════════════════════════════════════════════════

describe('handleHealth', () => {
  const info = { service: 'authz-service', startedAt: Date.now() };

  function storeWithPing(ping: DirectoryStore['ping']): DirectoryStore {
    return {
      getRoleIdsForUser: async () => new Set<string>(),
      getRolesMatchingRequest: async () => new Set<string>(),
      ping,
    };
  }

  it('should answer 200 ok when the store answers', async () => {
    const result = await handleHealth(new InMemoryDirectoryStore(), info);

    expect(result.status).toBe(200);
    expect(result.body).toMatchObject({ status: 'ok', service: 'authz-service' });
  });

  it('should answer 503 degraded when the ping reports unhealthy', async () => {
    const result = await handleHealth(storeWithPing(async () => false), info);

    expect(result.status).toBe(503);
    expect(result.body).toMatchObject({ status: 'degraded' });
  });

  it('should answer 503 degraded when the ping throws', async () => {
    const result = await handleHealth(storeWithPing(async () => { throw new Error('down'); }), info);

    expect(result.status).toBe(503);
  });

  it('should treat a store without ping as healthy', async () => {
    const result = await handleHealth(storeWithPing(undefined), info);

    expect(result.status).toBe(200);
  });
});

// ═══════════════════════════════════════════════════════════════════
// CORS
// ═══════════════════════════════════════════════════════════════════

describe('corsHeaders', () => {
  it('should allow any origin for a wildcard list', () => {
    expect(corsHeaders('https://app.example', ['*'])).toEqual({
      'Access-Control-Allow-Methods': CORS_METHODS,
      'Access-Control-Allow-Headers': CORS_HEADERS,
      'Access-Control-Expose-Headers': 'X-Correlation-ID',
      'Access-Control-Allow-Origin': '*',
    });
  });

  it('should echo a listed origin', () => {
    const headers = corsHeaders('https://app.example', ['https://app.example']);

    expect(headers['Access-Control-Allow-Origin']).toBe('https://app.example');
    expect(headers['Vary']).toBe('Origin');
  });

  it('should omit the allow-origin header for an unlisted origin', () => {
    expect(corsHeaders('https://evil.example', ['https://app.example'])).not.toHaveProperty('Access-Control-Allow-Origin');
  });

  it('should advertise the allowed methods and headers', () => {
    expect(CORS_METHODS).toBe('GET, POST, OPTIONS');
    expect(CORS_HEADERS).toBe('User-Agent, Content-Type, Authorization, X-Correlation-ID');
  });
});

// ═══════════════════════════════════════════════════════════════════
// GRAPHQL
// ═══════════════════════════════════════════════════════════════════

describe('GraphQL schema', () => {
  const contextValue: GatewayContext = { caller: { subject: 'svc-billing', claims: {} }, correlationId: 'corr-1' };

  const query = (input: Record<string, string>) => `{
    isAllowed(input: {
      externalUserId: "${input.externalUserId}",
      namespace: "${input.namespace}",
      action: "${input.action}",
      resource: "${input.resource}"
    }) { result }
  }`;

  const granted = { externalUserId: 'u1', namespace: 'billing', action: 'read', resource: 'invoices/123' };

  it('should answer isAllowed', async () => {
    const result = await graphql({ schema: createGraphQLSchema(createEngine()), source: query(granted), contextValue });

    expect(result.errors).toBeUndefined();
    expect(result.data).toEqual({ isAllowed: { result: true } });
  });

  it('should answer false for a denied request', async () => {
    const result = await graphql({
      schema: createGraphQLSchema(createEngine()),
      source: query({ ...granted, action: 'delete' }),
      contextValue,
    });

    expect(result.data).toEqual({ isAllowed: { result: false } });
  });

  it('should carry the service error code for an invalid request', async () => {
    const result = await graphql({
      schema: createGraphQLSchema(createEngine()),
      source: query({ ...granted, resource: '' }),
      contextValue,
    });

    expect(result.data).toBeNull();
    expect(result.errors?.[0].message).toBe('MSAuthzInvalidRequest');
    expect(result.errors?.[0].extensions).toMatchObject({
      code: 'MSAuthzInvalidRequest',
      status: 400,
      correlationId: 'corr-1',
    });
  });

  it('should carry the store code when the directory is down', async () => {
    const result = await graphql({
      schema: createGraphQLSchema(createEngine(failingStore(new StoreUnavailableError('timeout')))),
      source: query(granted),
      contextValue,
    });

    expect(result.data).toBeNull();
    expect(result.errors?.[0].extensions).toMatchObject({ code: 'MSAuthzStoreUnavailable', status: 503 });
  });

  it('should list registered error codes', async () => {
    registerServiceErrorCodes(AUTHZ_ERROR_CODES);

    const result = await graphql({ schema: createGraphQLSchema(createEngine()), source: '{ errorCodes }', contextValue });

    expect(result.data).toEqual({ errorCodes: [...AUTHZ_ERROR_CODES].sort() });
  });
});
