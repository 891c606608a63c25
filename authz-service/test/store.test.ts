/**
 * Mongo Directory Store - Test Suite
 *
 * Runs the store against in-process fake collections that record the
 * filters they receive.
 */

import { describe, it, expect, vi } from 'vitest';
import type { Document, Filter, FindOptions } from 'mongodb';
import { AccessEngine, StoreUnavailableError } from 'access-engine';
import { MongoDirectoryStore, type DirectoryCollection } from '../src/access/store.js';
import { subscribeToLogs, type LogEntry } from '../src/common/logger.js';

// ═══════════════════════════════════════════════════════════════════
// FAKES
// ═══════════════════════════════════════════════════════════════════

interface FakeCollection extends DirectoryCollection {
  calls: Array<{ filter: Filter<Document>; options?: FindOptions }>;
}

function fakeCollection(docs: Document[] | Error): FakeCollection {
  const calls: FakeCollection['calls'] = [];
  return {
    calls,
    find(filter, options) {
      calls.push({ filter, options });
      return {
        toArray: async () => {
          if (docs instanceof Error) throw docs;
          return docs;
        },
      };
    },
  };
}

const billingRoles: Document[] = [
  { _id: 'a', id: 'r-read', namespace: 'billing', permissions: [{ action: 'read', resource: 'invoices/*' }] },
  { _id: 'b', id: 'r-write', namespace: 'billing', permissions: [{ action: 'write', resource: 'invoices/*' }] },
];

function createStore(users: Document[] | Error, roles: Document[] | Error) {
  const usersCollection = fakeCollection(users);
  const rolesCollection = fakeCollection(roles);
  const store = new MongoDirectoryStore({ users: usersCollection, roles: rolesCollection });
  return { store, usersCollection, rolesCollection };
}

// ═══════════════════════════════════════════════════════════════════
// ROLE RESOLUTION
// ═══════════════════════════════════════════════════════════════════

describe('MongoDirectoryStore.getRoleIdsForUser', () => {
  it('should query by external user id and project role ids only', async () => {
    const { store, usersCollection } = createStore([{ roleIds: ['r-read'] }], []);

    await store.getRoleIdsForUser('u1');

    expect(usersCollection.calls).toEqual([
      { filter: { externalUserId: 'u1' }, options: { projection: { _id: 0, roleIds: 1 } } },
    ]);
  });

  it('should union role ids across tenant memberships', async () => {
    const { store } = createStore(
      [{ roleIds: ['r1', 'r2'] }, { roleIds: ['r2', 'r3'] }],
      []
    );

    const roleIds = await store.getRoleIdsForUser('u1');

    expect([...roleIds].sort()).toEqual(['r1', 'r2', 'r3']);
  });

  it('should return an empty set for an unknown user', async () => {
    const { store } = createStore([], []);

    expect((await store.getRoleIdsForUser('nobody')).size).toBe(0);
  });

  it('should skip malformed user documents', async () => {
    const { store } = createStore([{ roleIds: 'r1' }, { roleIds: ['r2'] }], []);

    expect([...(await store.getRoleIdsForUser('u1'))]).toEqual(['r2']);
  });

  it('should treat a user document without roleIds as having no roles', async () => {
    const { store } = createStore([{}, { roleIds: ['r2'] }], []);

    expect([...(await store.getRoleIdsForUser('u1'))]).toEqual(['r2']);
  });

  it('should warn only for a roleIds field of the wrong type', async () => {
    const warnings: LogEntry[] = [];
    vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const unsubscribe = subscribeToLogs(entry => {
      if (entry.level === 'warn') warnings.push(entry);
    });
    const { store } = createStore([{}, { roleIds: 'r1' }], []);

    try {
      await store.getRoleIdsForUser('u1');
    } finally {
      unsubscribe();
      vi.restoreAllMocks();
    }

    expect(warnings.map(w => w.message)).toEqual(['Skipping malformed user document']);
  });

  it('should wrap driver failures in StoreUnavailableError', async () => {
    const failure = new Error('connection refused');
    const { store } = createStore(failure, []);

    const error = await store.getRoleIdsForUser('u1').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StoreUnavailableError);
    expect(error).toMatchObject({
      message: 'Directory store unavailable: connection refused',
      cause: failure,
    });
  });

  it('should wrap synchronous driver failures too', async () => {
    const store = new MongoDirectoryStore({
      users: {
        find: () => {
          throw new Error('topology closed');
        },
      },
      roles: fakeCollection([]),
    });

    await expect(store.getRoleIdsForUser('u1')).rejects.toThrow('Directory store unavailable: topology closed');
  });
});

// ═══════════════════════════════════════════════════════════════════
// ROLE MATCHING
// ═══════════════════════════════════════════════════════════════════

describe('MongoDirectoryStore.getRolesMatchingRequest', () => {
  it('should push the id and namespace filter down to the roles collection', async () => {
    const { store, rolesCollection } = createStore([], billingRoles);

    await store.getRolesMatchingRequest(
      new Set(['r-read', 'r-write']),
      { action: 'read', resource: 'invoices/1' },
      'billing'
    );

    expect(rolesCollection.calls).toEqual([
      {
        filter: { id: { $in: ['r-read', 'r-write'] }, namespace: 'billing' },
        options: { projection: { _id: 0 } },
      },
    ]);
  });

  it('should return only the roles whose permissions grant the request', async () => {
    const { store } = createStore([], billingRoles);

    const matched = await store.getRolesMatchingRequest(
      new Set(['r-read', 'r-write']),
      { action: 'read', resource: 'invoices/1' },
      'billing'
    );

    expect([...matched]).toEqual(['r-read']);
  });

  it('should not query when there are no role ids', async () => {
    const { store, rolesCollection } = createStore([], billingRoles);

    const matched = await store.getRolesMatchingRequest(new Set(), { action: 'read', resource: 'invoices/1' }, 'billing');

    expect(matched.size).toBe(0);
    expect(rolesCollection.calls).toHaveLength(0);
  });

  it('should ignore documents outside the requested ids or namespace', async () => {
    const { store } = createStore([], [
      ...billingRoles,
      { id: 'r-other', namespace: 'billing', permissions: [{ action: '*', resource: '**' }] },
      { id: 'r-read-support', namespace: 'support', permissions: [{ action: 'read', resource: 'invoices/*' }] },
    ]);

    const matched = await store.getRolesMatchingRequest(
      new Set(['r-write', 'r-read-support']),
      { action: 'read', resource: 'invoices/1' },
      'billing'
    );

    expect(matched.size).toBe(0);
  });

  it('should skip malformed role documents', async () => {
    const { store } = createStore([], [
      { id: 'r-broken', namespace: 'billing' },
      billingRoles[0],
    ]);

    const matched = await store.getRolesMatchingRequest(
      new Set(['r-broken', 'r-read']),
      { action: 'read', resource: 'invoices/1' },
      'billing'
    );

    expect([...matched]).toEqual(['r-read']);
  });

  it('should wrap role query failures in StoreUnavailableError', async () => {
    const { store } = createStore([], new Error('socket timeout'));

    await expect(
      store.getRolesMatchingRequest(new Set(['r-read']), { action: 'read', resource: 'invoices/1' }, 'billing')
    ).rejects.toBeInstanceOf(StoreUnavailableError);
  });
});

// ═══════════════════════════════════════════════════════════════════
// HEALTH
// ═══════════════════════════════════════════════════════════════════

describe('MongoDirectoryStore.ping', () => {
  it('should report healthy when the database answers a ping', async () => {
    const command = vi.fn().mockResolvedValue({ ok: 1 });
    const store = new MongoDirectoryStore({ users: fakeCollection([]), roles: fakeCollection([]), database: { command } });

    expect(await store.ping()).toBe(true);
    expect(command).toHaveBeenCalledWith({ ping: 1 });
  });

  it('should report unhealthy when the ping fails', async () => {
    const command = vi.fn().mockRejectedValue(new Error('not primary'));
    const store = new MongoDirectoryStore({ users: fakeCollection([]), roles: fakeCollection([]), database: { command } });

    expect(await store.ping()).toBe(false);
  });

  it('should report unhealthy without a database handle', async () => {
    const { store } = createStore([], []);

    expect(await store.ping()).toBe(false);
  });
});

// ═══════════════════════════════════════════════════════════════════
// ENGINE OVER MONGO STORE
// ═══════════════════════════════════════════════════════════════════

describe('AccessEngine over MongoDirectoryStore', () => {
  it('should allow a request granted by an assigned role', async () => {
    const { store } = createStore([{ roleIds: ['r-read'] }], billingRoles);
    const engine = new AccessEngine(store);

    const decision = await engine.isAllowed({
      externalUserId: 'u1',
      namespace: 'billing',
      action: 'read',
      resource: 'invoices/123',
    });

    expect(decision).toEqual({ result: true });
  });

  it('should deny the same request in another namespace', async () => {
    const { store } = createStore([{ roleIds: ['r-read'] }], billingRoles);
    const engine = new AccessEngine(store);

    const decision = await engine.isAllowed({
      externalUserId: 'u1',
      namespace: 'support',
      action: 'read',
      resource: 'invoices/123',
    });

    expect(decision).toEqual({ result: false });
  });

  it('should fail rather than deny when the directory is down', async () => {
    const { store } = createStore([{ roleIds: ['r-read'] }], new Error('socket timeout'));
    const engine = new AccessEngine(store);

    await expect(
      engine.isAllowed({ externalUserId: 'u1', namespace: 'billing', action: 'read', resource: 'invoices/123' })
    ).rejects.toBeInstanceOf(StoreUnavailableError);
  });
});
