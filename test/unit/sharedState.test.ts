import { describe, expect, it } from 'vitest';
import { SharedStateStore } from '../../src/cluster/sharedState.js';
import { MissingKeysError, MissingTokenError, NotLeaderError } from '../../src/errors.js';
import { MemoryElection } from './_fakes.js';

const SECRETS = { rootToken: 'test-root-token', unsealKeys: ['key-a', 'key-b', 'key-c'], shares: 3, threshold: 2 };

describe('SharedStateStore', () => {
  it('publishes the bootstrap secrets in a single write', async () => {
    const election = new MemoryElection(true);
    const store = new SharedStateStore(election);

    await store.putBootstrapSecrets(SECRETS);

    expect(election.writes).toEqual(['root_token', 'keys', 'key_shares', 'key_threshold']);
    expect(election.data.get('keys')).toBe('["key-a","key-b","key-c"]');
    await expect(store.getBootstrapSecrets()).resolves.toEqual(SECRETS);
    await expect(store.getRootToken()).resolves.toBe('test-root-token');
    await expect(store.getUnsealKeys()).resolves.toEqual(['key-a', 'key-b', 'key-c']);
  });

  it('returns nothing before the leader has published', async () => {
    const store = new SharedStateStore(new MemoryElection(false));

    await expect(store.getBootstrapSecrets()).resolves.toBeUndefined();
    await expect(store.getLocalAccessRoleId()).resolves.toBeUndefined();
    await expect(store.getRootToken()).rejects.toBeInstanceOf(MissingTokenError);
    await expect(store.getUnsealKeys()).rejects.toBeInstanceOf(MissingKeysError);
  });

  it('treats an empty key list as missing', async () => {
    const store = new SharedStateStore(new MemoryElection(false, { keys: '[]' }));
    await expect(store.getUnsealKeys()).rejects.toBeInstanceOf(MissingKeysError);
  });

  it('falls back to the key count when shares and threshold were not stored', async () => {
    const store = new SharedStateStore(
      new MemoryElection(false, { root_token: 'test-root-token', keys: '["key-a","key-b"]' })
    );

    await expect(store.getBootstrapSecrets()).resolves.toEqual({
      rootToken: 'test-root-token',
      unsealKeys: ['key-a', 'key-b'],
      shares: 2,
      threshold: 2
    });
  });

  it('rejects writes from a follower', async () => {
    const election = new MemoryElection(false);
    const store = new SharedStateStore(election);

    await expect(store.putBootstrapSecrets(SECRETS)).rejects.toBeInstanceOf(NotLeaderError);
    await expect(store.putLocalAccessRoleId('role-id')).rejects.toThrow('Only the leader may write leader settings');
    expect(election.writes).toEqual([]);
  });

  it('stores the local access role id', async () => {
    const election = new MemoryElection(true);
    const store = new SharedStateStore(election);

    await store.putLocalAccessRoleId('role-id-local-charm-access');

    expect(election.data.get('local-charm-access-id')).toBe('role-id-local-charm-access');
    await expect(store.getLocalAccessRoleId()).resolves.toBe('role-id-local-charm-access');
  });
});
