import { describe, expect, it } from 'vitest';
import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import { loadOrCreateAdminToken } from '../../src/persistedConfig.js';

async function mkTmpDir(): Promise<string> {
  return await fs.mkdtemp(path.join(os.tmpdir(), 'vault-bootstrap-test-'));
}

function adminTokenPath(dir: string): string {
  return path.join(dir, 'vault-bootstrap', 'admin_token');
}

describe('persistedConfig', () => {
  it('creates an admin token on first run', async () => {
    const dir = await mkTmpDir();

    const res = loadOrCreateAdminToken({ dataDir: dir });
    expect(res.createdAdminToken).toBe(true);
    expect(res.adminToken).toHaveLength(32);

    expect((await fs.readFile(adminTokenPath(dir), 'utf8')).trim()).toBe(res.adminToken);
    expect(await fs.readdir(path.join(dir, 'vault-bootstrap'))).toEqual(['admin_token']);
  });

  it('reuses the previously persisted token', async () => {
    const dir = await mkTmpDir();

    const first = loadOrCreateAdminToken({ dataDir: dir });
    const second = loadOrCreateAdminToken({ dataDir: dir });

    expect(second).toEqual({ adminToken: first.adminToken, createdAdminToken: false });
  });

  it('lets the env value override and rewrites the file', async () => {
    const dir = await mkTmpDir();
    loadOrCreateAdminToken({ dataDir: dir });

    const res = loadOrCreateAdminToken({ dataDir: dir, envAdminToken: 'test-admin-token' });

    expect(res).toEqual({ adminToken: 'test-admin-token', createdAdminToken: false });
    expect((await fs.readFile(adminTokenPath(dir), 'utf8')).trim()).toBe('test-admin-token');
  });
});
