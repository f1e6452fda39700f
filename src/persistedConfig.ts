import fs from 'node:fs';
import path from 'node:path';
import crypto from 'node:crypto';

function ensureDir(dirPath: string): void {
  fs.mkdirSync(dirPath, { recursive: true, mode: 0o700 });
}

function tryReadText(filePath: string): string {
  try {
    return fs.readFileSync(filePath, 'utf8').trim();
  } catch {
    return '';
  }
}

function writeText0600(filePath: string, value: string): void {
  const tmpPath = `${filePath}.tmp`;
  fs.writeFileSync(tmpPath, `${value}\n`, { encoding: 'utf8', mode: 0o600 });
  fs.renameSync(tmpPath, filePath);
}

export type PersistedAdminToken = {
  adminToken: string;
  createdAdminToken: boolean;
};

/**
 * Resolves the admin token. The environment value wins over the file; whatever
 * is used is written back so a restart without the environment keeps it.
 *
 * The at-rest secrets key is not handled here: every peer must decrypt what
 * the leader stores, so it has to come from shared configuration.
 */
export function loadOrCreateAdminToken(opts: { dataDir: string; envAdminToken?: string }): PersistedAdminToken {
  const configDir = path.join(opts.dataDir, 'vault-bootstrap');
  ensureDir(configDir);

  const adminTokenPath = path.join(configDir, 'admin_token');
  const existingAdminToken = tryReadText(adminTokenPath);

  let adminToken = (opts.envAdminToken || '').trim() || existingAdminToken;
  let createdAdminToken = false;

  if (!adminToken) {
    adminToken = crypto.randomBytes(24).toString('base64url');
    createdAdminToken = true;
  }
  if (adminToken !== existingAdminToken) writeText0600(adminTokenPath, adminToken);

  return { adminToken, createdAdminToken };
}
