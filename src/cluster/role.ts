import fs from 'node:fs';
import type { AppConfig } from '../config.js';
import type { ClusterRole } from './types.js';

type RoleConfig = Pick<AppConfig, 'CLUSTER_ROLE' | 'CLUSTER_ROLE_FILE'>;

export function readRoleOverride(config: RoleConfig): ClusterRole | undefined {
  const p = config.CLUSTER_ROLE_FILE.trim();
  if (!p) return undefined;

  let raw: string;
  try {
    raw = fs.readFileSync(p, 'utf8').trim().toLowerCase();
  } catch (err) {
    // A missing file means the election agent has not written one yet.
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return undefined;
    throw err;
  }

  if (raw === 'leader' || raw === 'follower') return raw;
  return undefined;
}

// Read on every call: leadership can move between two steps of the same pass.
export function effectiveRole(config: RoleConfig): ClusterRole {
  return readRoleOverride(config) ?? config.CLUSTER_ROLE;
}
