import { z } from 'zod';
import { MissingKeysError, MissingTokenError } from '../errors.js';
import type { BootstrapSecrets, LeaderElection } from './types.js';

export const ROOT_TOKEN_KEY = 'root_token';
export const UNSEAL_KEYS_KEY = 'keys';
export const KEY_SHARES_KEY = 'key_shares';
export const KEY_THRESHOLD_KEY = 'key_threshold';
export const LOCAL_ACCESS_ROLE_ID_KEY = 'local-charm-access-id';

const unsealKeysSchema = z.array(z.string().min(1));

function parseCount(raw: string | undefined, fallback: number): number {
  const n = Number(raw);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

/**
 * Typed view over leader settings for the values the bootstrap sequence
 * shares between peers. Writes go through the election capability, which
 * only the leader may use.
 */
export class SharedStateStore {
  constructor(private readonly election: LeaderElection) {}

  isLeader(): Promise<boolean> {
    return this.election.isLeader();
  }

  /** Resolves once every value is acknowledged by the store. */
  async putBootstrapSecrets(secrets: BootstrapSecrets): Promise<void> {
    await this.election.setMany({
      [ROOT_TOKEN_KEY]: secrets.rootToken,
      [UNSEAL_KEYS_KEY]: JSON.stringify(secrets.unsealKeys),
      [KEY_SHARES_KEY]: String(secrets.shares),
      [KEY_THRESHOLD_KEY]: String(secrets.threshold)
    });
  }

  async getBootstrapSecrets(): Promise<BootstrapSecrets | undefined> {
    const rootToken = await this.election.get(ROOT_TOKEN_KEY);
    const unsealKeys = await this.readUnsealKeys();
    if (!rootToken || !unsealKeys) return undefined;

    const [shares, threshold] = await Promise.all([
      this.election.get(KEY_SHARES_KEY),
      this.election.get(KEY_THRESHOLD_KEY)
    ]);
    return {
      rootToken,
      unsealKeys,
      shares: parseCount(shares, unsealKeys.length),
      threshold: parseCount(threshold, unsealKeys.length)
    };
  }

  async getRootToken(): Promise<string> {
    const token = await this.election.get(ROOT_TOKEN_KEY);
    if (!token) throw new MissingTokenError();
    return token;
  }

  async getUnsealKeys(): Promise<string[]> {
    const keys = await this.readUnsealKeys();
    if (!keys || keys.length === 0) throw new MissingKeysError();
    return keys;
  }

  getLocalAccessRoleId(): Promise<string | undefined> {
    return this.election.get(LOCAL_ACCESS_ROLE_ID_KEY);
  }

  async putLocalAccessRoleId(roleId: string): Promise<void> {
    await this.election.set(LOCAL_ACCESS_ROLE_ID_KEY, roleId);
  }

  private async readUnsealKeys(): Promise<string[] | undefined> {
    const raw = await this.election.get(UNSEAL_KEYS_KEY);
    if (!raw) return undefined;
    return unsealKeysSchema.parse(JSON.parse(raw));
  }
}
