import type { AppConfig } from '../config.js';
import type { Db } from '../db.js';
import { decryptString, encryptString, isEncryptedPayload } from '../crypto.js';
import { NotLeaderError } from '../errors.js';
import { effectiveRole } from './role.js';
import type { LeaderElection } from './types.js';

const UPSERT_SQL =
  'INSERT INTO leader_settings(key, value) VALUES ($1, $2) ON CONFLICT (key) DO UPDATE SET value = EXCLUDED.value, updated_at = NOW()';

/**
 * Leader settings kept in the database every peer shares. Values are
 * encrypted with SECRETS_KEY, so all peers need the same key.
 */
export class PgLeaderStore implements LeaderElection {
  constructor(
    private readonly db: Db,
    private readonly config: Pick<AppConfig, 'CLUSTER_ROLE' | 'CLUSTER_ROLE_FILE' | 'SECRETS_KEY'>
  ) {}

  async isLeader(): Promise<boolean> {
    return effectiveRole(this.config) === 'leader';
  }

  async get(key: string): Promise<string | undefined> {
    const res = await this.db.pool.query('SELECT value FROM leader_settings WHERE key = $1', [key]);
    const value = res.rows[0]?.value;
    if (value === undefined || value === null) return undefined;

    if (!isEncryptedPayload(value)) {
      throw new Error(`Leader setting ${key} is not an encrypted payload`);
    }
    return decryptString(this.config, value);
  }

  async set(key: string, value: string): Promise<void> {
    await this.setMany({ [key]: value });
  }

  async setMany(values: Record<string, string>): Promise<void> {
    if (!(await this.isLeader())) throw new NotLeaderError('write leader settings');

    // Encrypt first so a missing key fails before the transaction opens.
    const rows = Object.entries(values).map(([key, value]) => [key, encryptString(this.config, value)] as const);

    const client = await this.db.pool.connect();
    try {
      await client.query('BEGIN');
      for (const [key, payload] of rows) {
        await client.query(UPSERT_SQL, [key, payload]);
      }
      await client.query('COMMIT');
    } catch (err) {
      await client.query('ROLLBACK');
      throw err;
    } finally {
      client.release();
    }
  }
}
