import { Pool } from 'pg';
import type { AppConfig } from './config.js';

export type SqlResult = {
  rows: Array<Record<string, unknown>>;
  rowCount: number | null;
};

export interface SqlClient {
  query(text: string, params?: unknown[]): Promise<SqlResult>;
}

export interface SqlPoolClient extends SqlClient {
  release(): void;
}

export interface SqlPool extends SqlClient {
  connect(): Promise<SqlPoolClient>;
}

export type Db = {
  pool: SqlPool;
  init: () => Promise<void>;
  close: () => Promise<void>;
};

export function createDb(config: AppConfig): Db {
  const pool = new Pool({
    connectionString: config.DATABASE_URL,
    max: 4,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000
  });

  async function init(): Promise<void> {
    await pool.query(`
      CREATE TABLE IF NOT EXISTS leader_settings (
        key TEXT PRIMARY KEY,
        value JSONB NOT NULL,
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      );
    `);
  }

  async function close(): Promise<void> {
    await pool.end();
  }

  return { pool, init, close };
}
