/**
 * Client Store — PostgreSQL persistence for linked bank items
 *
 * One table, one row per Pluggy item. Writes use a single
 * INSERT ... ON CONFLICT DO NOTHING so concurrent callbacks racing on the
 * same item id cannot produce a duplicate or an error.
 *
 * Consumers: connect/flow.ts (saveClient), index.ts (ensureSchema, close)
 */

import pg from 'pg';
import type { DatabaseConfig } from '../config.js';
import { sanitizeForLog } from '../web/sanitize.js';

export const CLIENTS_TABLE = 'financefly_clients';

const CONNECT_TIMEOUT_MS = 10_000;

const DDL = `
CREATE TABLE IF NOT EXISTS ${CLIENTS_TABLE} (
    id SERIAL PRIMARY KEY,
    name TEXT NOT NULL,
    email TEXT NOT NULL,
    item_id TEXT NOT NULL UNIQUE,
    created_at TIMESTAMPTZ DEFAULT NOW()
)`;

const INSERT_CLIENT = `
INSERT INTO ${CLIENTS_TABLE} (name, email, item_id)
VALUES ($1, $2, $3)
ON CONFLICT (item_id) DO NOTHING
RETURNING id`;

export interface ClientRecord {
  id: number;
  name: string;
  email: string;
  itemId: string;
  createdAt: Date;
}

export type NewClient = Pick<ClientRecord, 'name' | 'email' | 'itemId'>;

export interface ClientStore {
  /** Create the clients table if it does not exist. Safe to call on every start. */
  ensureSchema(): Promise<void>;
  /**
   * Insert a client row.
   * @returns The new row id, or null when the item id was already stored
   */
  saveClient(client: NewClient): Promise<number | null>;
  close(): Promise<void>;
}

/**
 * Database unreachable or statement failed. The cause keeps the driver
 * error for the server log; users only ever see a "try again later" text.
 */
export class StoreError extends Error {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Client store ${operation} failed: ${reason}`, { cause });
    this.name = 'StoreError';
    this.operation = operation;
  }
}

/**
 * Map DB_SSLMODE to node-postgres ssl options. libpq's "require" encrypts
 * without verifying the certificate; the verify-* modes check it.
 */
export function sslOptions(mode: DatabaseConfig['sslMode']): pg.PoolConfig['ssl'] {
  switch (mode) {
    case 'disable':
      return false;
    case 'require':
      return { rejectUnauthorized: false };
    case 'verify-ca':
    case 'verify-full':
      return { rejectUnauthorized: true };
  }
}

export class PgClientStore implements ClientStore {
  private readonly pool: pg.Pool;

  constructor(config: DatabaseConfig) {
    this.pool = new pg.Pool({
      host: config.host,
      port: config.port,
      user: config.user,
      password: config.password,
      database: config.name,
      ssl: sslOptions(config.sslMode),
      connectionTimeoutMillis: CONNECT_TIMEOUT_MS,
    });

    // Idle clients can lose their connection; without a listener the pool
    // error event would crash the process.
    this.pool.on('error', (err) => {
      console.error('[store] Idle connection error:', err.message);
    });
  }

  async ensureSchema(): Promise<void> {
    try {
      await this.pool.query(DDL);
      console.log(`[store] Schema ready (${CLIENTS_TABLE})`);
    } catch (error) {
      throw new StoreError('ensureSchema', error);
    }
  }

  async saveClient(client: NewClient): Promise<number | null> {
    let result: pg.QueryResult<{ id: number }>;
    try {
      result = await this.pool.query<{ id: number }>(INSERT_CLIENT, [client.name, client.email, client.itemId]);
    } catch (error) {
      throw new StoreError('saveClient', error);
    }

    const row = result.rows[0];
    if (!row) {
      console.log('[store] Item already linked, no row written', { itemId: client.itemId });
      return null;
    }

    console.log('[store] Client saved', sanitizeForLog({ id: row.id, itemId: client.itemId, email: client.email }));
    return row.id;
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
