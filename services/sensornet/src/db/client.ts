import pg, { Pool, type PoolClient } from 'pg';
import { loadServiceConfig, type ServiceConfig } from '../config/serviceConfig';
import type { ServiceLogger } from '../logger';
import { runMigrations } from './migrations';

export interface PostgresAcquireOptions {
  setSearchPath?: boolean;
}

type DatabaseSettings = ServiceConfig['database'];

let int8Configured = false;
let pool: Pool | null = null;
let settings: DatabaseSettings | null = null;
let logger: ServiceLogger | null = null;
let schemaReadyPromise: Promise<void> | null = null;

function configureGlobalParsers(): void {
  if (int8Configured) {
    return;
  }
  pg.types.setTypeParser(pg.types.builtins.INT8, (value: string) => Number.parseInt(value, 10));
  int8Configured = true;
}

export function quoteIdentifier(input: string): string {
  return `"${input.replace(/"/g, '""')}"`;
}

/**
 * Overrides the settings used when the pool is first created. Without a call
 * the pool reads them from the service config.
 */
export function configureDatabase(next: DatabaseSettings, log?: ServiceLogger): void {
  if (pool) {
    throw new Error('Database pool already initialized');
  }
  settings = next;
  logger = log ?? null;
}

function resolveSettings(): DatabaseSettings {
  if (!settings) {
    settings = loadServiceConfig().database;
  }
  return settings;
}

export function getPool(): Pool {
  if (!pool) {
    configureGlobalParsers();
    const database = resolveSettings();
    pool = new Pool({
      connectionString: database.url,
      max: database.maxConnections,
      idleTimeoutMillis: database.idleTimeoutMs,
      connectionTimeoutMillis: database.connectionTimeoutMs
    });
    pool.on('error', (err: Error) => {
      logger?.error({ err }, 'unexpected error on idle postgres client');
    });
  }
  return pool;
}

export async function getClient(options?: PostgresAcquireOptions): Promise<PoolClient> {
  const client = await getPool().connect();
  if (options?.setSearchPath === false) {
    return client;
  }
  try {
    await client.query(`SET search_path TO ${quoteIdentifier(resolveSettings().schema)}, public`);
  } catch (err) {
    client.release();
    throw err;
  }
  return client;
}

export async function withConnection<T>(
  fn: (client: PoolClient) => Promise<T>,
  options?: PostgresAcquireOptions
): Promise<T> {
  const client = await getClient(options);
  try {
    return await fn(client);
  } finally {
    client.release();
  }
}

async function prepareSchema(): Promise<void> {
  const rawClient = await getClient({ setSearchPath: false });
  try {
    await rawClient.query(`CREATE SCHEMA IF NOT EXISTS ${quoteIdentifier(resolveSettings().schema)}`);
  } finally {
    rawClient.release();
  }

  await withConnection(async (client) => {
    await runMigrations(client);
  });
}

export async function ensureSchemaReady(): Promise<void> {
  if (!schemaReadyPromise) {
    schemaReadyPromise = prepareSchema().catch((err) => {
      schemaReadyPromise = null;
      throw err;
    });
  }

  await schemaReadyPromise;
}

export async function closePool(): Promise<void> {
  if (!pool) {
    return;
  }
  const current = pool;
  pool = null;
  schemaReadyPromise = null;
  await current.end();
}
