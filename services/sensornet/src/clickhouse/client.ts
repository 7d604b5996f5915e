import { createClient, type ClickHouseClient } from '@clickhouse/client';
import type { ServiceConfig } from '../config/serviceConfig';

type ClickHouseSettings = ServiceConfig['clickhouse'];

let cached: { key: string; client: ClickHouseClient } | null = null;

function buildKey({ host, httpPort, username, password, database, secure }: ClickHouseSettings): string {
  return JSON.stringify([host, httpPort, username, password, database, secure]);
}

export function isInlineClickHouse(settings: Pick<ClickHouseSettings, 'host'>): boolean {
  return settings.host.trim().toLowerCase() === 'inline';
}

export function getClickHouseClient(settings: ClickHouseSettings): ClickHouseClient {
  if (isInlineClickHouse(settings)) {
    throw new Error('ClickHouse host is set to inline; use the in-memory observation store instead');
  }

  const key = buildKey(settings);
  if (cached) {
    if (cached.key !== key) {
      throw new Error('ClickHouse client already initialized with different settings');
    }
    return cached.client;
  }

  const protocol = settings.secure ? 'https' : 'http';
  const client = createClient({
    url: `${protocol}://${settings.host}:${settings.httpPort}`,
    username: settings.username,
    password: settings.password,
    database: settings.database,
    application: 'sensornet'
  });
  cached = { key, client };
  return client;
}

export async function closeClickHouseClient(): Promise<void> {
  if (!cached) {
    return;
  }
  const { client } = cached;
  cached = null;
  await client.close();
}
