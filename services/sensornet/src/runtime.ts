import { hostname } from 'node:os';
import { createResponseCache, type ResponseCache } from './cache/responseCache';
import type { ServiceConfig } from './config/serviceConfig';
import { closePool, withConnection } from './db/client';
import { createPostgresDatadumpStore, type DatadumpPartStore } from './db/datadumpRepository';
import { createPostgresMetadataRepository } from './db/metadataRepository';
import { closeClickHouseClient } from './clickhouse/client';
import type { DatadumpDeps } from './export/pipeline';
import { processDatadumpJob } from './export/processor';
import type { ServiceLogger } from './logger';
import type { MetadataRepository } from './metadata/types';
import { createSchemaRegistry, type SchemaRegistry } from './observations/schemaRegistry';
import { createObservationStore } from './observations/store';
import type { ObservationStore } from './observations/types';
import { BullJobQueue, InlineJobQueue, closeRedisConnection, getRedisConnection, type JobQueue } from './jobs/queue';
import { MemoryJobStatusStore, RedisJobStatusStore, type JobStatusStore } from './jobs/statusStore';

export type ServiceRuntime = {
  repository: MetadataRepository;
  registry: SchemaRegistry;
  store: ObservationStore;
  parts: DatadumpPartStore;
  statuses: JobStatusStore;
  queue: JobQueue;
  cache: ResponseCache;
  checkReadiness(): Promise<void>;
  close(): Promise<void>;
};

export function defaultWorkerId(): string {
  return `${hostname()}:${process.pid}`;
}

export function createDatadumpDeps(
  runtime: Pick<ServiceRuntime, 'repository' | 'registry' | 'store' | 'parts' | 'statuses'>,
  config: ServiceConfig,
  logger: ServiceLogger,
  workerId: string = defaultWorkerId()
): DatadumpDeps {
  return {
    repository: runtime.repository,
    registry: runtime.registry,
    store: runtime.store,
    parts: runtime.parts,
    statuses: runtime.statuses,
    logger,
    workerId,
    publicUrl: config.publicUrl,
    chunkSize: config.datadump.chunkSize,
    cleanupTtlSeconds: config.datadump.cleanupTtlSeconds
  };
}

/**
 * Wires the Postgres, ClickHouse and Redis adapters from config. With
 * `REDIS_URL=inline` job statuses stay in memory and exports run in-process.
 */
export function createRuntime(config: ServiceConfig, logger: ServiceLogger): ServiceRuntime {
  const repository = createPostgresMetadataRepository();
  const store = createObservationStore(config);
  const registry = createSchemaRegistry(store, { ttlMs: config.cache.schemaTtlMs });
  const parts = createPostgresDatadumpStore();
  const cache = createResponseCache(config.cache.enabled);

  let statuses: JobStatusStore;
  let queue: JobQueue;
  if (config.redis.inline) {
    statuses = new MemoryJobStatusStore();
    const deps = createDatadumpDeps({ repository, registry, store, parts, statuses }, config, logger);
    queue = new InlineJobQueue((payload) => processDatadumpJob(payload, deps), logger);
  } else {
    const redis = getRedisConnection(config, logger);
    statuses = new RedisJobStatusStore(redis, config.redis.keyPrefix);
    queue = new BullJobQueue(config.datadump.queueName, redis);
  }

  return {
    repository,
    registry,
    store,
    parts,
    statuses,
    queue,
    cache,
    async checkReadiness() {
      await withConnection(async (client) => {
        await client.query('SELECT 1 AS readiness_check');
      });
    },
    async close() {
      await queue.close();
      await closeClickHouseClient();
      if (!config.redis.inline) {
        await closeRedisConnection();
      }
      await closePool();
    }
  };
}
