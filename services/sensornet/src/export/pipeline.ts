import { randomUUID } from 'node:crypto';
import type { DatadumpPartStore } from '../db/datadumpRepository';
import { serializeJson } from '../formatting/envelope';
import { formatObservation, type FormattedObservation } from '../formatting/formatters';
import { formatTimestamp } from '../formatting/time';
import type { JobStatus, JobStatusStore } from '../jobs/statusStore';
import { createInitialStatus } from '../jobs/statusStore';
import type { DatadumpArgs, DatadumpResult } from '../jobs/types';
import type { ServiceLogger } from '../logger';
import { resolveFeatures } from '../metadata/filterChain';
import type { MetadataRepository } from '../metadata/types';
import { buildObservationQueries } from '../observations/queryBuilder';
import type { SchemaRegistry } from '../observations/schemaRegistry';
import type { ObservationQuery, ObservationStore } from '../observations/types';
import { windowedRows } from '../observations/windowed';

export type DatadumpDeps = {
  repository: MetadataRepository;
  registry: SchemaRegistry;
  store: Pick<ObservationStore, 'countRows' | 'fetchWindow'>;
  parts: DatadumpPartStore;
  statuses: JobStatusStore;
  logger: ServiceLogger;
  workerId: string;
  publicUrl: string;
  chunkSize?: number;
  cleanupTtlSeconds?: number;
  now?: () => Date;
  generateId?: () => string;
};

export const DEFAULT_CHUNK_SIZE = 1000;
export const DEFAULT_CLEANUP_TTL_SECONDS = 10_800;

type ChunkContext = {
  ticket: string;
  chunkCount: number;
  deps: DatadumpDeps;
};

function generatePartId(): string {
  return randomUUID().replace(/-/g, '');
}

export function suppressCleanupKey(ticket: string): string {
  return `${ticket}_suppresscleanup`;
}

export function datadumpUrl(publicUrl: string, ticket: string): string {
  return `${publicUrl.replace(/\/+$/, '')}/v1/api/datadump/${ticket}`;
}

/**
 * Persists one part, its progress update and the cleanup flag as one unit.
 * On failure the staged part is rolled back and the previous status restored,
 * or removed when the ticket had none.
 */
export async function storeChunk(
  chunk: FormattedObservation[],
  chunkNumber: number,
  context: ChunkContext
): Promise<void> {
  const { ticket, chunkCount, deps } = context;
  const now = deps.now ?? (() => new Date());
  const unit = await deps.parts.begin();
  let previous: JobStatus | null = null;
  let statusWritten = false;

  try {
    previous = await deps.statuses.getStatus(ticket);
    await unit.addPart({
      id: (deps.generateId ?? generatePartId)(),
      request: ticket,
      part: chunkNumber,
      total: chunkCount,
      data: serializeJson(chunk)
    });

    const base = previous ?? createInitialStatus(formatTimestamp(now()));
    statusWritten = true;
    await deps.statuses.setStatus(ticket, {
      ...base,
      progress: { done: chunkNumber, total: chunkCount }
    });
    await deps.statuses.setFlag(
      suppressCleanupKey(ticket),
      true,
      deps.cleanupTtlSeconds ?? DEFAULT_CLEANUP_TTL_SECONDS
    );
    await unit.commit();
  } catch (error) {
    try {
      await unit.rollback();
    } catch (rollbackError) {
      deps.logger.error({ err: rollbackError, ticket, part: chunkNumber }, 'failed to roll back datadump part');
    }
    if (statusWritten) {
      try {
        if (previous) {
          await deps.statuses.setStatus(ticket, previous);
        } else {
          await deps.statuses.deleteStatus(ticket);
        }
      } catch (restoreError) {
        deps.logger.error({ err: restoreError, ticket, part: chunkNumber }, 'failed to restore datadump status');
      }
    }
    throw error;
  }

  deps.logger.debug({ ticket, part: chunkNumber, total: chunkCount, rows: chunk.length }, 'datadump part stored');
}

async function countRows(queries: ObservationQuery[], deps: DatadumpDeps): Promise<number> {
  let total = 0;
  for (const query of queries) {
    total += await deps.registry.guard(query.feature, () => deps.store.countRows(query));
  }
  return total;
}

async function storeSummary(
  ticket: string,
  chunkCount: number,
  features: string[],
  deps: DatadumpDeps
): Promise<void> {
  const now = deps.now ?? (() => new Date());
  const status = await deps.statuses.getStatus(ticket);
  const summary = {
    startTime: status?.meta.startTime ?? formatTimestamp(now()),
    endTime: formatTimestamp(now()),
    workers: [deps.workerId],
    features
  };

  const unit = await deps.parts.begin();
  try {
    await unit.addPart({
      id: ticket,
      request: ticket,
      part: 0,
      total: chunkCount,
      data: serializeJson(summary)
    });
    await unit.commit();
  } catch (error) {
    try {
      await unit.rollback();
    } catch (rollbackError) {
      deps.logger.error({ err: rollbackError, ticket }, 'failed to roll back datadump summary');
    }
    throw error;
  }

  if (status) {
    await deps.statuses.setStatus(ticket, {
      ...status,
      meta: { ...status.meta, endTime: summary.endTime, workers: summary.workers, features }
    });
  }
}

/**
 * Streams every matching observation into parts of `chunkSize` rows, then
 * writes the summary as part 0.
 */
export async function runDatadump(
  ticket: string,
  args: DatadumpArgs,
  deps: DatadumpDeps
): Promise<DatadumpResult> {
  const chunkSize = deps.chunkSize ?? DEFAULT_CHUNK_SIZE;
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new Error(`Chunk size must be a positive integer, received ${chunkSize}`);
  }

  const features = await resolveFeatures(
    {
      network: args.network,
      nodes: args.nodes,
      sensors: args.sensors,
      features: args.features,
      geom: args.geom
    },
    deps.repository
  );
  const queries = await buildObservationQueries(
    features,
    {
      start: args.start,
      end: args.end,
      nodes: args.nodes,
      sensors: args.sensors,
      limit: args.limit,
      offset: args.offset
    },
    deps.registry
  );

  const rowCount = await countRows(queries, deps);
  const chunkCount = Math.ceil(rowCount / chunkSize);
  deps.logger.info({ ticket, rowCount, chunkCount, features: queries.length }, 'datadump started');

  const context: ChunkContext = { ticket, chunkCount, deps };
  const guardedStore = {
    fetchWindow: (query: ObservationQuery, window: { offset: number; limit: number }) =>
      deps.registry.guard(query.feature, () => deps.store.fetchWindow(query, window))
  };

  const producedFeatures = new Set<string>();
  let buffer: FormattedObservation[] = [];
  let chunkNumber = 1;

  for (const query of queries) {
    let columns = query.columns;
    for await (const rows of windowedRows(guardedStore, query, chunkSize)) {
      columns = await deps.registry.reconcile(query.feature, columns, rows);
      for (const row of rows) {
        buffer.push(formatObservation(row, query.feature, columns));
        producedFeatures.add(query.feature.toLowerCase());
        if (buffer.length >= chunkSize) {
          await storeChunk(buffer, chunkNumber, context);
          buffer = [];
          chunkNumber += 1;
        }
      }
    }
  }

  if (buffer.length > 0) {
    await storeChunk(buffer, chunkNumber, context);
  }

  await storeSummary(ticket, chunkCount, Array.from(producedFeatures), deps);
  deps.logger.info({ ticket, parts: chunkCount }, 'datadump complete');

  return { url: datadumpUrl(deps.publicUrl, ticket) };
}
