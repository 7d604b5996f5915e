import { aggregateObservations, type AggregateRecord } from '../aggregation/engine';
import { buildEnvelope, echoQuery, type ResponseEnvelope } from '../formatting/envelope';
import {
  formatMetadata,
  formatObservation,
  mergeObservations,
  type FormattedMetadata,
  type FormattedObservation
} from '../formatting/formatters';
import { makeJobResponse, type JobQueue, type JobResponse } from '../jobs/queue';
import type { JobStatus, JobStatusStore } from '../jobs/statusStore';
import { resolveFeatures, resolveMetadataOrThrow } from '../metadata/filterChain';
import type { MetadataFilters, MetadataLevel, MetadataRepository } from '../metadata/types';
import { buildObservationQueries } from '../observations/queryBuilder';
import type { SchemaRegistry } from '../observations/schemaRegistry';
import type { ObservationStore } from '../observations/types';
import { createRequestSchemas } from '../schemas/requests';
import { normalizeQuery, validateOrThrow } from '../validation/validator';

export type SensorNetworkServiceDeps = {
  repository: MetadataRepository;
  registry: SchemaRegistry;
  store: Pick<ObservationStore, 'fetchRows' | 'aggregate'>;
  statuses: JobStatusStore;
  queue: JobQueue;
  publicUrl: string;
  now?: () => Date;
};

export type PathParams = {
  network?: string;
  node?: string;
  sensor?: string;
  feature?: string;
};

export interface SensorNetworkService {
  getMetadata(
    level: MetadataLevel,
    params: PathParams,
    query: unknown
  ): Promise<ResponseEnvelope<FormattedMetadata[]>>;
  queryObservations(network: string, query: unknown): Promise<ResponseEnvelope<FormattedObservation[]>>;
  aggregate(network: string, query: unknown): Promise<ResponseEnvelope<AggregateRecord[]>>;
  requestDownload(network: string, query: unknown): Promise<ResponseEnvelope<JobResponse>>;
  getJobStatus(ticket: string): Promise<JobStatus | null>;
}

const PATH_FIELDS: Record<MetadataLevel, keyof MetadataFilters | null> = {
  network: null,
  nodes: 'nodes',
  sensors: 'sensors',
  features: 'features'
};

function metadataInput(level: MetadataLevel, params: PathParams, query: unknown): Record<string, string> {
  const input = normalizeQuery(query);
  if (params.network !== undefined) {
    input.network = params.network;
  }
  const single = level === 'nodes' ? params.node : level === 'sensors' ? params.sensor : params.feature;
  const field = PATH_FIELDS[level];
  if (field && single !== undefined) {
    input[field] = single;
  }
  return input;
}

export function createSensorNetworkService(deps: SensorNetworkServiceDeps): SensorNetworkService {
  const now = deps.now ?? (() => new Date());
  const schemas = createRequestSchemas(now);
  const loadIndex = () => deps.repository.loadIndex();

  return {
    async getMetadata(level, params, query) {
      const data = await validateOrThrow(schemas.metadata, metadataInput(level, params, query), {
        loadIndex,
        existence: (parsed) => parsed
      });
      const resolved = await resolveMetadataOrThrow(level, data, deps.repository);
      return buildEnvelope(echoQuery(data), formatMetadata(resolved));
    },

    async queryObservations(network, query) {
      const data = await validateOrThrow(
        schemas.observations,
        { ...normalizeQuery(query), network },
        {
          loadIndex,
          existence: (parsed) => ({ ...parsed, features: [parsed.feature] })
        }
      );

      const features = await resolveFeatures(
        {
          network: data.network,
          nodes: data.nodes,
          sensors: data.sensors,
          features: [data.feature],
          geom: data.geom
        },
        deps.repository
      );
      const queries = await buildObservationQueries(
        features,
        {
          start: data.start_datetime,
          end: data.end_datetime,
          nodes: data.nodes,
          sensors: data.sensors,
          limit: data.limit,
          offset: data.offset
        },
        deps.registry
      );

      const groups: FormattedObservation[][] = [];
      for (const observationQuery of queries) {
        const rows = await deps.registry.guard(observationQuery.feature, () =>
          deps.store.fetchRows(observationQuery)
        );
        const columns = await deps.registry.reconcile(observationQuery.feature, observationQuery.columns, rows);
        groups.push(rows.map((row) => formatObservation(row, observationQuery.feature, columns)));
      }

      return buildEnvelope(echoQuery(data, ['geom']), mergeObservations(groups));
    },

    async aggregate(network, query) {
      const data = await validateOrThrow(
        schemas.aggregate,
        { ...normalizeQuery(query), network },
        {
          loadIndex,
          existence: (parsed) => ({ ...parsed, nodes: [parsed.node] })
        }
      );

      const records = await aggregateObservations(
        {
          network: data.network,
          node: data.node,
          features: data.features,
          sensors: data.sensors,
          fn: data.function,
          bucket: data.agg,
          start: data.start_datetime,
          end: data.end_datetime
        },
        { repository: deps.repository, registry: deps.registry, store: deps.store }
      );
      return buildEnvelope(echoQuery(data), records);
    },

    async requestDownload(network, query) {
      const data = await validateOrThrow(
        schemas.datadump,
        { ...normalizeQuery(query), network },
        { loadIndex, existence: (parsed) => parsed }
      );

      const job = await makeJobResponse(
        'observation_datadump',
        {
          network: data.network,
          nodes: data.nodes ?? null,
          sensors: data.sensors ?? null,
          features: data.features ?? null,
          geom: data.geom ?? null,
          start: data.start_datetime,
          end: data.end_datetime,
          limit: data.limit ?? null,
          offset: data.offset ?? null
        },
        { queue: deps.queue, statuses: deps.statuses, publicUrl: deps.publicUrl, now }
      );
      return buildEnvelope(echoQuery(data, ['geom']), job);
    },

    async getJobStatus(ticket) {
      return deps.statuses.getStatus(ticket);
    }
  };
}
