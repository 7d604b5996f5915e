import { UnprocessableQueryError } from '../errors/domain';
import { resolveFeatures } from '../metadata/filterChain';
import type { MetadataRepository } from '../metadata/types';
import type { SchemaRegistry } from '../observations/schemaRegistry';
import { ENVELOPE_COLUMNS, type AggregationPlan, type ObservationStore } from '../observations/types';
import { formatTimestamp } from '../formatting/time';
import { isNumericType, type AggregateFunctionName, type Bucket } from './functions';

export type AggregateRequest = {
  network: string;
  node: string;
  /** Feature names, optionally narrowed to one property as `feature.property`. */
  features: string[];
  sensors?: string[] | null;
  fn: AggregateFunctionName;
  bucket: Bucket;
  start: Date;
  end: Date;
};

export type AggregateRecord = {
  time_bucket: string;
  feature: string;
  count: number;
  results: Record<string, number | null>;
};

export type AggregationDeps = {
  repository: MetadataRepository;
  registry: SchemaRegistry;
  store: Pick<ObservationStore, 'aggregate'>;
};

const ENVELOPE = new Set<string>(ENVELOPE_COLUMNS);

function requestedProperties(features: string[]): Map<string, Set<string> | null> {
  const requested = new Map<string, Set<string> | null>();
  for (const entry of features) {
    const [feature, property] = entry.toLowerCase().split('.', 2);
    if (!property) {
      requested.set(feature, null);
      continue;
    }
    const current = requested.get(feature);
    if (current === null) {
      continue;
    }
    const properties = current ?? new Set<string>();
    properties.add(property);
    requested.set(feature, properties);
  }
  return requested;
}

async function planFor(
  feature: string,
  wanted: Set<string> | null,
  request: AggregateRequest,
  registry: SchemaRegistry
): Promise<AggregationPlan | null> {
  const schema = await registry.getSchema(feature);
  const measured = schema.columns.filter((column) => !ENVELOPE.has(column.name.toLowerCase()));

  if (wanted) {
    const known = new Set(measured.map((column) => column.name.toLowerCase()));
    for (const property of wanted) {
      if (!known.has(property)) {
        throw new UnprocessableQueryError(`Feature '${feature}' has no property '${property}'`);
      }
    }
  }

  const properties = measured
    .filter((column) => (wanted ? wanted.has(column.name.toLowerCase()) : true))
    .filter((column) => isNumericType(column.type))
    .map((column) => column.name);
  if (properties.length === 0) {
    return null;
  }

  return {
    feature,
    table: schema.table,
    fn: request.fn,
    bucket: request.bucket,
    node: request.node,
    sensors: request.sensors && request.sensors.length > 0 ? request.sensors.map((s) => s.toLowerCase()) : null,
    properties,
    range: { start: request.start, end: request.end }
  };
}

/**
 * Buckets one node's observations per feature and applies `fn` to every
 * numeric property in each bucket.
 */
export async function aggregateObservations(
  request: AggregateRequest,
  deps: AggregationDeps
): Promise<AggregateRecord[]> {
  const resolved = await resolveFeatures(
    {
      network: request.network,
      nodes: [request.node],
      sensors: request.sensors ?? null,
      features: request.features
    },
    deps.repository
  );

  const requested = requestedProperties(request.features);
  const plans: AggregationPlan[] = [];
  for (const feature of resolved) {
    const wanted = requested.get(feature.name.toLowerCase()) ?? null;
    const plan = await planFor(feature.name, wanted, request, deps.registry);
    if (plan) {
      plans.push(plan);
    }
  }

  if (plans.length === 0) {
    throw new UnprocessableQueryError(
      `Function '${request.fn}' cannot be applied: the selected features have no numeric properties`
    );
  }

  const records: AggregateRecord[] = [];
  for (const plan of plans) {
    const rows = await deps.registry.guard(plan.feature, () => deps.store.aggregate(plan));
    for (const row of rows) {
      records.push({
        time_bucket: formatTimestamp(row.bucket),
        feature: plan.feature,
        count: row.count,
        results: row.values
      });
    }
  }

  if (records.length === 0) {
    throw new UnprocessableQueryError(
      `No observations found for node '${request.node}' between ${formatTimestamp(request.start)} ` +
        `and ${formatTimestamp(request.end)}`
    );
  }

  return records.sort(
    (a, b) =>
      a.time_bucket.localeCompare(b.time_bucket) || a.feature.localeCompare(b.feature)
  );
}
