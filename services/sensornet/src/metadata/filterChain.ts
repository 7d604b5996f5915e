import { EmptyResolutionError, type UpstreamSelection } from '../errors/domain';
import {
  METADATA_LEVELS,
  type FeatureRecord,
  type MetadataFilters,
  type MetadataLevel,
  type MetadataRepository,
  type ResolvedLevel
} from './types';

export type MetadataResolution =
  | { ok: true; resolved: ResolvedLevel }
  | { ok: false; error: EmptyResolutionError };

type StepContext = {
  repository: MetadataRepository;
  filters: MetadataFilters;
  target: MetadataLevel;
  previous: ResolvedLevel | null;
};

type ResolutionStep = (context: StepContext) => Promise<MetadataResolution>;

function normalizeValues(values: string | string[] | null | undefined): string[] | null {
  if (values === null || values === undefined) {
    return null;
  }
  const list = Array.isArray(values) ? values : [values];
  const normalized = list.map((value) => value.trim().toLowerCase()).filter((value) => value.length > 0);
  return normalized.length > 0 ? Array.from(new Set(normalized)) : null;
}

function unique(values: Iterable<string>): string[] {
  return Array.from(new Set(Array.from(values, (value) => value.toLowerCase())));
}

export function recordKeys(resolved: ResolvedLevel): string[] {
  switch (resolved.level) {
    case 'network':
      return resolved.records.map((record) => record.name.toLowerCase());
    case 'nodes':
      return resolved.records.map((record) => record.id.toLowerCase());
    case 'sensors':
      return resolved.records.map((record) => record.name.toLowerCase());
    case 'features':
      return resolved.records.map((record) => record.name.toLowerCase());
  }
}

/**
 * Values a level may take given what the level above it resolved to.
 */
function inheritedValues(previous: ResolvedLevel): string[] {
  switch (previous.level) {
    case 'network':
      return unique(previous.records.flatMap((network) => network.nodes));
    case 'nodes':
      return unique(previous.records.flatMap((node) => node.sensors));
    case 'sensors':
      return unique(
        previous.records.flatMap((sensor) =>
          Object.values(sensor.observedProperties).map((reference) => reference.split('.')[0])
        )
      );
    case 'features':
      return [];
  }
}

function restrict(inherited: string[], requested: string[] | null): string[] {
  if (!requested) {
    return inherited;
  }
  const allowed = new Set(inherited);
  return requested.filter((value) => allowed.has(value));
}

function upstreamSelection(previous: ResolvedLevel | null): UpstreamSelection | null {
  if (!previous) {
    return null;
  }
  return { level: previous.level, values: recordKeys(previous) };
}

function emptyResult(
  level: MetadataLevel,
  context: StepContext,
  requested: string[] | null
): MetadataResolution {
  return {
    ok: false,
    error: new EmptyResolutionError(level, context.target, requested ?? [], upstreamSelection(context.previous))
  };
}

const resolveNetworks: ResolutionStep = async (context) => {
  const requested = normalizeValues(context.filters.network);
  const records = requested
    ? await context.repository.listNetworks(requested)
    : await context.repository.listNetworks();
  if (records.length === 0) {
    return emptyResult('network', context, requested);
  }
  return { ok: true, resolved: { level: 'network', records } };
};

const resolveNodes: ResolutionStep = async (context) => {
  const { previous } = context;
  if (!previous || previous.level !== 'network') {
    throw new Error('Node resolution requires resolved networks');
  }
  const requested = normalizeValues(context.filters.nodes);
  const values = restrict(inheritedValues(previous), requested);
  if (values.length === 0) {
    return emptyResult('nodes', context, requested);
  }
  const records = await context.repository.listNodes({
    ids: values,
    networks: recordKeys(previous),
    geom: context.filters.geom ?? null
  });
  if (records.length === 0) {
    return emptyResult('nodes', context, requested);
  }
  return { ok: true, resolved: { level: 'nodes', records } };
};

const resolveSensors: ResolutionStep = async (context) => {
  const { previous } = context;
  if (!previous || previous.level !== 'nodes') {
    throw new Error('Sensor resolution requires resolved nodes');
  }
  const requested = normalizeValues(context.filters.sensors);
  const values = restrict(inheritedValues(previous), requested);
  if (values.length === 0) {
    return emptyResult('sensors', context, requested);
  }
  const records = await context.repository.listSensors(values);
  if (records.length === 0) {
    return emptyResult('sensors', context, requested);
  }
  return { ok: true, resolved: { level: 'sensors', records } };
};

const resolveFeatureRecords: ResolutionStep = async (context) => {
  const { previous } = context;
  if (!previous || previous.level !== 'sensors') {
    throw new Error('Feature resolution requires resolved sensors');
  }
  const requested = normalizeValues(
    context.filters.features?.map((feature) => feature.split('.')[0])
  );
  const values = restrict(inheritedValues(previous), requested);
  if (values.length === 0) {
    return emptyResult('features', context, requested);
  }
  const records = await context.repository.listFeatures(values);
  if (records.length === 0) {
    return emptyResult('features', context, requested);
  }
  return { ok: true, resolved: { level: 'features', records } };
};

const PIPELINE: ReadonlyArray<{ level: MetadataLevel; step: ResolutionStep }> = [
  { level: 'network', step: resolveNetworks },
  { level: 'nodes', step: resolveNodes },
  { level: 'sensors', step: resolveSensors },
  { level: 'features', step: resolveFeatureRecords }
];

/**
 * Cascades network -> nodes -> sensors -> features, stopping at `target`.
 */
export async function resolveMetadata(
  target: MetadataLevel,
  filters: MetadataFilters,
  repository: MetadataRepository
): Promise<MetadataResolution> {
  if (!METADATA_LEVELS.includes(target)) {
    throw new Error(`Unknown metadata level: ${String(target)}`);
  }

  let previous: ResolvedLevel | null = null;
  for (const { level, step } of PIPELINE) {
    const outcome = await step({ repository, filters, target, previous });
    if (!outcome.ok) {
      return outcome;
    }
    if (level === target) {
      return outcome;
    }
    previous = outcome.resolved;
  }

  throw new Error(`Metadata pipeline ended before reaching ${target}`);
}

export async function resolveMetadataOrThrow(
  target: MetadataLevel,
  filters: MetadataFilters,
  repository: MetadataRepository
): Promise<ResolvedLevel> {
  const outcome = await resolveMetadata(target, filters, repository);
  if (!outcome.ok) {
    throw outcome.error;
  }
  return outcome.resolved;
}

export async function resolveFeatures(
  filters: MetadataFilters,
  repository: MetadataRepository
): Promise<FeatureRecord[]> {
  const resolved = await resolveMetadataOrThrow('features', filters, repository);
  if (resolved.level !== 'features') {
    throw new Error(`Expected features, resolved ${resolved.level}`);
  }
  return resolved.records;
}
