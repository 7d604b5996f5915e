import type { Point } from 'geojson';
import type {
  FeatureProperty,
  FeatureRecord,
  JsonObject,
  NetworkRecord,
  NodeRecord,
  ResolvedLevel,
  SensorRecord
} from '../metadata/types';
import { ENVELOPE_COLUMNS, type ColumnDefinition, type ObservationRow } from '../observations/types';
import { formatTimestamp, toDate } from './time';

export type FormattedNetwork = {
  name: string;
  features: string[];
  nodes: string[];
  sensors: string[];
  info: JsonObject;
};

export type FormattedNode = {
  type: 'Feature';
  geometry: Point | null;
  properties: {
    id: string;
    network: string;
    sensors: string[];
    info: JsonObject;
  };
};

export type FormattedSensor = {
  name: string;
  observed_properties: string[];
  info: JsonObject;
};

export type FormattedFeature = {
  name: string;
  observed_properties: FeatureProperty[];
};

export type FormattedMetadata = FormattedNetwork | FormattedNode | FormattedSensor | FormattedFeature;

export type FormattedObservation = {
  node_id: string;
  meta_id: number | string | null;
  datetime: string;
  sensor: string;
  feature_of_interest: string;
  results: Record<string, unknown>;
};

export function formatNetwork(network: NetworkRecord): FormattedNetwork {
  return {
    name: network.name,
    features: [...network.features],
    nodes: [...network.nodes],
    sensors: [...network.sensors],
    info: network.info
  };
}

export function formatNode(node: NodeRecord): FormattedNode {
  return {
    type: 'Feature',
    geometry: node.location
      ? { type: 'Point', coordinates: [node.location.longitude, node.location.latitude] }
      : null,
    properties: {
      id: node.id,
      network: node.network,
      sensors: [...node.sensors],
      info: node.info
    }
  };
}

export function formatSensor(sensor: SensorRecord): FormattedSensor {
  return {
    name: sensor.name,
    observed_properties: Object.values(sensor.observedProperties),
    info: sensor.info
  };
}

export function formatFeature(feature: FeatureRecord): FormattedFeature {
  return {
    name: feature.name,
    observed_properties: feature.observedProperties.map((property) => ({ ...property }))
  };
}

export function formatMetadata(resolved: ResolvedLevel): FormattedMetadata[] {
  switch (resolved.level) {
    case 'network':
      return resolved.records.map(formatNetwork);
    case 'nodes':
      return resolved.records.map(formatNode);
    case 'sensors':
      return resolved.records.map(formatSensor);
    case 'features':
      return resolved.records.map(formatFeature);
  }
}

const ENVELOPE = new Set<string>(ENVELOPE_COLUMNS);

function asText(value: unknown): string {
  return value === null || value === undefined ? '' : String(value);
}

function asMetaId(value: unknown): number | string | null {
  if (typeof value === 'number' || typeof value === 'string') {
    return value;
  }
  return null;
}

/**
 * `results` carries every non-envelope column of the feature table, in table
 * order, including nulls.
 */
export function formatObservation(
  row: ObservationRow,
  feature: string,
  columns: ColumnDefinition[]
): FormattedObservation {
  const datetime = toDate(row.datetime);
  if (!datetime) {
    throw new Error(`Observation row for ${feature} has no valid datetime`);
  }
  const results: Record<string, unknown> = {};
  for (const column of columns) {
    if (ENVELOPE.has(column.name)) {
      continue;
    }
    results[column.name] = row[column.name] ?? null;
  }
  return {
    node_id: asText(row.node_id),
    meta_id: asMetaId(row.meta_id),
    datetime: formatTimestamp(datetime),
    sensor: asText(row.sensor),
    feature_of_interest: feature,
    results
  };
}

/**
 * Concatenates per-feature lists and sorts by datetime; ties keep their
 * input order.
 */
export function mergeObservations(groups: FormattedObservation[][]): FormattedObservation[] {
  return groups
    .flat()
    .map((observation, index) => ({ observation, index, time: Date.parse(`${observation.datetime}Z`) }))
    .sort((a, b) => a.time - b.time || a.index - b.index)
    .map(({ observation }) => observation);
}
