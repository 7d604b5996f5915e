import type { PoolClient } from 'pg';
import { z } from 'zod';
import { toGeoJsonText } from '../validation/geometry';
import type {
  FeatureRecord,
  JsonObject,
  MetadataIndex,
  MetadataRepository,
  NetworkRecord,
  NodeQuery,
  NodeRecord,
  SensorRecord
} from '../metadata/types';
import { withConnection } from './client';

type NetworkRow = {
  name: string;
  info: unknown;
  nodes: string[] | null;
  sensors: string[] | null;
  features: string[] | null;
};

type NodeRow = {
  id: string;
  network: string;
  longitude: number | null;
  latitude: number | null;
  info: unknown;
  sensors: string[] | null;
};

type SensorRow = {
  name: string;
  observed_properties: unknown;
  info: unknown;
};

type FeatureRow = {
  name: string;
  observed_properties: unknown;
};

const jsonObjectSchema = z.record(z.unknown());
const sensorPropertiesSchema = z.record(z.string());
const featurePropertiesSchema = z.array(z.object({ name: z.string(), type: z.string() }));

function parseInfo(value: unknown): JsonObject {
  const parsed = jsonObjectSchema.safeParse(value);
  return parsed.success ? parsed.data : {};
}

function mapNetworkRow(row: NetworkRow): NetworkRecord {
  return {
    name: row.name,
    info: parseInfo(row.info),
    nodes: row.nodes ?? [],
    sensors: row.sensors ?? [],
    features: row.features ?? []
  };
}

function mapNodeRow(row: NodeRow): NodeRecord {
  return {
    id: row.id,
    network: row.network,
    location:
      row.longitude !== null && row.latitude !== null
        ? { longitude: row.longitude, latitude: row.latitude }
        : null,
    info: parseInfo(row.info),
    sensors: row.sensors ?? []
  };
}

function mapSensorRow(row: SensorRow): SensorRecord {
  const properties = sensorPropertiesSchema.safeParse(row.observed_properties);
  return {
    name: row.name,
    observedProperties: properties.success ? properties.data : {},
    info: parseInfo(row.info)
  };
}

function mapFeatureRow(row: FeatureRow): FeatureRecord {
  const properties = featurePropertiesSchema.parse(row.observed_properties);
  return { name: row.name, observedProperties: properties };
}

export async function listNetworks(client: PoolClient, names?: string[]): Promise<NetworkRecord[]> {
  const { rows } = await client.query<NetworkRow>(
    `SELECT n.name,
            n.info,
            COALESCE((
              SELECT array_agg(LOWER(m.id) ORDER BY LOWER(m.id))
                FROM sensor__node_metadata m
               WHERE m.sensor_network = n.name
            ), '{}') AS nodes,
            COALESCE((
              SELECT array_agg(DISTINCT LOWER(s.sensor))
                FROM sensor__sensor_to_node s
               WHERE s.network = n.name
            ), '{}') AS sensors,
            COALESCE((
              SELECT array_agg(DISTINCT LOWER(split_part(p.value, '.', 1)))
                FROM sensor__sensor_to_node s
                JOIN sensor__sensor_metadata sm ON sm.name = s.sensor
                CROSS JOIN LATERAL jsonb_each_text(sm.observed_properties) AS p
               WHERE s.network = n.name
            ), '{}') AS features
       FROM sensor__network_metadata n
      WHERE $1::text[] IS NULL OR LOWER(n.name) = ANY($1::text[])
      ORDER BY n.name`,
    [names ? names.map((name) => name.toLowerCase()) : null]
  );
  return rows.map(mapNetworkRow);
}

export async function listNodes(client: PoolClient, query: NodeQuery): Promise<NodeRecord[]> {
  if (query.ids.length === 0 || query.networks.length === 0) {
    return [];
  }

  const params: unknown[] = [
    query.ids.map((id) => id.toLowerCase()),
    query.networks.map((network) => network.toLowerCase())
  ];
  let spatialClause = '';
  if (query.geom) {
    params.push(toGeoJsonText(query.geom));
    spatialClause = ` AND ST_Within(m.location, ST_SetSRID(ST_GeomFromGeoJSON($${params.length}), 4326))`;
  }

  const { rows } = await client.query<NodeRow>(
    `SELECT m.id,
            m.sensor_network AS network,
            ST_X(m.location) AS longitude,
            ST_Y(m.location) AS latitude,
            m.info,
            COALESCE((
              SELECT array_agg(LOWER(s.sensor) ORDER BY LOWER(s.sensor))
                FROM sensor__sensor_to_node s
               WHERE s.node = m.id AND s.network = m.sensor_network
            ), '{}') AS sensors
       FROM sensor__node_metadata m
      WHERE LOWER(m.id) = ANY($1::text[])
        AND LOWER(m.sensor_network) = ANY($2::text[])${spatialClause}
      ORDER BY m.sensor_network, m.id`,
    params
  );
  return rows.map(mapNodeRow);
}

export async function listSensors(client: PoolClient, names: string[]): Promise<SensorRecord[]> {
  if (names.length === 0) {
    return [];
  }
  const { rows } = await client.query<SensorRow>(
    `SELECT name, observed_properties, info
       FROM sensor__sensor_metadata
      WHERE LOWER(name) = ANY($1::text[])
      ORDER BY name`,
    [names.map((name) => name.toLowerCase())]
  );
  return rows.map(mapSensorRow);
}

export async function listFeatures(client: PoolClient, names: string[]): Promise<FeatureRecord[]> {
  if (names.length === 0) {
    return [];
  }
  const { rows } = await client.query<FeatureRow>(
    `SELECT name, observed_properties
       FROM sensor__feature_metadata
      WHERE LOWER(name) = ANY($1::text[])
      ORDER BY name`,
    [names.map((name) => name.toLowerCase())]
  );
  return rows.map(mapFeatureRow);
}

export async function loadMetadataIndex(client: PoolClient): Promise<MetadataIndex> {
  const { rows } = await client.query<{ level: keyof MetadataIndex; value: string }>(
    `SELECT 'networks' AS level, LOWER(name) AS value FROM sensor__network_metadata
     UNION ALL
     SELECT 'nodes', LOWER(id) FROM sensor__node_metadata
     UNION ALL
     SELECT 'sensors', LOWER(name) FROM sensor__sensor_metadata
     UNION ALL
     SELECT 'features', LOWER(name) FROM sensor__feature_metadata`
  );
  const index: MetadataIndex = { networks: [], nodes: [], sensors: [], features: [] };
  for (const row of rows) {
    index[row.level].push(row.value);
  }
  return index;
}

type ConnectionRunner = <T>(fn: (client: PoolClient) => Promise<T>) => Promise<T>;

export function createPostgresMetadataRepository(
  run: ConnectionRunner = (fn) => withConnection(fn)
): MetadataRepository {
  return {
    listNetworks: (names) => run((client) => listNetworks(client, names)),
    listNodes: (query) => run((client) => listNodes(client, query)),
    listSensors: (names) => run((client) => listSensors(client, names)),
    listFeatures: (names) => run((client) => listFeatures(client, names)),
    loadIndex: () => run((client) => loadMetadataIndex(client))
  };
}
