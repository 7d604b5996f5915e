import type { SpatialFilter } from '../validation/geometry';

export type JsonObject = Record<string, unknown>;

export type MetadataLevel = 'network' | 'nodes' | 'sensors' | 'features';

export const METADATA_LEVELS: readonly MetadataLevel[] = ['network', 'nodes', 'sensors', 'features'];

export interface NetworkRecord {
  name: string;
  info: JsonObject;
  nodes: string[];
  sensors: string[];
  features: string[];
}

export interface NodeLocation {
  longitude: number;
  latitude: number;
}

export interface NodeRecord {
  id: string;
  network: string;
  location: NodeLocation | null;
  info: JsonObject;
  sensors: string[];
}

export interface SensorRecord {
  name: string;
  /** property name -> "feature.property" */
  observedProperties: Record<string, string>;
  info: JsonObject;
}

export interface FeatureProperty {
  name: string;
  type: string;
}

export interface FeatureRecord {
  name: string;
  observedProperties: FeatureProperty[];
}

export type ResolvedLevel =
  | { level: 'network'; records: NetworkRecord[] }
  | { level: 'nodes'; records: NodeRecord[] }
  | { level: 'sensors'; records: SensorRecord[] }
  | { level: 'features'; records: FeatureRecord[] };

export interface MetadataFilters {
  network?: string | string[] | null;
  nodes?: string[] | null;
  sensors?: string[] | null;
  features?: string[] | null;
  geom?: SpatialFilter | null;
}

export interface NodeQuery {
  ids: string[];
  networks: string[];
  geom: SpatialFilter | null;
}

export interface MetadataIndex {
  networks: string[];
  nodes: string[];
  sensors: string[];
  features: string[];
}

export interface MetadataRepository {
  /** Every network when `names` is omitted. */
  listNetworks(names?: string[]): Promise<NetworkRecord[]>;
  listNodes(query: NodeQuery): Promise<NodeRecord[]>;
  listSensors(names: string[]): Promise<SensorRecord[]>;
  listFeatures(names: string[]): Promise<FeatureRecord[]>;
  loadIndex(): Promise<MetadataIndex>;
}
