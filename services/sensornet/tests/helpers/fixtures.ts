import { MemoryObservationStore } from '../../src/clickhouse/memoryStore';
import type { DatadumpPart, DatadumpPartStore, DatadumpUnitOfWork } from '../../src/db/datadumpRepository';
import type {
  FeatureRecord,
  MetadataIndex,
  MetadataRepository,
  NetworkRecord,
  NodeQuery,
  NodeRecord,
  SensorRecord
} from '../../src/metadata/types';
import type { ColumnDefinition, ObservationRow } from '../../src/observations/types';
import type { SpatialFilter } from '../../src/validation/geometry';

type NetworkSeed = { name: string; info: Record<string, unknown> };

export type MetadataSeed = {
  networks: NetworkSeed[];
  nodes: NodeRecord[];
  sensors: SensorRecord[];
  features: FeatureRecord[];
};

export const seed: MetadataSeed = {
  networks: [
    { name: 'array_of_things', info: { city: 'Chicago' } },
    { name: 'lake_sensors', info: { city: 'Evanston' } }
  ],
  nodes: [
    {
      id: '005a',
      network: 'array_of_things',
      location: { longitude: -87.6, latitude: 41.9 },
      info: { address: 'State St' },
      sensors: ['tmp112']
    },
    {
      id: '006b',
      network: 'array_of_things',
      location: { longitude: -87.7, latitude: 41.8 },
      info: { address: 'Halsted St' },
      sensors: ['bmp180', 'hih6130']
    },
    {
      id: 'l01',
      network: 'lake_sensors',
      location: { longitude: -87.68, latitude: 42.05 },
      info: {},
      sensors: ['anemometer']
    }
  ],
  sensors: [
    { name: 'tmp112', observedProperties: { temperature: 'temperature.temperature' }, info: {} },
    {
      name: 'hih6130',
      observedProperties: { temperature: 'temperature.temperature', humidity: 'relative_humidity.humidity' },
      info: {}
    },
    {
      name: 'bmp180',
      observedProperties: { pressure: 'atmospheric_pressure.pressure', temperature: 'temperature.temperature' },
      info: {}
    },
    { name: 'anemometer', observedProperties: { speed: 'wind.speed' }, info: {} }
  ],
  features: [
    { name: 'temperature', observedProperties: [{ name: 'temperature', type: 'float' }] },
    { name: 'relative_humidity', observedProperties: [{ name: 'humidity', type: 'float' }] },
    { name: 'atmospheric_pressure', observedProperties: [{ name: 'pressure', type: 'float' }] },
    { name: 'wind', observedProperties: [{ name: 'speed', type: 'float' }] }
  ]
};

function uniqueSorted(values: string[]): string[] {
  return Array.from(new Set(values)).sort();
}

function pointInRing(x: number, y: number, ring: number[][]): boolean {
  let inside = false;
  for (let i = 0, j = ring.length - 1; i < ring.length; j = i, i += 1) {
    const [xi, yi] = ring[i];
    const [xj, yj] = ring[j];
    if (yi > y !== yj > y && x < ((xj - xi) * (y - yi)) / (yj - yi) + xi) {
      inside = !inside;
    }
  }
  return inside;
}

function within(node: NodeRecord, geom: SpatialFilter): boolean {
  if (!node.location) {
    return false;
  }
  const { longitude, latitude } = node.location;
  const inPolygon = (rings: number[][][]) =>
    pointInRing(longitude, latitude, rings[0]) && !rings.slice(1).some((hole) => pointInRing(longitude, latitude, hole));
  switch (geom.type) {
    case 'Polygon':
      return inPolygon(geom.coordinates);
    case 'MultiPolygon':
      return geom.coordinates.some(inPolygon);
    default:
      return false;
  }
}

/**
 * Mirrors the Postgres repository's queries over plain arrays.
 */
export class MemoryMetadataRepository implements MetadataRepository {
  calls = 0;

  constructor(private readonly data: MetadataSeed = seed) {}

  private sensorsFor(network: string): SensorRecord[] {
    const names = new Set(
      this.data.nodes.filter((node) => node.network === network).flatMap((node) => node.sensors)
    );
    return this.data.sensors.filter((sensor) => names.has(sensor.name));
  }

  async listNetworks(names?: string[]): Promise<NetworkRecord[]> {
    this.calls += 1;
    return this.data.networks
      .filter((network) => !names || names.includes(network.name.toLowerCase()))
      .map((network) => {
        const sensors = this.sensorsFor(network.name);
        return {
          name: network.name,
          info: network.info,
          nodes: this.data.nodes.filter((node) => node.network === network.name).map((node) => node.id),
          sensors: uniqueSorted(sensors.map((sensor) => sensor.name)),
          features: uniqueSorted(
            sensors.flatMap((sensor) =>
              Object.values(sensor.observedProperties).map((reference) => reference.split('.')[0])
            )
          )
        };
      });
  }

  async listNodes(query: NodeQuery): Promise<NodeRecord[]> {
    this.calls += 1;
    const geom = query.geom;
    return this.data.nodes.filter(
      (node) =>
        query.ids.includes(node.id.toLowerCase()) &&
        query.networks.includes(node.network.toLowerCase()) &&
        (!geom || within(node, geom))
    );
  }

  async listSensors(names: string[]): Promise<SensorRecord[]> {
    this.calls += 1;
    return this.data.sensors.filter((sensor) => names.includes(sensor.name.toLowerCase()));
  }

  async listFeatures(names: string[]): Promise<FeatureRecord[]> {
    this.calls += 1;
    return this.data.features.filter((feature) => names.includes(feature.name.toLowerCase()));
  }

  async loadIndex(): Promise<MetadataIndex> {
    return {
      networks: this.data.networks.map((network) => network.name),
      nodes: this.data.nodes.map((node) => node.id),
      sensors: this.data.sensors.map((sensor) => sensor.name),
      features: this.data.features.map((feature) => feature.name)
    };
  }
}

export class MemoryPartStore implements DatadumpPartStore {
  readonly committed: DatadumpPart[] = [];
  rollbacks = 0;
  failOnPart: number | null = null;

  async begin(): Promise<DatadumpUnitOfWork> {
    const staged: DatadumpPart[] = [];
    let finished = false;
    return {
      addPart: async (part) => {
        if (this.failOnPart === part.part) {
          throw new Error(`insert failed for part ${part.part}`);
        }
        staged.push(part);
      },
      commit: async () => {
        finished = true;
        this.committed.push(...staged);
      },
      rollback: async () => {
        if (!finished) {
          finished = true;
          this.rollbacks += 1;
        }
      }
    };
  }

  parts(): DatadumpPart[] {
    return [...this.committed].sort((a, b) => a.part - b.part);
  }
}

export const ENVELOPE: ColumnDefinition[] = [
  { name: 'node_id', type: 'String' },
  { name: 'datetime', type: 'DateTime64(3)' },
  { name: 'sensor', type: 'String' },
  { name: 'meta_id', type: 'UInt32' }
];

export function observationRow(
  node: string,
  sensor: string,
  datetime: string,
  values: Record<string, unknown>
): ObservationRow {
  return { node_id: node, datetime, sensor, meta_id: 1, ...values };
}

/**
 * Tables for every seeded feature; `temperature` gets one reading per minute
 * for each of its sensors starting at 2024-01-01T00:00:00.
 */
export function createObservationStore(temperatureRows = 0): MemoryObservationStore {
  const store = new MemoryObservationStore();
  store.defineTable('temperature', [...ENVELOPE, { name: 'temperature', type: 'Nullable(Float64)' }]);
  store.defineTable('relative_humidity', [...ENVELOPE, { name: 'humidity', type: 'Float64' }]);
  store.defineTable('atmospheric_pressure', [
    ...ENVELOPE,
    { name: 'pressure', type: 'Float64' },
    { name: 'status', type: 'String' }
  ]);
  store.defineTable('wind', [...ENVELOPE, { name: 'speed', type: 'Float32' }]);

  const rows: ObservationRow[] = [];
  const start = Date.UTC(2024, 0, 1);
  for (let i = 0; i < temperatureRows; i += 1) {
    const datetime = new Date(start + i * 60_000).toISOString().slice(0, 19);
    rows.push(observationRow('005a', 'tmp112', datetime, { temperature: 20 + (i % 5) }));
  }
  store.insert('temperature', rows);
  return store;
}
