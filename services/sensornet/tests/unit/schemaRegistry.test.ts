import assert from 'node:assert/strict';
import { mock, test } from 'node:test';
import type { MemoryObservationStore } from '../../src/clickhouse/memoryStore';
import { FeatureSchemaChangedError, FeatureTableMissingError } from '../../src/errors/domain';
import { formatObservation } from '../../src/formatting/formatters';
import { buildObservationQueries } from '../../src/observations/queryBuilder';
import { createSchemaRegistry } from '../../src/observations/schemaRegistry';
import type { AggregationPlan, ColumnDefinition } from '../../src/observations/types';
import { ENVELOPE, createObservationStore, observationRow } from '../helpers/fixtures';

const COLUMNS: ColumnDefinition[] = [
  { name: 'node_id', type: 'String' },
  { name: 'datetime', type: 'DateTime64(3)' },
  { name: 'value', type: 'Float64' }
];

test('caches table schemas until the TTL expires', async () => {
  let now = 1_000;
  const describeTable = mock.fn(async (_table: string) => COLUMNS);
  const registry = createSchemaRegistry({ describeTable }, { ttlMs: 500, now: () => now });

  const first = await registry.getSchema('Temperature');
  await registry.getSchema('temperature');
  assert.equal(describeTable.mock.callCount(), 1);
  assert.equal(first.table, 'temperature');
  assert.deepEqual(describeTable.mock.calls[0].arguments, ['temperature']);

  now += 500;
  await registry.getSchema('temperature');
  assert.equal(describeTable.mock.callCount(), 2);
});

test('drops entries on invalidate and reset', async () => {
  const describeTable = mock.fn(async (_table: string) => COLUMNS);
  const registry = createSchemaRegistry({ describeTable }, { ttlMs: 60_000 });

  await registry.getSchema('temperature');
  registry.invalidate('TEMPERATURE');
  await registry.getSchema('temperature');
  assert.equal(describeTable.mock.callCount(), 2);

  registry.reset();
  await registry.getSchema('temperature');
  assert.equal(describeTable.mock.callCount(), 3);
});

test('does not cache when the TTL is zero', async () => {
  const describeTable = mock.fn(async (_table: string) => COLUMNS);
  const registry = createSchemaRegistry({ describeTable }, { ttlMs: 0 });
  await registry.getSchema('temperature');
  await registry.getSchema('temperature');
  assert.equal(describeTable.mock.callCount(), 2);
});

test('raises FeatureTableMissingError for tables the store does not know', async () => {
  const registry = createSchemaRegistry(createObservationStore(), { ttlMs: 60_000 });
  await assert.rejects(registry.getSchema('ozone'), (error: unknown) => {
    assert.ok(error instanceof FeatureTableMissingError);
    assert.equal(error.feature, 'ozone');
    return true;
  });
});

test('invalidates the cached schema when a table disappears between queries', async () => {
  const store = createObservationStore();
  const registry = createSchemaRegistry(store, { ttlMs: 60_000 });
  const schema = await registry.getSchema('wind');
  store.dropTable('wind');

  const query = {
    feature: 'wind',
    table: schema.table,
    columns: schema.columns,
    range: { start: new Date('2024-01-01T00:00:00Z'), end: new Date('2024-01-02T00:00:00Z') },
    nodes: null,
    sensors: null,
    limit: null,
    offset: null
  };
  await assert.rejects(
    registry.guard('wind', () => store.fetchRows(query)),
    FeatureTableMissingError
  );
  await assert.rejects(registry.getSchema('wind'), FeatureTableMissingError);
});

test('passes other errors through the guard untouched', async () => {
  const registry = createSchemaRegistry(createObservationStore(), { ttlMs: 60_000 });
  const failure = new Error('connection reset');
  await assert.rejects(
    registry.guard('wind', async () => {
      throw failure;
    }),
    (error: unknown) => error === failure
  );
});

const RANGE = { start: new Date('2024-01-01T00:00:00Z'), end: new Date('2024-01-02T00:00:00Z') };

function countingStore(store: MemoryObservationStore) {
  return { describeTable: mock.fn((table: string) => store.describeTable(table)) };
}

test('drops the cached schema when a column disappears under a query', async () => {
  const store = createObservationStore();
  const counted = countingStore(store);
  const registry = createSchemaRegistry(counted, { ttlMs: 60_000 });
  const schema = await registry.getSchema('wind');
  store.defineTable('wind', ENVELOPE);

  const plan: AggregationPlan = {
    feature: 'wind',
    table: schema.table,
    fn: 'avg',
    bucket: 'hour',
    node: 'l01',
    sensors: null,
    properties: ['speed'],
    range: RANGE
  };
  await assert.rejects(registry.guard('wind', () => store.aggregate(plan)), (error: unknown) => {
    assert.ok(error instanceof FeatureSchemaChangedError);
    assert.equal(error.feature, 'wind');
    return true;
  });

  const fresh = await registry.getSchema('wind');
  assert.equal(counted.describeTable.mock.callCount(), 2);
  assert.deepEqual(
    fresh.columns.map((column) => column.name),
    ['node_id', 'datetime', 'sensor', 'meta_id']
  );
});

test('treats unknown identifier errors from ClickHouse as a schema change', async () => {
  const describeTable = mock.fn(async (_table: string) => COLUMNS);
  const registry = createSchemaRegistry({ describeTable }, { ttlMs: 60_000 });
  await registry.getSchema('temperature');

  await assert.rejects(
    registry.guard('temperature', async () => {
      throw Object.assign(new Error("Missing columns: 'value' while processing query"), {
        code: '47',
        type: 'UNKNOWN_IDENTIFIER'
      });
    }),
    FeatureSchemaChangedError
  );
  await assert.rejects(
    registry.guard('temperature', async () => {
      throw { code: 16, type: 'NO_SUCH_COLUMN_IN_TABLE', message: "There's no column 'value' in table" };
    }),
    FeatureSchemaChangedError
  );

  await registry.getSchema('temperature');
  assert.equal(describeTable.mock.callCount(), 2);
});

test('picks up columns added after the schema was cached', async () => {
  const store = createObservationStore();
  const counted = countingStore(store);
  const registry = createSchemaRegistry(counted, { ttlMs: 60_000 });
  const [query] = await buildObservationQueries([{ name: 'wind', observedProperties: [] }], RANGE, registry);

  store.defineTable('wind', [
    ...ENVELOPE,
    { name: 'speed', type: 'Float32' },
    { name: 'gust', type: 'Float32' }
  ]);
  store.insert('wind', [observationRow('l01', 'anemometer', '2024-01-01T00:10:00', { speed: 3, gust: 9 })]);

  const rows = await registry.guard('wind', () => store.fetchRows(query));
  const columns = await registry.reconcile('wind', query.columns, rows);

  assert.deepEqual(
    columns.map((column) => column.name),
    ['node_id', 'datetime', 'sensor', 'meta_id', 'speed', 'gust']
  );
  assert.deepEqual(formatObservation(rows[0], 'wind', columns).results, { speed: 3, gust: 9 });
  assert.equal(counted.describeTable.mock.callCount(), 2);
  assert.equal((await registry.getSchema('wind')).columns.length, 6);
  assert.equal(counted.describeTable.mock.callCount(), 2);
});

test('keeps the cached columns when rows match them', async () => {
  const describeTable = mock.fn(async (_table: string) => COLUMNS);
  const registry = createSchemaRegistry({ describeTable }, { ttlMs: 60_000 });
  const schema = await registry.getSchema('temperature');

  const row = { node_id: '005a', datetime: '2024-01-01T00:00:00', value: 1 };
  assert.equal(await registry.reconcile('temperature', schema.columns, [row]), schema.columns);
  assert.equal(await registry.reconcile('temperature', schema.columns, []), schema.columns);
  assert.equal(describeTable.mock.callCount(), 1);
});

test('fails when rows still disagree with a freshly described table', async () => {
  const describeTable = mock.fn(async (_table: string) => COLUMNS);
  const registry = createSchemaRegistry({ describeTable }, { ttlMs: 60_000 });
  const schema = await registry.getSchema('temperature');

  const row = { node_id: '005a', datetime: '2024-01-01T00:00:00', value: 1, status: 'ok' };
  await assert.rejects(registry.reconcile('temperature', schema.columns, [row]), FeatureSchemaChangedError);
  assert.equal(describeTable.mock.callCount(), 2);

  await registry.getSchema('temperature');
  assert.equal(describeTable.mock.callCount(), 3);
});
