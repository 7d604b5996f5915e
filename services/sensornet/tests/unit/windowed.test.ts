import assert from 'node:assert/strict';
import { mock, test } from 'node:test';
import type { ObservationQuery, ObservationRow, WindowRequest } from '../../src/observations/types';
import { windowedRows } from '../../src/observations/windowed';
import { ENVELOPE, createObservationStore, observationRow } from '../helpers/fixtures';

function query(overrides: Partial<ObservationQuery> = {}): ObservationQuery {
  return {
    feature: 'temperature',
    table: 'temperature',
    columns: [...ENVELOPE, { name: 'temperature', type: 'Nullable(Float64)' }],
    range: { start: new Date('2024-01-01T00:00:00Z'), end: new Date('2024-01-02T00:00:00Z') },
    nodes: null,
    sensors: null,
    limit: null,
    offset: null,
    ...overrides
  };
}

async function collect(source: AsyncGenerator<ObservationRow[]>): Promise<ObservationRow[][]> {
  const windows: ObservationRow[][] = [];
  for await (const rows of source) {
    windows.push(rows);
  }
  return windows;
}

test('walks the result set in ordered windows', async () => {
  const store = createObservationStore(7);
  const windows = await collect(windowedRows(store, query(), 3));
  assert.deepEqual(
    windows.map((rows) => rows.map((row) => row.temperature)),
    [
      [20, 21, 22],
      [23, 24, 20],
      [21]
    ]
  );
});

test('orders rows sharing a timestamp the same way across window boundaries', async () => {
  const store = createObservationStore();
  store.insert('temperature', [
    observationRow('005a', 'tmp112', '2024-01-01T00:05:00', { meta_id: 2, temperature: 22 }),
    observationRow('005a', 'tmp112', '2024-01-01T00:05:00', { temperature: 25 }),
    observationRow('005a', 'tmp112', '2024-01-01T00:05:00', { temperature: 21 }),
    observationRow('005a', 'tmp112', '2024-01-01T00:00:00', { temperature: 20 })
  ]);
  const windows = await collect(windowedRows(store, query(), 2));
  assert.deepEqual(
    windows.map((rows) => rows.map((row) => [row.meta_id, row.temperature])),
    [
      [
        [1, 20],
        [1, 21]
      ],
      [
        [1, 25],
        [2, 22]
      ]
    ]
  );
});

test('stops at the query limit without an extra fetch', async () => {
  const store = createObservationStore(10);
  const fetchWindow = mock.fn((q: ObservationQuery, window: WindowRequest) => store.fetchWindow(q, window));
  const windows = await collect(windowedRows({ fetchWindow }, query({ limit: 4 }), 3));

  assert.deepEqual(
    windows.map((rows) => rows.length),
    [3, 1]
  );
  assert.deepEqual(
    fetchWindow.mock.calls.map((call) => call.arguments[1]),
    [
      { offset: 0, limit: 3 },
      { offset: 3, limit: 1 }
    ]
  );
});

test('rejects non-positive window sizes', async () => {
  const store = createObservationStore(1);
  await assert.rejects(collect(windowedRows(store, query(), 0)), /Window size must be a positive integer/);
});
