import assert from 'node:assert/strict';
import { test } from 'node:test';
import { buildEnvelope, echoQuery, serializeJson } from '../../src/formatting/envelope';
import {
  formatMetadata,
  formatObservation,
  mergeObservations,
  type FormattedObservation
} from '../../src/formatting/formatters';
import { formatTimestamp, parseUtcDateTime } from '../../src/formatting/time';
import { ENVELOPE, seed } from '../helpers/fixtures';

function observation(datetime: string, sensor: string, feature: string): FormattedObservation {
  return { node_id: '005a', meta_id: 1, datetime, sensor, feature_of_interest: feature, results: {} };
}

test('formats an observation with every non-envelope column in table order', () => {
  const formatted = formatObservation(
    { node_id: '005a', datetime: new Date('2024-01-01T00:00:00.250Z'), sensor: 'tmp112', meta_id: 7, humidity: 40 },
    'temperature',
    [...ENVELOPE, { name: 'temperature', type: 'Nullable(Float64)' }, { name: 'humidity', type: 'Float64' }]
  );
  assert.deepEqual(formatted, {
    node_id: '005a',
    meta_id: 7,
    datetime: '2024-01-01T00:00:00.250',
    sensor: 'tmp112',
    feature_of_interest: 'temperature',
    results: { temperature: null, humidity: 40 }
  });
  assert.deepEqual(Object.keys(formatted.results), ['temperature', 'humidity']);
});

test('rejects rows without a usable datetime', () => {
  assert.throws(
    () => formatObservation({ node_id: '005a', datetime: 'soon' }, 'temperature', ENVELOPE),
    /no valid datetime/
  );
});

test('merges feature groups by datetime keeping ties in input order', () => {
  const merged = mergeObservations([
    [observation('2024-01-01T00:02:00', 'tmp112', 'temperature'), observation('2024-01-01T00:05:00', 'tmp112', 'temperature')],
    [observation('2024-01-01T00:02:00', 'hih6130', 'relative_humidity'), observation('2024-01-01T00:01:00', 'hih6130', 'relative_humidity')]
  ]);
  assert.deepEqual(
    merged.map((entry) => `${entry.datetime} ${entry.feature_of_interest}`),
    [
      '2024-01-01T00:01:00 relative_humidity',
      '2024-01-01T00:02:00 temperature',
      '2024-01-01T00:02:00 relative_humidity',
      '2024-01-01T00:05:00 temperature'
    ]
  );
});

test('formats nodes as GeoJSON features', () => {
  const [located, unlocated] = formatMetadata({
    level: 'nodes',
    records: [seed.nodes[0], { ...seed.nodes[2], location: null }]
  });
  assert.deepEqual(located, {
    type: 'Feature',
    geometry: { type: 'Point', coordinates: [-87.6, 41.9] },
    properties: { id: '005a', network: 'array_of_things', sensors: ['tmp112'], info: { address: 'State St' } }
  });
  assert.deepEqual(unlocated, {
    type: 'Feature',
    geometry: null,
    properties: { id: 'l01', network: 'lake_sensors', sensors: ['anemometer'], info: {} }
  });
});

test('lists a sensor observed properties by their feature references', () => {
  const [sensor] = formatMetadata({ level: 'sensors', records: [seed.sensors[1]] });
  assert.deepEqual(sensor, {
    name: 'hih6130',
    observed_properties: ['temperature.temperature', 'relative_humidity.humidity'],
    info: {}
  });
});

test('parses and prints offset-free UTC timestamps', () => {
  assert.equal(parseUtcDateTime('2024-02-03 04:05:06')?.toISOString(), '2024-02-03T04:05:06.000Z');
  assert.equal(parseUtcDateTime('2024-02-03T04:05:06Z')?.toISOString(), '2024-02-03T04:05:06.000Z');
  assert.equal(parseUtcDateTime('2024-02-03T04:05:06-0500')?.toISOString(), '2024-02-03T04:05:06.000Z');
  assert.equal(parseUtcDateTime('2024-13-01'), null);
  assert.equal(parseUtcDateTime(''), null);
  assert.equal(formatTimestamp(new Date('2024-02-03T04:05:06Z')), '2024-02-03T04:05:06');
});

test('wraps data in an envelope echoing the applied query', () => {
  const envelope = buildEnvelope(
    echoQuery({ network: 'array_of_things', nodes: null, limit: undefined, geom: 'x' }, ['geom']),
    [{ a: 1 }, { a: 2 }]
  );
  assert.deepEqual(envelope.meta, {
    status: 'ok',
    query: { network: 'array_of_things' },
    message: [],
    total: 2
  });
  assert.equal(buildEnvelope({}, { ticket: 't' }).meta.total, 1);
});

test('serializes dates without an offset', () => {
  assert.equal(
    serializeJson({ start: new Date('2024-01-01T00:00:00Z'), list: [new Date('2024-01-01T00:00:00.500Z')] }),
    '{"start":"2024-01-01T00:00:00","list":["2024-01-01T00:00:00.500"]}'
  );
});
