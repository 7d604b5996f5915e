import assert from 'node:assert/strict';
import { test } from 'node:test';
import { extractFirstGeometryFragment } from '../../src/validation/geometry';

const square = [
  [
    [0, 0],
    [1, 0],
    [1, 1],
    [0, 1],
    [0, 0]
  ]
];

test('keeps plain geometries as they are', () => {
  assert.deepEqual(extractFirstGeometryFragment({ type: 'Polygon', coordinates: square }), {
    type: 'Polygon',
    coordinates: square
  });
  assert.deepEqual(extractFirstGeometryFragment('{"type":"Point","coordinates":[-87.6,41.9]}'), {
    type: 'Point',
    coordinates: [-87.6, 41.9]
  });
});

test('takes the first geometry of features and collections', () => {
  const collection = JSON.stringify({
    type: 'FeatureCollection',
    features: [
      { type: 'Feature', properties: {}, geometry: { type: 'Polygon', coordinates: square } },
      { type: 'Feature', properties: {}, geometry: { type: 'Point', coordinates: [5, 5] } }
    ]
  });
  assert.equal(extractFirstGeometryFragment(collection).type, 'Polygon');

  const nested = {
    type: 'Feature',
    geometry: {
      type: 'GeometryCollection',
      geometries: [
        { type: 'LineString', coordinates: [[0, 0], [1, 1]] },
        { type: 'Point', coordinates: [0, 0] }
      ]
    }
  };
  assert.equal(extractFirstGeometryFragment(nested).type, 'LineString');
});

test('rejects empty collections and malformed geometries', () => {
  assert.throws(
    () => extractFirstGeometryFragment({ type: 'FeatureCollection', features: [] }),
    /FeatureCollection contains no features/
  );
  assert.throws(() => extractFirstGeometryFragment({ type: 'Polygon', coordinates: [[[0, 0], [1, 1]]] }));
  assert.throws(() => extractFirstGeometryFragment({ type: 'Circle', radius: 3 }));
  assert.throws(() => extractFirstGeometryFragment('{not json'), SyntaxError);
});
