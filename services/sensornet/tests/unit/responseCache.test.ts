import assert from 'node:assert/strict';
import { test } from 'node:test';
import { MemoryResponseCache, NoopResponseCache, buildCacheKey } from '../../src/cache/responseCache';

test('keys requests by method, path and sorted query string', () => {
  assert.equal(
    buildCacheKey('get', '/v1/api/sensor-networks/aot/nodes?sensors=tmp112&geom=x&nodes=b&nodes=a'),
    'GET /v1/api/sensor-networks/aot/nodes?geom=x&nodes=a&nodes=b&sensors=tmp112'
  );
  assert.equal(buildCacheKey('GET', '/v1/api/sensor-networks'), 'GET /v1/api/sensor-networks');
  assert.equal(
    buildCacheKey('GET', '/v1/api/sensor-networks?b=2&a=1'),
    buildCacheKey('GET', '/v1/api/sensor-networks?a=1&b=2')
  );
});

test('returns stored bodies until they expire', async () => {
  let clock = 0;
  const cache = new MemoryResponseCache(10, () => clock);
  await cache.set('k', '{"a":1}', 1_000);
  clock = 999;
  assert.equal(await cache.get('k'), '{"a":1}');
  clock = 1_000;
  assert.equal(await cache.get('k'), null);
});

test('does not store entries with a zero TTL', async () => {
  const cache = new MemoryResponseCache();
  await cache.set('k', 'v', 0);
  assert.equal(await cache.get('k'), null);
});

test('evicts the least recently written entry beyond capacity', async () => {
  const cache = new MemoryResponseCache(2);
  await cache.set('a', '1', 60_000);
  await cache.set('b', '2', 60_000);
  await cache.set('a', '3', 60_000);
  await cache.set('c', '4', 60_000);
  assert.equal(await cache.get('b'), null);
  assert.equal(await cache.get('a'), '3');
  assert.equal(await cache.get('c'), '4');
});

test('never stores anything when disabled', async () => {
  const cache = new NoopResponseCache();
  await cache.set('k', 'v', 60_000);
  assert.equal(await cache.get('k'), null);
});
