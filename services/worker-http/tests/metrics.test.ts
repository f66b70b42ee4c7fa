import test from 'node:test';
import assert from 'node:assert/strict';
import { Registry } from 'prom-client';
import { createWorkerMetrics } from '../src/metrics';

test('hit rate is zero before anything was requested', async () => {
  const metrics = createWorkerMetrics({ registry: new Registry() });
  assert.equal(await metrics.cacheHitRate(), 0);
});

test('hit rate divides served bytes by requested bytes', async () => {
  const metrics = createWorkerMetrics({ registry: new Registry() });
  metrics.recordBytesRequested(100);
  metrics.recordBytesServed(25);

  assert.equal(await metrics.cacheHitRate(), 0.25);
  const exposition = await metrics.registry.metrics();
  assert.match(exposition, /^worker_http_cache_hit_rate 0\.25$/m);
  assert.match(exposition, /^worker_http_bytes_requested_total 100$/m);
  assert.match(exposition, /^worker_http_bytes_read_cache_total 25$/m);
});

test('exchanges are counted per method, route and status', async () => {
  const metrics = createWorkerMetrics({ registry: new Registry() });
  metrics.recordExchange('GET', 'file', 200, 0.01);
  metrics.recordExchange('GET', 'file', 200, 0.02);
  metrics.recordExchange('POST', 'unmatched', 404, 0.001);

  const exposition = await metrics.registry.metrics();
  assert.match(exposition, /^worker_http_requests_total\{method="GET",route="file",status="200"\} 2$/m);
  assert.match(exposition, /^worker_http_requests_total\{method="POST",route="unmatched",status="404"\} 1$/m);
  assert.match(exposition, /^worker_http_request_duration_seconds_count\{method="GET",route="file",status="200"\} 2$/m);
});

test('reset clears every counter', async () => {
  const metrics = createWorkerMetrics({ registry: new Registry() });
  metrics.recordBytesRequested(10);
  metrics.recordBytesServed(10);
  metrics.recordLoadJob('submitted');

  metrics.reset();

  assert.equal(await metrics.cacheHitRate(), 0);
  const exposition = await metrics.registry.metrics();
  assert.match(exposition, /^worker_http_bytes_requested_total 0$/m);
  assert.doesNotMatch(exposition, /outcome="submitted"/);
});

test('a custom prefix names every metric', async () => {
  const metrics = createWorkerMetrics({ registry: new Registry(), prefix: 'edge_' });
  metrics.recordLoadJob('completed');

  const exposition = await metrics.registry.metrics();
  assert.match(exposition, /^edge_load_jobs_total\{outcome="completed"\} 1$/m);
});
