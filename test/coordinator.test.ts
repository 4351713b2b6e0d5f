import test from 'node:test';
import assert from 'node:assert/strict';
import { setTimeout as sleep } from 'timers/promises';
import { executePlan, succeededBackends, type BackendInvoker } from '../src/core/retrieval/coordinator';
import { BackendUnavailableError } from '../src/core/errors';
import type { BackendId, ExecutionPlan, Item } from '../src/core/retrieval/types';

function plan(backends: BackendId[], strategy: ExecutionPlan['strategy'], perBackendLimit = 5): ExecutionPlan {
  return { backends, strategy, perBackendLimit, comprehensive: false };
}

function items(prefix: string, n: number): Item[] {
  return Array.from({ length: n }, (_, i) => ({ id: `${prefix}${i + 1}`, score: 1 - i / 10 }));
}

function concurrencyProbe(delayMs: number): { invoke: BackendInvoker; peak: () => number } {
  let active = 0;
  let peak = 0;
  const invoke: BackendInvoker = async (backend) => {
    active += 1;
    peak = Math.max(peak, active);
    await sleep(delayMs);
    active -= 1;
    return items(backend, 1);
  };
  return { invoke, peak: () => peak };
}

test('parallel plans overlap their backend calls', async () => {
  const probe = concurrencyProbe(20);
  const results = await executePlan(plan(['vector', 'graph'], 'parallel'), probe.invoke);
  assert.equal(probe.peak(), 2);
  assert.deepEqual(results.map((r) => r.backend), ['vector', 'graph']);
});

test('sequential plans run one backend at a time in plan order', async () => {
  const probe = concurrencyProbe(5);
  const order: BackendId[] = [];
  const invoke: BackendInvoker = async (backend, limit) => {
    order.push(backend);
    return probe.invoke(backend, limit);
  };
  const results = await executePlan(plan(['metadata', 'vector', 'graph'], 'sequential'), invoke);
  assert.equal(probe.peak(), 1);
  assert.deepEqual(order, ['metadata', 'vector', 'graph']);
  assert.deepEqual(results.map((r) => r.status), ['ok', 'ok', 'ok']);
});

test('results are truncated to the per-backend limit and ranked from one', async () => {
  const [result] = await executePlan(plan(['vector'], 'parallel', 2), async () => items('v', 4));
  assert.equal(result?.status, 'ok');
  assert.deepEqual(result?.items.map((i) => [i.id, i.rank]), [['v1', 1], ['v2', 2]]);
});

test('a failing backend becomes an error result while the others succeed', async () => {
  const invoke: BackendInvoker = async (backend) => {
    if (backend === 'graph') throw new Error('query exploded');
    if (backend === 'metadata') throw new BackendUnavailableError('metadata', 'connection refused');
    return items(backend, 2);
  };
  const results = await executePlan(plan(['vector', 'graph', 'metadata'], 'parallel'), invoke);
  const [vector, graph, metadata] = results;
  assert.equal(vector?.status, 'ok');
  assert.ok(graph?.status === 'error');
  assert.deepEqual(graph.error, { kind: 'failed', message: 'query exploded' });
  assert.deepEqual(graph.items, []);
  assert.ok(metadata?.status === 'error');
  assert.equal(metadata.error.kind, 'unavailable');
  assert.deepEqual(succeededBackends(results), ['vector']);
});

test('connection refusal codes count as unavailable', async () => {
  const invoke: BackendInvoker = async () => {
    throw Object.assign(new Error('connect failed'), { code: 'ECONNREFUSED' });
  };
  const [result] = await executePlan(plan(['graph'], 'parallel'), invoke);
  assert.ok(result?.status === 'error');
  assert.equal(result.error.kind, 'unavailable');
});

test('a backend with no items is reported as empty and still counts as used', async () => {
  const results = await executePlan(plan(['vector', 'graph'], 'parallel'), async (backend) =>
    backend === 'graph' ? [] : items('v', 1)
  );
  assert.deepEqual(results.map((r) => r.status), ['ok', 'empty']);
  assert.deepEqual(succeededBackends(results), ['vector', 'graph']);
});

test('calls outstanding at the deadline time out without failing the others', async () => {
  const invoke: BackendInvoker = async (backend) => {
    if (backend === 'graph') await sleep(200);
    return items(backend, 1);
  };
  const results = await executePlan(plan(['vector', 'graph'], 'parallel'), invoke, { deadline: Date.now() + 40 });
  const [vector, graph] = results;
  assert.equal(vector?.status, 'ok');
  assert.ok(graph?.status === 'error');
  assert.equal(graph.error.kind, 'timeout');
});

test('sequential backends starting after the deadline are skipped as timed out', async () => {
  const calls: BackendId[] = [];
  const invoke: BackendInvoker = async (backend) => {
    calls.push(backend);
    await sleep(60);
    return items(backend, 1);
  };
  const results = await executePlan(plan(['vector', 'graph', 'metadata'], 'sequential'), invoke, {
    deadline: Date.now() + 30,
  });
  assert.deepEqual(calls, ['vector']);
  assert.deepEqual(results.map((r) => r.status), ['error', 'error', 'error']);
});
