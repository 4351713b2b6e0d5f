import test from 'node:test';
import assert from 'node:assert/strict';
import { createLogger } from '../src/core/log';

function withLevel<T>(level: string | undefined, fn: () => T): T {
  const prev = process.env.SCHOLARMUX_LOG_LEVEL;
  if (level === undefined) delete process.env.SCHOLARMUX_LOG_LEVEL;
  else process.env.SCHOLARMUX_LOG_LEVEL = level;
  try {
    return fn();
  } finally {
    if (prev === undefined) delete process.env.SCHOLARMUX_LOG_LEVEL;
    else process.env.SCHOLARMUX_LOG_LEVEL = prev;
  }
}

function parseLines(lines: string[]): Array<Record<string, unknown>> {
  return lines.map((l) => {
    const parsed: unknown = JSON.parse(l);
    assert.ok(typeof parsed === 'object' && parsed !== null);
    return Object.fromEntries(Object.entries(parsed));
  });
}

test('logger writes one JSON line with base and call fields', (t) => {
  const lines: string[] = [];
  t.mock.method(process.stderr, 'write', (chunk: unknown) => {
    lines.push(String(chunk));
    return true;
  });
  const log = withLevel('info', () => createLogger({ component: 'test', kind: 'unit' }));
  log.info('backend_failed', { backend: 'graph' });

  const [rec] = parseLines(lines);
  assert.equal(lines.length, 1);
  assert.equal(rec?.level, 'info');
  assert.equal(rec?.msg, 'backend_failed');
  assert.equal(rec?.component, 'test');
  assert.equal(rec?.kind, 'unit');
  assert.equal(rec?.backend, 'graph');
  assert.equal(typeof rec?.ts, 'string');
});

test('logger drops records below the configured level', (t) => {
  const lines: string[] = [];
  t.mock.method(process.stderr, 'write', (chunk: unknown) => {
    lines.push(String(chunk));
    return true;
  });
  const log = withLevel('warn', () => createLogger());
  log.debug('a');
  log.info('b');
  log.warn('c');
  log.error('d');
  assert.deepEqual(parseLines(lines).map((r) => r.msg), ['c', 'd']);
});

test('silent level disables output', (t) => {
  const lines: string[] = [];
  t.mock.method(process.stderr, 'write', (chunk: unknown) => {
    lines.push(String(chunk));
    return true;
  });
  const log = withLevel('silent', () => createLogger());
  log.error('never');
  assert.equal(lines.length, 0);
});

test('child loggers extend base fields', (t) => {
  const lines: string[] = [];
  t.mock.method(process.stderr, 'write', (chunk: unknown) => {
    lines.push(String(chunk));
    return true;
  });
  const log = withLevel('info', () => createLogger({ component: 'search' }).child({ kind: 'planner' }));
  log.info('planned');
  const [rec] = parseLines(lines);
  assert.equal(rec?.component, 'search');
  assert.equal(rec?.kind, 'planner');
});

test('span logs the outcome and rethrows failures', async (t) => {
  const lines: string[] = [];
  t.mock.method(process.stderr, 'write', (chunk: unknown) => {
    lines.push(String(chunk));
    return true;
  });
  const log = withLevel('info', () => createLogger());

  const value = await log.span('step', { n: 1 }, async () => 42);
  assert.equal(value, 42);
  await assert.rejects(log.span('step', { n: 2 }, async () => {
    throw new Error('boom');
  }), /boom/);

  const [ok, failed] = parseLines(lines);
  assert.equal(ok?.level, 'info');
  assert.equal(ok?.ok, true);
  assert.equal(ok?.n, 1);
  assert.equal(typeof ok?.duration_ms, 'number');
  assert.equal(failed?.level, 'error');
  assert.equal(failed?.ok, false);
  assert.deepEqual(failed?.err && typeof failed.err === 'object' ? Object.keys(failed.err) : [], ['name', 'message', 'stack']);
});
