import test from 'node:test';
import assert from 'node:assert/strict';
import { emptyFused, fuseResults, rrfContribution } from '../src/core/retrieval/fuser';
import type { BackendId, BackendResult, Item } from '../src/core/retrieval/types';

function ok(backend: BackendId, list: Array<string | Item>): BackendResult {
  const ranked = list.map((entry, idx) => {
    const item = typeof entry === 'string' ? { id: entry, score: 1 } : entry;
    return { ...item, rank: idx + 1 };
  });
  return { backend, status: 'ok', items: ranked, durationMs: 1 };
}

test('a single list keeps its order with 1/(k+rank) scores', () => {
  const fused = fuseResults([ok('vector', ['a', 'b', 'c'])]);
  assert.deepEqual(fused.entries.map((e) => [e.id, e.score, e.rank]), [
    ['a', 1 / 61, 1],
    ['b', 1 / 62, 2],
    ['c', 1 / 63, 3],
  ]);
});

test('items found by several backends appear once with summed contributions', () => {
  const fused = fuseResults([ok('vector', ['a', 'b']), ok('graph', ['b', 'c'])]);
  assert.deepEqual(fused.entries.map((e) => e.id), ['b', 'a', 'c']);
  const b = fused.byId.get('b');
  assert.equal(b?.score, 1 / 62 + 1 / 61);
  assert.deepEqual(b?.backends, ['vector', 'graph']);
  assert.equal(fused.byId.size, 3);
});

test('repeated lists from one backend count only its best rank', () => {
  const fused = fuseResults([ok('vector', ['a', 'b']), ok('vector', ['b', 'a'])]);
  assert.deepEqual(fused.entries.map((e) => [e.id, e.score]), [
    ['a', 1 / 61],
    ['b', 1 / 61],
  ]);
  assert.deepEqual(fused.byId.get('b')?.backends, ['vector']);
});

test('score ties go to the backend listed first in the plan', () => {
  assert.deepEqual(fuseResults([ok('vector', ['a']), ok('graph', ['b'])]).entries.map((e) => e.id), ['a', 'b']);
  assert.deepEqual(fuseResults([ok('graph', ['b']), ok('vector', ['a'])]).entries.map((e) => e.id), ['b', 'a']);
});

test('ties within one backend fall back to rank then id', () => {
  const fused = fuseResults([ok('vector', ['x', 'y']), ok('graph', ['y', 'x'])]);
  assert.deepEqual(fused.entries.map((e) => e.id), ['x', 'y']);
});

test('appearing in one more backend never lowers an item score', () => {
  const before = fuseResults([ok('vector', ['a', 'b', 'c'])]).byId.get('c')?.score ?? 0;
  const after = fuseResults([ok('vector', ['a', 'b', 'c']), ok('metadata', ['d', 'e', 'f', 'c'])]).byId.get('c')?.score ?? 0;
  assert.ok(after > before);
  assert.equal(after, 1 / 63 + 1 / 64);
});

test('moving an item up within one backend never lowers its fused score', () => {
  const graph = ok('graph', ['c', 'x']);
  const scores = [['a', 'b', 'c'], ['a', 'c', 'b'], ['c', 'a', 'b']].map(
    (order) => fuseResults([ok('vector', order), graph]).byId.get('c')?.score ?? 0
  );
  assert.deepEqual(scores, [1 / 63 + 1 / 61, 1 / 62 + 1 / 61, 1 / 61 + 1 / 61]);
  for (let i = 1; i < scores.length; i++) assert.ok((scores[i] ?? 0) >= (scores[i - 1] ?? 0));
});

test('payload fields missing on the first sighting are filled from later ones', () => {
  const fused = fuseResults([
    ok('vector', [{ id: 'a', score: 0.9, snippet: 'chunk text', metadata: { year: 2010 } }]),
    ok('graph', [{ id: 'a', score: 3, title: 'Dissociation revisited', metadata: { year: 1999, via: 'Spiegel' } }]),
  ]);
  const item = fused.byId.get('a')?.item;
  assert.equal(item?.title, 'Dissociation revisited');
  assert.equal(item?.snippet, 'chunk text');
  assert.deepEqual(item?.metadata, { year: 2010, via: 'Spiegel' });
  assert.equal(item?.score, 0.9);
});

test('error results contribute nothing and the constant k is configurable', () => {
  const failed: BackendResult = {
    backend: 'graph',
    status: 'error',
    items: [],
    durationMs: 3,
    error: { kind: 'failed', message: 'down' },
  };
  const fused = fuseResults([failed, ok('vector', ['a'])], { k: 10 });
  assert.deepEqual(fused.entries.map((e) => [e.id, e.score]), [['a', 1 / 11]]);
  assert.equal(rrfContribution(1, 10), 1 / 11);
});

test('fusing nothing yields an empty frozen result', () => {
  const fused = fuseResults([]);
  assert.equal(fused.entries.length, 0);
  assert.ok(Object.isFrozen(fused.entries));
  assert.equal(emptyFused().byId.size, 0);
});
