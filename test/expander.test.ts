import test from 'node:test';
import assert from 'node:assert/strict';
import { defaultOrchestratorConfig } from '../src/core/config';
import { expandQuery, shouldExpandQuery } from '../src/core/retrieval/expander';

const expansion = defaultOrchestratorConfig().expansion;

test('short queries get two related terms per matched concept', () => {
  assert.deepEqual(expandQuery('dissociation', expansion), {
    text: 'dissociation depersonalization derealization',
    added: ['depersonalization', 'derealization'],
  });
});

test('terms already present in the query are skipped', () => {
  assert.deepEqual(expandQuery('working memory', expansion), {
    text: 'working memory episodic memory',
    added: ['episodic memory'],
  });
});

test('every matched concept contributes in vocabulary order', () => {
  assert.deepEqual(expandQuery('trauma memory', expansion).added, [
    'working memory',
    'episodic memory',
    'PTSD',
    'post-traumatic stress',
  ]);
});

test('long, quoted and boolean queries are left alone', () => {
  for (const q of ['memory in older adults after sleep', '"dissociation"', 'trauma AND sleep']) {
    assert.equal(shouldExpandQuery(q, expansion), false, q);
    assert.deepEqual(expandQuery(q, expansion), { text: q, added: [] });
  }
});

test('queries without vocabulary terms or with expansion disabled are unchanged', () => {
  assert.deepEqual(expandQuery('emotion regulation', expansion), { text: 'emotion regulation', added: [] });
  assert.deepEqual(expandQuery('dissociation', { ...expansion, enabled: false }), { text: 'dissociation', added: [] });
});
