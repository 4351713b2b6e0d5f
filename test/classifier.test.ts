import test from 'node:test';
import assert from 'node:assert/strict';
import { classifyIntent, DEFAULT_INTENT_RULES, type IntentRule } from '../src/core/retrieval/classifier';
import {
  extractAuthor,
  extractConcept,
  extractPaperId,
  extractYears,
  mergeParams,
  sanitizeParams,
} from '../src/core/retrieval/params';

test('citation phrasing classifies as citation', () => {
  const res = classifyIntent('papers citing the attention paper');
  assert.equal(res.intent, 'citation');
  assert.equal(res.confidence, 0.9);
});

test('influence phrasing classifies as influence', () => {
  const res = classifyIntent('most influential papers on memory');
  assert.equal(res.intent, 'influence');
  assert.equal(res.confidence, 0.9);
});

test('content similarity wins over relationship when both match', () => {
  const res = classifyIntent('show papers similar to SPG2013B that are connected to it');
  assert.equal(res.intent, 'content-similarity');
  assert.equal(res.confidence, 0.85);
  assert.deepEqual(res.params, { paperId: 'SPG2013B' });
});

test('collaboration extracts the author', () => {
  const res = classifyIntent('who collaborated with Spiegel');
  assert.deepEqual(res, { intent: 'collaboration', confidence: 0.9, params: { author: 'Spiegel' } });
});

test('temporal phrasing extracts years and the concept', () => {
  const res = classifyIntent('How did dissociation evolve from 2010 to 2024');
  assert.equal(res.intent, 'temporal');
  assert.equal(res.confidence, 0.85);
  assert.deepEqual(res.params, {
    years: [2010, 2024],
    yearRange: { start: 2010, end: 2024 },
    concept: 'dissociation',
  });
});

test('concept network phrasing extracts a multi-word concept', () => {
  const res = classifyIntent('concepts related to working memory');
  assert.equal(res.intent, 'concept-network');
  assert.deepEqual(res.params, { concept: 'working memory' });
});

test('venue phrasing classifies as venue', () => {
  const res = classifyIntent('which journals publish dissociation research');
  assert.equal(res.intent, 'venue');
  assert.equal(res.confidence, 0.8);
});

test('relationship phrasing classifies as relationship', () => {
  const res = classifyIntent('relationship between trauma and memory');
  assert.equal(res.intent, 'relationship');
  assert.equal(res.confidence, 0.9);
  assert.deepEqual(res.params, {});
});

test('metadata phrasing keeps apostrophes in author names', () => {
  const res = classifyIntent("papers by O'Brien published in 2018");
  assert.equal(res.intent, 'metadata');
  assert.equal(res.confidence, 0.8);
  assert.deepEqual(res.params, { author: "O'Brien", years: [2018] });
});

test('author names keep lowercase particles', () => {
  assert.equal(extractAuthor('work by van der Waals'), 'van der Waals');
  assert.equal(classifyIntent('work by van der Waals').intent, 'metadata');
});

test('unmatched text falls back to semantic at 0.7', () => {
  assert.deepEqual(classifyIntent('neural basis of emotion regulation'), {
    intent: 'semantic',
    confidence: 0.7,
    params: {},
  });
});

test('classification is deterministic', () => {
  const text = 'How did dissociation evolve from 2010 to 2024';
  assert.deepEqual(classifyIntent(text), classifyIntent(text));
});

test('custom rule lists are honoured in order', () => {
  const rules: IntentRule[] = [
    { intent: 'venue', confidence: 0.5, patterns: [/\bmemory\b/] },
    ...DEFAULT_INTENT_RULES,
  ];
  assert.deepEqual(classifyIntent('most influential papers on memory', rules), {
    intent: 'venue',
    confidence: 0.5,
    params: {},
  });
});

test('years are whole four-digit values inside 1900-2099', () => {
  assert.deepEqual(extractYears('dissociation evolved from 2010 to 2024'), [2010, 2024]);
  assert.deepEqual(extractYears('between 1899 and 2100'), []);
});

test('concept extraction stops before evolution verbs', () => {
  assert.equal(extractConcept('research on dissociation evolved from 2010'), 'dissociation');
  assert.equal(extractConcept('papers about the default mode network'), 'default mode network');
});

test('paper ids need eight upper-case characters with a digit and a letter', () => {
  assert.equal(extractPaperId('details for SPG2013B please'), 'SPG2013B');
  assert.equal(extractPaperId('ABCDEFGH'), undefined);
  assert.equal(extractPaperId('12345678'), undefined);
});

test('sanitizeParams drops malformed fields and keeps the rest', () => {
  const out = sanitizeParams({
    author: ' ',
    paperId: 'bad id!',
    concept: 'trauma',
    years: [1850, 2015],
    yearRange: { start: 2020, end: 2010 },
  });
  assert.deepEqual(out, { concept: 'trauma', years: [2015] });
});

test('mergeParams lets supplied values win', () => {
  const merged = mergeParams({ author: 'Spiegel', concept: 'trauma' }, { author: 'Lanius', paperId: undefined });
  assert.deepEqual(merged, { author: 'Lanius', concept: 'trauma' });
});
