import test from 'node:test';
import assert from 'node:assert/strict';
import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import { ErrorCode, LibraryError } from '../src/core/errors';
import { LibraryCorpus, libraryAdapters, openLibrary } from '../src/core/library';
import type { GraphRecord } from '../src/core/backends/types';

const LIBRARY = path.join(__dirname, 'fixtures', 'library.json');

function ids(records: GraphRecord[]): string[] {
  return records.map((r) => (r.kind === 'item' ? r.item.id : r.name));
}

function rejectsWith(code: ErrorCode) {
  return (e: unknown) => {
    assert.ok(e instanceof LibraryError);
    assert.equal(e.code, code);
    return true;
  };
}

test('loading a missing library file fails with LIBRARY_NOT_FOUND', async () => {
  await assert.rejects(LibraryCorpus.load(path.join(os.tmpdir(), 'scholarmux-missing', 'none.json')), rejectsWith(ErrorCode.LIBRARY_NOT_FOUND));
});

test('unreadable or invalid library files fail with LIBRARY_INVALID', async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'scholarmux-library-'));
  const broken = path.join(dir, 'broken.json');
  await fs.writeFile(broken, '{ "papers": [');
  await assert.rejects(LibraryCorpus.load(broken), rejectsWith(ErrorCode.LIBRARY_INVALID));

  const untitled = path.join(dir, 'untitled.json');
  await fs.writeJSON(untitled, { papers: [{ id: 'NOTITLE1' }] });
  await assert.rejects(LibraryCorpus.load(untitled), rejectsWith(ErrorCode.LIBRARY_INVALID));
});

test('duplicate paper ids are rejected', () => {
  assert.throws(
    () => LibraryCorpus.fromInput([{ id: 'DUP00001', title: 'One' }, { id: 'DUP00001', title: 'Two' }]),
    rejectsWith(ErrorCode.LIBRARY_INVALID)
  );
});

test('citation chains walk citing papers breadth-first', async () => {
  const { graph } = await openLibrary(LIBRARY);
  const records = await graph.query('citation', { paperId: 'SPG2010A' }, 10);
  assert.deepEqual(ids(records), ['LAN2016C', 'SPG2013B', 'VER2019D', 'FRE2024E']);
  const last = records[3];
  assert.ok(last?.kind === 'item');
  assert.deepEqual(last.details, { hops: 2, path: ['SPG2010A', 'LAN2016C', 'FRE2024E'] });

  const oneHop = await graph.query('citation', { paperId: 'SPG2010A', maxHops: 1 }, 10);
  assert.deepEqual(ids(oneHop), ['LAN2016C', 'SPG2013B', 'VER2019D']);
});

test('the citation source can be resolved from free text', async () => {
  const { graph } = await openLibrary(LIBRARY);
  const records = await graph.query('citation', { query: 'dissociation and trauma clinical review', maxHops: 1 }, 10);
  assert.deepEqual(ids(records), ['LAN2016C', 'SPG2013B', 'VER2019D']);
});

test('influence ranks papers by citation count', async () => {
  const { graph } = await openLibrary(LIBRARY);
  assert.deepEqual(ids(await graph.query('influence', {}, 10)), ['SPG2010A', 'SPG2013B', 'LAN2016C', 'MEM2015F']);
});

test('collaboration expands co-authors hop by hop', async () => {
  const { graph } = await openLibrary(LIBRARY);
  const direct = await graph.query('collaboration', { author: 'Spiegel' }, 10);
  assert.deepEqual(ids(direct), ['Eric Vermetten', 'Richard Loewenstein', 'Ruth Lanius']);

  const twoHops = await graph.query('collaboration', { author: 'Spiegel', maxHops: 2 }, 10);
  assert.deepEqual(ids(twoHops), ['Eric Vermetten', 'Richard Loewenstein', 'Ruth Lanius', 'Paul Frewen', 'Onno van der Hart']);
  const frewen = twoHops[3];
  assert.ok(frewen?.kind === 'entity');
  assert.equal(frewen.score, 1);
  assert.deepEqual(frewen.relatedItems.map((i) => i.id), ['LAN2016C', 'FRE2024E']);
});

test('concept networks rank co-occurring concepts', async () => {
  const { graph } = await openLibrary(LIBRARY);
  const records = await graph.query('concept-network', { concept: 'dissociation' }, 10);
  assert.deepEqual(ids(records), ['neuroimaging', 'PTSD', 'depersonalization', 'development', 'hypnosis', 'trauma']);
});

test('temporal queries list matching papers by year inside the range', async () => {
  const { graph } = await openLibrary(LIBRARY);
  const records = await graph.query('temporal', { concept: 'dissociation', yearRange: { start: 2013, end: 2019 } }, 10);
  assert.deepEqual(ids(records), ['SPG2013B', 'LAN2016C', 'VER2019D']);
});

test('venue queries group papers by venue', async () => {
  const { graph } = await openLibrary(LIBRARY);
  const [top] = await graph.query('venue', {}, 10);
  assert.ok(top?.kind === 'entity');
  assert.equal(top.name, 'Journal of Trauma and Dissociation');
  assert.equal(top.score, 3);

  const neuro = await graph.query('venue', { field: 'neuroscience' }, 10);
  assert.deepEqual(ids(neuro), ['Journal of Trauma and Dissociation', 'Nature Neuroscience']);
});

test('related papers score shared authors, concepts and citation links', async () => {
  const { graph } = await openLibrary(LIBRARY);
  const records = await graph.query('related', { paperId: 'SPG2013B' }, 10);
  assert.deepEqual(ids(records), ['LAN2016C', 'SPG2010A', 'FRE2024E', 'VER2019D']);
  assert.deepEqual(
    records.map((r) => (r.kind === 'item' ? r.item.score : 0)),
    [5, 5, 4, 3]
  );
});

test('entity search matches authors, concepts and titles', async () => {
  const { graph } = await openLibrary(LIBRARY);
  assert.deepEqual(ids(await graph.query('comprehensive', { query: 'hypnosis' }, 10)), ['VER2019D']);
  assert.deepEqual(await graph.query('comprehensive', { query: 'the of' }, 10), []);
});

test('graph results honour the limit', async () => {
  const { graph } = await openLibrary(LIBRARY);
  assert.equal((await graph.query('influence', {}, 2)).length, 2);
});

test('metadata search filters by author and sorts newest first', async () => {
  const { metadata } = await openLibrary(LIBRARY);
  const byAuthor = await metadata.search({ author: 'Gathercole' }, 10);
  assert.deepEqual(byAuthor.map((i) => i.id), ['MEM2021G', 'MEM2015F']);
});

test('metadata search ranks free text by token overlap', async () => {
  const { metadata } = await openLibrary(LIBRARY);
  const res = await metadata.search({ text: 'sleep memory' }, 10);
  assert.deepEqual(res.map((i) => [i.id, i.score]), [
    ['MEM2021G', 2],
    ['MEM2015F', 1],
  ]);
});

test('metadata search combines venue and year range filters', async () => {
  const { metadata } = await openLibrary(LIBRARY);
  const res = await metadata.search({ venue: 'journal of trauma', yearRange: { start: 2014, end: 2020 } }, 10);
  assert.deepEqual(res.map((i) => i.id), ['LAN2016C']);
});

test('vector search finds the paper sharing a rare term and ignores empty text', async () => {
  const { vector } = await openLibrary(LIBRARY);
  const res = await vector.search('hypnotizability', 3);
  assert.equal(res[0]?.id, 'VER2019D');
  assert.deepEqual(await vector.search('', 3), []);
});

test('documents expose records, chunks and full text', async () => {
  const corpus = await LibraryCorpus.load(LIBRARY);
  const { documents } = libraryAdapters(corpus);

  const record = await documents.getItem('SPG2010A');
  assert.equal(record?.title, 'Dissociation and trauma: a clinical review');
  assert.deepEqual(record?.authors, ['David Spiegel', 'Richard Loewenstein']);
  assert.equal(await documents.getItem('UNKNOWN1'), null);

  assert.equal(await documents.getFullText('SPG2010A'), 'Dissociation and trauma. Full text of the clinical review.');
  assert.equal(
    await documents.getFullText('SPG2013B'),
    'Neuroimaging shows increased prefrontal inhibition of limbic regions in the dissociative subtype.\n\n' +
      'Symptom clusters separate patients with depersonalization from other PTSD presentations.'
  );
  assert.equal(await documents.getFullText('LAN2016C'), null);

  assert.deepEqual(await documents.searchChunks('LAN2016C', 'depersonalization', 3), []);
  const [best] = await documents.searchChunks('SPG2010A', 'methodology structured interviews scales', 1);
  assert.equal(best?.index, 1);
  assert.equal(best?.itemId, 'SPG2010A');
});
