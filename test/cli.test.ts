import test from 'node:test';
import assert from 'node:assert/strict';
import os from 'os';
import path from 'path';
import { z } from 'zod';
import { cliHandlers } from '../src/cli/registry';
import { defineHandler, dispatchHandler, error, success } from '../src/cli/types';
import { formatError } from '../src/cli/helpers';
import { searchParams } from '../src/cli/handlers/searchHandlers';
import { SearchSchema } from '../src/cli/schemas/searchSchemas';
import { ExploreSchema } from '../src/cli/schemas/exploreSchemas';
import { ConfigError, ErrorCode, LibraryError, ScholarError } from '../src/core/errors';

const LIBRARY = path.join(__dirname, 'fixtures', 'library.json');

const EchoSchema = z.object({ word: z.string().min(1) });

const fakeHandlers = {
  echo: defineHandler(EchoSchema, async (input) => success({ echoed: input.word })),
  refuse: defineHandler(EchoSchema, async () => error('no_results', { message: 'nothing here' })),
  explode: defineHandler(EchoSchema, async () => {
    throw new ScholarError('backend melted', ErrorCode.BACKEND_UNAVAILABLE);
  }),
};

test('unknown commands exit 1 with a help hint', async () => {
  const { exitCode, payload } = await dispatchHandler(fakeHandlers, 'missing', {});
  assert.equal(exitCode, 1);
  assert.equal(payload.ok, false);
  assert.equal(payload.command, 'missing');
  assert.equal(payload.hint, 'Run "scholarmux --help" to see available commands');
});

test('successful handlers exit 0 with command metadata', async () => {
  const { exitCode, payload } = await dispatchHandler(fakeHandlers, 'echo', { word: 'hello' });
  assert.equal(exitCode, 0);
  assert.equal(payload.ok, true);
  assert.equal(payload.echoed, 'hello');
  assert.equal(payload.command, 'echo');
  assert.equal(typeof payload.duration_ms, 'number');
  assert.equal(typeof payload.timestamp, 'string');
});

test('handler-reported failures exit 2', async () => {
  const { exitCode, payload } = await dispatchHandler(fakeHandlers, 'refuse', { word: 'hello' });
  assert.equal(exitCode, 2);
  assert.equal(payload.reason, 'no_results');
  assert.equal(payload.message, 'nothing here');
});

test('schema violations become validation errors', async () => {
  const { exitCode, payload } = await dispatchHandler(fakeHandlers, 'echo', { word: '' });
  assert.equal(exitCode, 1);
  assert.equal(payload.reason, 'validation_error');
  assert.equal(payload.hint, 'Check command syntax with --help');
  const errors = payload.errors;
  assert.ok(Array.isArray(errors));
  assert.equal(errors.length, 1);
});

test('thrown errors become internal errors carrying the error code', async () => {
  const { exitCode, payload } = await dispatchHandler(fakeHandlers, 'explode', { word: 'x' });
  assert.equal(exitCode, 1);
  assert.equal(payload.reason, 'internal_error');
  assert.equal(payload.message, 'backend melted');
  assert.equal(payload.code, 'BACKEND_UNAVAILABLE');
});

test('search options coerce numbers and reject unknown modes', () => {
  const parsed = SearchSchema.parse({ text: '  sleep  ', limit: '3', mode: 'fast', startYear: '2010' });
  assert.equal(parsed.text, 'sleep');
  assert.equal(parsed.limit, 3);
  assert.equal(parsed.startYear, 2010);
  assert.equal(SearchSchema.safeParse({ text: 'sleep', mode: 'slow' }).success, false);
  assert.equal(SearchSchema.safeParse({ text: '   ' }).success, false);
});

test('explore options default the text and limit', () => {
  const parsed = ExploreSchema.parse({});
  assert.equal(parsed.text, '');
  assert.equal(parsed.limit, 10);
  assert.equal(parsed.maxHops, undefined);
  assert.equal(ExploreSchema.safeParse({ maxHops: 9 }).success, false);
});

test('search flags map onto query parameters', () => {
  assert.deepEqual(searchParams({ author: 'Lanius', paper: 'SPG2013B', startYear: 2012 }), {
    author: 'Lanius',
    paperId: 'SPG2013B',
    yearRange: { start: 2012, end: undefined },
  });
  assert.deepEqual(searchParams({}), {});
});

test('config and library errors map to their reasons', () => {
  assert.equal(formatError(new ConfigError('bad config')).reason, 'config_invalid');
  assert.equal(formatError(new LibraryError('gone', ErrorCode.LIBRARY_NOT_FOUND)).reason, 'library_not_found');
  assert.equal(formatError(new LibraryError('broken', ErrorCode.LIBRARY_INVALID)).reason, 'library_invalid');
  assert.deepEqual(formatError('odd'), { ok: false, reason: 'internal_error', message: 'odd' });
});

test('search runs against a library file', async () => {
  const { exitCode, payload } = await dispatchHandler(cliHandlers, 'search', {
    text: 'who collaborated with Spiegel',
    limit: '2',
    library: LIBRARY,
  });
  assert.equal(exitCode, 0);
  assert.equal(payload.mode, 'collaboration');
  assert.equal(payload.escalated, false);
});

test('a missing library file is reported as library_not_found', async () => {
  const { exitCode, payload } = await dispatchHandler(cliHandlers, 'search', {
    text: 'sleep',
    library: path.join(os.tmpdir(), 'scholarmux-none', 'library.json'),
  });
  assert.equal(exitCode, 2);
  assert.equal(payload.reason, 'library_not_found');
});

test('summarize failures carry the reason and the suggestion as hint', async () => {
  const { exitCode, payload } = await dispatchHandler(cliHandlers, 'summarize', {
    itemId: 'LAN2016C',
    depth: 'full',
    library: LIBRARY,
  });
  assert.equal(exitCode, 2);
  assert.equal(payload.reason, 'summarize_failed');
  assert.equal(payload.message, 'No full text is available for this paper');
  assert.equal(payload.hint, 'Try --depth quick for the abstract');
  assert.equal(payload.itemId, 'LAN2016C');
});

test('explore renders markdown content', async () => {
  const { exitCode, payload } = await dispatchHandler(cliHandlers, 'explore', {
    mode: 'collaboration',
    author: 'Spiegel',
    library: LIBRARY,
  });
  assert.equal(exitCode, 0);
  assert.equal(payload.mode, 'collaboration');
  assert.equal(payload.itemsFound, 2);
  assert.equal(typeof payload.content, 'string');
});
