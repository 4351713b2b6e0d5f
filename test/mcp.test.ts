import test from 'node:test';
import assert from 'node:assert/strict';
import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { ResearchOrchestrator } from '../src/core/orchestrator';
import { accessLogDisabledByEnv, ScholarMcpServer } from '../src/mcp/server';
import { createToolRegistry } from '../src/mcp/tools';
import type { ToolContext } from '../src/mcp/types';

const LIBRARY = path.join(__dirname, 'fixtures', 'library.json');

function body(res: CallToolResult): Record<string, unknown> {
  const first = res.content[0];
  assert.ok(first && first.type === 'text');
  const parsed: unknown = JSON.parse(first.text);
  assert.ok(typeof parsed === 'object' && parsed !== null);
  return Object.fromEntries(Object.entries(parsed));
}

function errorOf(res: CallToolResult): Record<string, unknown> {
  const err = body(res).error;
  assert.ok(typeof err === 'object' && err !== null);
  return Object.fromEntries(Object.entries(err));
}

async function context(): Promise<ToolContext> {
  return { orchestrator: await ResearchOrchestrator.fromLibrary(LIBRARY), options: { disableAccessLog: true } };
}

test('the registry lists the research tools', () => {
  const tools = createToolRegistry().listTools();
  assert.deepEqual(tools.map((t) => t.name), ['search', 'summarize', 'explore']);
  assert.deepEqual(tools[0]?.inputSchema.required, ['query']);
});

test('unknown tools return TOOL_NOT_FOUND', async () => {
  const res = await createToolRegistry().execute('rerank', {}, await context());
  assert.equal(res.isError, true);
  assert.equal(errorOf(res).code, 'TOOL_NOT_FOUND');
  assert.equal(errorOf(res).message, "Tool 'rerank' not found");
});

test('invalid arguments return VALIDATION_ERROR', async () => {
  const res = await createToolRegistry().execute('search', { limit: 5 }, await context());
  assert.equal(res.isError, true);
  assert.equal(errorOf(res).code, 'VALIDATION_ERROR');
  assert.equal(errorOf(res).message, 'Validation failed: query: Required');
});

test('search calls return the fused response', async () => {
  const server = new ScholarMcpServer(await ResearchOrchestrator.fromLibrary(LIBRARY), { disableAccessLog: true });
  const res = await server.callTool('search', { query: 'who collaborated with Spiegel', limit: 2 });
  assert.equal(res.isError, undefined);
  const data = body(res);
  assert.equal(data.ok, true);
  assert.equal(data.mode, 'collaboration');
  assert.deepEqual(data.backendsUsed, ['graph']);
});

test('summarize failures carry the error code and details', async () => {
  const server = new ScholarMcpServer(await ResearchOrchestrator.fromLibrary(LIBRARY), { disableAccessLog: true });
  const res = await server.callTool('summarize', { item_id: 'MISSING1' });
  assert.equal(res.isError, true);
  const err = errorOf(res);
  assert.equal(err.code, 'SUMMARIZE_FAILED');
  assert.equal(err.message, 'No item found with id MISSING1');
  assert.deepEqual(err.details, { itemId: 'MISSING1', depth: 'quick', confidence: 1 });
});

test('tool calls are appended to the access log', async () => {
  const logDir = await fs.mkdtemp(path.join(os.tmpdir(), 'scholarmux-mcp-'));
  const server = new ScholarMcpServer(await ResearchOrchestrator.fromLibrary(LIBRARY), { logDir });
  await server.callTool('explore', { mode: 'influence' });

  const lines = (await fs.readFile(path.join(logDir, 'mcp-access.log'), 'utf-8')).trim().split('\n');
  assert.equal(lines.length, 1);
  const entry: unknown = JSON.parse(lines[0] ?? '');
  assert.ok(typeof entry === 'object' && entry !== null);
  const fields = Object.fromEntries(Object.entries(entry));
  assert.equal(fields.tool, 'explore');
  assert.equal(fields.ok, true);
  assert.equal(fields.args, '{"mode":"influence"}');
});

test('the access log can be disabled from the environment', () => {
  assert.equal(accessLogDisabledByEnv({ SCHOLARMUX_DISABLE_MCP_ACCESS_LOG: '1' }), true);
  assert.equal(accessLogDisabledByEnv({ SCHOLARMUX_DISABLE_MCP_ACCESS_LOG: 'true' }), true);
  assert.equal(accessLogDisabledByEnv({}), false);
});
