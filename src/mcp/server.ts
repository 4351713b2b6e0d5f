import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import fs from 'fs-extra';
import path from 'path';
import os from 'os';
import { createLogger } from '../core/log';
import { errorMessage } from '../core/errors';
import type { ResearchOrchestrator } from '../core/orchestrator';
import { readVersionFromPackageJson } from '../core/version';
import type { ToolRegistry } from './registry';
import { createToolRegistry } from './tools';
import type { ToolContext } from './types';

export interface ScholarMcpServerOptions {
  disableAccessLog?: boolean;
  /** Directory for mcp-access.log; defaults to ~/.scholarmux/logs. */
  logDir?: string;
}

const log = createLogger({ component: 'mcp' });

export function accessLogDisabledByEnv(env: NodeJS.ProcessEnv = process.env): boolean {
  const v = env.SCHOLARMUX_DISABLE_MCP_ACCESS_LOG;
  return v === 'true' || v === '1';
}

export class ScholarMcpServer {
  private server: Server;
  private registry: ToolRegistry;
  private context: ToolContext;
  private options: ScholarMcpServerOptions;

  constructor(orchestrator: ResearchOrchestrator, options: ScholarMcpServerOptions = {}) {
    this.options = options;
    this.registry = createToolRegistry();
    this.context = { orchestrator, options: { disableAccessLog: options.disableAccessLog } };
    this.server = new Server(
      { name: 'scholarmux', version: readVersionFromPackageJson() },
      { capabilities: { tools: {} } }
    );
    this.setupHandlers();
  }

  private async writeAccessLog(name: string, args: unknown, duration: number, ok: boolean) {
    if (this.options.disableAccessLog || accessLogDisabledByEnv()) return;

    try {
      const logDir = this.options.logDir ?? path.join(os.homedir(), '.scholarmux', 'logs');
      await fs.ensureDir(logDir);
      const logFile = path.join(logDir, 'mcp-access.log');
      const entry = {
        ts: new Date().toISOString(),
        tool: name,
        duration_ms: duration,
        ok,
        args: JSON.stringify(args).slice(0, 1000),
      };
      await fs.appendFile(logFile, JSON.stringify(entry) + '\n', 'utf-8');
    } catch (e) {
      log.warn('access_log_failed', { err: errorMessage(e) });
    }
  }

  /** Runs one tool call and records it; exposed for in-process callers. */
  async callTool(name: string, args: unknown) {
    const startedAt = Date.now();
    const response = await this.registry.execute(name, args, this.context);
    const ok = !response.isError;
    log.info('tool_call', { tool: name, ok, duration_ms: Date.now() - startedAt });
    await this.writeAccessLog(name, args, Date.now() - startedAt, ok);
    return response;
  }

  listTools() {
    return this.registry.listTools();
  }

  private setupHandlers() {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: this.listTools() }));
    this.server.setRequestHandler(CallToolRequestSchema, async (request) =>
      this.callTool(request.params.name, request.params.arguments ?? {})
    );
  }

  async start() {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    log.info('server_started', { transport: 'stdio', tools: this.registry.listTools().length });
  }
}
