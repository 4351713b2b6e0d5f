import { Command } from 'commander';
import { executeHandler } from '../types';

export const serveCommand = new Command('serve')
  .description('Start the MCP server over stdio')
  .option('--disable-mcp-log', 'Disable MCP access logging', false)
  .option('-l, --library <file>', 'Library JSON file')
  .option('-c, --config <file>', 'Config file (default: ./scholarmux.config.json)')
  .action(async (options) => {
    await executeHandler('serve', options);
  });
