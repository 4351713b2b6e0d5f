import { Command } from 'commander';
import { executeHandler } from '../types';

export const searchCommand = new Command('search')
  .description('Search the library: classify the query, route it to backends and fuse the ranked results')
  .argument('<text>', 'Query text')
  .option('-n, --limit <n>', 'Maximum number of results')
  .option('-m, --mode <mode>', 'Force a route: fast|semantic|relationship|metadata|citation|influence|content-similarity|collaboration|concept-network|temporal|venue|comprehensive')
  .option('--author <name>', 'Author filter')
  .option('--paper <id>', 'Paper id')
  .option('--start-year <year>', 'First year of the range')
  .option('--end-year <year>', 'Last year of the range')
  .option('--timeout <ms>', 'Overall deadline in milliseconds')
  .option('-l, --library <file>', 'Library JSON file')
  .option('-c, --config <file>', 'Config file (default: ./scholarmux.config.json)')
  .action(async (text, options) => {
    await executeHandler('search', { text, ...options });
  });
