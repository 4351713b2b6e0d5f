import { Command } from 'commander';
import { executeHandler } from '../types';

export const exploreCommand = new Command('explore')
  .description('Explore citation, collaboration, concept and venue relations')
  .argument('[text]', 'Question about the research graph', '')
  .option('-m, --mode <strategy>', 'Force a strategy: citation|influence|content-similarity|related|collaboration|concept-network|temporal|venue|comprehensive')
  .option('--paper <id>', 'Paper id')
  .option('--author <name>', 'Author name')
  .option('--concept <name>', 'Concept name')
  .option('--field <name>', 'Research field')
  .option('--start-year <year>', 'First year of the range')
  .option('--end-year <year>', 'Last year of the range')
  .option('-n, --limit <n>', 'Maximum number of records', '10')
  .option('--max-hops <n>', 'Traversal depth for citation chains and collaborator networks')
  .option('-l, --library <file>', 'Library JSON file')
  .option('-c, --config <file>', 'Config file (default: ./scholarmux.config.json)')
  .action(async (text, options) => {
    await executeHandler('explore', { text, ...options });
  });
