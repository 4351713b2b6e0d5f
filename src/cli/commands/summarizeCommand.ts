import { Command } from 'commander';
import { executeHandler } from '../types';

export const summarizeCommand = new Command('summarize')
  .description('Summarize one paper at a depth picked from the question')
  .argument('<itemId>', 'Paper id')
  .option('-q, --query <question>', 'Question about the paper')
  .option('-d, --depth <depth>', 'Force a depth: quick|targeted|comprehensive|full')
  .option('-l, --library <file>', 'Library JSON file')
  .option('-c, --config <file>', 'Config file (default: ./scholarmux.config.json)')
  .action(async (itemId, options) => {
    await executeHandler('summarize', { itemId, ...options });
  });
