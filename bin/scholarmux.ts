#!/usr/bin/env node
import { Command } from 'commander';
import { readVersionFromPackageJson } from '../src/core/version';
import { searchCommand } from '../src/cli/commands/searchCommand';
import { summarizeCommand } from '../src/cli/commands/summarizeCommand';
import { exploreCommand } from '../src/cli/commands/exploreCommand';
import { serveCommand } from '../src/cli/commands/serveCommands';

function main() {
  const program = new Command();
  program
    .name('scholarmux')
    .description('scholarmux: research queries routed across vector, graph and metadata backends')
    .version(readVersionFromPackageJson(__dirname));

  program.addCommand(searchCommand);
  program.addCommand(summarizeCommand);
  program.addCommand(exploreCommand);
  program.addCommand(serveCommand);
  program.parse(process.argv);
}

main();
