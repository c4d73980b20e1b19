#!/usr/bin/env node
import { Command } from 'commander';
import { specCommand } from './commands/spec';
import { checkCommand } from './commands/check';
import { discoverCommand } from './commands/discover';
import { readCommand } from './commands/read';
import { entitiesCommand } from './commands/entities';
import { configCommand } from './commands/config';

const program = new Command();

program
  .name('greenhouse-source')
  .description('Extract recruiting records from the Greenhouse Harvest API')
  .version('0.1.0');

// Connector operations (JSON lines on stdout)
program.addCommand(specCommand);
program.addCommand(checkCommand);
program.addCommand(discoverCommand);
program.addCommand(readCommand);

// Human-readable helpers
program.addCommand(entitiesCommand);
program.addCommand(configCommand);

program.parseAsync().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
