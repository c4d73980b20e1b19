import { Command } from 'commander';
import { errorMessage } from '@greenhouse-source/core';
import { createSource } from '../lib/connector';
import { emitToStdout, protocolLogger } from '../lib/output';

export const discoverCommand = new Command('discover')
  .description('Print the catalog of streams the API key can read')
  .option('-c, --config <file>', 'Connector config JSON file')
  .action(async (options: { config?: string }) => {
    const logger = protocolLogger();
    try {
      const source = await createSource(options, logger);
      emitToStdout({ type: 'CATALOG', catalog: await source.discover() });
    } catch (error) {
      logger.error(`Discover failed: ${errorMessage(error)}`);
      // exitCode rather than exit() so buffered stdout is flushed
      process.exitCode = 1;
    }
  });
