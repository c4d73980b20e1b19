/**
 * Read Command
 *
 * Streams every record of the configured streams to stdout, one JSON message
 * per line, in catalog order.
 */

import { Command } from 'commander';
import { errorMessage } from '@greenhouse-source/core';
import { createSource } from '../lib/connector';
import { emitToStdout, protocolLogger } from '../lib/output';
import { loadConfiguredCatalog } from '../lib/source-config';

export const readCommand = new Command('read')
  .description('Extract records for the configured streams')
  .requiredOption('--catalog <file>', 'Configured catalog JSON file')
  .option('-c, --config <file>', 'Connector config JSON file')
  .action(async (options: { catalog: string; config?: string }) => {
    const logger = protocolLogger();
    try {
      const catalog = await loadConfiguredCatalog(options.catalog);
      const source = await createSource(options, logger);

      for await (const message of source.read(catalog)) {
        emitToStdout(message);
      }
    } catch (error) {
      logger.error(`Read failed: ${errorMessage(error)}`);
      process.exitCode = 1;
    }
  });
