import { Command } from 'commander';
import { errorMessage } from '@greenhouse-source/core';
import { createSource } from '../lib/connector';
import { emitToStdout, protocolLogger } from '../lib/output';

export const checkCommand = new Command('check')
  .description('Check that the API key can read at least one endpoint')
  .option('-c, --config <file>', 'Connector config JSON file ({ "api_key": "..." })')
  .action(async (options: { config?: string }) => {
    try {
      const source = await createSource(options, protocolLogger());
      const connectionStatus = await source.check();
      emitToStdout({ type: 'CONNECTION_STATUS', connectionStatus });
    } catch (error) {
      // Config problems are reported as a failed check, not a crash
      emitToStdout({
        type: 'CONNECTION_STATUS',
        connectionStatus: { status: 'FAILED', message: errorMessage(error) }
      });
    }
  });
