import { Command } from 'commander';
import { CONNECTOR_SPECIFICATION } from '@greenhouse-source/core';
import { emitToStdout } from '../lib/output';

export const specCommand = new Command('spec')
  .description('Print the connection specification')
  .action(() => {
    emitToStdout({ type: 'SPEC', spec: CONNECTOR_SPECIFICATION });
  });
