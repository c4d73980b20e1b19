import chalk from 'chalk';
import type { ConnectorMessage, LogLevel, Logger } from '@greenhouse-source/core';

export type Emit = (message: ConnectorMessage) => void;

export const emitToStdout: Emit = message => {
  process.stdout.write(`${JSON.stringify(message)}\n`);
};

// Logs travel on stdout as LOG messages so they interleave with records
export function protocolLogger(emit: Emit = emitToStdout): Logger {
  const log = (level: LogLevel) => (message: string) => emit({ type: 'LOG', log: { level, message } });
  return {
    debug: log('DEBUG'),
    info: log('INFO'),
    warn: log('WARN'),
    error: log('ERROR')
  };
}

export interface SpinnerLike {
  clear(): unknown;
  render(): unknown;
}

// Clears the spinner line around each write so log lines and the spinner do not collide
export function spinnerWriter(spinner: SpinnerLike, write: (line: string) => void = line => console.error(line)) {
  return (line: string): void => {
    spinner.clear();
    write(line);
    spinner.render();
  };
}

export function consoleLogger(verbose = false, write: (line: string) => void = line => console.error(line)): Logger {
  return {
    debug: message => {
      if (verbose) write(chalk.dim(message));
    },
    info: message => {
      if (verbose) write(message);
    },
    warn: message => write(chalk.yellow(message)),
    error: message => write(chalk.red(message))
  };
}
