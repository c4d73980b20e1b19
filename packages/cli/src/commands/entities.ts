import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { errorMessage } from '@greenhouse-source/core';
import { createSource } from '../lib/connector';
import { formatAccessSummary, formatAccessTable } from '../lib/format';
import { consoleLogger, spinnerWriter } from '../lib/output';

export const entitiesCommand = new Command('entities')
  .description('Show every entity and whether the API key can read it')
  .option('-c, --config <file>', 'Connector config JSON file')
  .option('-v, --verbose', 'Also print info and debug lines while probing')
  .action(async (options: { config?: string; verbose?: boolean }) => {
    const spinner = ora('Probing endpoints...').start();

    try {
      const source = await createSource(options, consoleLogger(Boolean(options.verbose), spinnerWriter(spinner)));
      const accessible = await source.getAccessibleEndpoints();

      spinner.stop();
      console.log(formatAccessTable(source.entities, accessible));
      console.log(`\n${formatAccessSummary(accessible.length, source.entities.length)}`);

      if (accessible.length === 0) {
        console.log(chalk.dim('\nGrant read permissions to the API key in Greenhouse: Configure > Dev Center > API Credential Management'));
      }
    } catch (error) {
      spinner.fail('Failed to probe endpoints');
      console.error(chalk.red(errorMessage(error)));
      process.exit(1);
    }
  });
