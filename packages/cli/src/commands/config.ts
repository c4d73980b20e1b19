import { Command } from 'commander';
import chalk from 'chalk';
import { getSettings, isSettingKey, resetSettings, setSetting, settingsPath, SETTING_KEYS } from '../lib/config';

export const configCommand = new Command('config')
  .description('Manage stored connector settings');

configCommand
  .command('show')
  .description('Show current settings')
  .action(() => {
    const settings = getSettings();
    console.log(chalk.bold('\nGreenhouse Source Settings\n'));
    console.log(`    API Key:   ${settings.apiKey ? chalk.green('configured') : chalk.yellow('not set')}`);
    console.log(`    Base URL:  ${settings.baseUrl}`);
    console.log(chalk.dim(`\n    Stored in ${settingsPath()}`));
    console.log('');
  });

configCommand
  .command('set <key> <value>')
  .description('Set a setting')
  .action((key: string, value: string) => {
    if (!isSettingKey(key)) {
      console.error(chalk.red(`Invalid key: ${key}`));
      console.log(`\nValid keys: ${SETTING_KEYS.join(', ')}`);
      process.exit(1);
    }
    setSetting(key, value);
    // Mask the API key in output
    const displayValue = key === 'apiKey' ? value.slice(0, 4) + '...' : value;
    console.log(chalk.green(`Set ${key} = ${displayValue}`));
  });

configCommand
  .command('reset')
  .description('Reset settings to defaults')
  .action(() => {
    resetSettings();
    console.log(chalk.green('Settings reset to defaults'));
  });
