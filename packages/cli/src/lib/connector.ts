import { GreenhouseSource, type Logger } from '@greenhouse-source/core';
import { getSettings } from './config';
import { resolveConnectorConfig } from './source-config';

export interface SourceCommandOptions {
  config?: string;
}

export async function createSource(options: SourceCommandOptions, logger: Logger): Promise<GreenhouseSource> {
  const settings = getSettings();
  const config = await resolveConnectorConfig({
    configPath: options.config,
    storedApiKey: settings.apiKey
  });
  return new GreenhouseSource(config, { logger, baseUrl: settings.baseUrl });
}
