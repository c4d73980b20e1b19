/**
 * Connector config and catalog loading
 *
 * Files are validated with the core zod schemas. The API key falls back to the
 * stored settings and then the environment when no config file is given.
 */

import { readFile } from 'fs/promises';
import type { ZodError } from 'zod';
import {
  ConfigError,
  ConfiguredCatalogSchema,
  ConnectorConfigSchema,
  errorMessage,
  type ConfiguredCatalog,
  type ConnectorConfig
} from '@greenhouse-source/core';

export const API_KEY_ENV = 'GREENHOUSE_API_KEY';

export interface ConfigSources {
  configPath?: string;
  storedApiKey?: string;
  env?: NodeJS.ProcessEnv;
}

function describeIssues(error: ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export async function readJsonFile(path: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Could not read ${path}: ${errorMessage(error)}`);
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Could not parse ${path}: ${errorMessage(error)}`);
  }
}

export function parseConnectorConfig(raw: unknown): ConnectorConfig {
  const parsed = ConnectorConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid connector config: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function parseConfiguredCatalog(raw: unknown): ConfiguredCatalog {
  const parsed = ConfiguredCatalogSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid catalog: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

export async function resolveConnectorConfig(sources: ConfigSources): Promise<ConnectorConfig> {
  if (sources.configPath) {
    return parseConnectorConfig(await readJsonFile(sources.configPath));
  }

  const apiKey = sources.storedApiKey || (sources.env ?? process.env)[API_KEY_ENV];
  if (!apiKey) {
    throw new ConfigError(
      `No API key configured. Pass --config <file>, run "greenhouse-source config set apiKey <key>" or set ${API_KEY_ENV}`
    );
  }
  return parseConnectorConfig({ api_key: apiKey });
}

export async function loadConfiguredCatalog(path: string): Promise<ConfiguredCatalog> {
  return parseConfiguredCatalog(await readJsonFile(path));
}
