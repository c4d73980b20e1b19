/**
 * Access prober
 *
 * Harvest API keys carry per-endpoint permissions. Before listing streams or
 * reporting health, every catalog entity is read once; a 403 marks it as
 * forbidden, anything else stops the probe.
 */

import type { EntityCatalog } from '../catalog/entities';
import { errorMessage, isForbiddenError } from '../errors';
import { silentLogger, type Logger } from '../logger';
import type { ResourceDirectory } from './accessor';

export const NO_PERMISSIONS_MESSAGE =
  'Your API Key does not have permission for any existing endpoints. Please grant read permissions for required streams/endpoints';

export interface HealthCheckResult {
  alive: boolean;
  message: string | null;
}

export class AccessProber {
  constructor(
    private readonly catalog: EntityCatalog,
    private readonly directory: ResourceDirectory,
    private readonly logger: Logger = silentLogger
  ) {}

  async probe(entity: string): Promise<boolean> {
    const { resource } = this.catalog.resolve(entity);
    try {
      await this.directory.open(resource).get();
      return true;
    } catch (error) {
      this.logger.warn(`Endpoint '${entity}' error: ${errorMessage(error)}`);
      if (isForbiddenError(error)) {
        return false;
      }
      throw error;
    }
  }

  async getAccessibleEndpoints(): Promise<string[]> {
    const accessible: string[] = [];
    for (const entity of this.catalog.names) {
      if (await this.probe(entity)) {
        accessible.push(entity);
      }
    }
    this.logger.info(`API key has access to ${accessible.length} endpoints: ${accessible.join(', ')}`);
    return accessible;
  }

  async healthCheck(): Promise<HealthCheckResult> {
    try {
      const accessible = await this.getAccessibleEndpoints();
      if (accessible.length === 0) {
        return { alive: false, message: NO_PERMISSIONS_MESSAGE };
      }
      return { alive: true, message: null };
    } catch (error) {
      return { alive: false, message: errorMessage(error) };
    }
  }

  async filterStreams<T extends { name: string }>(declared: Iterable<T>): Promise<T[]> {
    const accessible = new Set(await this.getAccessibleEndpoints());
    return [...declared].filter(stream => accessible.has(stream.name));
  }
}
