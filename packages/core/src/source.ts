/**
 * Greenhouse source
 *
 * Ties the Harvest client, the entity catalog and the prober together behind
 * the four connector operations: spec, check, discover and read.
 */

import { EntityCatalog } from './catalog/entities';
import { UnknownStreamError } from './errors';
import { HarvestClient, type FetchLike } from './harvest/client';
import { silentLogger, type Logger } from './logger';
import {
  CONNECTOR_SPECIFICATION,
  type Catalog,
  type ConfiguredCatalog,
  type ConnectionStatus,
  type ConnectorConfig,
  type ConnectorSpecification,
  type QueryParams,
  type RecordMessage,
  type StreamDescriptor
} from './schemas';
import { describeStream } from './streams';
import type { ResourceDirectory } from './sync/accessor';
import { paginate, type RecordStream } from './sync/paginator';
import { AccessProber, type HealthCheckResult } from './sync/prober';

export interface GreenhouseSourceOptions {
  logger?: Logger;
  baseUrl?: string;
  fetch?: FetchLike;
  // Replaces the HTTP client entirely; baseUrl and fetch are then ignored
  directory?: ResourceDirectory;
  now?: () => number;
}

export class GreenhouseSource {
  readonly catalog: EntityCatalog;
  private readonly directory: ResourceDirectory;
  private readonly prober: AccessProber;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(config: ConnectorConfig, options: GreenhouseSourceOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
    this.directory = options.directory ?? new HarvestClient({
      apiKey: config.api_key,
      baseUrl: options.baseUrl,
      fetch: options.fetch
    });
    this.catalog = new EntityCatalog(this.directory);
    this.prober = new AccessProber(this.catalog, this.directory, this.logger);
  }

  get entities(): string[] {
    return this.catalog.names;
  }

  /**
   * Lazily lists every record of an entity. For compound names only the
   * innermost records are produced. Nothing is fetched until iteration starts.
   */
  list(name: string, params: QueryParams = {}): RecordStream {
    const entity = this.catalog.resolve(name);
    const root = this.directory.open(entity.resource);
    return paginate(root, entity.kind === 'nested' ? entity.relations : [], params);
  }

  getAccessibleEndpoints(): Promise<string[]> {
    return this.prober.getAccessibleEndpoints();
  }

  healthCheck(): Promise<HealthCheckResult> {
    return this.prober.healthCheck();
  }

  declaredStreams(): StreamDescriptor[] {
    return this.catalog.names.map(describeStream);
  }

  // Declared streams the API key can read, in catalog order
  streams(): Promise<StreamDescriptor[]> {
    return this.prober.filterStreams(this.declaredStreams());
  }

  spec(): ConnectorSpecification {
    return CONNECTOR_SPECIFICATION;
  }

  async check(): Promise<ConnectionStatus> {
    const { alive, message } = await this.healthCheck();
    if (alive) {
      return { status: 'SUCCEEDED' };
    }
    return message === null ? { status: 'FAILED' } : { status: 'FAILED', message };
  }

  async discover(): Promise<Catalog> {
    return { streams: await this.streams() };
  }

  async *read(configured: ConfiguredCatalog): AsyncGenerator<RecordMessage> {
    const names = configured.streams.map(entry => entry.stream.name);
    for (const name of names) {
      if (!this.catalog.has(name)) {
        throw new UnknownStreamError(name, this.catalog.names);
      }
    }

    for (const name of names) {
      this.logger.info(`Syncing stream: ${name}`);
      let count = 0;
      for await (const data of this.list(name)) {
        count += 1;
        yield {
          type: 'RECORD',
          record: { stream: name, data, emitted_at: this.now() }
        };
      }
      this.logger.info(`Read ${count} records from ${name} stream`);
    }
  }
}
