/**
 * @greenhouse-source/core
 *
 * Entity catalog, paginated traversal and access probing for the
 * Greenhouse Harvest API.
 */

export * from './schemas';
export * from './errors';
export { silentLogger, type Logger, type LogMethod } from './logger';

// Catalog
export {
  ENTITIES,
  EntityCatalog,
  describeEntity,
  splitEntityName,
  type EntityName,
  type EntityDescriptor,
  type RootEntity,
  type NestedEntity
} from './catalog/entities';

// Harvest transport
export { HarvestClient, parseNextLink, type FetchLike, type HarvestClientOptions } from './harvest/client';
export { HarvestResource, type Page, type PageFetcher } from './harvest/resource';
export { DEFAULT_BASE_URL, DIRECT_ENDPOINTS, RELATED_ENDPOINTS } from './harvest/endpoints';

// Traversal and probing
export type { ResourceAccessor, ResourceDirectory } from './sync/accessor';
export { RecordStream, paginate, collect, DEFAULT_ITEMS_PER_PAGE } from './sync/paginator';
export { AccessProber, NO_PERMISSIONS_MESSAGE, type HealthCheckResult } from './sync/prober';

// Connector
export { GreenhouseSource, type GreenhouseSourceOptions } from './source';
export { describeStream } from './streams';
