/**
 * Error classes shared by the catalog, the HTTP resource and the traversal engine.
 */

export type HarvestErrorKind =
  | 'unauthorized'
  | 'forbidden'
  | 'not_found'
  | 'rate_limited'
  | 'server'
  | 'unexpected';

export function classifyStatus(status: number): HarvestErrorKind {
  if (status === 401) return 'unauthorized';
  if (status === 403) return 'forbidden';
  if (status === 404) return 'not_found';
  if (status === 429) return 'rate_limited';
  if (status >= 500) return 'server';
  return 'unexpected';
}

export class HarvestApiError extends Error {
  readonly kind: HarvestErrorKind;

  constructor(
    message: string,
    readonly status: number,
    readonly url: string
  ) {
    super(message);
    this.name = 'HarvestApiError';
    this.kind = classifyStatus(status);
  }
}

export function isForbiddenError(error: unknown): error is HarvestApiError {
  return error instanceof HarvestApiError && error.kind === 'forbidden';
}

export class EntityResolutionError extends Error {
  constructor(readonly entity: string, reason: string) {
    super(`Cannot resolve entity '${entity}': ${reason}`);
    this.name = 'EntityResolutionError';
  }
}

export class TraversalError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TraversalError';
  }
}

export class UnknownStreamError extends Error {
  constructor(readonly stream: string, available: readonly string[]) {
    super(`The requested stream ${stream} was not found in the source. Available streams: ${available.join(', ')}`);
    this.name = 'UnknownStreamError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
