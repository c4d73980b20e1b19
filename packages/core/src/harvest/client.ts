/**
 * Harvest HTTP client
 *
 * Thin transport over fetch: Basic auth with the API key, Link-header
 * pagination, and typed errors for non-2xx responses. No retries.
 */

import { z } from 'zod';
import { EntityResolutionError, HarvestApiError } from '../errors';
import type { QueryParams } from '../schemas';
import type { ResourceAccessor, ResourceDirectory } from '../sync/accessor';
import { DEFAULT_BASE_URL, DIRECT_ENDPOINTS, RELATED_ENDPOINTS } from './endpoints';
import { HarvestResource, type Page, type PageFetcher } from './resource';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface HarvestClientOptions {
  apiKey: string;
  baseUrl?: string;
  fetch?: FetchLike;
  userAgent?: string;
}

const PageBodySchema = z.array(z.record(z.unknown()));
const ErrorBodySchema = z.object({ message: z.string() }).passthrough();

export function parseNextLink(header: string | null): string | null {
  if (!header) return null;
  // URLs may carry commas in their query, so the header is not split on them
  const match = /<([^>]*)>\s*;\s*rel="?next"?(?=[\s;,]|$)/.exec(header);
  return match ? match[1] : null;
}

async function describeFailure(response: Response): Promise<string> {
  const fallback = `Greenhouse API error: ${response.status} ${response.statusText}`.trim();
  const text = await response.text();
  if (!text) return fallback;
  try {
    const parsed = ErrorBodySchema.safeParse(JSON.parse(text));
    return parsed.success ? parsed.data.message : fallback;
  } catch {
    // Non-JSON error bodies (HTML from a proxy, plain text) keep the status line
    return fallback;
  }
}

export class HarvestClient implements ResourceDirectory, PageFetcher {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;
  private readonly headers: Record<string, string>;

  constructor(options: HarvestClientOptions) {
    const base = options.baseUrl || DEFAULT_BASE_URL;
    this.baseUrl = base.endsWith('/') ? base : `${base}/`;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.headers = {
      'Authorization': `Basic ${Buffer.from(`${options.apiKey}:`).toString('base64')}`,
      'Accept': 'application/json',
      'User-Agent': options.userAgent || 'greenhouse-source/0.1.0'
    };
  }

  hasResource(resource: string): boolean {
    return Object.prototype.hasOwnProperty.call(DIRECT_ENDPOINTS, resource);
  }

  hasRelation(resource: string, relation: string): boolean {
    const relations = RELATED_ENDPOINTS[resource];
    return relations !== undefined && Object.prototype.hasOwnProperty.call(relations, relation);
  }

  open(resource: string): ResourceAccessor {
    if (!this.hasResource(resource)) {
      throw new EntityResolutionError(resource, 'no such Harvest collection');
    }
    return new HarvestResource(this, resource, DIRECT_ENDPOINTS[resource]);
  }

  buildUrl(path: string, params: QueryParams = {}): string {
    const url = new URL(path, this.baseUrl);
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }
    return url.toString();
  }

  async fetchPage(url: string): Promise<Page> {
    const response = await this.fetchImpl(url, { method: 'GET', headers: this.headers });

    if (!response.ok) {
      throw new HarvestApiError(await describeFailure(response), response.status, url);
    }

    const body: unknown = await response.json();
    const records = PageBodySchema.safeParse(body);
    if (!records.success) {
      throw new HarvestApiError(`Expected a JSON array of records from ${url}`, response.status, url);
    }

    return {
      records: records.data,
      next: parseNextLink(response.headers.get('link'))
    };
  }
}
