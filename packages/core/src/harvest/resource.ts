import { EntityResolutionError } from '../errors';
import type { HarvestRecord, QueryParams, RecordId } from '../schemas';
import type { ResourceAccessor } from '../sync/accessor';
import { relatedPath } from './endpoints';

export interface Page {
  records: HarvestRecord[];
  next: string | null;
}

export interface PageFetcher {
  buildUrl(path: string, params?: QueryParams): string;
  fetchPage(url: string): Promise<Page>;
}

/**
 * Cursor over one Harvest collection. Pagination follows the `next` link of
 * the previous response, so `getNext` ignores the params given to `get`.
 */
export class HarvestResource implements ResourceAccessor {
  private nextUrl: string | null = null;

  constructor(
    private readonly http: PageFetcher,
    readonly resource: string,
    readonly path: string
  ) {}

  get recordsRemaining(): boolean {
    return this.nextUrl !== null;
  }

  async get(params: QueryParams = {}): Promise<HarvestRecord[]> {
    return this.load(this.http.buildUrl(this.path, params));
  }

  async getNext(): Promise<HarvestRecord[]> {
    if (this.nextUrl === null) {
      return [];
    }
    return this.load(this.nextUrl);
  }

  related(parentId: RecordId, relation: string): HarvestResource {
    const path = relatedPath(this.resource, relation, String(parentId));
    if (path === undefined) {
      throw new EntityResolutionError(`${this.resource}.${relation}`, `'${relation}' is not a relation of '${this.resource}'`);
    }
    return new HarvestResource(this.http, relation, path);
  }

  private async load(url: string): Promise<HarvestRecord[]> {
    // Clear first so a failed request leaves no stale cursor behind
    this.nextUrl = null;
    const page = await this.http.fetchPage(url);
    this.nextUrl = page.next;
    return page.records;
  }
}
