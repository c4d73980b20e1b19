/**
 * In-memory stand-ins for the Harvest client, used by the tests.
 */

import type { HarvestRecord, QueryParams, RecordId } from './schemas';
import type { ResourceAccessor, ResourceDirectory } from './sync/accessor';

export interface FakeCall {
  method: 'get' | 'getNext';
  key: string;
  params?: QueryParams;
}

export interface FakeDirectoryOptions {
  // Pages keyed by path: `jobs`, `jobs/7/openings`, ...
  pages?: Record<string, HarvestRecord[][]>;
  // Errors thrown by the first-page request of a key
  failures?: Record<string, Error>;
  relations?: Record<string, string[]>;
}

export class FakeAccessor implements ResourceAccessor {
  private pageIndex = 0;

  constructor(
    private readonly directory: FakeDirectory,
    readonly resource: string,
    readonly key: string
  ) {}

  get recordsRemaining(): boolean {
    return this.pageIndex < this.directory.pagesFor(this.key).length - 1;
  }

  async get(params?: QueryParams): Promise<HarvestRecord[]> {
    this.directory.calls.push({ method: 'get', key: this.key, params });
    const failure = this.directory.failures[this.key];
    if (failure) {
      throw failure;
    }
    this.pageIndex = 0;
    return this.directory.pagesFor(this.key)[0] ?? [];
  }

  async getNext(): Promise<HarvestRecord[]> {
    this.directory.calls.push({ method: 'getNext', key: this.key });
    this.pageIndex += 1;
    return this.directory.pagesFor(this.key)[this.pageIndex] ?? [];
  }

  related(parentId: RecordId, relation: string): FakeAccessor {
    return new FakeAccessor(this.directory, relation, `${this.key}/${parentId}/${relation}`);
  }
}

export class FakeDirectory implements ResourceDirectory {
  readonly calls: FakeCall[] = [];
  readonly pages: Record<string, HarvestRecord[][]>;
  readonly failures: Record<string, Error>;
  private readonly relations: Record<string, string[]>;

  constructor(options: FakeDirectoryOptions = {}) {
    this.pages = options.pages ?? {};
    this.failures = options.failures ?? {};
    this.relations = options.relations ?? {};
  }

  pagesFor(key: string): HarvestRecord[][] {
    return this.pages[key] ?? [];
  }

  hasResource(_resource: string): boolean {
    return true;
  }

  hasRelation(resource: string, relation: string): boolean {
    return (this.relations[resource] ?? []).includes(relation);
  }

  open(resource: string): FakeAccessor {
    return new FakeAccessor(this, resource, resource);
  }

  keysRequested(): string[] {
    return this.calls.filter(call => call.method === 'get').map(call => call.key);
  }
}

export function records(...ids: number[]): HarvestRecord[] {
  return ids.map(id => ({ id }));
}
