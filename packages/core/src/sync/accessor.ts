import type { HarvestRecord, QueryParams, RecordId } from '../schemas';

/**
 * A stateful cursor over one remote collection. `get` loads the first page and
 * resets the cursor; `getNext` follows it while `recordsRemaining` is true.
 */
export interface ResourceAccessor {
  readonly resource: string;
  readonly recordsRemaining: boolean;
  get(params?: QueryParams): Promise<HarvestRecord[]>;
  getNext(): Promise<HarvestRecord[]>;
  related(parentId: RecordId, relation: string): ResourceAccessor;
}

/**
 * Knows which collections and nested relations exist and opens fresh accessors
 * for root collections.
 */
export interface ResourceDirectory {
  hasResource(resource: string): boolean;
  hasRelation(resource: string, relation: string): boolean;
  open(resource: string): ResourceAccessor;
}
