/**
 * Paginated traversal
 *
 * Walks a root collection page by page and, for compound entities, descends
 * into each record's nested relation before moving to the next record. The
 * walk is driven by an explicit stack of frames so records are fetched only
 * as the consumer pulls them.
 */

import { TraversalError } from '../errors';
import { ParentRecordSchema, type HarvestRecord, type QueryParams } from '../schemas';
import type { ResourceAccessor } from './accessor';

export const DEFAULT_ITEMS_PER_PAGE = 100;

interface Frame {
  accessor: ResourceAccessor;
  // Relations still to descend below this accessor
  chain: string[];
  params: QueryParams;
  batch: HarvestRecord[] | null;
  index: number;
}

export class RecordStream implements AsyncIterableIterator<HarvestRecord> {
  private readonly stack: Frame[];
  // Calls are serialized so overlapping next() never share a frame mid-fetch
  private pending: Promise<unknown> = Promise.resolve();

  constructor(root: ResourceAccessor, chain: readonly string[] = [], params: QueryParams = {}) {
    this.stack = [createFrame(root, [...chain], params)];
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<HarvestRecord> {
    return this;
  }

  next(): Promise<IteratorResult<HarvestRecord>> {
    return this.enqueue<IteratorResult<HarvestRecord>>(async () => {
      try {
        return await this.advance();
      } catch (error) {
        this.stack.length = 0;
        throw error;
      }
    });
  }

  return(): Promise<IteratorResult<HarvestRecord>> {
    return this.enqueue<IteratorResult<HarvestRecord>>(async () => {
      this.stack.length = 0;
      return { done: true, value: undefined };
    });
  }

  private enqueue<T>(step: () => Promise<T>): Promise<T> {
    const result = this.pending.then(step);
    this.pending = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  private async advance(): Promise<IteratorResult<HarvestRecord>> {
    while (this.stack.length > 0) {
      const frame = this.stack[this.stack.length - 1];

      if (frame.batch === null) {
        frame.batch = await frame.accessor.get(frame.params);
        frame.index = 0;
        continue;
      }

      if (frame.index < frame.batch.length) {
        const record = frame.batch[frame.index];
        frame.index += 1;

        if (frame.chain.length === 0) {
          return { done: false, value: record };
        }

        const [relation, ...rest] = frame.chain;
        const child = frame.accessor.related(parentIdOf(record, frame.accessor.resource), relation);
        this.stack.push(createFrame(child, rest, {}));
        continue;
      }

      if (frame.accessor.recordsRemaining) {
        frame.batch = await frame.accessor.getNext();
        frame.index = 0;
        continue;
      }

      this.stack.pop();
    }

    return { done: true, value: undefined };
  }
}

function createFrame(accessor: ResourceAccessor, chain: string[], params: QueryParams): Frame {
  return {
    accessor,
    chain,
    params: { ...params, per_page: DEFAULT_ITEMS_PER_PAGE },
    batch: null,
    index: 0
  };
}

function parentIdOf(record: HarvestRecord, resource: string): number | string {
  const parsed = ParentRecordSchema.safeParse(record);
  if (!parsed.success) {
    throw new TraversalError(`Record from '${resource}' has no usable id to descend into`);
  }
  return parsed.data.id;
}

export function paginate(
  root: ResourceAccessor,
  chain: readonly string[] = [],
  params: QueryParams = {}
): RecordStream {
  return new RecordStream(root, chain, params);
}

export async function collect<T>(source: AsyncIterable<T>, limit = Infinity): Promise<T[]> {
  const items: T[] = [];
  if (limit <= 0) return items;
  for await (const item of source) {
    items.push(item);
    if (items.length >= limit) break;
  }
  return items;
}
