import { z } from 'zod';

export type RecordId = number | string;

/**
 * A record as the Harvest API returns it. Field contents are not validated;
 * only parents in a nested traversal need an `id`.
 */
export type HarvestRecord = Record<string, unknown>;

export const ParentRecordSchema = z
  .object({
    id: z.union([z.number().int(), z.string().min(1)])
  })
  .passthrough();

export type QueryValue = string | number | boolean;
export type QueryParams = Record<string, QueryValue | undefined>;
