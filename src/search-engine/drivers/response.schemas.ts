import { z } from 'zod';
import { BulkResponse } from '../interfaces/driver.interface';

const bulkItemResultSchema = z
  .object({
    _id: z.string().optional(),
    _index: z.string().optional(),
    status: z.number(),
    error: z
      .union([
        z.string(),
        z.object({ type: z.string().optional(), reason: z.string().optional() }).passthrough(),
      ])
      .optional(),
  })
  .passthrough();

export const bulkResponseSchema = z.object({
  errors: z.boolean(),
  items: z.array(z.record(bulkItemResultSchema)),
});

export const aliasResponseSchema = z.record(z.unknown());

export const catIndicesResponseSchema = z.array(z.object({ index: z.string() }).passthrough());

export const deleteByQueryResponseSchema = z
  .object({ deleted: z.number().optional() })
  .passthrough();

/**
 * Flattens `{ items: [{ index: { ... } }] }` into one entry per item
 */
export function parseBulkResponse(response: unknown): BulkResponse {
  const { errors, items } = bulkResponseSchema.parse(response);

  return {
    errors,
    items: items.flatMap(item =>
      Object.entries(item).map(([action, result]) => ({
        action,
        id: result._id,
        index: result._index,
        status: result.status,
        error: result.error,
      })),
    ),
  };
}
