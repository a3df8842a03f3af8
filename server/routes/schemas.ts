import { z } from 'zod';
import { PAGINATION } from '../../shared/constants';

export const idParams = z.object({ id: z.string().trim().min(1) });

export const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a date as YYYY-MM-DD');

export const pageQuery = z.object({
  page: z.coerce.number().int().positive().optional(),
  limit: z.coerce.number().int().positive().max(PAGINATION.MAX_LIMIT).optional(),
  search: z.string().trim().min(1).optional(),
});

export const dateRangeQuery = z.object({
  from_date: isoDate.optional(),
  to_date: isoDate.optional(),
});

/** Positive amount with at most two decimals. */
export const amount = z
  .number()
  .finite()
  .positive()
  .refine((n) => Math.abs(Math.round(n * 100) - n * 100) < 1e-6, 'At most 2 decimal places');

export const recipeItems = z
  .array(
    z.object({
      raw_item_id: z.string().trim().min(1),
      quantity_per_unit: z.number().finite().positive(),
    }),
  )
  .min(1);

export function ok<T>(data: T) {
  return { success: true as const, data };
}
