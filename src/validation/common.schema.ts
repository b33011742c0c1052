import { z } from 'zod';
import type { SortDirection } from '../types/domain';

export const idParam = z.string().min(1);

const queryBoolean = z.enum(['true', 'false', '1', '0']).transform((value) => value === 'true' || value === '1');

/** Boolean query flag, false when absent. */
export const flagQuery = queryBoolean.optional().transform((value) => value ?? false);

/** Tri-state boolean query filter, undefined when absent. */
export const optionalBooleanQuery = queryBoolean.optional();

export const pagingQuery = {
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(0).max(1000).default(100)
};

/**
 * Sort query of the form `field` or `-field` (descending).
 * @param fields Sortable field names.
 * @param fallback Sort applied when the parameter is absent.
 */
export function sortQuery<F extends string>(fields: readonly [F, ...F[]], fallback: string) {
  const allowed: readonly string[] = fields;
  const isField = (value: string): value is F => allowed.includes(value);

  return z
    .string()
    .default(fallback)
    .transform((raw, ctx) => {
      const descending = raw.startsWith('-');
      const name = descending ? raw.slice(1) : raw;
      if (!isField(name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `sort must be one of: ${fields.join(', ')} (prefix with - for descending)`
        });
        return z.NEVER;
      }
      const direction: SortDirection = descending ? 'desc' : 'asc';
      return { field: name, direction };
    });
}
