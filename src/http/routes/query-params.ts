import { z } from 'zod';

/** `?status=sent,overdue` into a validated list; absent stays undefined. */
export function csvList<T extends z.ZodTypeAny>(item: T) {
  return z
    .string()
    .optional()
    .transform((raw) => (raw === undefined ? undefined : raw.split(',').map((value) => value.trim()).filter((value) => value.length > 0)))
    .pipe(z.array(item).min(1).optional());
}

export const currencySchema = z.string().trim().length(3);

export const usagePeriodSchema = z.string().regex(/^\d{4}-(?:0[1-9]|1[0-2])$/, 'Expected a YYYY-MM period.');
