import { z } from 'zod';
import { ALLOCATION_METHODS } from '../../shared/costAllocation.js';

export const isoTimestamp = z.string().datetime({ offset: true });
export const allocationMethodSchema = z.enum(ALLOCATION_METHODS);
export const calendarDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'date must be YYYY-MM-DD')
  .refine((value) => !Number.isNaN(Date.parse(`${value}T00:00:00.000Z`)), 'date must be a valid calendar date');

export function ensureOrdered(
  ctx: z.RefinementCtx,
  earlier: string | undefined,
  later: string | undefined,
  laterField: string,
  earlierField: string
): void {
  if (earlier && later && new Date(earlier).getTime() >= new Date(later).getTime()) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: [laterField],
      message: `${laterField} must be after ${earlierField}`
    });
  }
}
