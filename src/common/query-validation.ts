import { BadRequestException } from '@nestjs/common';
import { z } from 'zod';
import { getCurrentDate } from './date-utils';

/**
 * ISO-8601 timestamp that is not in the future.
 */
export const isoDateSchema = z
  .string()
  .min(1)
  .transform((value, ctx) => {
    const date = new Date(value);
    if (Number.isNaN(date.getTime())) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid date: ${value}`,
        fatal: true,
      });
      return z.NEVER;
    }
    return date;
  })
  .refine((date) => date.getTime() <= getCurrentDate().getTime(), {
    message: 'Date cannot be in the future',
  });

export function endAfterStart(range: {
  start_date: Date;
  end_date: Date;
}): boolean {
  return range.end_date.getTime() > range.start_date.getTime();
}

export const endAfterStartIssue = {
  message: 'end_date must be after start_date',
  path: ['end_date'],
};

/**
 * `start_date` / `end_date` pair, end strictly after start.
 */
export const dateRangeQuerySchema = z
  .object({
    start_date: isoDateSchema,
    end_date: isoDateSchema,
  })
  .refine(endAfterStart, endAfterStartIssue);

export type DateRangeQuery = z.output<typeof dateRangeQuerySchema>;

/**
 * Parse request input, turning zod issues into a 400.
 *
 * @throws BadRequestException with one entry per issue
 */
export function parseOrThrow<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      field: issue.path.join('.'),
      issue: issue.message,
    }));
    throw new BadRequestException({
      error: 'ValidationError',
      message: issues.map((i) => `${i.field || 'request'}: ${i.issue}`).join('; '),
      details: issues,
    });
  }
  return result.data;
}
