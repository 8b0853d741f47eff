import { z } from 'zod';
import { isoDateSchema } from '../../common/query-validation';

export const DIAGNOSTIC_KINDS = [
  'underperforming_sites',
  'rmse_above',
  'r_squared_below',
  'financial_impact',
  'site_metrics',
  'worst_components',
  'compare_skids',
  'power_curve',
] as const;

export type DiagnosticKind = (typeof DIAGNOSTIC_KINDS)[number];

/**
 * Kinds that analyse one site and need `site_id`.
 */
const SITE_KINDS: readonly DiagnosticKind[] = [
  'site_metrics',
  'worst_components',
  'compare_skids',
  'power_curve',
];

export function requiresSite(kind: DiagnosticKind): boolean {
  return SITE_KINDS.includes(kind);
}

/**
 * POST /api/query body.
 *
 * The window is optional as a pair; without it the previous calendar
 * month is analysed.
 */
export const diagnosticQuerySchema = z
  .object({
    kind: z.enum(DIAGNOSTIC_KINDS),
    limit: z.number().int().nonnegative().optional(),
    threshold: z.number().finite().optional(),
    site_id: z.string().min(1).optional(),
    skid_a: z.string().min(1).optional(),
    skid_b: z.string().min(1).optional(),
    start_date: isoDateSchema.optional(),
    end_date: isoDateSchema.optional(),
  })
  .superRefine((query, ctx) => {
    if (requiresSite(query.kind) && !query.site_id) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `site_id is required for ${query.kind}`,
        path: ['site_id'],
      });
    }
    if (query.kind === 'compare_skids' && (!query.skid_a || !query.skid_b)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'skid_a and skid_b are required for compare_skids',
        path: [query.skid_a ? 'skid_b' : 'skid_a'],
      });
    }
    if ((query.start_date === undefined) !== (query.end_date === undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'start_date and end_date must be given together',
        path: [query.start_date ? 'end_date' : 'start_date'],
      });
    } else if (
      query.start_date &&
      query.end_date &&
      query.end_date.getTime() <= query.start_date.getTime()
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'end_date must be after start_date',
        path: ['end_date'],
      });
    }
  });

export type DiagnosticQuery = z.output<typeof diagnosticQuerySchema>;

export type ChartType = 'bar' | 'scatter';

export interface DiagnosticResponse {
  summary: string;
  data: Record<string, unknown> | null;
  chart_type: ChartType | null;
  columns: string[] | null;
}
