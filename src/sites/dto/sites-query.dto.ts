import { z } from 'zod';
import { EntityMetricKey } from '../../analytics/analytics.service';
import {
  endAfterStart,
  endAfterStartIssue,
  isoDateSchema,
} from '../../common/query-validation';

/**
 * Wire metric names accepted by `by` / `sort_by`, and the row field each
 * one ranks on.
 */
export const METRIC_FIELDS = {
  rmse: 'rmse',
  r_squared: 'rSquared',
  deviation_percentage: 'deviationPercentage',
  revenue_impact: 'revenueImpact',
  avg_actual_power: 'avgActualPower',
  avg_expected_power: 'avgExpectedPower',
  avg_irradiance: 'avgIrradiance',
  availability: 'availability',
  data_point_count: 'dataPointCount',
} as const satisfies Record<string, EntityMetricKey>;

export type WireMetric = keyof typeof METRIC_FIELDS;

const wireMetricSchema = z.enum([
  'rmse',
  'r_squared',
  'deviation_percentage',
  'revenue_impact',
  'avg_actual_power',
  'avg_expected_power',
  'avg_irradiance',
  'availability',
  'data_point_count',
]);

const orderSchema = z.enum(['asc', 'desc']);

/**
 * GET /api/sites/:siteId/skids
 *
 * Without `sort_by` skids come back in id order.
 */
export const skidsQuerySchema = z
  .object({
    start_date: isoDateSchema,
    end_date: isoDateSchema,
    sort_by: wireMetricSchema.optional(),
    order: orderSchema.default('desc'),
  })
  .refine(endAfterStart, endAfterStartIssue);

export type SkidsQuery = z.output<typeof skidsQuerySchema>;

/**
 * GET /api/sites/leaderboard
 *
 * Defaults to the worst fit first. `limit` 0 returns every site; a negative
 * limit is passed through and rejected by the ranker.
 */
export const leaderboardQuerySchema = z
  .object({
    start_date: isoDateSchema,
    end_date: isoDateSchema,
    by: wireMetricSchema.default('r_squared'),
    order: orderSchema.default('asc'),
    limit: z.coerce.number().int().default(0),
  })
  .refine(endAfterStart, endAfterStartIssue);

export type LeaderboardQueryDto = z.output<typeof leaderboardQuerySchema>;
