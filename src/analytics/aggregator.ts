import {
  AggregatedPoint,
  GroupBy,
  Sample,
  TimeBucket,
} from './interfaces/analytics.interface';
import { ContractViolationError } from './analytics.errors';

const GROUP_BY_VALUES: readonly GroupBy[] = ['entity', 'time_bucket', 'both'];
const TIME_BUCKET_VALUES: readonly TimeBucket[] = ['daily', 'monthly', 'all'];

/** Bucket key used when the full range collapses into one group */
export const ALL_BUCKET_KEY = 'all';

/** Entity key used when grouping by time bucket only */
export const ANY_ENTITY_KEY = '*';

export function isGroupBy(value: string): value is GroupBy {
  return GROUP_BY_VALUES.some((candidate) => candidate === value);
}

export function isTimeBucket(value: string): value is TimeBucket {
  return TIME_BUCKET_VALUES.some((candidate) => candidate === value);
}

/**
 * Bucket key for a timestamp (UTC calendar).
 *
 * @example
 * bucketKeyFor(new Date('2024-03-05T22:10:00Z'), 'daily')   // '2024-03-05'
 * bucketKeyFor(new Date('2024-03-05T22:10:00Z'), 'monthly') // '2024-03'
 */
export function bucketKeyFor(timestamp: Date, bucket: TimeBucket): string {
  switch (bucket) {
    case 'daily':
      return timestamp.toISOString().slice(0, 10);
    case 'monthly':
      return timestamp.toISOString().slice(0, 7);
    case 'all':
      return ALL_BUCKET_KEY;
  }
}

export function avgActualPower(point: AggregatedPoint): number {
  return point.sumActualPower / point.sampleCount;
}

export function avgExpectedPower(point: AggregatedPoint): number {
  return point.sumExpectedPower / point.sampleCount;
}

export function avgIrradiance(point: AggregatedPoint): number {
  return point.sumIrradiance / point.sampleCount;
}

/**
 * Group samples by entity, time bucket, or both.
 *
 * Output order follows the first occurrence of each key, and sums are
 * accumulated in input order, so the same input sequence always yields
 * bit-identical results. Groups only exist if a sample landed in them.
 *
 * Samples are not validated here; compose with `filterValid` first.
 *
 * @throws ContractViolationError for an unknown groupBy or bucket
 */
export function aggregate(
  samples: readonly Sample[],
  groupBy: GroupBy,
  bucket: TimeBucket = 'daily',
): AggregatedPoint[] {
  if (!isGroupBy(groupBy)) {
    throw new ContractViolationError(
      'aggregate',
      `Unknown group-by key: ${String(groupBy)}. Expected one of ${GROUP_BY_VALUES.join(', ')}`,
    );
  }
  if (!isTimeBucket(bucket)) {
    throw new ContractViolationError(
      'aggregate',
      `Unknown time bucket: ${String(bucket)}. Expected one of ${TIME_BUCKET_VALUES.join(', ')}`,
    );
  }

  // Map preserves insertion order
  const groups = new Map<string, AggregatedPoint>();

  for (const sample of samples) {
    const entityId = groupBy === 'time_bucket' ? ANY_ENTITY_KEY : sample.entityId;
    const bucketKey =
      groupBy === 'entity' ? ALL_BUCKET_KEY : bucketKeyFor(sample.timestamp, bucket);
    const key = `${entityId}\u0000${bucketKey}`;

    let group = groups.get(key);
    if (!group) {
      group = {
        entityId,
        bucketKey,
        sampleCount: 0,
        sumActualPower: 0,
        sumExpectedPower: 0,
        sumIrradiance: 0,
      };
      groups.set(key, group);
    }

    group.sampleCount++;
    group.sumActualPower += sample.actualPower;
    group.sumExpectedPower += sample.expectedPower;
    group.sumIrradiance += sample.irradiance;
  }

  return Array.from(groups.values());
}
