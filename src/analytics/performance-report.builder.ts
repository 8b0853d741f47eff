import {
  PerformanceReport,
  ReportOptions,
  ReportSummary,
  Sample,
} from './interfaces/analytics.interface';
import { filterValid } from './sample-filter';
import {
  aggregate,
  avgActualPower,
  avgExpectedPower,
  avgIrradiance,
} from './aggregator';
import { computeMetrics } from './metrics-calculator';

/** Telemetry is hourly unless the caller says otherwise */
export const DEFAULT_INTERVAL_HOURS = 1;

export const NO_SAMPLES_REASON = 'No samples in the requested window';

function chronological(samples: readonly Sample[]): Sample[] {
  // Array.prototype.sort is stable, equal timestamps keep input order
  return [...samples].sort(
    (a, b) => a.timestamp.getTime() - b.timestamp.getTime(),
  );
}

/**
 * Build the report consumed by chart views, leaderboards and the
 * diagnostics responder.
 *
 * Samples are filtered, sorted by timestamp and summarised. A window
 * with zero valid points sets `isFallbackNeeded` with a reason that tells
 * an empty window apart from one where every sample was rejected. A
 * window whose valid points are all zero-valued is a normal report.
 */
export function buildReport(
  entityId: string,
  samples: readonly Sample[],
  options: ReportOptions = {},
): PerformanceReport {
  const intervalHours = options.intervalHours ?? DEFAULT_INTERVAL_HOURS;
  const points = chronological(filterValid(samples));
  const metrics = computeMetrics(points, { ...options, entityId });

  let fallbackReason: string | null = null;
  if (points.length === 0) {
    fallbackReason =
      samples.length === 0
        ? NO_SAMPLES_REASON
        : `All ${samples.length} samples failed validation`;
  }

  const [rollup] = aggregate(points, 'time_bucket', 'all');

  let summary: ReportSummary;
  if (rollup) {
    const totalActualEnergy = rollup.sumActualPower * intervalHours;
    const totalExpectedEnergy = rollup.sumExpectedPower * intervalHours;
    summary = {
      pointCount: rollup.sampleCount,
      dateRange: {
        start: points[0].timestamp,
        end: points[points.length - 1].timestamp,
      },
      avgActual: avgActualPower(rollup),
      avgExpected: avgExpectedPower(rollup),
      avgIrradiance: avgIrradiance(rollup),
      totalActualEnergy,
      totalExpectedEnergy,
      performanceRatio:
        totalExpectedEnergy === 0 ? 0 : totalActualEnergy / totalExpectedEnergy,
      metrics,
    };
  } else {
    summary = {
      pointCount: 0,
      dateRange: null,
      avgActual: 0,
      avgExpected: 0,
      avgIrradiance: 0,
      totalActualEnergy: 0,
      totalExpectedEnergy: 0,
      performanceRatio: 0,
      metrics,
    };
  }

  return {
    entityId,
    points,
    summary,
    isFallbackNeeded: points.length === 0,
    fallbackReason,
  };
}
