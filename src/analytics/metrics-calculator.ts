import {
  AggregatedPoint,
  MetricsOptions,
  PerformanceMetrics,
  PowerPair,
  PpaRateConfig,
  Sample,
} from './interfaces/analytics.interface';
import { ContractViolationError } from './analytics.errors';
import { classifyAlert } from './alert-classifier';
import { avgActualPower, avgExpectedPower } from './aggregator';

/** Approximate operating hours in a month */
export const OPERATIONAL_HOURS_PER_MONTH = 720;

/** Portfolio-wide PPA rate in currency/MWh when nothing else is configured */
export const DEFAULT_PPA_RATE = 50.0;

/**
 * R² reported when the actual series has zero variance (empty, singleton,
 * or flat). Applies even if the residual is also zero.
 */
export const ZERO_VARIANCE_R_SQUARED = 0;

const KW_PER_MW = 1000;

/**
 * Resolve the PPA rate for an entity: per-entity override, then the
 * configured default, then DEFAULT_PPA_RATE.
 */
export function resolvePpaRate(
  config: PpaRateConfig | undefined,
  entityId?: string,
): number {
  if (config && entityId) {
    const override = config.entityRates[entityId.toLowerCase()];
    if (override !== undefined) {
      return override;
    }
  }
  return config?.defaultRate ?? DEFAULT_PPA_RATE;
}

/**
 * Revenue at risk for a month of operation, rounded to cents.
 *
 * @param rmseMw - RMSE in MW
 * @param ppaRate - Currency per MWh
 */
export function calculateRevenueImpact(
  rmseMw: number,
  ppaRate: number,
  operationalHours: number = OPERATIONAL_HOURS_PER_MONTH,
): number {
  return Math.round(rmseMw * operationalHours * ppaRate * 100) / 100;
}

/**
 * (avgActual − avgExpected) / avgExpected × 100, or 0 when nothing was
 * expected.
 */
export function calculateDeviationPercentage(
  avgActual: number,
  avgExpected: number,
): number {
  if (avgExpected === 0) {
    return 0;
  }
  return ((avgActual - avgExpected) / avgExpected) * 100;
}

function calculateRmse(pairs: readonly PowerPair[]): number {
  if (pairs.length === 0) {
    return 0;
  }
  let sumSquares = 0;
  for (const [actual, expected] of pairs) {
    const residual = actual - expected;
    sumSquares += residual * residual;
  }
  return Math.sqrt(sumSquares / pairs.length);
}

function calculateRSquared(pairs: readonly PowerPair[]): number {
  if (pairs.length === 0) {
    return ZERO_VARIANCE_R_SQUARED;
  }
  // The float mean of a flat series can be off by an ulp, so compare values.
  const firstActual = pairs[0][0];
  if (pairs.every(([actual]) => actual === firstActual)) {
    return ZERO_VARIANCE_R_SQUARED;
  }

  let sumActual = 0;
  for (const [actual] of pairs) {
    sumActual += actual;
  }
  const meanActual = sumActual / pairs.length;

  let ssRes = 0;
  let ssTot = 0;
  for (const [actual, expected] of pairs) {
    ssRes += (actual - expected) * (actual - expected);
    ssTot += (actual - meanActual) * (actual - meanActual);
  }

  if (ssTot === 0) {
    return ZERO_VARIANCE_R_SQUARED;
  }
  return 1 - ssRes / ssTot;
}

/**
 * Core metrics over paired (actual, expected) values.
 *
 * Both public call shapes funnel into this function. Deviation percentage
 * uses the means of the pairs; `computeMetrics` overrides those means with
 * sample-weighted ones when given aggregated points.
 */
export function computeMetricsFromPairs(
  pairs: readonly PowerPair[],
  options: MetricsOptions = {},
  means?: { avgActual: number; avgExpected: number },
): PerformanceMetrics {
  const scale = options.powerUnit === 'kW' ? 1 / KW_PER_MW : 1;
  const rmse = calculateRmse(pairs) * scale;
  const rSquared = calculateRSquared(pairs);

  let avgActual = 0;
  let avgExpected = 0;
  if (means) {
    avgActual = means.avgActual;
    avgExpected = means.avgExpected;
  } else if (pairs.length > 0) {
    for (const [actual, expected] of pairs) {
      avgActual += actual;
      avgExpected += expected;
    }
    avgActual /= pairs.length;
    avgExpected /= pairs.length;
  }

  const ppaRate = resolvePpaRate(options.ppaRates, options.entityId);

  return {
    rmse,
    rSquared,
    deviationPercentage: calculateDeviationPercentage(avgActual, avgExpected),
    revenueImpact: calculateRevenueImpact(rmse, ppaRate),
    alertLevel: classifyAlert(rSquared, rmse),
    sampleCount: pairs.length,
  };
}

/**
 * Metrics from two parallel arrays.
 *
 * @throws ContractViolationError when the arrays differ in length
 */
export function computeMetricsFromArrays(
  actual: readonly number[],
  expected: readonly number[],
  options: MetricsOptions = {},
): PerformanceMetrics {
  if (actual.length !== expected.length) {
    throw new ContractViolationError(
      'computeMetrics',
      `actual and expected must have equal length (got ${actual.length} and ${expected.length})`,
    );
  }
  const pairs = actual.map((value, index): PowerPair => [value, expected[index]]);
  return computeMetricsFromPairs(pairs, options);
}

function isAggregatedPoint(
  value: Sample | AggregatedPoint,
): value is AggregatedPoint {
  return 'sampleCount' in value;
}

/**
 * Metrics from raw samples or from pre-aggregated points.
 *
 * Raw samples contribute one pair each. Aggregated points contribute their
 * per-point averages (e.g. one pair per day), and the deviation percentage
 * is weighted by each point's sample count.
 */
export function computeMetrics(
  values: readonly Sample[] | readonly AggregatedPoint[],
  options: MetricsOptions = {},
): PerformanceMetrics {
  const pairs: PowerPair[] = [];
  let totalActual = 0;
  let totalExpected = 0;
  let totalCount = 0;

  for (const value of values) {
    if (isAggregatedPoint(value)) {
      pairs.push([avgActualPower(value), avgExpectedPower(value)]);
      totalActual += value.sumActualPower;
      totalExpected += value.sumExpectedPower;
      totalCount += value.sampleCount;
    } else {
      pairs.push([value.actualPower, value.expectedPower]);
      totalActual += value.actualPower;
      totalExpected += value.expectedPower;
      totalCount++;
    }
  }

  const means =
    totalCount > 0
      ? { avgActual: totalActual / totalCount, avgExpected: totalExpected / totalCount }
      : { avgActual: 0, avgExpected: 0 };

  return computeMetricsFromPairs(pairs, options, means);
}
