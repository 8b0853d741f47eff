/**
 * Engine types for the performance-deviation analytics pipeline.
 *
 * Everything here is a plain value: samples come in from the warehouse,
 * aggregated points and metrics are recomputed per request and never stored.
 */

/**
 * One telemetry reading for a site, skid or inverter.
 */
export interface Sample {
  timestamp: Date;
  /** Owning site/skid/inverter identifier */
  entityId: string;
  /** POA or GHI irradiance in W/m² */
  irradiance: number;
  /** kW */
  actualPower: number;
  /** kW, from the expected-generation model */
  expectedPower: number;
  /** 0..1, 1.0 = fully available */
  availability: number;
}

export type GroupBy = 'entity' | 'time_bucket' | 'both';

export type TimeBucket = 'daily' | 'monthly' | 'all';

/**
 * Rollup of one or more valid samples for an (entity × bucket) key.
 *
 * When grouping by time bucket only, entityId is `*`.
 * When grouping by entity only, bucketKey is `all`.
 */
export interface AggregatedPoint {
  entityId: string;
  bucketKey: string;
  sampleCount: number;
  sumActualPower: number;
  sumExpectedPower: number;
  sumIrradiance: number;
}

export type AlertLevel = 'GOOD' | 'MONITOR' | 'WARNING' | 'CRITICAL';

export type PowerUnit = 'kW' | 'MW';

export interface PerformanceMetrics {
  /** Same unit the thresholds use (MW unless the caller opts out) */
  rmse: number;
  rSquared: number;
  deviationPercentage: number;
  /** Currency, rounded to cents */
  revenueImpact: number;
  alertLevel: AlertLevel;
  sampleCount: number;
}

/**
 * PPA rate table: per-entity overrides plus a portfolio default.
 * Keys are matched case-insensitively.
 */
export interface PpaRateConfig {
  defaultRate: number;
  entityRates: Record<string, number>;
}

export interface MetricsOptions {
  /** Entity whose PPA rate applies; omitted means the default rate */
  entityId?: string;
  ppaRates?: PpaRateConfig;
  /**
   * Unit of the incoming power values. kW inputs are scaled to MW before
   * the RMSE is reported, classified and priced.
   */
  powerUnit?: PowerUnit;
}

/** [actual, expected] */
export type PowerPair = readonly [number, number];

export interface DateRange {
  start: Date;
  end: Date;
}

export interface ReportSummary {
  pointCount: number;
  dateRange: DateRange | null;
  avgActual: number;
  avgExpected: number;
  avgIrradiance: number;
  /** kWh when power is kW and intervalHours is in hours */
  totalActualEnergy: number;
  totalExpectedEnergy: number;
  /** totalActual / totalExpected, 0 when nothing was expected */
  performanceRatio: number;
  metrics: PerformanceMetrics;
}

export interface PerformanceReport {
  entityId: string;
  points: Sample[];
  summary: ReportSummary;
  /** True iff the window produced zero valid points */
  isFallbackNeeded: boolean;
  fallbackReason: string | null;
}

export interface ReportOptions extends MetricsOptions {
  /** Hours represented by one sample, used for energy totals */
  intervalHours?: number;
}

export type RankOrder = 'asc' | 'desc';

export interface RankOptions<K extends string> {
  by: K;
  order: RankOrder;
  /** 0 means no limit */
  limit?: number;
}
