import { Injectable, Logger } from '@nestjs/common';
import { FinancialConfigService } from '../financial/financial-config.service';
import {
  AlertLevel,
  MetricsOptions,
  PerformanceReport,
  RankOptions,
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
import { buildReport } from './performance-report.builder';
import { NumericKeys, rank } from './deviation-ranker';

/**
 * Per-entity leaderboard row.
 */
export interface EntityPerformance {
  entityId: string;
  entityName: string;
  avgActualPower: number;
  avgExpectedPower: number;
  avgIrradiance: number;
  deviationPercentage: number;
  dataPointCount: number;
  /** Mean availability over every reading with a known availability */
  availability: number;
  /** MW */
  rmse: number;
  rSquared: number;
  revenueImpact: number;
  alertLevel: AlertLevel;
}

export type EntityMetricKey = NumericKeys<EntityPerformance>;

/**
 * AnalyticsService - the engine bound to the configured PPA rates
 *
 * Telemetry arrives in kW; RMSE is reported, classified and priced in MW.
 * Holds no state beyond the injected rate table.
 */
@Injectable()
export class AnalyticsService {
  private readonly logger = new Logger(AnalyticsService.name);

  constructor(private readonly financialConfig: FinancialConfigService) {}

  private metricsOptions(entityId: string): MetricsOptions {
    return {
      entityId,
      ppaRates: this.financialConfig.getRateConfig(),
      powerUnit: 'kW',
    };
  }

  /**
   * Full report for one entity's window.
   */
  buildReport(entityId: string, samples: readonly Sample[]): PerformanceReport {
    const report = buildReport(entityId, samples, this.metricsOptions(entityId));
    this.logger.debug(
      `Report for ${entityId}: ${report.summary.pointCount}/${samples.length} valid points, alert=${report.summary.metrics.alertLevel}`,
    );
    return report;
  }

  /**
   * One leaderboard row per entity, in order of first appearance.
   *
   * Entities whose samples are all invalid are left out, matching the
   * aggregator's no-empty-groups rule.
   *
   * @param names - Optional display names by entityId
   */
  summarizeEntities(
    samples: readonly Sample[],
    names: ReadonlyMap<string, string> = new Map(),
  ): EntityPerformance[] {
    const valid = filterValid(samples);
    const points = aggregate(valid, 'entity');

    const samplesByEntity = new Map<string, Sample[]>();
    for (const sample of valid) {
      const bucket = samplesByEntity.get(sample.entityId) ?? [];
      bucket.push(sample);
      samplesByEntity.set(sample.entityId, bucket);
    }

    const availability = new Map<string, { sum: number; count: number }>();
    for (const sample of samples) {
      if (!Number.isFinite(sample.availability)) continue;
      const entry = availability.get(sample.entityId) ?? { sum: 0, count: 0 };
      entry.sum += sample.availability;
      entry.count++;
      availability.set(sample.entityId, entry);
    }

    return points.map((point) => {
      const metrics = computeMetrics(
        samplesByEntity.get(point.entityId) ?? [],
        this.metricsOptions(point.entityId),
      );
      const avail = availability.get(point.entityId);
      return {
        entityId: point.entityId,
        entityName: names.get(point.entityId) ?? point.entityId,
        avgActualPower: avgActualPower(point),
        avgExpectedPower: avgExpectedPower(point),
        avgIrradiance: avgIrradiance(point),
        deviationPercentage: metrics.deviationPercentage,
        dataPointCount: point.sampleCount,
        availability: avail && avail.count > 0 ? avail.sum / avail.count : 0,
        rmse: metrics.rmse,
        rSquared: metrics.rSquared,
        revenueImpact: metrics.revenueImpact,
        alertLevel: metrics.alertLevel,
      };
    });
  }

  rankEntities(
    entities: readonly EntityPerformance[],
    options: RankOptions<EntityMetricKey>,
  ): EntityPerformance[] {
    return rank(entities, options);
  }
}
