import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { SitesService } from '../sites/sites.service';
import { TelemetryService } from '../telemetry/telemetry.service';
import {
  AnalyticsService,
  EntityPerformance,
} from '../analytics/analytics.service';
import { DateRange, rank, worstPerformers } from '../analytics';
import {
  formatDay,
  getCurrentDate,
  previousCalendarMonth,
} from '../common/date-utils';
import {
  DiagnosticQuery,
  DiagnosticResponse,
} from './dto/diagnostic-query.dto';

/** Performance ratio under which a reading counts as underperforming */
export const UNDERPERFORMANCE_THRESHOLD = 0.9;

/** Ratio gap under which two skids are reported as performing alike */
export const SIMILAR_RATIO_DIFFERENCE = 0.05;

export const DEFAULT_SITE_LIMIT = 3;
export const DEFAULT_COMPONENT_LIMIT = 5;
export const DEFAULT_RMSE_THRESHOLD = 2.0;
export const DEFAULT_R_SQUARED_THRESHOLD = 0.8;

export function performanceRatio(actual: number, expected: number): number {
  return expected > 0 ? actual / expected : 0;
}

function percent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}

function describeWindow(window: DateRange): string {
  return `${formatDay(window.start)} to ${formatDay(window.end)}`;
}

function noData(summary: string): DiagnosticResponse {
  return { summary, data: null, chart_type: null, columns: null };
}

function toSiteRow(site: EntityPerformance): Record<string, unknown> {
  return {
    site_id: site.entityId,
    site_name: site.entityName,
    r_squared: site.rSquared,
    rmse: site.rmse,
    deviation_percentage: site.deviationPercentage,
    revenue_impact: site.revenueImpact,
    alert_level: site.alertLevel,
  };
}

function describeSite(site: EntityPerformance, index: number): string {
  return (
    `${index + 1}. ${site.entityName}: R² ${site.rSquared.toFixed(3)}, ` +
    `RMSE ${site.rmse.toFixed(2)} MW, ${site.alertLevel}, ` +
    `revenue impact $${site.revenueImpact.toFixed(2)}`
  );
}

function requireField(value: string | undefined, field: string): string {
  if (!value) {
    throw new BadRequestException({
      error: 'ValidationError',
      message: `${field} is required`,
      details: [{ field, issue: 'Required' }],
    });
  }
  return value;
}

/**
 * DiagnosticsService - canned analyses over the fleet statistics
 *
 * Each query kind maps to one fixed analysis. An analysis over an empty
 * window answers with a "no data" summary and null data rather than an
 * error; unknown sites still raise 404 through SitesService.
 */
@Injectable()
export class DiagnosticsService {
  private readonly logger = new Logger(DiagnosticsService.name);

  constructor(
    private readonly sitesService: SitesService,
    private readonly telemetryService: TelemetryService,
    private readonly analyticsService: AnalyticsService,
  ) {}

  /**
   * Explicit window, or the previous calendar month.
   */
  resolveWindow(query: Pick<DiagnosticQuery, 'start_date' | 'end_date'>): DateRange {
    if (query.start_date && query.end_date) {
      return { start: query.start_date, end: query.end_date };
    }
    return previousCalendarMonth(getCurrentDate());
  }

  async answer(query: DiagnosticQuery): Promise<DiagnosticResponse> {
    const window = this.resolveWindow(query);
    this.logger.log(`Answering ${query.kind} for ${describeWindow(window)}`);

    switch (query.kind) {
      case 'underperforming_sites':
        return this.underperformingSites(window, query.limit ?? DEFAULT_SITE_LIMIT);
      case 'rmse_above':
        return this.rmseAbove(window, query.threshold ?? DEFAULT_RMSE_THRESHOLD);
      case 'r_squared_below':
        return this.rSquaredBelow(
          window,
          query.threshold ?? DEFAULT_R_SQUARED_THRESHOLD,
        );
      case 'financial_impact':
        return this.financialImpact(window, query.limit ?? 0);
      case 'site_metrics':
        return this.siteMetrics(requireField(query.site_id, 'site_id'), window);
      case 'worst_components':
        return this.worstComponents(
          requireField(query.site_id, 'site_id'),
          window,
          query.limit ?? DEFAULT_COMPONENT_LIMIT,
        );
      case 'compare_skids':
        return this.compareSkids(
          requireField(query.site_id, 'site_id'),
          requireField(query.skid_a, 'skid_a'),
          requireField(query.skid_b, 'skid_b'),
          window,
        );
      case 'power_curve':
        return this.powerCurve(requireField(query.site_id, 'site_id'), window);
    }
  }

  private async underperformingSites(
    window: DateRange,
    limit: number,
  ): Promise<DiagnosticResponse> {
    const portfolio = await this.sitesService.getPortfolioPerformance(
      window.start,
      window.end,
    );
    if (portfolio.length === 0) {
      return noData(`No site performance data available for ${describeWindow(window)}.`);
    }

    const worst = worstPerformers(portfolio, limit);
    const lines = worst.map(describeSite);
    return {
      summary: [
        `The ${worst.length} most underperforming sites (${describeWindow(window)}):`,
        ...lines,
      ].join('\n'),
      data: { sites: worst.map(toSiteRow) },
      chart_type: 'bar',
      columns: ['site_name', 'r_squared'],
    };
  }

  private async rmseAbove(
    window: DateRange,
    threshold: number,
  ): Promise<DiagnosticResponse> {
    const portfolio = await this.sitesService.getPortfolioPerformance(
      window.start,
      window.end,
    );
    if (portfolio.length === 0) {
      return noData(`No site performance data available for ${describeWindow(window)}.`);
    }

    const matches = this.analyticsService.rankEntities(
      portfolio.filter((site) => site.rmse > threshold),
      { by: 'rmse', order: 'desc' },
    );
    const heading =
      matches.length === 0
        ? `No sites with RMSE above ${threshold} MW (${describeWindow(window)}).`
        : `${matches.length} site(s) with RMSE above ${threshold} MW (${describeWindow(window)}):`;
    return {
      summary: [heading, ...matches.map(describeSite)].join('\n'),
      data: { threshold, sites: matches.map(toSiteRow) },
      chart_type: 'bar',
      columns: ['site_name', 'rmse'],
    };
  }

  private async rSquaredBelow(
    window: DateRange,
    threshold: number,
  ): Promise<DiagnosticResponse> {
    const portfolio = await this.sitesService.getPortfolioPerformance(
      window.start,
      window.end,
    );
    if (portfolio.length === 0) {
      return noData(`No site performance data available for ${describeWindow(window)}.`);
    }

    const matches = worstPerformers(
      portfolio.filter((site) => site.rSquared < threshold),
    );
    const heading =
      matches.length === 0
        ? `No sites with R² below ${threshold} (${describeWindow(window)}).`
        : `${matches.length} site(s) with R² below ${threshold} (${describeWindow(window)}):`;
    return {
      summary: [heading, ...matches.map(describeSite)].join('\n'),
      data: { threshold, sites: matches.map(toSiteRow) },
      chart_type: 'bar',
      columns: ['site_name', 'r_squared'],
    };
  }

  private async financialImpact(
    window: DateRange,
    limit: number,
  ): Promise<DiagnosticResponse> {
    const portfolio = await this.sitesService.getPortfolioPerformance(
      window.start,
      window.end,
    );
    if (portfolio.length === 0) {
      return noData(`No site performance data available for ${describeWindow(window)}.`);
    }

    const total =
      Math.round(
        portfolio.reduce((sum, site) => sum + site.revenueImpact, 0) * 100,
      ) / 100;
    const ranked = this.analyticsService.rankEntities(portfolio, {
      by: 'revenueImpact',
      order: 'desc',
      limit,
    });
    return {
      summary: [
        `Estimated monthly revenue impact across ${portfolio.length} sites: $${total.toFixed(2)} (${describeWindow(window)})`,
        ...ranked.map(describeSite),
      ].join('\n'),
      data: { total_revenue_impact: total, sites: ranked.map(toSiteRow) },
      chart_type: 'bar',
      columns: ['site_name', 'revenue_impact'],
    };
  }

  private async siteMetrics(
    siteId: string,
    window: DateRange,
  ): Promise<DiagnosticResponse> {
    const site = await this.sitesService.getSite(siteId);
    const name = site.siteName ?? site.siteId;
    const samples = await this.telemetryService.getSiteSamples(
      siteId,
      window.start,
      window.end,
    );
    const report = this.analyticsService.buildReport(siteId, samples);
    if (report.isFallbackNeeded) {
      return noData(
        `No performance data available for site ${name} to calculate metrics.`,
      );
    }

    const { metrics } = report.summary;
    const fit =
      metrics.rSquared > 0.9
        ? 'Excellent model fit: expected power tracks actual output closely.'
        : metrics.rSquared > 0.7
          ? 'Good model fit: expected power is reasonably accurate.'
          : 'Poor model fit: expected power deviates significantly from actual output.';
    const error =
      metrics.rmse < 1
        ? `Low error rate: average deviation of ${metrics.rmse.toFixed(2)} MW.`
        : metrics.rmse < 5
          ? `Moderate error rate: average deviation of ${metrics.rmse.toFixed(2)} MW.`
          : `High error rate: average deviation of ${metrics.rmse.toFixed(2)} MW.`;

    return {
      summary: [
        `Performance metrics for ${name}:`,
        `- Time period: ${describeWindow(window)}`,
        `- Data points analyzed: ${report.summary.pointCount}`,
        `- RMSE: ${metrics.rmse.toFixed(2)} MW`,
        `- R²: ${metrics.rSquared.toFixed(3)}`,
        `- Alert level: ${metrics.alertLevel}`,
        `- Revenue impact: $${metrics.revenueImpact.toFixed(2)}`,
        fit,
        error,
      ].join('\n'),
      data: {
        rmse: metrics.rmse,
        r_squared: metrics.rSquared,
        deviation_percentage: metrics.deviationPercentage,
        revenue_impact: metrics.revenueImpact,
        alert_level: metrics.alertLevel,
        data_points_count: report.summary.pointCount,
        time_range: {
          start: window.start.toISOString(),
          end: window.end.toISOString(),
        },
      },
      chart_type: null,
      columns: null,
    };
  }

  private async worstComponents(
    siteId: string,
    window: DateRange,
    limit: number,
  ): Promise<DiagnosticResponse> {
    const site = await this.sitesService.getSite(siteId);
    const name = site.siteName ?? site.siteId;
    const samples = await this.telemetryService.getSkidSamples(
      siteId,
      window.start,
      window.end,
    );
    const skids = this.analyticsService.summarizeEntities(samples);
    if (skids.length === 0) {
      return noData(`No skids data available for site ${name}.`);
    }

    const components = skids
      .map((skid) => ({
        component_id: skid.entityId,
        component_name: skid.entityName,
        performance_ratio: performanceRatio(
          skid.avgActualPower,
          skid.avgExpectedPower,
        ),
        actual_power: skid.avgActualPower,
        expected_power: skid.avgExpectedPower,
      }))
      .filter((component) => component.performance_ratio > 0);
    const worst = rank(components, {
      by: 'performance_ratio',
      order: 'asc',
      limit,
    });

    if (worst.length === 0) {
      return {
        summary: `No performance issues detected for components at ${name}.`,
        data: { worst_skids: [] },
        chart_type: 'bar',
        columns: ['component_name', 'performance_ratio'],
      };
    }

    const lines = worst.map(
      (component, i) =>
        `${i + 1}. ${component.component_name}: ${percent(component.performance_ratio)} of expected power ` +
        `(actual ${component.actual_power.toFixed(1)} kW, expected ${component.expected_power.toFixed(1)} kW)`,
    );
    return {
      summary: [`Worst performing skids at ${name}:`, ...lines].join('\n'),
      data: { worst_skids: worst },
      chart_type: 'bar',
      columns: ['component_name', 'performance_ratio'],
    };
  }

  private async compareSkids(
    siteId: string,
    skidA: string,
    skidB: string,
    window: DateRange,
  ): Promise<DiagnosticResponse> {
    const site = await this.sitesService.getSite(siteId);
    const name = site.siteName ?? site.siteId;
    const samples = await this.telemetryService.getSkidSamples(
      siteId,
      window.start,
      window.end,
    );
    const skids = this.analyticsService.summarizeEntities(samples);

    const a = skids.find((skid) => skid.entityId === skidA);
    if (!a) {
      return noData(`No performance data available for skid ${skidA} at site ${name}.`);
    }
    const b = skids.find((skid) => skid.entityId === skidB);
    if (!b) {
      return noData(`No performance data available for skid ${skidB} at site ${name}.`);
    }

    const ratioA = performanceRatio(a.avgActualPower, a.avgExpectedPower);
    const ratioB = performanceRatio(b.avgActualPower, b.avgExpectedPower);
    const describeSkid = (skid: EntityPerformance, ratio: number): string[] => [
      `Skid ${skid.entityId}:`,
      `- Average actual power: ${skid.avgActualPower.toFixed(1)} kW`,
      `- Average expected power: ${skid.avgExpectedPower.toFixed(1)} kW`,
      `- Performance ratio: ${percent(ratio)}`,
      `- Data points: ${skid.dataPointCount}`,
    ];

    let conclusion: string;
    if (Math.abs(ratioA - ratioB) < SIMILAR_RATIO_DIFFERENCE) {
      conclusion = 'Both skids are performing similarly with less than 5% difference.';
    } else {
      const [leader, trailer] = ratioA > ratioB ? [skidA, skidB] : [skidB, skidA];
      const gap = (Math.abs(ratioA - ratioB) * 100).toFixed(1);
      conclusion = `Skid ${leader} is outperforming Skid ${trailer} by ${gap} percentage points.`;
    }

    const toRow = (skid: EntityPerformance, ratio: number) => ({
      skid_id: skid.entityId,
      performance_ratio: ratio,
      avg_actual_power: skid.avgActualPower,
      avg_expected_power: skid.avgExpectedPower,
      data_point_count: skid.dataPointCount,
    });
    return {
      summary: [
        `Skid comparison at ${name} (${describeWindow(window)}):`,
        ...describeSkid(a, ratioA),
        ...describeSkid(b, ratioB),
        conclusion,
      ].join('\n'),
      data: { skid_a: toRow(a, ratioA), skid_b: toRow(b, ratioB) },
      chart_type: 'bar',
      columns: ['skid_id', 'performance_ratio'],
    };
  }

  private async powerCurve(
    siteId: string,
    window: DateRange,
  ): Promise<DiagnosticResponse> {
    const site = await this.sitesService.getSite(siteId);
    const name = site.siteName ?? site.siteId;
    const samples = await this.telemetryService.getSiteSamples(
      siteId,
      window.start,
      window.end,
    );
    const report = this.analyticsService.buildReport(siteId, samples);
    if (report.isFallbackNeeded) {
      return noData(
        `No performance data available for site ${name} in the specified time range.`,
      );
    }

    const points = report.points.map((point) => ({
      timestamp: point.timestamp.toISOString(),
      poa_irradiance: point.irradiance,
      actual_power: point.actualPower,
      expected_power: point.expectedPower,
      performance_ratio: performanceRatio(point.actualPower, point.expectedPower),
    }));
    const underperforming = points.filter(
      (point) =>
        point.performance_ratio > 0 &&
        point.performance_ratio < UNDERPERFORMANCE_THRESHOLD,
    );

    const lines = [
      `Power curve analysis for ${name}:`,
      `- Time period: ${describeWindow(window)}`,
      `- Total data points: ${points.length}`,
      `- Underperforming periods: ${underperforming.length} (${percent(underperforming.length / points.length)} of time)`,
    ];
    if (underperforming.length > 0) {
      const avgRatio =
        underperforming.reduce((sum, p) => sum + p.performance_ratio, 0) /
        underperforming.length;
      const irradiance = underperforming.map((p) => p.poa_irradiance);
      lines.push(
        `- Average performance during underperformance: ${percent(avgRatio)} of expected`,
        `- Underperformance seen at irradiance between ${Math.min(...irradiance).toFixed(0)} and ${Math.max(...irradiance).toFixed(0)} W/m²`,
      );
    }

    return {
      summary: lines.join('\n'),
      data: { data_points: points, underperforming_points: underperforming },
      chart_type: 'scatter',
      columns: ['poa_irradiance', 'actual_power', 'expected_power'],
    };
  }
}
