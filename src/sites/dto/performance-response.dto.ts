import { PerformanceReport } from '../../analytics';
import { EntityPerformance } from '../../analytics/analytics.service';
import { Site } from '../../database/entities/site.entity';

/**
 * Wire format for the chart and drill-down views. Field names are
 * snake_case to match the dashboard clients.
 */

export interface SiteDetailsDto {
  site_id: string;
  site_name: string | null;
  location: string | null;
  capacity_kw: number | null;
  installation_date: string | null;
}

export interface SitesListResponse {
  sites: SiteDetailsDto[];
  total_count: number;
}

export interface PerformanceDataPointDto {
  timestamp: string;
  site_id: string;
  poa_irradiance: number;
  actual_power: number;
  expected_power: number;
  inverter_availability: number;
}

export interface SiteDataSummaryDto {
  data_point_count: number;
  avg_actual_power: number;
  avg_expected_power: number;
  avg_poa_irradiance: number;
  first_reading: string | null;
  last_reading: string | null;
  total_actual_energy: number;
  total_expected_energy: number;
  performance_ratio: number;
}

export interface SitePerformanceResponse {
  site_id: string;
  site_name: string | null;
  data_points: PerformanceDataPointDto[];
  summary: SiteDataSummaryDto;
  rmse: number;
  r_squared: number;
  deviation_percentage: number;
  revenue_impact: number;
  alert_level: string;
  /** True when the previous calendar month was served instead */
  data_fallback: boolean;
  /** 'YYYY-MM' of the month served when data_fallback is set */
  data_month: string | null;
}

export interface SkidPerformanceDto {
  skid_id: string;
  skid_name: string;
  avg_actual_power: number;
  avg_expected_power: number;
  deviation_percentage: number;
  data_point_count: number;
}

export interface SkidsListResponse {
  site_id: string;
  skids: SkidPerformanceDto[];
  total_count: number;
}

export interface InverterPerformanceDto {
  inverter_id: string;
  inverter_name: string;
  avg_actual_power: number;
  avg_expected_power: number;
  deviation_percentage: number;
  availability: number;
  data_point_count: number;
}

export interface InvertersListResponse {
  skid_id: string;
  inverters: InverterPerformanceDto[];
  total_count: number;
}

export interface LeaderboardEntryDto {
  entity_id: string;
  entity_name: string;
  avg_actual_power: number;
  avg_expected_power: number;
  deviation_percentage: number;
  data_point_count: number;
  rmse: number;
  r_squared: number;
  revenue_impact: number;
  alert_level: string;
}

export interface LeaderboardResponse {
  by: string;
  order: string;
  entries: LeaderboardEntryDto[];
  total_count: number;
}

export function toSiteDetailsDto(site: Site): SiteDetailsDto {
  return {
    site_id: site.siteId,
    site_name: site.siteName,
    location: site.location,
    capacity_kw: site.capacityKw,
    installation_date: site.installationDate,
  };
}

export function toSitePerformanceResponse(
  site: Site,
  report: PerformanceReport,
  dataMonth: string | null,
): SitePerformanceResponse {
  const { summary } = report;
  return {
    site_id: site.siteId,
    site_name: site.siteName,
    data_points: report.points.map((point) => ({
      timestamp: point.timestamp.toISOString(),
      site_id: point.entityId,
      poa_irradiance: point.irradiance,
      actual_power: point.actualPower,
      expected_power: point.expectedPower,
      inverter_availability: point.availability,
    })),
    summary: {
      data_point_count: summary.pointCount,
      avg_actual_power: summary.avgActual,
      avg_expected_power: summary.avgExpected,
      avg_poa_irradiance: summary.avgIrradiance,
      first_reading: summary.dateRange?.start.toISOString() ?? null,
      last_reading: summary.dateRange?.end.toISOString() ?? null,
      total_actual_energy: summary.totalActualEnergy,
      total_expected_energy: summary.totalExpectedEnergy,
      performance_ratio: summary.performanceRatio,
    },
    rmse: summary.metrics.rmse,
    r_squared: summary.metrics.rSquared,
    deviation_percentage: summary.metrics.deviationPercentage,
    revenue_impact: summary.metrics.revenueImpact,
    alert_level: summary.metrics.alertLevel,
    data_fallback: dataMonth !== null,
    data_month: dataMonth,
  };
}

export function toSkidDto(entity: EntityPerformance): SkidPerformanceDto {
  return {
    skid_id: entity.entityId,
    skid_name: entity.entityName,
    avg_actual_power: entity.avgActualPower,
    avg_expected_power: entity.avgExpectedPower,
    deviation_percentage: entity.deviationPercentage,
    data_point_count: entity.dataPointCount,
  };
}

export function toInverterDto(entity: EntityPerformance): InverterPerformanceDto {
  return {
    inverter_id: entity.entityId,
    inverter_name: entity.entityName,
    avg_actual_power: entity.avgActualPower,
    avg_expected_power: entity.avgExpectedPower,
    deviation_percentage: entity.deviationPercentage,
    availability: entity.availability,
    data_point_count: entity.dataPointCount,
  };
}

export function toLeaderboardEntryDto(
  entity: EntityPerformance,
): LeaderboardEntryDto {
  return {
    entity_id: entity.entityId,
    entity_name: entity.entityName,
    avg_actual_power: entity.avgActualPower,
    avg_expected_power: entity.avgExpectedPower,
    deviation_percentage: entity.deviationPercentage,
    data_point_count: entity.dataPointCount,
    rmse: entity.rmse,
    r_squared: entity.rSquared,
    revenue_impact: entity.revenueImpact,
    alert_level: entity.alertLevel,
  };
}
