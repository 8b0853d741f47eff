import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Site } from '../database/entities/site.entity';
import { TelemetryService } from '../telemetry/telemetry.service';
import {
  AnalyticsService,
  EntityMetricKey,
  EntityPerformance,
} from '../analytics/analytics.service';
import { PerformanceReport, RankOrder } from '../analytics';
import { formatMonth, previousCalendarMonth } from '../common/date-utils';

export interface SitePerformanceResult {
  site: Site;
  report: PerformanceReport;
  /** 'YYYY-MM' when the previous calendar month was served instead */
  dataMonth: string | null;
}

export interface LeaderboardQuery {
  start: Date;
  end: Date;
  by: EntityMetricKey;
  order: RankOrder;
  limit: number;
}

/**
 * SitesService
 *
 * Joins site metadata with the analytics engine for the portfolio,
 * site, skid and inverter views.
 */
@Injectable()
export class SitesService {
  private readonly logger = new Logger(SitesService.name);

  constructor(
    @InjectRepository(Site)
    private readonly siteRepository: Repository<Site>,
    private readonly telemetryService: TelemetryService,
    private readonly analyticsService: AnalyticsService,
  ) {}

  async listSites(): Promise<Site[]> {
    return this.siteRepository.find({ order: { siteId: 'ASC' } });
  }

  /**
   * @throws NotFoundException when the site is unknown
   */
  async getSite(siteId: string): Promise<Site> {
    const site = await this.siteRepository.findOne({ where: { siteId } });
    if (!site) {
      throw new NotFoundException({
        error: 'SiteNotFound',
        message: `Site with ID '${siteId}' not found`,
        details: { site_id: siteId },
      });
    }
    return site;
  }

  /**
   * Performance report for a site window.
   *
   * When the window has no valid points the previous calendar month of
   * `start` is tried once; the result is flagged through `dataMonth`.
   *
   * @throws NotFoundException when the site is unknown or both windows are empty
   */
  async getPerformance(
    siteId: string,
    start: Date,
    end: Date,
  ): Promise<SitePerformanceResult> {
    const site = await this.getSite(siteId);

    const samples = await this.telemetryService.getSiteSamples(siteId, start, end);
    const report = this.analyticsService.buildReport(siteId, samples);
    if (!report.isFallbackNeeded) {
      return { site, report, dataMonth: null };
    }

    const fallback = previousCalendarMonth(start);
    this.logger.log(
      `No valid data for ${siteId} (${report.fallbackReason}), falling back to ${formatMonth(fallback.start)}`,
    );
    const fallbackSamples = await this.telemetryService.getSiteSamples(
      siteId,
      fallback.start,
      fallback.end,
    );
    const fallbackReport = this.analyticsService.buildReport(
      siteId,
      fallbackSamples,
    );
    if (fallbackReport.isFallbackNeeded) {
      throw new NotFoundException({
        error: 'NoDataFound',
        message: `No performance data found for site '${siteId}' in the specified date range`,
        details: {
          site_id: siteId,
          start_date: start.toISOString(),
          end_date: end.toISOString(),
        },
      });
    }
    return {
      site,
      report: fallbackReport,
      dataMonth: formatMonth(fallback.start),
    };
  }

  /**
   * One row per skid of a site, in skid id order.
   *
   * @throws NotFoundException when the site is unknown or has no valid skid data
   */
  async getSkidPerformance(
    siteId: string,
    start: Date,
    end: Date,
  ): Promise<EntityPerformance[]> {
    await this.getSite(siteId);
    const samples = await this.telemetryService.getSkidSamples(siteId, start, end);
    const skids = this.analyticsService.summarizeEntities(samples);
    if (skids.length === 0) {
      throw new NotFoundException({
        error: 'NoDataFound',
        message: `No skids data found for site '${siteId}' in the specified date range`,
        details: {
          site_id: siteId,
          start_date: start.toISOString(),
          end_date: end.toISOString(),
        },
      });
    }
    return skids;
  }

  /**
   * One row per inverter of a skid, in inverter id order.
   *
   * @throws NotFoundException when the skid has no valid data
   */
  async getInverterPerformance(
    skidId: string,
    start: Date,
    end: Date,
  ): Promise<EntityPerformance[]> {
    const samples = await this.telemetryService.getInverterSamples(
      skidId,
      start,
      end,
    );
    const inverters = this.analyticsService.summarizeEntities(samples);
    if (inverters.length === 0) {
      throw new NotFoundException({
        error: 'NoDataFound',
        message: `No inverters data found for skid '${skidId}' in the specified date range`,
        details: {
          skid_id: skidId,
          start_date: start.toISOString(),
          end_date: end.toISOString(),
        },
      });
    }
    return inverters;
  }

  /**
   * Site-level metrics for every site, unranked, in site id order.
   * Sites without valid data in the window are left out.
   */
  async getPortfolioPerformance(
    start: Date,
    end: Date,
  ): Promise<EntityPerformance[]> {
    const sites = await this.listSites();
    const perSite = await Promise.all(
      sites.map((site) =>
        this.telemetryService.getSiteSamples(site.siteId, start, end),
      ),
    );
    const names = new Map(
      sites.map((site) => [site.siteId, site.siteName ?? site.siteId]),
    );
    return this.analyticsService.summarizeEntities(perSite.flat(), names);
  }

  /**
   * Full ordering of already-fetched rows, no limit.
   */
  sortEntities(
    entities: readonly EntityPerformance[],
    by: EntityMetricKey,
    order: RankOrder,
  ): EntityPerformance[] {
    return this.analyticsService.rankEntities(entities, { by, order, limit: 0 });
  }

  async getLeaderboard(query: LeaderboardQuery): Promise<EntityPerformance[]> {
    const portfolio = await this.getPortfolioPerformance(query.start, query.end);
    this.logger.debug(
      `Ranking ${portfolio.length} sites by ${query.by} ${query.order}`,
    );
    return this.analyticsService.rankEntities(portfolio, {
      by: query.by,
      order: query.order,
      limit: query.limit,
    });
  }
}
