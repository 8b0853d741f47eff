import { Controller, Get, Logger, Param, Query } from '@nestjs/common';
import { SitesService } from './sites.service';
import { dateRangeQuerySchema, parseOrThrow } from '../common/query-validation';
import { EntityPerformance } from '../analytics/analytics.service';
import {
  LeaderboardResponse,
  SitePerformanceResponse,
  SitesListResponse,
  SkidsListResponse,
  toLeaderboardEntryDto,
  toSiteDetailsDto,
  toSitePerformanceResponse,
  toSkidDto,
} from './dto/performance-response.dto';
import {
  METRIC_FIELDS,
  leaderboardQuerySchema,
  skidsQuerySchema,
} from './dto/sites-query.dto';

/**
 * SitesController
 *
 * Endpoints:
 * - GET /api/sites - All sites with metadata
 * - GET /api/sites/leaderboard - Sites ranked on a metric
 * - GET /api/sites/:siteId/performance - Time series, summary and fit metrics
 * - GET /api/sites/:siteId/skids - Per-skid metrics
 */
@Controller('api/sites')
export class SitesController {
  private readonly logger = new Logger(SitesController.name);

  constructor(private readonly sitesService: SitesService) {}

  @Get()
  async listSites(): Promise<SitesListResponse> {
    const sites = await this.sitesService.listSites();
    return {
      sites: sites.map(toSiteDetailsDto),
      total_count: sites.length,
    };
  }

  /**
   * @example
   * GET /api/sites/leaderboard?start_date=2025-06-01T00:00:00Z&end_date=2025-07-01T00:00:00Z&by=rmse&order=desc&limit=5
   */
  @Get('leaderboard')
  async getLeaderboard(
    @Query() query: Record<string, unknown>,
  ): Promise<LeaderboardResponse> {
    this.logger.log(`GET /api/sites/leaderboard with query: ${JSON.stringify(query)}`);
    const params = parseOrThrow(leaderboardQuerySchema, query);

    const entries = await this.sitesService.getLeaderboard({
      start: params.start_date,
      end: params.end_date,
      by: METRIC_FIELDS[params.by],
      order: params.order,
      limit: params.limit,
    });
    return {
      by: params.by,
      order: params.order,
      entries: entries.map(toLeaderboardEntryDto),
      total_count: entries.length,
    };
  }

  /**
   * @example
   * GET /api/sites/ASMB2/performance?start_date=2025-06-01T00:00:00Z&end_date=2025-06-08T00:00:00Z
   */
  @Get(':siteId/performance')
  async getPerformance(
    @Param('siteId') siteId: string,
    @Query() query: Record<string, unknown>,
  ): Promise<SitePerformanceResponse> {
    this.logger.log(`GET /api/sites/${siteId}/performance with query: ${JSON.stringify(query)}`);
    const range = parseOrThrow(dateRangeQuerySchema, query);

    const { site, report, dataMonth } = await this.sitesService.getPerformance(
      siteId,
      range.start_date,
      range.end_date,
    );
    this.logger.log(
      `Returning ${report.summary.pointCount} points for ${siteId}${dataMonth ? ` (fallback ${dataMonth})` : ''}`,
    );
    return toSitePerformanceResponse(site, report, dataMonth);
  }

  @Get(':siteId/skids')
  async getSkids(
    @Param('siteId') siteId: string,
    @Query() query: Record<string, unknown>,
  ): Promise<SkidsListResponse> {
    this.logger.log(`GET /api/sites/${siteId}/skids with query: ${JSON.stringify(query)}`);
    const params = parseOrThrow(skidsQuerySchema, query);

    let skids: EntityPerformance[] = await this.sitesService.getSkidPerformance(
      siteId,
      params.start_date,
      params.end_date,
    );
    if (params.sort_by) {
      skids = this.sitesService.sortEntities(
        skids,
        METRIC_FIELDS[params.sort_by],
        params.order,
      );
    }
    return {
      site_id: siteId,
      skids: skids.map(toSkidDto),
      total_count: skids.length,
    };
  }
}
