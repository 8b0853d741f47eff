import { Controller, Get, Logger, Param, Query } from '@nestjs/common';
import { SitesService } from './sites.service';
import { dateRangeQuerySchema, parseOrThrow } from '../common/query-validation';
import {
  InvertersListResponse,
  toInverterDto,
} from './dto/performance-response.dto';

/**
 * SkidsController
 *
 * Endpoints:
 * - GET /api/skids/:skidId/inverters - Per-inverter metrics of a skid
 */
@Controller('api/skids')
export class SkidsController {
  private readonly logger = new Logger(SkidsController.name);

  constructor(private readonly sitesService: SitesService) {}

  @Get(':skidId/inverters')
  async getInverters(
    @Param('skidId') skidId: string,
    @Query() query: Record<string, unknown>,
  ): Promise<InvertersListResponse> {
    this.logger.log(`GET /api/skids/${skidId}/inverters with query: ${JSON.stringify(query)}`);
    const range = parseOrThrow(dateRangeQuerySchema, query);

    const inverters = await this.sitesService.getInverterPerformance(
      skidId,
      range.start_date,
      range.end_date,
    );
    return {
      skid_id: skidId,
      inverters: inverters.map(toInverterDto),
      total_count: inverters.length,
    };
  }
}
