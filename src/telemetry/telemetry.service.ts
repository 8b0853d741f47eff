import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository, Between } from 'typeorm';
import { SiteTelemetry } from '../database/entities/site-telemetry.entity';
import { ComponentTelemetry } from '../database/entities/component-telemetry.entity';
import { Sample } from '../analytics';

/**
 * Columns shared by site and component telemetry rows.
 */
type TelemetryRow = Pick<
  SiteTelemetry,
  | 'timestamp'
  | 'poaIrradiance'
  | 'actualPower'
  | 'expectedPower'
  | 'inverterAvailability'
>;

/**
 * Map a warehouse row to an engine Sample.
 *
 * Null power or availability becomes NaN so the validator rejects the row.
 * Null irradiance becomes 0; it is informational and never gates a sample.
 */
export function toSample(row: TelemetryRow, entityId: string): Sample {
  return {
    timestamp: new Date(row.timestamp),
    entityId,
    irradiance: row.poaIrradiance ?? 0,
    actualPower: row.actualPower ?? Number.NaN,
    expectedPower: row.expectedPower ?? Number.NaN,
    availability: row.inverterAvailability ?? Number.NaN,
  };
}

/**
 * TelemetryService - warehouse access for the analytics engine
 *
 * Returns every row in the window, unavailable ones included; filtering
 * is the engine's job so that "no rows" and "no valid rows" stay
 * distinguishable in the report.
 */
@Injectable()
export class TelemetryService {
  private readonly logger = new Logger(TelemetryService.name);

  constructor(
    @InjectRepository(SiteTelemetry)
    private readonly siteTelemetryRepository: Repository<SiteTelemetry>,
    @InjectRepository(ComponentTelemetry)
    private readonly componentTelemetryRepository: Repository<ComponentTelemetry>,
  ) {}

  /**
   * Site-level samples, entityId = siteId.
   */
  async getSiteSamples(
    siteId: string,
    start: Date,
    end: Date,
  ): Promise<Sample[]> {
    this.logger.debug(
      `Fetching site telemetry for ${siteId} from ${start.toISOString()} to ${end.toISOString()}`,
    );

    try {
      const rows = await this.siteTelemetryRepository.find({
        where: { siteId, timestamp: Between(start, end) },
        order: { timestamp: 'ASC' },
      });
      this.logger.debug(`Found ${rows.length} site rows for ${siteId}`);
      return rows.map((row) => toSample(row, row.siteId));
    } catch (error) {
      this.logger.error(
        `Failed to fetch site telemetry for ${siteId}: ${error instanceof Error ? error.message : String(error)}`,
      );
      throw error;
    }
  }

  /**
   * Inverter readings of a site, keyed by skid (entityId = skidId).
   */
  async getSkidSamples(
    siteId: string,
    start: Date,
    end: Date,
  ): Promise<Sample[]> {
    const rows = await this.findComponentRows({ siteId }, start, end);
    return rows.map((row) => toSample(row, row.skidId));
  }

  /**
   * Inverter readings of a skid, keyed by inverter (entityId = inverterId).
   */
  async getInverterSamples(
    skidId: string,
    start: Date,
    end: Date,
  ): Promise<Sample[]> {
    const rows = await this.findComponentRows({ skidId }, start, end);
    return rows.map((row) => toSample(row, row.inverterId));
  }

  private async findComponentRows(
    filter: { siteId: string } | { skidId: string },
    start: Date,
    end: Date,
  ): Promise<ComponentTelemetry[]> {
    const label = 'siteId' in filter ? `site ${filter.siteId}` : `skid ${filter.skidId}`;
    this.logger.debug(
      `Fetching component telemetry for ${label} from ${start.toISOString()} to ${end.toISOString()}`,
    );

    try {
      const rows = await this.componentTelemetryRepository.find({
        where: { ...filter, timestamp: Between(start, end) },
        order: { skidId: 'ASC', inverterId: 'ASC', timestamp: 'ASC' },
      });
      this.logger.debug(`Found ${rows.length} component rows for ${label}`);
      return rows;
    } catch (error) {
      this.logger.error(
        `Failed to fetch component telemetry for ${label}: ${error instanceof Error ? error.message : String(error)}`,
      );
      throw error;
    }
  }
}
