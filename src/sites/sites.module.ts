import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Site } from '../database/entities/site.entity';
import { TelemetryModule } from '../telemetry/telemetry.module';
import { AnalyticsModule } from '../analytics/analytics.module';
import { SitesController } from './sites.controller';
import { SkidsController } from './skids.controller';
import { SitesService } from './sites.service';

/**
 * SitesModule
 *
 * Portfolio, site, skid and inverter read endpoints.
 */
@Module({
  imports: [TypeOrmModule.forFeature([Site]), TelemetryModule, AnalyticsModule],
  controllers: [SitesController, SkidsController],
  providers: [SitesService],
  exports: [SitesService],
})
export class SitesModule {}
