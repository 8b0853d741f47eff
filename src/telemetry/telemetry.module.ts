import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { SiteTelemetry } from '../database/entities/site-telemetry.entity';
import { ComponentTelemetry } from '../database/entities/component-telemetry.entity';
import { TelemetryService } from './telemetry.service';

/**
 * TelemetryModule
 *
 * Read-only warehouse access. Produces engine Samples.
 */
@Module({
  imports: [TypeOrmModule.forFeature([SiteTelemetry, ComponentTelemetry])],
  providers: [TelemetryService],
  exports: [TelemetryService],
})
export class TelemetryModule {}
