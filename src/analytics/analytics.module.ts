import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { FinancialModule } from '../financial/financial.module';
import { AnalyticsService } from './analytics.service';
import { ContractViolationFilter } from './contract-violation.filter';

/**
 * AnalyticsModule
 *
 * Exposes the performance-deviation engine to the HTTP modules and
 * registers the app-wide filter that turns contract violations into 400s.
 */
@Module({
  imports: [FinancialModule],
  providers: [
    AnalyticsService,
    { provide: APP_FILTER, useClass: ContractViolationFilter },
  ],
  exports: [AnalyticsService],
})
export class AnalyticsModule {}
