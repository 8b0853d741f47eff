import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { FinancialConfigService } from './financial-config.service';
import { FinancialController } from './financial.controller';

/**
 * FinancialModule
 *
 * Owns the PPA rate table used to price RMSE into revenue impact.
 */
@Module({
  imports: [ConfigModule],
  controllers: [FinancialController],
  providers: [FinancialConfigService],
  exports: [FinancialConfigService],
})
export class FinancialModule {}
