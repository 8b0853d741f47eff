import { Controller, Get, Logger } from '@nestjs/common';
import {
  FinancialConfigService,
  RatesSummary,
} from './financial-config.service';

/**
 * FinancialController
 *
 * Endpoints:
 * - GET /api/financial/rates - Masked PPA rate summary
 */
@Controller('api/financial')
export class FinancialController {
  private readonly logger = new Logger(FinancialController.name);

  constructor(private readonly financialConfig: FinancialConfigService) {}

  /**
   * Rates are always masked over HTTP.
   *
   * @example
   * GET /api/financial/rates
   * Response: { default: "$5**00/MWh", sites: { asmb2: "$4**50/MWh" }, rates_configured: true }
   */
  @Get('rates')
  getRates(): RatesSummary {
    this.logger.log('GET /api/financial/rates');
    return this.financialConfig.getRatesSummary();
  }
}
