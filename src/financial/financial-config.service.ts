import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs';
import { z } from 'zod';
import { DEFAULT_PPA_RATE, PpaRateConfig, resolvePpaRate } from '../analytics';

const siteRatesSchema = z.record(z.string(), z.number().nonnegative());

/**
 * Shape of the optional JSON file at FINANCIAL_CONFIG_PATH.
 */
const financialFileSchema = z.object({
  default_ppa_rate: z.number().nonnegative().optional(),
  site_ppa_rates: siteRatesSchema.optional(),
});

export interface RatesSummary {
  default: string;
  sites: Record<string, string>;
  rates_configured: boolean;
}

function lowerCaseKeys(rates: Record<string, number>): Record<string, number> {
  const result: Record<string, number> = {};
  for (const [key, value] of Object.entries(rates)) {
    result[key.toLowerCase()] = value;
  }
  return result;
}

/**
 * FinancialConfigService - PPA rate table
 *
 * Sources, later ones winning:
 * 1. DEFAULT_PPA_RATE (number) and SITE_PPA_RATES (JSON object) env vars
 * 2. JSON file at FINANCIAL_CONFIG_PATH, if set and present
 *
 * Every malformed source is logged and ignored; the portfolio default
 * (50.0/MWh) applies when nothing valid is configured.
 *
 * The engine never reads this service directly. Callers hand the
 * resulting PpaRateConfig to the metrics calculator per call.
 */
@Injectable()
export class FinancialConfigService {
  private readonly logger = new Logger(FinancialConfigService.name);
  private readonly rateConfig: PpaRateConfig;

  constructor(private readonly configService: ConfigService) {
    this.rateConfig = this.loadConfig();
    this.logger.log(
      `Loaded PPA rates: default=${this.rateConfig.defaultRate}, site overrides=${Object.keys(this.rateConfig.entityRates).length}`,
    );
  }

  private loadConfig(): PpaRateConfig {
    let defaultRate = DEFAULT_PPA_RATE;
    let entityRates: Record<string, number> = {};

    const rawDefault = this.configService.get<string>('DEFAULT_PPA_RATE');
    if (rawDefault !== undefined && rawDefault !== '') {
      const parsed = Number(rawDefault);
      if (Number.isFinite(parsed) && parsed >= 0) {
        defaultRate = parsed;
      } else {
        this.logger.warn(
          `Invalid DEFAULT_PPA_RATE "${rawDefault}", using ${DEFAULT_PPA_RATE}`,
        );
      }
    }

    const rawSiteRates = this.configService.get<string>('SITE_PPA_RATES');
    if (rawSiteRates) {
      const parsed = this.parseJson(rawSiteRates, siteRatesSchema);
      if (parsed) {
        entityRates = lowerCaseKeys(parsed);
      } else {
        this.logger.warn('Invalid SITE_PPA_RATES, ignoring site overrides');
      }
    }

    const configPath = this.configService.get<string>('FINANCIAL_CONFIG_PATH');
    if (configPath && fs.existsSync(configPath)) {
      const parsed = this.parseJson(
        fs.readFileSync(configPath, 'utf-8'),
        financialFileSchema,
      );
      if (parsed) {
        defaultRate = parsed.default_ppa_rate ?? defaultRate;
        entityRates = {
          ...entityRates,
          ...lowerCaseKeys(parsed.site_ppa_rates ?? {}),
        };
        this.logger.debug(`Applied financial config from ${configPath}`);
      } else {
        this.logger.warn(`Invalid financial config file ${configPath}, skipped`);
      }
    }

    return { defaultRate, entityRates };
  }

  private parseJson<T>(raw: string, schema: z.ZodType<T>): T | null {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      return null;
    }
    const result = schema.safeParse(json);
    return result.success ? result.data : null;
  }

  /**
   * Rate table to pass into the metrics calculator.
   */
  getRateConfig(): PpaRateConfig {
    return {
      defaultRate: this.rateConfig.defaultRate,
      entityRates: { ...this.rateConfig.entityRates },
    };
  }

  /**
   * PPA rate in $/MWh for a site, or the default.
   */
  getPpaRate(siteId?: string): number {
    return resolvePpaRate(this.rateConfig, siteId);
  }

  /**
   * Rate formatted for display, all but the first digit and the cents
   * masked.
   *
   * @example
   * getMaskedRate() // '$5**00/MWh' for 50.00
   */
  getMaskedRate(siteId?: string): string {
    const rateStr = this.getPpaRate(siteId).toFixed(2);
    if (rateStr.length > 4) {
      const masked =
        rateStr[0] + '*'.repeat(rateStr.length - 3) + rateStr.slice(-2);
      return `$${masked}/MWh`;
    }
    return '$**.**/MWh';
  }

  getRatesSummary(): RatesSummary {
    const sites: Record<string, string> = {};
    for (const siteId of Object.keys(this.rateConfig.entityRates)) {
      sites[siteId] = this.getMaskedRate(siteId);
    }
    return {
      default: this.getMaskedRate(),
      sites,
      rates_configured: Object.keys(sites).length > 0,
    };
  }
}
