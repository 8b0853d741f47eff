import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { FinancialConfigService } from './financial-config.service';

async function createService(
  env: Record<string, string | undefined>,
): Promise<FinancialConfigService> {
  const module: TestingModule = await Test.createTestingModule({
    providers: [
      FinancialConfigService,
      {
        provide: ConfigService,
        useValue: { get: jest.fn((key: string) => env[key]) },
      },
    ],
  }).compile();

  return module.get<FinancialConfigService>(FinancialConfigService);
}

describe('FinancialConfigService', () => {
  describe('defaults', () => {
    it('should use 50/MWh when nothing is configured', async () => {
      const service = await createService({});

      expect(service.getPpaRate()).toBe(50);
      expect(service.getPpaRate('SITE001')).toBe(50);
      expect(service.getRateConfig()).toEqual({ defaultRate: 50, entityRates: {} });
    });

    it('should ignore an invalid DEFAULT_PPA_RATE', async () => {
      const service = await createService({ DEFAULT_PPA_RATE: 'fifty' });
      expect(service.getPpaRate()).toBe(50);
    });

    it('should ignore a negative DEFAULT_PPA_RATE', async () => {
      const service = await createService({ DEFAULT_PPA_RATE: '-3' });
      expect(service.getPpaRate()).toBe(50);
    });

    it('should read DEFAULT_PPA_RATE', async () => {
      const service = await createService({ DEFAULT_PPA_RATE: '65.5' });
      expect(service.getPpaRate()).toBe(65.5);
    });
  });

  describe('site overrides', () => {
    it('should look up site rates case-insensitively', async () => {
      const service = await createService({
        SITE_PPA_RATES: '{"SITE001": 75}',
      });

      expect(service.getPpaRate('SITE001')).toBe(75);
      expect(service.getPpaRate('site001')).toBe(75);
      expect(service.getPpaRate('SITE002')).toBe(50);
    });

    it('should ignore malformed JSON', async () => {
      const service = await createService({ SITE_PPA_RATES: '{not json' });
      expect(service.getRateConfig().entityRates).toEqual({});
    });

    it('should ignore rates that fail validation', async () => {
      const service = await createService({
        SITE_PPA_RATES: '{"SITE001": -10}',
      });
      expect(service.getRateConfig().entityRates).toEqual({});
    });

    it('should hand out a copy of the rate table', async () => {
      const service = await createService({
        SITE_PPA_RATES: '{"SITE001": 75}',
      });

      service.getRateConfig().entityRates.site001 = 1;

      expect(service.getPpaRate('SITE001')).toBe(75);
    });
  });

  describe('config file', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'financial-config-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should layer the file over environment settings', async () => {
      const file = path.join(dir, 'financial.json');
      fs.writeFileSync(
        file,
        JSON.stringify({ default_ppa_rate: 40, site_ppa_rates: { Site002: 90 } }),
      );

      const service = await createService({
        DEFAULT_PPA_RATE: '65',
        SITE_PPA_RATES: '{"SITE001": 75}',
        FINANCIAL_CONFIG_PATH: file,
      });

      expect(service.getRateConfig()).toEqual({
        defaultRate: 40,
        entityRates: { site001: 75, site002: 90 },
      });
    });

    it('should skip an invalid file', async () => {
      const file = path.join(dir, 'financial.json');
      fs.writeFileSync(file, JSON.stringify({ default_ppa_rate: 'high' }));

      const service = await createService({
        DEFAULT_PPA_RATE: '65',
        FINANCIAL_CONFIG_PATH: file,
      });

      expect(service.getPpaRate()).toBe(65);
    });

    it('should skip a missing file', async () => {
      const service = await createService({
        FINANCIAL_CONFIG_PATH: path.join(dir, 'missing.json'),
      });

      expect(service.getPpaRate()).toBe(50);
    });
  });

  describe('getMaskedRate', () => {
    it('should keep the first digit and the cents', async () => {
      const service = await createService({});
      expect(service.getMaskedRate()).toBe('$5**00/MWh');
    });

    it('should mask longer rates', async () => {
      const service = await createService({ DEFAULT_PPA_RATE: '123.45' });
      expect(service.getMaskedRate()).toBe('$1***45/MWh');
    });

    it('should fully mask single-digit rates', async () => {
      const service = await createService({ DEFAULT_PPA_RATE: '5' });
      expect(service.getMaskedRate()).toBe('$**.**/MWh');
    });
  });

  describe('getRatesSummary', () => {
    it('should mask every configured rate', async () => {
      const service = await createService({
        SITE_PPA_RATES: '{"SITE001": 75}',
      });

      expect(service.getRatesSummary()).toEqual({
        default: '$5**00/MWh',
        sites: { site001: '$7**00/MWh' },
        rates_configured: true,
      });
    });

    it('should report when no site rates are configured', async () => {
      const service = await createService({});

      expect(service.getRatesSummary()).toEqual({
        default: '$5**00/MWh',
        sites: {},
        rates_configured: false,
      });
    });
  });
});
