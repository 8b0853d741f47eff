import { Test, TestingModule } from '@nestjs/testing';
import { AnalyticsService } from './analytics.service';
import { FinancialConfigService } from '../financial/financial-config.service';
import {
  hoursAfterBase,
  makeSample,
  twoSampleScenario,
} from '../../test/utils/mock-data';

describe('AnalyticsService', () => {
  let service: AnalyticsService;
  let mockFinancialConfig: { getRateConfig: jest.Mock };

  beforeEach(async () => {
    mockFinancialConfig = {
      getRateConfig: jest.fn().mockReturnValue({
        defaultRate: 50,
        entityRates: { 'skid-b': 100 },
      }),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AnalyticsService,
        { provide: FinancialConfigService, useValue: mockFinancialConfig },
      ],
    }).compile();

    service = module.get<AnalyticsService>(AnalyticsService);
  });

  describe('buildReport', () => {
    it('should treat telemetry as kW and report RMSE in MW', () => {
      const report = service.buildReport('SITE001', twoSampleScenario());

      expect(report.summary.metrics.rmse).toBeCloseTo(0.01, 12);
      expect(report.summary.metrics.revenueImpact).toBe(360);
      expect(report.summary.metrics.alertLevel).toBe('GOOD');
    });
  });

  describe('summarizeEntities', () => {
    const samples = [
      ...twoSampleScenario('SKID-A'),
      makeSample({ entityId: 'SKID-A', availability: 0 }),
      makeSample({
        entityId: 'SKID-B',
        timestamp: hoursAfterBase(0),
        actualPower: 90,
        expectedPower: 100,
      }),
      makeSample({ entityId: 'SKID-B', availability: Number.NaN }),
      makeSample({ entityId: 'SKID-C', availability: 0.2 }),
    ];

    it('should produce one row per entity with valid data, in first-seen order', () => {
      const rows = service.summarizeEntities(samples);

      expect(rows.map((r) => r.entityId)).toEqual(['SKID-A', 'SKID-B']);
    });

    it('should aggregate valid samples per entity', () => {
      const [skidA] = service.summarizeEntities(
        samples,
        new Map([['SKID-A', 'Skid A']]),
      );

      expect(skidA).toEqual({
        entityId: 'SKID-A',
        entityName: 'Skid A',
        avgActualPower: 225,
        avgExpectedPower: 235,
        avgIrradiance: 150,
        deviationPercentage: expect.closeTo(((225 - 235) / 235) * 100, 10),
        dataPointCount: 2,
        availability: expect.closeTo(2 / 3, 12),
        rmse: expect.closeTo(0.01, 12),
        rSquared: expect.closeTo(1 - 200 / 11250, 12),
        revenueImpact: 360,
        alertLevel: 'GOOD',
      });
    });

    it('should average availability over readings that report one', () => {
      const skidB = service.summarizeEntities(samples)[1];

      expect(skidB.entityName).toBe('SKID-B');
      expect(skidB.availability).toBe(1);
      expect(skidB.deviationPercentage).toBeCloseTo(-10, 10);
      expect(skidB.rSquared).toBe(0);
      expect(skidB.alertLevel).toBe('CRITICAL');
    });

    it('should price each entity at its own rate', () => {
      const skidB = service.summarizeEntities(samples)[1];

      // 0.01 MW x 720 h x 100/MWh
      expect(skidB.revenueImpact).toBe(720);
    });

    it('should return no rows for no samples', () => {
      expect(service.summarizeEntities([])).toEqual([]);
    });
  });

  describe('rankEntities', () => {
    it('should rank rows on a metric', () => {
      const rows = service.summarizeEntities([
        ...twoSampleScenario('GOOD-FIT'),
        makeSample({ entityId: 'SINGLE', actualPower: 50, expectedPower: 60 }),
      ]);

      const ranked = service.rankEntities(rows, {
        by: 'rSquared',
        order: 'asc',
        limit: 1,
      });

      expect(ranked.map((r) => r.entityId)).toEqual(['SINGLE']);
    });
  });
});
