import {
  NO_SAMPLES_REASON,
  buildReport,
} from './performance-report.builder';
import {
  hoursAfterBase,
  makeSample,
  twoSampleScenario,
} from '../../test/utils/mock-data';

describe('buildReport', () => {
  it('should summarise valid samples in chronological order', () => {
    const [early, late] = twoSampleScenario();
    const rejected = makeSample({
      timestamp: hoursAfterBase(2),
      availability: 0.8,
    });

    const report = buildReport('SITE001', [late, rejected, early]);

    expect(report.entityId).toBe('SITE001');
    expect(report.points).toEqual([early, late]);
    expect(report.isFallbackNeeded).toBe(false);
    expect(report.fallbackReason).toBeNull();
    expect(report.summary).toEqual({
      pointCount: 2,
      dateRange: { start: hoursAfterBase(0), end: hoursAfterBase(1) },
      avgActual: 225,
      avgExpected: 235,
      avgIrradiance: 150,
      totalActualEnergy: 450,
      totalExpectedEnergy: 470,
      performanceRatio: 450 / 470,
      metrics: expect.objectContaining({ rmse: 10, sampleCount: 2 }),
    });
  });

  it('should flag an empty window as needing fallback', () => {
    const report = buildReport('SITE001', []);

    expect(report.isFallbackNeeded).toBe(true);
    expect(report.fallbackReason).toBe(NO_SAMPLES_REASON);
    expect(report.points).toEqual([]);
    expect(report.summary.pointCount).toBe(0);
    expect(report.summary.dateRange).toBeNull();
    expect(report.summary.metrics.rmse).toBe(0);
  });

  it('should tell a fully rejected window apart from an empty one', () => {
    const report = buildReport('SITE001', [
      makeSample({ availability: 0 }),
      makeSample({ actualPower: -5 }),
    ]);

    expect(report.isFallbackNeeded).toBe(true);
    expect(report.fallbackReason).toBe('All 2 samples failed validation');
  });

  it('should not flag fallback for present zero-valued samples', () => {
    const report = buildReport('SITE001', [
      makeSample({ timestamp: hoursAfterBase(0), actualPower: 0, expectedPower: 0 }),
      makeSample({ timestamp: hoursAfterBase(1), actualPower: 0, expectedPower: 0 }),
    ]);

    expect(report.isFallbackNeeded).toBe(false);
    expect(report.fallbackReason).toBeNull();
    expect(report.summary.pointCount).toBe(2);
    expect(report.summary.totalExpectedEnergy).toBe(0);
    expect(report.summary.performanceRatio).toBe(0);
  });

  it('should keep input order for equal timestamps', () => {
    const first = makeSample({ irradiance: 1 });
    const second = makeSample({ irradiance: 2 });

    expect(buildReport('SITE001', [first, second]).points).toEqual([first, second]);
    expect(buildReport('SITE001', [first, second]).points[0]).toBe(first);
  });

  it('should scale energy by the sample interval', () => {
    const report = buildReport('SITE001', twoSampleScenario(), {
      intervalHours: 0.25,
    });

    expect(report.summary.totalActualEnergy).toBe(112.5);
    expect(report.summary.totalExpectedEnergy).toBe(117.5);
  });

  it('should price revenue impact with the entity rate', () => {
    const report = buildReport('SITE001', twoSampleScenario(), {
      powerUnit: 'kW',
      ppaRates: { defaultRate: 50, entityRates: { site001: 80 } },
    });

    // 0.01 MW x 720 h x 80/MWh
    expect(report.summary.metrics.revenueImpact).toBe(576);
    expect(report.summary.metrics.alertLevel).toBe('GOOD');
  });
});
