import {
  ALL_BUCKET_KEY,
  ANY_ENTITY_KEY,
  aggregate,
  avgActualPower,
  avgExpectedPower,
  bucketKeyFor,
  isGroupBy,
  isTimeBucket,
} from './aggregator';
import { ContractViolationError } from './analytics.errors';
import { makeSample } from '../../test/utils/mock-data';

describe('aggregator', () => {
  describe('bucketKeyFor', () => {
    const ts = new Date('2024-03-05T22:10:00.000Z');

    it('should use the UTC calendar day for daily buckets', () => {
      expect(bucketKeyFor(ts, 'daily')).toBe('2024-03-05');
    });

    it('should use the UTC month for monthly buckets', () => {
      expect(bucketKeyFor(ts, 'monthly')).toBe('2024-03');
    });

    it('should collapse everything for the all bucket', () => {
      expect(bucketKeyFor(ts, 'all')).toBe(ALL_BUCKET_KEY);
    });
  });

  describe('type guards', () => {
    it('should recognise known keys only', () => {
      expect(isGroupBy('both')).toBe(true);
      expect(isGroupBy('hourly')).toBe(false);
      expect(isTimeBucket('monthly')).toBe(true);
      expect(isTimeBucket('weekly')).toBe(false);
    });
  });

  describe('aggregate', () => {
    const samples = [
      makeSample({
        entityId: 'B',
        timestamp: new Date('2024-03-01T10:00:00Z'),
        actualPower: 10,
        expectedPower: 20,
        irradiance: 100,
      }),
      makeSample({
        entityId: 'A',
        timestamp: new Date('2024-03-01T11:00:00Z'),
        actualPower: 30,
        expectedPower: 40,
        irradiance: 300,
      }),
      makeSample({
        entityId: 'B',
        timestamp: new Date('2024-03-02T10:00:00Z'),
        actualPower: 50,
        expectedPower: 60,
        irradiance: 500,
      }),
    ];

    it('should return an empty array for empty input', () => {
      expect(aggregate([], 'entity')).toEqual([]);
    });

    it('should group by entity in order of first appearance', () => {
      const result = aggregate(samples, 'entity');

      expect(result).toEqual([
        {
          entityId: 'B',
          bucketKey: ALL_BUCKET_KEY,
          sampleCount: 2,
          sumActualPower: 60,
          sumExpectedPower: 80,
          sumIrradiance: 600,
        },
        {
          entityId: 'A',
          bucketKey: ALL_BUCKET_KEY,
          sampleCount: 1,
          sumActualPower: 30,
          sumExpectedPower: 40,
          sumIrradiance: 300,
        },
      ]);
      expect(avgActualPower(result[0])).toBe(30);
      expect(avgExpectedPower(result[0])).toBe(40);
    });

    it('should group by daily time bucket across entities', () => {
      const result = aggregate(samples, 'time_bucket', 'daily');

      expect(result.map((p) => [p.entityId, p.bucketKey, p.sampleCount])).toEqual([
        [ANY_ENTITY_KEY, '2024-03-01', 2],
        [ANY_ENTITY_KEY, '2024-03-02', 1],
      ]);
      expect(result[0].sumActualPower).toBe(40);
    });

    it('should group by entity and bucket together', () => {
      const result = aggregate(samples, 'both', 'daily');

      expect(result.map((p) => `${p.entityId}/${p.bucketKey}`)).toEqual([
        'B/2024-03-01',
        'A/2024-03-01',
        'B/2024-03-02',
      ]);
    });

    it('should merge days into one monthly bucket', () => {
      const result = aggregate(samples, 'both', 'monthly');

      expect(result.map((p) => `${p.entityId}/${p.bucketKey}:${p.sampleCount}`)).toEqual([
        'B/2024-03:2',
        'A/2024-03:1',
      ]);
    });

    it('should not filter invalid samples', () => {
      const result = aggregate(
        [makeSample({ availability: 0, actualPower: 7 })],
        'entity',
      );
      expect(result[0].sumActualPower).toBe(7);
    });

    it('should throw ContractViolationError for an unknown group-by key', () => {
      expect(() => Reflect.apply(aggregate, undefined, [samples, 'hourly'])).toThrow(
        ContractViolationError,
      );
    });

    it('should throw ContractViolationError for an unknown bucket', () => {
      expect(() =>
        Reflect.apply(aggregate, undefined, [samples, 'both', 'weekly']),
      ).toThrow('[aggregate] Unknown time bucket: weekly');
    });
  });
});
