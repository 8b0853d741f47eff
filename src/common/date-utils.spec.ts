import {
  formatDay,
  formatMonth,
  getCurrentDate,
  previousCalendarMonth,
} from './date-utils';

describe('date utils', () => {
  describe('getCurrentDate', () => {
    const original = process.env.DEMO_DATE;

    afterEach(() => {
      if (original === undefined) {
        delete process.env.DEMO_DATE;
      } else {
        process.env.DEMO_DATE = original;
      }
    });

    it('should return the pinned demo date', () => {
      process.env.DEMO_DATE = '2025-09-15T12:00:00Z';
      expect(getCurrentDate().toISOString()).toBe('2025-09-15T12:00:00.000Z');
    });

    it('should ignore an invalid demo date', () => {
      process.env.DEMO_DATE = 'not-a-date';
      const before = Date.now();
      const now = getCurrentDate().getTime();
      expect(now).toBeGreaterThanOrEqual(before);
    });
  });

  describe('previousCalendarMonth', () => {
    it('should span the whole previous month in UTC', () => {
      const range = previousCalendarMonth(new Date('2025-03-10T08:00:00Z'));

      expect(range.start.toISOString()).toBe('2025-02-01T00:00:00.000Z');
      expect(range.end.toISOString()).toBe('2025-02-28T23:59:59.999Z');
    });

    it('should handle leap years', () => {
      const range = previousCalendarMonth(new Date('2024-03-01T00:00:00Z'));
      expect(range.end.toISOString()).toBe('2024-02-29T23:59:59.999Z');
    });

    it('should roll back across the year boundary', () => {
      const range = previousCalendarMonth(new Date('2025-01-20T00:00:00Z'));

      expect(range.start.toISOString()).toBe('2024-12-01T00:00:00.000Z');
      expect(range.end.toISOString()).toBe('2024-12-31T23:59:59.999Z');
    });
  });

  describe('formatting', () => {
    const date = new Date('2025-07-04T23:30:00Z');

    it('should format months as YYYY-MM', () => {
      expect(formatMonth(date)).toBe('2025-07');
    });

    it('should format days as YYYY-MM-DD', () => {
      expect(formatDay(date)).toBe('2025-07-04');
    });
  });
});
