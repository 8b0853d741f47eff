import { diagnosticQuerySchema } from './diagnostic-query.dto';

describe('diagnosticQuerySchema', () => {
  function issues(body: unknown): string[] {
    const result = diagnosticQuerySchema.safeParse(body);
    return result.success
      ? []
      : result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
  }

  it('should accept a fleet question without a site', () => {
    expect(issues({ kind: 'underperforming_sites', limit: 3 })).toEqual([]);
  });

  it('should parse window dates', () => {
    const result = diagnosticQuerySchema.safeParse({
      kind: 'financial_impact',
      start_date: '2025-06-01T00:00:00Z',
      end_date: '2025-07-01T00:00:00Z',
    });

    expect(result.success && result.data.start_date?.toISOString()).toBe(
      '2025-06-01T00:00:00.000Z',
    );
  });

  it('should reject an unknown kind', () => {
    expect(issues({ kind: 'weather_forecast' })).toHaveLength(1);
  });

  it('should require site_id for site questions', () => {
    expect(issues({ kind: 'power_curve' })).toEqual([
      'site_id: site_id is required for power_curve',
    ]);
  });

  it('should require both skids for a comparison', () => {
    expect(
      issues({ kind: 'compare_skids', site_id: 'SITE001', skid_a: 'SKID-A' }),
    ).toEqual(['skid_b: skid_a and skid_b are required for compare_skids']);
  });

  it('should require the window dates together', () => {
    expect(
      issues({ kind: 'rmse_above', start_date: '2025-06-01T00:00:00Z' }),
    ).toEqual(['end_date: start_date and end_date must be given together']);
  });

  it('should reject an inverted window', () => {
    expect(
      issues({
        kind: 'rmse_above',
        start_date: '2025-06-02T00:00:00Z',
        end_date: '2025-06-01T00:00:00Z',
      }),
    ).toEqual(['end_date: end_date must be after start_date']);
  });

  it('should reject a negative limit', () => {
    expect(issues({ kind: 'financial_impact', limit: -1 })).toHaveLength(1);
  });
});
