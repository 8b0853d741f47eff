import { Sample } from './interfaces/analytics.interface';

/** Only fully available readings count toward metrics. */
export const REQUIRED_AVAILABILITY = 1.0;

function isNonNegativeFinite(value: number): boolean {
  return Number.isFinite(value) && value >= 0;
}

/**
 * Data-quality rule for a single sample.
 *
 * A sample is valid iff availability is exactly 1.0 and both power fields
 * are finite and non-negative. Irradiance is carried through for charting
 * but does not gate inclusion.
 */
export function isValidSample(sample: Sample): boolean {
  return (
    sample.availability === REQUIRED_AVAILABILITY &&
    isNonNegativeFinite(sample.actualPower) &&
    isNonNegativeFinite(sample.expectedPower)
  );
}

/**
 * Drop invalid samples, keeping the original relative order.
 * Invalid readings are excluded, never zero-filled.
 */
export function filterValid(samples: readonly Sample[]): Sample[] {
  return samples.filter(isValidSample);
}
