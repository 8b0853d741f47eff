import { AlertLevel } from './interfaces/analytics.interface';

interface AlertThreshold {
  level: Exclude<AlertLevel, 'GOOD'>;
  /** Elevate when r² is strictly below this */
  minRSquared: number;
  /** Elevate when RMSE (MW) is strictly above this */
  maxRmse: number;
}

/**
 * Evaluated top to bottom, first match wins. Either condition alone is
 * enough to elevate.
 */
export const ALERT_THRESHOLDS: readonly AlertThreshold[] = [
  { level: 'CRITICAL', minRSquared: 0.7, maxRmse: 3.0 },
  { level: 'WARNING', minRSquared: 0.8, maxRmse: 2.0 },
  { level: 'MONITOR', minRSquared: 0.9, maxRmse: 1.5 },
];

/**
 * Map fit quality to an alert level.
 *
 * @param rSquared - Coefficient of determination
 * @param rmse - RMSE in the threshold unit (MW)
 */
export function classifyAlert(rSquared: number, rmse: number): AlertLevel {
  for (const threshold of ALERT_THRESHOLDS) {
    if (rSquared < threshold.minRSquared || rmse > threshold.maxRmse) {
      return threshold.level;
    }
  }
  return 'GOOD';
}

