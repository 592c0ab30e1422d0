import {
  SEVERITIES,
  type BuildOutcome,
  type ScanStatistics,
  type Severity,
  type Thresholds,
} from '../src/core/jobTypes.js';

/**
 * Limit applied to critical findings when none is configured. Fail-closed:
 * a single critical finding fails the build unless a limit says otherwise.
 */
export const DEFAULT_CRITICAL_LIMIT = 0;

export interface ExceededThreshold {
  severity: Severity;
  count: number;
  limit: number;
}

/**
 * Maps severity counts and configured limits to a build outcome.
 * Tiers are checked from most to least urgent and the first breach wins.
 */
export function evaluateThresholds(statistics: ScanStatistics, thresholds: Thresholds): BuildOutcome {
  if (statistics.critical > (thresholds.critical ?? DEFAULT_CRITICAL_LIMIT)) {
    return 'failure';
  }
  if (thresholds.high !== undefined && statistics.high > thresholds.high) {
    return 'unstable';
  }
  if (thresholds.medium !== undefined && statistics.medium > thresholds.medium) {
    return 'unstable';
  }
  return 'success';
}

// Every breached tier, for alert bodies. Low and info limits are reported here
// even though they never change the outcome.
export function exceededThresholds(statistics: ScanStatistics, thresholds: Thresholds): ExceededThreshold[] {
  const exceeded: ExceededThreshold[] = [];
  for (const severity of SEVERITIES) {
    const limit = severity === 'critical'
      ? thresholds.critical ?? DEFAULT_CRITICAL_LIMIT
      : thresholds[severity];
    if (limit !== undefined && statistics[severity] > limit) {
      exceeded.push({ severity, count: statistics[severity], limit });
    }
  }
  return exceeded;
}
