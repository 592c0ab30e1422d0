import {
  SEVERITIES,
  emptyStatistics,
  type ScanStatistics,
  type Severity,
} from '../src/core/jobTypes.js';
import type { EngineFinding } from './engine.js';

// Scanner risk codes (0 = informational .. 4 = critical)
const RISK_CODE_SEVERITY: Record<string, Severity> = {
  '0': 'info',
  '1': 'low',
  '2': 'medium',
  '3': 'high',
  '4': 'critical',
};

function isSeverity(value: string): value is Severity {
  return (SEVERITIES as readonly string[]).includes(value);
}

/**
 * Accepts a severity name in any case or a numeric risk code.
 * Anything unrecognised is counted as informational.
 */
export function normalizeSeverity(raw: unknown): Severity {
  if (typeof raw === 'number') {
    return RISK_CODE_SEVERITY[String(raw)] ?? 'info';
  }
  if (typeof raw !== 'string') return 'info';

  const value = raw.trim().toLowerCase();
  if (isSeverity(value)) return value;
  if (value === 'informational') return 'info';
  return RISK_CODE_SEVERITY[value] ?? 'info';
}

export function summarizeFindings(findings: readonly EngineFinding[]): ScanStatistics {
  const statistics = emptyStatistics();
  for (const finding of findings) {
    statistics[normalizeSeverity(finding.severity)] += 1;
    statistics.total += 1;
  }
  return statistics;
}
