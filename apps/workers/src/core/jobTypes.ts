export const SEVERITIES = ['critical', 'high', 'medium', 'low', 'info'] as const;
export type Severity = (typeof SEVERITIES)[number];

export const SCAN_TYPES = ['full', 'quick', 'incremental'] as const;
export type ScanType = (typeof SCAN_TYPES)[number];

export type ScanStatus = 'pending' | 'running' | 'completed' | 'failed' | 'cancelled';

export type BuildOutcome = 'success' | 'unstable' | 'failure';

/** Per-severity limit; an absent key means no limit for that tier. */
export type Thresholds = Partial<Record<Severity, number>>;

export type ScanStatistics = Record<Severity, number> & { total: number };

export interface TriggerConfig {
  target: string;
  thresholds?: Thresholds;
  policy?: string;
  timeoutMs?: number;
  notify?: boolean;
  channels?: string[];
}

export interface ScanJob {
  id: string;
  application: string;
  scanType: ScanType;
  target: string;
  status: ScanStatus;
  progress: number;
  createdAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
  thresholds: Thresholds;
  statistics: ScanStatistics | null;
  buildOutcome: BuildOutcome | null;
  errorMessage: string | null;
}

export const TERMINAL_STATUSES: readonly ScanStatus[] = ['completed', 'failed', 'cancelled'];

export function isTerminal(status: ScanStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export function emptyStatistics(): ScanStatistics {
  return { critical: 0, high: 0, medium: 0, low: 0, info: 0, total: 0 };
}
