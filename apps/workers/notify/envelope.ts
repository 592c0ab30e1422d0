import {
  SEVERITIES,
  emptyStatistics,
  type BuildOutcome,
  type ScanJob,
  type ScanStatistics,
  type ScanType,
  type Severity,
} from '../src/core/jobTypes.js';
import { exceededThresholds, type ExceededThreshold } from '../scan/thresholds.js';

export type NotificationEvent = 'scan.completed' | 'scan.failed' | 'threshold.exceeded';

export type ReportLinks = Readonly<Record<string, string>>;

export interface NotificationEnvelope {
  readonly scanJobId: string;
  readonly application: string;
  readonly scanType: ScanType;
  readonly status: 'completed' | 'failed';
  readonly buildOutcome: BuildOutcome;
  readonly statistics: Readonly<ScanStatistics>;
  readonly reportLinks: ReportLinks;
  readonly exceededThresholds: readonly ExceededThreshold[];
  readonly errorMessage: string | null;
  readonly createdAt: Date;
}

const REPORT_FORMATS = ['html', 'json', 'pdf'] as const;

export function reportLinksFor(baseUrl: string | undefined, scanJobId: string): ReportLinks {
  if (!baseUrl) return {};
  const base = baseUrl.replace(/\/+$/, '');
  const links: Record<string, string> = {};
  for (const format of REPORT_FORMATS) {
    links[format] = `${base}/${encodeURIComponent(scanJobId)}/report.${format}`;
  }
  return links;
}

export function primaryReportUrl(links: ReportLinks): string {
  return links.html ?? Object.values(links)[0] ?? '';
}

/**
 * Freezes the outcome of a completed or failed job. Failed jobs carry zeroed
 * statistics and a `failure` outcome.
 */
export function buildEnvelope(job: ScanJob, reportLinks: ReportLinks, now: Date = new Date()): NotificationEnvelope {
  if (job.status !== 'completed' && job.status !== 'failed') {
    throw new Error(`Cannot notify for scan ${job.id} in status ${job.status}`);
  }

  const completed = job.status === 'completed' && job.statistics !== null;
  const statistics = completed && job.statistics ? { ...job.statistics } : emptyStatistics();

  return Object.freeze({
    scanJobId: job.id,
    application: job.application,
    scanType: job.scanType,
    status: job.status,
    buildOutcome: completed ? job.buildOutcome ?? 'success' : 'failure',
    statistics: Object.freeze(statistics),
    reportLinks: Object.freeze({ ...reportLinks }),
    exceededThresholds: Object.freeze(completed ? exceededThresholds(statistics, job.thresholds) : []),
    errorMessage: job.errorMessage,
    createdAt: now,
  });
}

export function notificationEvent(envelope: NotificationEnvelope): NotificationEvent {
  if (envelope.status === 'failed') return 'scan.failed';
  return envelope.buildOutcome === 'success' ? 'scan.completed' : 'threshold.exceeded';
}

/** Most urgent severity with at least one finding. */
export function highestSeverity(statistics: Readonly<ScanStatistics>): Severity {
  return SEVERITIES.find((severity) => statistics[severity] > 0) ?? 'info';
}
