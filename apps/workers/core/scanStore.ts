import type { ScanJob } from '../src/core/jobTypes.js';
import type { DispatchReport } from '../notify/dispatcher.js';

/**
 * Persistence seen from the orchestrator. Writes are fire-and-forget: a
 * failed save is logged and never rolls back an in-memory transition.
 */
export interface ScanStore {
  saveScanJob(job: ScanJob): Promise<void>;
  saveDispatchReport(report: DispatchReport): Promise<void>;
}

export class MemoryScanStore implements ScanStore {
  readonly jobs = new Map<string, ScanJob>();
  readonly reports = new Map<string, DispatchReport>();
  /** Every saved snapshot, oldest first. */
  readonly history: ScanJob[] = [];

  async saveScanJob(job: ScanJob): Promise<void> {
    this.jobs.set(job.id, job);
    this.history.push(job);
  }

  async saveDispatchReport(report: DispatchReport): Promise<void> {
    this.reports.set(report.scanJobId, report);
  }
}
