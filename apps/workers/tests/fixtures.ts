import type { ScanJob } from '../src/core/jobTypes.js';
import { buildEnvelope, reportLinksFor, type NotificationEnvelope } from '../notify/envelope.js';
import type { ChannelAdapter, ChannelKind, SendResult } from '../notify/channels/types.js';

export const CREATED_AT = new Date('2026-03-01T12:00:00.000Z');
export const REPORT_BASE = 'https://reports.test/scans/';

export function completedJob(overrides: Partial<ScanJob> = {}): ScanJob {
  return {
    id: 'scan-abc',
    application: 'shop',
    scanType: 'quick',
    target: 'https://shop.test',
    status: 'completed',
    progress: 100,
    createdAt: new Date('2026-03-01T11:00:00.000Z'),
    startedAt: new Date('2026-03-01T11:00:01.000Z'),
    completedAt: CREATED_AT,
    thresholds: { critical: 0, high: 5 },
    statistics: { critical: 1, high: 5, medium: 0, low: 0, info: 0, total: 6 },
    buildOutcome: 'failure',
    errorMessage: null,
    ...overrides,
  };
}

export function failedJob(errorMessage = 'timeout'): ScanJob {
  return completedJob({ status: 'failed', statistics: null, buildOutcome: null, errorMessage });
}

export function envelopeFor(job: ScanJob, withReport = true): NotificationEnvelope {
  return buildEnvelope(job, withReport ? reportLinksFor(REPORT_BASE, job.id) : {}, CREATED_AT);
}

/** In-process channel whose send outcome is scripted per attempt. */
export class FakeChannel implements ChannelAdapter<string> {
  readonly kind: ChannelKind = 'webhook';
  readonly rendered: NotificationEnvelope[] = [];
  readonly signals: AbortSignal[] = [];
  sends = 0;

  constructor(
    readonly id: string,
    private readonly behaviour: (attempt: number, signal: AbortSignal) => Promise<SendResult> = async () => ({ ok: true }),
    private readonly skip = false
  ) {}

  render(envelope: NotificationEnvelope): string | null {
    this.rendered.push(envelope);
    return this.skip ? null : `${envelope.scanJobId}:${envelope.buildOutcome}`;
  }

  async send(_payload: string, signal: AbortSignal): Promise<SendResult> {
    this.sends += 1;
    this.signals.push(signal);
    return this.behaviour(this.sends, signal);
  }

  async testConnection(): Promise<boolean> {
    return true;
  }
}
