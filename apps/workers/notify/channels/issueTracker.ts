import { z } from 'zod';
import { SEVERITIES, type BuildOutcome } from '../../src/core/jobTypes.js';
import { primaryReportUrl, type NotificationEnvelope } from '../envelope.js';
import { callApi, deliverJson, type ChannelTransport } from './transport.js';
import type { ChannelAdapter, ChannelKind, SendResult } from './types.js';

export const IssueTrackerConfigSchema = z.object({
  id: z.string().min(1).default('issue-tracker'),
  token: z.string().min(1),
  owner: z.string().min(1),
  repo: z.string().min(1),
  labels: z.array(z.string()).default(['security', 'automated-scan']),
  /** Least severe outcome that opens an issue. */
  minOutcome: z.enum(['unstable', 'failure']).default('unstable'),
  apiBaseUrl: z.string().url().default('https://api.github.com'),
});

export type IssueTrackerConfig = z.input<typeof IssueTrackerConfigSchema>;

export interface IssuePayload {
  title: string;
  body: string;
  labels: string[];
}

const OUTCOME_RANK: Record<BuildOutcome, number> = { success: 0, unstable: 1, failure: 2 };

export function buildIssue(envelope: NotificationEnvelope, labels: string[]): IssuePayload {
  const { statistics } = envelope;
  const title = `[Security] ${envelope.application}: ${envelope.buildOutcome} ` +
    `(${statistics.critical} critical, ${statistics.high} high)`;

  const body = [
    `## Security scan ${envelope.scanJobId}`,
    '',
    `**Application:** ${envelope.application}`,
    `**Scan type:** ${envelope.scanType}`,
    `**Outcome:** ${envelope.buildOutcome}`,
    '',
    '| Severity | Count |',
    '|----------|-------|',
    ...SEVERITIES.map((severity) => `| ${severity} | ${statistics[severity]} |`),
    `| total | ${statistics.total} |`,
  ];

  if (envelope.exceededThresholds.length > 0) {
    body.push('', '### Thresholds exceeded', '');
    for (const exceeded of envelope.exceededThresholds) {
      body.push(`- ${exceeded.severity}: ${exceeded.count} found, limit ${exceeded.limit}`);
    }
  }

  const reportUrl = primaryReportUrl(envelope.reportLinks);
  if (reportUrl) {
    body.push('', `[Full report](${reportUrl})`);
  }

  return {
    title,
    body: body.join('\n'),
    labels: [...labels, `outcome:${envelope.buildOutcome}`],
  };
}

/**
 * Opens one GitHub issue per scan whose outcome is at least `minOutcome`.
 * Passing and failed-to-run scans are skipped.
 */
export class IssueTrackerChannel implements ChannelAdapter<IssuePayload> {
  readonly kind: ChannelKind = 'issue-tracker';
  readonly id: string;
  private readonly config: z.infer<typeof IssueTrackerConfigSchema>;

  constructor(config: IssueTrackerConfig, private readonly transport: ChannelTransport = {}) {
    this.config = IssueTrackerConfigSchema.parse(config);
    this.id = this.config.id;
  }

  render(envelope: NotificationEnvelope): IssuePayload | null {
    if (envelope.status !== 'completed') return null;
    if (OUTCOME_RANK[envelope.buildOutcome] < OUTCOME_RANK[this.config.minOutcome]) return null;
    return buildIssue(envelope, this.config.labels);
  }

  async send(payload: IssuePayload, signal: AbortSignal): Promise<SendResult> {
    return deliverJson(this.transport, `${this.repoUrl()}/issues`, JSON.stringify(payload), signal, this.headers());
  }

  async testConnection(): Promise<boolean> {
    try {
      const response = await callApi(this.transport, this.repoUrl(), {
        method: 'GET',
        headers: this.headers(),
        signal: AbortSignal.timeout(10_000),
      });
      return response.ok;
    } catch {
      return false;
    }
  }

  private repoUrl(): string {
    const base = this.config.apiBaseUrl.replace(/\/+$/, '');
    return `${base}/repos/${encodeURIComponent(this.config.owner)}/${encodeURIComponent(this.config.repo)}`;
  }

  private headers(): Record<string, string> {
    return {
      authorization: `Bearer ${this.config.token}`,
      accept: 'application/vnd.github+json',
    };
  }
}
