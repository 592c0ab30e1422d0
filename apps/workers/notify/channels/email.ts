import handlebars from 'handlebars';
import { z } from 'zod';
import { SEVERITIES } from '../../src/core/jobTypes.js';
import { notificationEvent, primaryReportUrl, type NotificationEnvelope } from '../envelope.js';
import { callApi, deliverJson, type ChannelTransport } from './transport.js';
import type { ChannelAdapter, ChannelKind, SendResult } from './types.js';

export const EmailChannelConfigSchema = z.object({
  id: z.string().min(1).default('email'),
  /** HTTP mail API endpoint accepting `{ from, to, subject, text, html }`. */
  apiUrl: z.string().url(),
  apiKey: z.string().min(1),
  from: z.string().email(),
  to: z.array(z.string().email()).default([]),
});

export type EmailChannelConfig = z.input<typeof EmailChannelConfigSchema>;

export interface EmailMessage {
  from: string;
  to: string[];
  subject: string;
  text: string;
  html: string;
}

const SEVERITY_HEX: Record<string, string> = {
  critical: '#DC3545',
  high: '#FD7E14',
  medium: '#FFC107',
  low: '#28A745',
  info: '#17A2B8',
};

const htmlTemplate = handlebars.compile<EmailView>(`<!DOCTYPE html>
<html>
<body style="font-family: Arial, sans-serif;">
  <div style="background-color: {{color}}; color: white; padding: 20px;">
    <h2>{{heading}}</h2>
    <p>Application: {{application}} ({{scanType}})</p>
  </div>
  <div style="padding: 20px;">
    {{#if errorMessage}}<p>Error: {{errorMessage}}</p>{{/if}}
    {{#if rows.length}}
    <table>
      {{#each rows}}<tr><td>{{label}}</td><td>{{count}}</td></tr>{{/each}}
    </table>
    {{/if}}
    {{#each exceeded}}<p>Threshold exceeded: {{this}}</p>{{/each}}
    {{#if reportUrl}}<p><a href="{{reportUrl}}">View Full Report</a></p>{{/if}}
  </div>
</body>
</html>`);

interface EmailView {
  heading: string;
  color: string;
  application: string;
  scanType: string;
  errorMessage: string | null;
  rows: Array<{ label: string; count: number }>;
  exceeded: string[];
  reportUrl: string;
}

export function emailSubject(envelope: NotificationEnvelope): string {
  switch (notificationEvent(envelope)) {
    case 'scan.failed':
      return `Security scan failed: ${envelope.application}`;
    case 'threshold.exceeded':
      return `ALERT: thresholds exceeded for ${envelope.application} (${envelope.buildOutcome})`;
    default:
      return `Security scan passed: ${envelope.application} (${envelope.statistics.total} findings)`;
  }
}

export function emailText(envelope: NotificationEnvelope): string {
  const lines = [
    `Application: ${envelope.application}`,
    `Scan: ${envelope.scanJobId} (${envelope.scanType})`,
  ];

  if (envelope.status === 'failed') {
    lines.push(`Status: FAILED`, `Error: ${envelope.errorMessage ?? 'unknown error'}`);
  } else {
    lines.push(`Outcome: ${envelope.buildOutcome.toUpperCase()}`);
    for (const severity of SEVERITIES) {
      lines.push(`${severity}: ${envelope.statistics[severity]}`);
    }
    lines.push(`total: ${envelope.statistics.total}`);
    for (const exceeded of envelope.exceededThresholds) {
      lines.push(`Threshold exceeded: ${exceeded.severity} ${exceeded.count} > ${exceeded.limit}`);
    }
  }

  const reportUrl = primaryReportUrl(envelope.reportLinks);
  if (reportUrl) lines.push(`Report: ${reportUrl}`);
  return lines.join('\n');
}

function emailView(envelope: NotificationEnvelope): EmailView {
  const failed = envelope.status === 'failed';
  return {
    heading: failed ? 'Security Scan Failed' : `Security Scan Report: ${envelope.buildOutcome.toUpperCase()}`,
    color: failed ? SEVERITY_HEX.critical : envelope.buildOutcome === 'success' ? SEVERITY_HEX.low : SEVERITY_HEX.high,
    application: envelope.application,
    scanType: envelope.scanType,
    errorMessage: failed ? envelope.errorMessage : null,
    rows: failed ? [] : SEVERITIES.map((severity) => ({ label: severity, count: envelope.statistics[severity] })),
    exceeded: envelope.exceededThresholds.map((e) => `${e.severity} ${e.count} > ${e.limit}`),
    reportUrl: primaryReportUrl(envelope.reportLinks),
  };
}

/**
 * Email over an HTTP mail API. With no recipients configured the channel
 * has nothing to deliver and is skipped.
 */
export class EmailChannel implements ChannelAdapter<EmailMessage> {
  readonly kind: ChannelKind = 'email';
  readonly id: string;
  private readonly config: z.infer<typeof EmailChannelConfigSchema>;

  constructor(config: EmailChannelConfig, private readonly transport: ChannelTransport = {}) {
    this.config = EmailChannelConfigSchema.parse(config);
    this.id = this.config.id;
  }

  render(envelope: NotificationEnvelope): EmailMessage | null {
    if (this.config.to.length === 0) return null;
    return {
      from: this.config.from,
      to: [...this.config.to],
      subject: emailSubject(envelope),
      text: emailText(envelope),
      html: htmlTemplate(emailView(envelope)),
    };
  }

  async send(payload: EmailMessage, signal: AbortSignal): Promise<SendResult> {
    return deliverJson(this.transport, this.config.apiUrl, JSON.stringify(payload), signal, this.authHeaders());
  }

  async testConnection(): Promise<boolean> {
    try {
      const response = await callApi(this.transport, this.config.apiUrl, {
        method: 'HEAD',
        headers: this.authHeaders(),
        signal: AbortSignal.timeout(10_000),
      });
      return response.status < 500 && response.status !== 401 && response.status !== 403;
    } catch {
      return false;
    }
  }

  private authHeaders(): Record<string, string> {
    return { authorization: `Bearer ${this.config.apiKey}` };
  }
}
