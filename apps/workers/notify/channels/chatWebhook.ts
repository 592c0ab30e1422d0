import { z } from 'zod';
import type { Severity } from '../../src/core/jobTypes.js';
import { highestSeverity, primaryReportUrl, type NotificationEnvelope } from '../envelope.js';
import { deliverJson, type ChannelTransport } from './transport.js';
import type { ChannelAdapter, ChannelKind, SendResult } from './types.js';

export const ChatChannelConfigSchema = z.object({
  id: z.string().min(1).default('chat'),
  webhookUrl: z.string().url(),
  channel: z.string().optional(),
  username: z.string().default('Security Scanner'),
});

export type ChatChannelConfig = z.input<typeof ChatChannelConfigSchema>;

interface ChatField {
  title: string;
  value: string;
  short: boolean;
}

interface ChatAttachment {
  fallback: string;
  color: string;
  pretext: string;
  title: string;
  fields: ChatField[];
  footer: string;
  ts: number;
  actions?: Array<{ type: 'button'; text: string; url: string; style: 'primary' | 'default' }>;
}

export interface ChatMessage {
  text: string;
  username: string;
  channel?: string;
  attachments: ChatAttachment[];
}

const SEVERITY_COLORS: Record<Severity, string> = {
  critical: 'danger',
  high: 'warning',
  medium: '#ffc107',
  low: '#17a2b8',
  info: 'good',
};

export function summaryLine(envelope: NotificationEnvelope): string {
  const { critical, high, total } = envelope.statistics;
  if (critical > 0) {
    return `:rotating_light: *Critical Issues Found* - ${critical} critical vulnerabilities detected!`;
  }
  if (high > 0) {
    return `:warning: *High Severity Issues* - ${high} high severity vulnerabilities found.`;
  }
  if (total > 0) {
    return `:mag: Scan complete - ${total} issues identified.`;
  }
  return ':white_check_mark: *Clean Scan* - No vulnerabilities detected!';
}

export function buildChatMessage(envelope: NotificationEnvelope, username: string, channel?: string): ChatMessage {
  const app = envelope.application;
  const ts = Math.floor(envelope.createdAt.getTime() / 1000);
  const base = { username, ...(channel ? { channel } : {}) };

  if (envelope.status === 'failed') {
    return {
      ...base,
      text: `Security scan failed for *${app}*`,
      attachments: [{
        fallback: `Scan failed for ${app}: ${envelope.errorMessage ?? 'unknown error'}`,
        color: 'danger',
        pretext: ':x: *Scan Failed*',
        title: `Security Scan Failure - ${app}`,
        fields: [
          { title: 'Application', value: app, short: true },
          { title: 'Scan Type', value: envelope.scanType.toUpperCase(), short: true },
          { title: 'Error', value: envelope.errorMessage ?? 'unknown error', short: false },
        ],
        footer: `Scan ${envelope.scanJobId}`,
        ts,
      }],
    };
  }

  const { statistics } = envelope;
  const severity = highestSeverity(statistics);
  const attachment: ChatAttachment = {
    fallback: `Scan complete for ${app}: ${statistics.total} vulnerabilities`,
    color: SEVERITY_COLORS[severity],
    pretext: summaryLine(envelope),
    title: `Security Scan Report - ${app}`,
    fields: [
      { title: 'Application', value: app, short: true },
      { title: 'Scan Type', value: envelope.scanType.toUpperCase(), short: true },
      { title: 'Outcome', value: envelope.buildOutcome.toUpperCase(), short: true },
      { title: 'Critical', value: String(statistics.critical), short: true },
      { title: 'High', value: String(statistics.high), short: true },
      { title: 'Medium', value: String(statistics.medium), short: true },
      { title: 'Low', value: String(statistics.low), short: true },
      { title: 'Total Vulnerabilities', value: String(statistics.total), short: true },
    ],
    footer: `Scan ${envelope.scanJobId}`,
    ts,
  };

  for (const exceeded of envelope.exceededThresholds) {
    attachment.fields.push({
      title: `Threshold exceeded: ${exceeded.severity}`,
      value: `${exceeded.count} > ${exceeded.limit}`,
      short: true,
    });
  }

  const reportUrl = primaryReportUrl(envelope.reportLinks);
  if (reportUrl) {
    attachment.actions = [{
      type: 'button',
      text: 'View Full Report',
      url: reportUrl,
      style: severity === 'critical' || severity === 'high' ? 'primary' : 'default',
    }];
  }

  return {
    ...base,
    text: `Security scan completed for *${app}*`,
    attachments: [attachment],
  };
}

/**
 * Incoming-webhook chat integration (Slack attachment format).
 */
export class ChatWebhookChannel implements ChannelAdapter<ChatMessage> {
  readonly kind: ChannelKind = 'chat';
  readonly id: string;
  private readonly config: z.infer<typeof ChatChannelConfigSchema>;

  constructor(config: ChatChannelConfig, private readonly transport: ChannelTransport = {}) {
    this.config = ChatChannelConfigSchema.parse(config);
    this.id = this.config.id;
  }

  render(envelope: NotificationEnvelope): ChatMessage {
    return buildChatMessage(envelope, this.config.username, this.config.channel);
  }

  async send(payload: ChatMessage, signal: AbortSignal): Promise<SendResult> {
    return deliverJson(this.transport, this.config.webhookUrl, JSON.stringify(payload), signal);
  }

  async testConnection(): Promise<boolean> {
    try {
      const result = await deliverJson(
        this.transport,
        this.config.webhookUrl,
        JSON.stringify({ text: 'Security scanner chat integration test - connection successful!' }),
        AbortSignal.timeout(10_000)
      );
      return result.ok;
    } catch {
      return false;
    }
  }
}
