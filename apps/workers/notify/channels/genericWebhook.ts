import { createHmac } from 'node:crypto';
import { z } from 'zod';
import type { BuildOutcome, ScanType } from '../../src/core/jobTypes.js';
import {
  notificationEvent,
  primaryReportUrl,
  type NotificationEnvelope,
  type NotificationEvent,
} from '../envelope.js';
import { deliverJson, type ChannelTransport } from './transport.js';
import type { ChannelAdapter, ChannelKind, SendResult } from './types.js';

export const WebhookChannelConfigSchema = z.object({
  id: z.string().min(1).optional(),
  url: z.string().url(),
  headers: z.record(z.string()).default({}),
  /** When set, the body is signed with HMAC-SHA256 in `x-signature-256`. */
  secret: z.string().min(1).optional(),
});

export type WebhookChannelConfig = z.input<typeof WebhookChannelConfigSchema>;

/**
 * Wire format consumed by external systems. Key order is part of the
 * contract, so the object is built field by field.
 */
export interface WebhookPayload {
  event: NotificationEvent;
  timestamp: string;
  scan_info: {
    application: string;
    scan_id: string;
    scan_type: ScanType;
  };
  statistics: {
    critical: number;
    high: number;
    medium: number;
    low: number;
    info: number;
    total: number;
  };
  outcome: BuildOutcome;
  report_url: string;
}

export function buildWebhookPayload(envelope: NotificationEnvelope): WebhookPayload {
  const { statistics } = envelope;
  return {
    event: notificationEvent(envelope),
    timestamp: envelope.createdAt.toISOString(),
    scan_info: {
      application: envelope.application,
      scan_id: envelope.scanJobId,
      scan_type: envelope.scanType,
    },
    statistics: {
      critical: statistics.critical,
      high: statistics.high,
      medium: statistics.medium,
      low: statistics.low,
      info: statistics.info,
      total: statistics.total,
    },
    outcome: envelope.buildOutcome,
    report_url: primaryReportUrl(envelope.reportLinks),
  };
}

export function signBody(secret: string, body: string): string {
  return `sha256=${createHmac('sha256', secret).update(body).digest('hex')}`;
}

export class GenericWebhookChannel implements ChannelAdapter<WebhookPayload> {
  readonly kind: ChannelKind = 'webhook';
  readonly id: string;
  private readonly config: z.infer<typeof WebhookChannelConfigSchema>;

  constructor(config: WebhookChannelConfig, private readonly transport: ChannelTransport = {}) {
    this.config = WebhookChannelConfigSchema.parse(config);
    this.id = this.config.id ?? `webhook:${new URL(this.config.url).host}`;
  }

  render(envelope: NotificationEnvelope): WebhookPayload {
    return buildWebhookPayload(envelope);
  }

  async send(payload: WebhookPayload, signal: AbortSignal): Promise<SendResult> {
    return this.post(JSON.stringify(payload), signal);
  }

  async testConnection(): Promise<boolean> {
    const body = JSON.stringify({
      event: 'test',
      timestamp: new Date().toISOString(),
      message: 'Webhook connectivity test',
    });
    try {
      const result = await this.post(body, AbortSignal.timeout(10_000));
      return result.ok;
    } catch {
      return false;
    }
  }

  private async post(body: string, signal: AbortSignal): Promise<SendResult> {
    const headers: Record<string, string> = { ...this.config.headers };
    if (this.config.secret) {
      headers['x-signature-256'] = signBody(this.config.secret, body);
    }
    return deliverJson(this.transport, this.config.url, body, signal, headers);
  }
}
