import type { NotificationEnvelope } from '../envelope.js';

export type ChannelKind = 'email' | 'chat' | 'issue-tracker' | 'webhook';

export type SendResult =
  | { ok: true }
  | { ok: false; reason: string; retryable: boolean };

/**
 * One notification destination. The dispatcher only ever talks to this
 * contract, so variants differ in rendering and transport alone.
 */
export interface ChannelAdapter<P = unknown> {
  readonly id: string;
  readonly kind: ChannelKind;
  /** `null` means the channel has nothing to say about this envelope. */
  render(envelope: NotificationEnvelope): P | null;
  send(payload: P, signal: AbortSignal): Promise<SendResult>;
  /** Best-effort reachability and credential check. */
  testConnection(): Promise<boolean>;
}

export const sent = (): SendResult => ({ ok: true });

export const failed = (reason: string, retryable = true): SendResult => ({ ok: false, reason, retryable });

/**
 * Maps an HTTP status to a send result. Client errors other than 408 and 429
 * will not succeed on retry.
 */
export function resultForStatus(status: number, body?: string): SendResult {
  if (status >= 200 && status < 300) return sent();
  const detail = body ? `: ${body.slice(0, 200)}` : '';
  const clientError = status >= 400 && status < 500 && status !== 408 && status !== 429;
  return failed(`HTTP ${status}${detail}`, !clientError);
}
