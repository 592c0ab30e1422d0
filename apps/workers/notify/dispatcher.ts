import { createDeliveryLimiter } from '../src/core/limiters.js';
import { errorMessage } from '../core/errors.js';
import { moduleLogger } from '../core/logger.js';
import type { NotificationEnvelope } from './envelope.js';
import type { ChannelAdapter, SendResult } from './channels/types.js';

const log = moduleLogger('Dispatcher');

export type DeliveryResult = 'sent' | 'failed' | 'skipped';

export interface DeliveryAttempt {
  channelId: string;
  attemptNumber: number;
  result: DeliveryResult;
  error: string | null;
}

export interface DispatchReport {
  scanJobId: string;
  /** Final attempt per channel. */
  results: Record<string, DeliveryAttempt>;
  /** Every attempt, in the order each channel made them. */
  attempts: DeliveryAttempt[];
  startedAt: Date;
  completedAt: Date;
}

export interface DispatcherOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  attemptTimeoutMs: number;
  concurrency: number;
}

export const DEFAULT_DISPATCHER_OPTIONS: DispatcherOptions = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
  attemptTimeoutMs: 10_000,
  concurrency: 8,
};

export function backoffDelay(attemptNumber: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(baseDelayMs * 2 ** (attemptNumber - 1), maxDelayMs);
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Fans one envelope out to every channel. Channels run concurrently and fail
 * independently; `dispatch` itself never rejects.
 */
export class NotificationDispatcher {
  readonly options: DispatcherOptions;

  constructor(options: Partial<DispatcherOptions> = {}) {
    this.options = { ...DEFAULT_DISPATCHER_OPTIONS, ...options };
    if (!Number.isInteger(this.options.maxAttempts) || this.options.maxAttempts < 1) {
      throw new Error(`maxAttempts must be a positive integer, got ${this.options.maxAttempts}`);
    }
  }

  async dispatch(envelope: NotificationEnvelope, channels: readonly ChannelAdapter[]): Promise<DispatchReport> {
    const startedAt = new Date();
    const limiter = createDeliveryLimiter(this.options.concurrency);

    log.info(`Dispatching ${envelope.buildOutcome} to ${channels.length} channels`, { scanId: envelope.scanJobId });

    const perChannel = await Promise.all(
      channels.map((channel) =>
        limiter.add(() => this.deliver(envelope, channel), { throwOnTimeout: true })
      )
    );

    const results: Record<string, DeliveryAttempt> = {};
    const attempts: DeliveryAttempt[] = [];
    channels.forEach((channel, index) => {
      const history = perChannel[index];
      attempts.push(...history);
      results[channel.id] = history[history.length - 1];
    });

    const failedCount = Object.values(results).filter((a) => a.result === 'failed').length;
    const completedAt = new Date();
    log.info(`Dispatch finished: ${channels.length - failedCount}/${channels.length} channels without failure`, {
      scanId: envelope.scanJobId,
      duration: completedAt.getTime() - startedAt.getTime(),
    });

    return { scanJobId: envelope.scanJobId, results, attempts, startedAt, completedAt };
  }

  /** Probes every channel; a probe that throws counts as unreachable. */
  async testConnections(channels: readonly ChannelAdapter[]): Promise<Record<string, boolean>> {
    const probes = await Promise.all(
      channels.map(async (channel): Promise<[string, boolean]> => {
        try {
          return [channel.id, await channel.testConnection()];
        } catch (err) {
          log.warn(`Connection test failed: ${errorMessage(err)}`, { channel: channel.id });
          return [channel.id, false];
        }
      })
    );
    return Object.fromEntries(probes);
  }

  // Never throws: every outcome, including adapter exceptions, becomes an attempt.
  private async deliver(envelope: NotificationEnvelope, channel: ChannelAdapter): Promise<DeliveryAttempt[]> {
    const context = { scanId: envelope.scanJobId, channel: channel.id };
    const history: DeliveryAttempt[] = [];

    let payload: unknown;
    try {
      payload = channel.render(envelope);
    } catch (err) {
      log.error('Payload rendering failed', { ...context, error: err });
      history.push({ channelId: channel.id, attemptNumber: 1, result: 'failed', error: `render failed: ${errorMessage(err)}` });
      return history;
    }

    if (payload === null) {
      log.debug('Channel skipped this envelope', context);
      history.push({ channelId: channel.id, attemptNumber: 0, result: 'skipped', error: null });
      return history;
    }

    const { maxAttempts, baseDelayMs, maxDelayMs } = this.options;
    for (let attemptNumber = 1; attemptNumber <= maxAttempts; attemptNumber++) {
      const outcome = await this.attempt(channel, payload);

      if (outcome.ok) {
        history.push({ channelId: channel.id, attemptNumber, result: 'sent', error: null });
        log.info(`Delivered on attempt ${attemptNumber}`, context);
        return history;
      }

      history.push({ channelId: channel.id, attemptNumber, result: 'failed', error: outcome.reason });
      log.warn(`Attempt ${attemptNumber}/${maxAttempts} failed: ${outcome.reason}`, context);

      if (!outcome.retryable) break;
      if (attemptNumber < maxAttempts) {
        await sleep(backoffDelay(attemptNumber, baseDelayMs, maxDelayMs));
      }
    }

    log.error(`Giving up after ${history.length} attempts`, context);
    return history;
  }

  private async attempt(channel: ChannelAdapter, payload: unknown): Promise<SendResult> {
    const { attemptTimeoutMs } = this.options;
    const controller = new AbortController();
    let timeoutHandle: NodeJS.Timeout | undefined;

    const timeout = new Promise<SendResult>((resolve) => {
      timeoutHandle = setTimeout(() => {
        controller.abort();
        resolve({ ok: false, reason: `timeout after ${attemptTimeoutMs}ms`, retryable: true });
      }, attemptTimeoutMs);
    });

    try {
      return await Promise.race([channel.send(payload, controller.signal), timeout]);
    } catch (err) {
      return { ok: false, reason: errorMessage(err), retryable: true };
    } finally {
      if (timeoutHandle) clearTimeout(timeoutHandle);
    }
  }
}
