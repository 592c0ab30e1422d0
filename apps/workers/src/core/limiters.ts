import PQueue from 'p-queue';
import { moduleLogger } from '../../core/logger.js';

const log = moduleLogger('Limiters');

// Bounds how many channel deliveries of one dispatch are in flight together
export function createDeliveryLimiter(concurrency: number): PQueue {
  return new PQueue({ concurrency: Math.max(1, concurrency) });
}

/**
 * Per-host limiter registry so several channels pointing at the same host
 * (e.g. multiple webhooks on one receiver) don't hammer it.
 */
export class HostLimiters {
  private readonly limiters = new Map<string, PQueue>();

  constructor(private readonly perHostConcurrency: number) {}

  forHost(hostname: string): PQueue {
    let limiter = this.limiters.get(hostname);
    if (!limiter) {
      limiter = new PQueue({ concurrency: Math.max(1, this.perHostConcurrency) });
      this.limiters.set(hostname, limiter);
      log.debug(`Created rate limiter for ${hostname} (max: ${this.perHostConcurrency})`);
    }
    return limiter;
  }

  run<T>(url: string, task: () => Promise<T>): Promise<T> {
    return this.forHost(new URL(url).host).add(task, { throwOnTimeout: true });
  }

  stats() {
    return Array.from(this.limiters.entries()).map(([hostname, limiter]) => ({
      hostname,
      size: limiter.size,
      pending: limiter.pending,
      concurrency: limiter.concurrency
    }));
  }
}
