/*
 * =============================================================================
 * MODULE: orchestrator.ts
 * =============================================================================
 * Owns every ScanJob from trigger to terminal state.
 *
 *   pending --(slot free)--> running --(engine ok)------> completed
 *                               |----(engine error)---> failed
 *                               |----(timeout)--------> failed ("timeout")
 *   pending|running --(cancel)------------------------> cancelled
 *
 * The running counter and the pending queue change only inside synchronous
 * sections, so a slot is claimed in the same step as pending -> running and
 * released in the same step as any terminal transition.
 * =============================================================================
 */

import { nanoid } from 'nanoid';
import { z } from 'zod';
import {
  SCAN_TYPES,
  SEVERITIES,
  isTerminal,
  type ScanJob,
  type ScanStatus,
  type ScanType,
  type Thresholds,
  type TriggerConfig,
} from '../src/core/jobTypes.js';
import { InvalidRequestError, NotFoundError, describeEngineFailure } from '../core/errors.js';
import { moduleLogger } from '../core/logger.js';
import { MemoryScanStore, type ScanStore } from '../core/scanStore.js';
import { buildEnvelope, reportLinksFor } from '../notify/envelope.js';
import type { DispatchReport, NotificationDispatcher } from '../notify/dispatcher.js';
import type { ChannelAdapter } from '../notify/channels/types.js';
import type { EngineResult, ScanEngine, ScanHandle, ScanProgress } from './engine.js';
import { summarizeFindings } from './findings.js';
import { evaluateThresholds } from './thresholds.js';

const log = moduleLogger('Orchestrator');

export const TIMEOUT_MESSAGE = 'timeout';

/** Longest delay setTimeout honours; larger values fire almost at once. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export interface OrchestratorSettings {
  maxConcurrentScans: number;
  defaultTimeoutMs: number;
  /** How long a cancelled or timed-out scan may take to acknowledge termination. */
  cancelGraceMs: number;
  defaultPolicy: string;
  reportBaseUrl?: string;
}

export const DEFAULT_ORCHESTRATOR_SETTINGS: OrchestratorSettings = {
  maxConcurrentScans: 2,
  defaultTimeoutMs: 2 * 60 * 60 * 1000,
  cancelGraceMs: 30_000,
  defaultPolicy: 'default',
};

export interface OrchestratorDeps {
  engine: ScanEngine;
  dispatcher: NotificationDispatcher;
  channels?: readonly ChannelAdapter[];
  store?: ScanStore;
  settings?: Partial<OrchestratorSettings>;
}

export interface QueueMetrics {
  running: number;
  pending: number;
  maxConcurrent: number;
  total: number;
}

const TRANSITIONS: Record<ScanStatus, readonly ScanStatus[]> = {
  pending: ['running', 'cancelled'],
  running: ['completed', 'failed', 'cancelled'],
  completed: [],
  failed: [],
  cancelled: [],
};

const thresholdValue = z.number().int().nonnegative().nullable().optional();

export const TriggerRequestSchema = z.object({
  application: z.string().trim().min(1, 'must be non-empty'),
  scanType: z.enum(SCAN_TYPES),
  config: z.object({
    target: z.string().trim().min(1, 'must be non-empty'),
    thresholds: z.object({
      critical: thresholdValue,
      high: thresholdValue,
      medium: thresholdValue,
      low: thresholdValue,
      info: thresholdValue,
    }).strict().default({}),
    policy: z.string().min(1).optional(),
    timeoutMs: z.number().int().positive().max(MAX_TIMEOUT_MS).optional(),
    notify: z.boolean().default(true),
    channels: z.array(z.string().min(1)).optional(),
  }),
});

export interface TriggerRequest {
  application: string;
  scanType: ScanType;
  config: Omit<TriggerConfig, 'thresholds' | 'notify'> & { thresholds: Thresholds; notify: boolean };
}

/**
 * Validates a trigger request from any source. Null thresholds count as
 * absent. Throws InvalidRequestError listing every problem found.
 */
export function parseTriggerRequest(input: unknown): TriggerRequest {
  const parsed = TriggerRequestSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidRequestError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'request'}: ${issue.message}`)
    );
  }

  const { application, scanType, config } = parsed.data;
  const thresholds: Thresholds = {};
  for (const severity of SEVERITIES) {
    const limit = config.thresholds[severity];
    if (limit !== null && limit !== undefined) thresholds[severity] = limit;
  }

  return { application, scanType, config: { ...config, thresholds } };
}

interface JobRecord {
  job: ScanJob;
  policy: string;
  timeoutMs: number;
  notify: boolean;
  channelIds: string[] | null;
  handle: ScanHandle | null;
  timeoutTimer: NodeJS.Timeout | null;
  /** Set while a cancel or timeout is waiting for the engine to stop. */
  stopping: Promise<void> | null;
  /** Tail of this job's store writes; each save waits for the previous one. */
  saving: Promise<void>;
}

function snapshotOf(job: ScanJob): Readonly<ScanJob> {
  return Object.freeze({
    ...job,
    createdAt: new Date(job.createdAt),
    startedAt: job.startedAt && new Date(job.startedAt),
    completedAt: job.completedAt && new Date(job.completedAt),
    thresholds: Object.freeze({ ...job.thresholds }),
    statistics: job.statistics && Object.freeze({ ...job.statistics }),
  });
}

export class ScanOrchestrator {
  readonly settings: OrchestratorSettings;
  readonly channels: readonly ChannelAdapter[];

  private readonly engine: ScanEngine;
  private readonly dispatcher: NotificationDispatcher;
  private readonly store: ScanStore;
  private readonly jobs = new Map<string, JobRecord>();
  private readonly reports = new Map<string, DispatchReport>();
  private readonly inFlight = new Set<Promise<void>>();
  private queue: JobRecord[] = [];
  private running = 0;

  constructor(deps: OrchestratorDeps) {
    this.engine = deps.engine;
    this.dispatcher = deps.dispatcher;
    this.channels = deps.channels ?? [];
    this.store = deps.store ?? new MemoryScanStore();
    this.settings = { ...DEFAULT_ORCHESTRATOR_SETTINGS, ...deps.settings };

    if (!Number.isInteger(this.settings.maxConcurrentScans) || this.settings.maxConcurrentScans < 1) {
      throw new Error(`maxConcurrentScans must be a positive integer, got ${this.settings.maxConcurrentScans}`);
    }
    for (const key of ['defaultTimeoutMs', 'cancelGraceMs'] as const) {
      const value = this.settings[key];
      if (!Number.isInteger(value) || value < 1 || value > MAX_TIMEOUT_MS) {
        throw new Error(`${key} must be an integer between 1 and ${MAX_TIMEOUT_MS}, got ${value}`);
      }
    }
  }

  trigger(application: string, scanType: ScanType, config: TriggerConfig): string {
    const request = parseTriggerRequest({ application, scanType, config });
    const unknown = (request.config.channels ?? []).filter((channelId) => !this.channels.some((c) => c.id === channelId));
    if (unknown.length > 0) {
      throw new InvalidRequestError(unknown.map((channelId) => `config.channels: unknown channel "${channelId}"`));
    }
    const id = `scan-${nanoid()}`;

    const record: JobRecord = {
      job: {
        id,
        application: request.application,
        scanType: request.scanType,
        target: request.config.target,
        status: 'pending',
        progress: 0,
        createdAt: new Date(),
        startedAt: null,
        completedAt: null,
        thresholds: request.config.thresholds,
        statistics: null,
        buildOutcome: null,
        errorMessage: null,
      },
      policy: request.config.policy ?? this.settings.defaultPolicy,
      timeoutMs: request.config.timeoutMs ?? this.settings.defaultTimeoutMs,
      notify: request.config.notify,
      channelIds: request.config.channels ?? null,
      handle: null,
      timeoutTimer: null,
      stopping: null,
      saving: Promise.resolve(),
    };

    this.jobs.set(id, record);
    this.persist(record);
    log.info(`Triggered ${request.scanType} scan for ${request.application}`, { scanId: id });

    if (this.running < this.settings.maxConcurrentScans) {
      this.start(record);
    } else {
      this.queue.push(record);
      log.info(`All ${this.settings.maxConcurrentScans} slots busy, queued at position ${this.queue.length}`, { scanId: id });
    }

    return id;
  }

  getStatus(scanJobId: string): Readonly<ScanJob> {
    return snapshotOf(this.require(scanJobId).job);
  }

  listJobs(): Readonly<ScanJob>[] {
    return Array.from(this.jobs.values(), (record) => snapshotOf(record.job));
  }

  getDispatchReport(scanJobId: string): DispatchReport | undefined {
    this.require(scanJobId);
    return this.reports.get(scanJobId);
  }

  metrics(): QueueMetrics {
    return {
      running: this.running,
      pending: this.queue.length,
      maxConcurrent: this.settings.maxConcurrentScans,
      total: this.jobs.size,
    };
  }

  testConnections(): Promise<Record<string, boolean>> {
    return this.dispatcher.testConnections(this.channels);
  }

  /**
   * Pending jobs are cancelled at once. Running jobs are cancelled once the
   * engine acknowledges termination or the grace period runs out.
   */
  async cancel(scanJobId: string): Promise<void> {
    const record = this.require(scanJobId);
    const { status } = record.job;

    if (isTerminal(status)) {
      log.debug(`Cancel ignored, scan already ${status}`, { scanId: scanJobId });
      return;
    }

    if (status === 'pending') {
      this.queue = this.queue.filter((queued) => queued !== record);
      this.transition(record, 'cancelled');
      log.info('Cancelled while pending', { scanId: scanJobId });
      return;
    }

    await this.stop(record, 'cancelled');
  }

  /** Resolves once every dispatch and store write started so far has finished. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled(Array.from(this.inFlight));
    }
    await Promise.all(Array.from(this.jobs.values(), (record) => record.saving));
  }

  async shutdown(): Promise<void> {
    const active = Array.from(this.jobs.values()).filter((record) => !isTerminal(record.job.status));
    log.info(`Shutting down, cancelling ${active.length} active scans`);

    // Pending first so that cancelling running jobs doesn't promote them
    const pending = active.filter((record) => record.job.status === 'pending');
    for (const record of pending) {
      await this.cancel(record.job.id);
    }
    await Promise.all(active.filter((record) => !pending.includes(record)).map((record) => this.cancel(record.job.id)));
    await this.drain();
  }

  private require(scanJobId: string): JobRecord {
    const record = this.jobs.get(scanJobId);
    if (!record) throw new NotFoundError(scanJobId);
    return record;
  }

  private start(record: JobRecord) {
    this.running++;
    this.transition(record, 'running', { startedAt: new Date(), progress: 0 });
    record.timeoutTimer = setTimeout(() => this.expire(record), record.timeoutMs);

    this.execute(record).catch((err) => {
      log.error('Unexpected error while executing scan', { scanId: record.job.id, error: err });
    });
  }

  // Promote the oldest pending jobs into free slots
  private pump() {
    while (this.running < this.settings.maxConcurrentScans && this.queue.length > 0) {
      const next = this.queue.shift();
      if (next && next.job.status === 'pending') {
        this.start(next);
      }
    }
  }

  /**
   * Applies a transition if the state machine allows it. Disallowed ones
   * (late engine callbacks on a finished job) are dropped.
   */
  private transition(record: JobRecord, to: ScanStatus, patch: Partial<ScanJob> = {}): boolean {
    const from = record.job.status;
    if (!TRANSITIONS[from].includes(to)) {
      log.debug(`Discarding ${from} -> ${to}`, { scanId: record.job.id });
      return false;
    }

    Object.assign(record.job, patch, { status: to });

    if (isTerminal(to)) {
      record.job.completedAt = new Date();
      if (record.timeoutTimer) {
        clearTimeout(record.timeoutTimer);
        record.timeoutTimer = null;
      }
      if (from === 'running') {
        this.running--;
      }
    }

    log.info(`${from} -> ${to}`, { scanId: record.job.id });
    this.persist(record);

    if (to === 'completed' || to === 'failed') {
      this.notify(record);
    }
    if (isTerminal(to)) {
      this.pump();
    }
    return true;
  }

  private async execute(record: JobRecord): Promise<void> {
    const { job } = record;

    // Deferred so a synchronous engine error can't re-enter the caller's transition
    await Promise.resolve();
    if (job.status !== 'running' || record.stopping) {
      log.debug(`Not launching, scan already ${job.status}`, { scanId: job.id });
      return;
    }

    let handle: ScanHandle;
    try {
      handle = await this.engine.startScan({
        scanId: job.id,
        target: job.target,
        scanType: job.scanType,
        policy: record.policy,
        timeoutMs: record.timeoutMs,
      });
    } catch (err) {
      const message = describeEngineFailure(err);
      log.warn(`Scan could not start: ${message}`, { scanId: job.id });
      this.transition(record, 'failed', { errorMessage: message });
      return;
    }

    if (job.status !== 'running' || record.stopping) {
      // Cancelled or timed out while the engine was launching
      handle.completion.catch((err) => {
        log.debug(`Discarded scan ended: ${describeEngineFailure(err)}`, { scanId: job.id });
      });
      await this.terminateWithGrace(record, handle);
      return;
    }

    record.handle = handle;
    handle.onProgress((progress) => this.recordProgress(record, progress));

    let result: EngineResult;
    try {
      result = await handle.completion;
    } catch (err) {
      if (!record.stopping) {
        this.transition(record, 'failed', { errorMessage: describeEngineFailure(err) });
      }
      return;
    }

    if (record.stopping) return;
    this.complete(record, result);
  }

  private complete(record: JobRecord, result: EngineResult) {
    if (result.exitCode !== 0) {
      const detail = result.message ? `: ${result.message}` : '';
      this.transition(record, 'failed', {
        errorMessage: `engine error: scanner exited with code ${result.exitCode}${detail}`,
      });
      return;
    }

    const statistics = summarizeFindings(result.findings);
    const buildOutcome = evaluateThresholds(statistics, record.job.thresholds);
    log.info(`Scan finished with ${statistics.total} findings, outcome ${buildOutcome}`, { scanId: record.job.id });
    this.transition(record, 'completed', { statistics, buildOutcome, progress: 100 });
  }

  private recordProgress(record: JobRecord, update: ScanProgress) {
    if (record.job.status !== 'running' || record.stopping) return;

    const value = Math.min(100, Math.max(0, Math.round(update.progress)));
    if (Number.isNaN(value) || value <= record.job.progress) return;

    record.job.progress = value;
    this.persist(record);
  }

  private expire(record: JobRecord) {
    record.timeoutTimer = null;
    if (record.job.status !== 'running') return;

    log.warn(`Scan exceeded ${record.timeoutMs}ms, terminating`, { scanId: record.job.id });
    this.stop(record, 'timeout').catch((err) => {
      log.error('Failed to stop timed out scan', { scanId: record.job.id, error: err });
    });
  }

  private stop(record: JobRecord, reason: 'cancelled' | 'timeout'): Promise<void> {
    if (record.stopping) return record.stopping;

    const finish = () => {
      if (reason === 'timeout') {
        this.transition(record, 'failed', { errorMessage: TIMEOUT_MESSAGE });
      } else {
        this.transition(record, 'cancelled');
      }
    };

    const handle = record.handle;
    if (!handle) {
      // Engine still launching: nothing to signal yet, execute() cleans up
      finish();
      return Promise.resolve();
    }

    record.stopping = (async () => {
      const acknowledged = await this.terminateWithGrace(record, handle);
      if (!acknowledged) {
        log.warn(`Engine did not acknowledge termination within ${this.settings.cancelGraceMs}ms, forcing ${reason}`, {
          scanId: record.job.id,
        });
      }
      finish();
    })();
    return record.stopping;
  }

  private async terminateWithGrace(record: JobRecord, handle: ScanHandle): Promise<boolean> {
    let graceTimer: NodeJS.Timeout | undefined;
    const grace = new Promise<boolean>((resolve) => {
      graceTimer = setTimeout(() => resolve(false), this.settings.cancelGraceMs);
    });

    const acknowledged = Promise.resolve()
      .then(() => handle.terminate())
      .then(
        () => true,
        (err) => {
          log.warn('Engine terminate failed', { scanId: record.job.id, error: err });
          return false;
        }
      );

    try {
      return await Promise.race([acknowledged, grace]);
    } finally {
      if (graceTimer) clearTimeout(graceTimer);
    }
  }

  private persist(record: JobRecord) {
    const snapshot = snapshotOf(record.job);
    record.saving = record.saving
      .then(() => this.store.saveScanJob(snapshot))
      .catch((err) => {
        log.warn('Failed to persist scan job', { scanId: snapshot.id, error: err });
      });
  }

  private notify(record: JobRecord) {
    const { job } = record;
    if (!record.notify) return;

    const { channelIds } = record;
    const channels = channelIds
      ? this.channels.filter((channel) => channelIds.includes(channel.id))
      : this.channels;
    if (channels.length === 0) {
      log.debug('No notification channels enabled', { scanId: job.id });
      return;
    }

    const envelope = buildEnvelope(snapshotOf(job), reportLinksFor(this.settings.reportBaseUrl, job.id));

    // Dispatch results are recorded but never touch the job's status
    const delivery: Promise<void> = Promise.resolve()
      .then(() => this.dispatcher.dispatch(envelope, channels))
      .then((report) => {
        this.reports.set(job.id, report);
        return this.store.saveDispatchReport(report);
      })
      .catch((err) => {
        log.error('Notification dispatch could not be recorded', { scanId: job.id, error: err });
      })
      .finally(() => {
        this.inFlight.delete(delivery);
      });
    this.inFlight.add(delivery);
  }
}
