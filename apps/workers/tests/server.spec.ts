import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildServer } from '../server.js';
import { ScanOrchestrator } from '../scan/orchestrator.js';
import { NotificationDispatcher } from '../notify/dispatcher.js';
import type { EngineRequest, EngineResult, ScanEngine, ScanHandle } from '../scan/engine.js';
import { FakeChannel } from './fixtures.js';

// Engine whose scans finish immediately without findings
class InstantEngine implements ScanEngine {
  async startScan(_request: EngineRequest): Promise<ScanHandle> {
    const result: EngineResult = { findings: [], exitCode: 0 };
    return {
      completion: Promise.resolve(result),
      onProgress: () => undefined,
      terminate: async () => undefined,
    };
  }
}

// Engine whose scans never finish, so jobs stay running or pending
class IdleEngine implements ScanEngine {
  async startScan(_request: EngineRequest): Promise<ScanHandle> {
    let stop: (err: Error) => void = () => undefined;
    const completion = new Promise<EngineResult>((_resolve, reject) => {
      stop = reject;
    });
    completion.catch(() => undefined);
    return {
      completion,
      onProgress: () => undefined,
      terminate: async () => stop(new Error('terminated')),
    };
  }
}

describe('HTTP API', () => {
  let orchestrator: ScanOrchestrator;
  let app: FastifyInstance;

  function start(engine: ScanEngine, maxConcurrentScans = 1) {
    orchestrator = new ScanOrchestrator({
      engine,
      dispatcher: new NotificationDispatcher({ baseDelayMs: 1 }),
      channels: [new FakeChannel('chat')],
      settings: { maxConcurrentScans, cancelGraceMs: 50 },
    });
    app = buildServer(orchestrator, { logger: false });
  }

  beforeEach(() => start(new IdleEngine()));

  afterEach(async () => {
    await app.close();
    await orchestrator.shutdown();
  });

  it('answers health checks', async () => {
    const response = await app.inject({ method: 'GET', url: '/' });
    expect(response.statusCode).toBe(200);
    expect(response.json().status).toBe('ok');
  });

  it('triggers a scan', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/scans',
      payload: { application: 'shop', scanType: 'full', config: { target: 'https://shop.test', thresholds: { high: 3 } } },
    });

    expect(response.statusCode).toBe(202);
    const body = response.json();
    expect(body.id).toMatch(/^scan-/);
    expect(body.status).toBe('running');
    expect(body.thresholds).toEqual({ high: 3 });
  });

  it('returns 400 with every validation issue', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/scans',
      payload: { application: '', scanType: 'full', config: { target: 'https://shop.test' } },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      error: 'INVALID_REQUEST',
      message: 'Invalid scan request: application: must be non-empty',
      issues: ['application: must be non-empty'],
    });
    expect(orchestrator.metrics().total).toBe(0);
  });

  it('returns 404 for unknown scans', async () => {
    const response = await app.inject({ method: 'GET', url: '/scans/scan-missing' });
    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ error: 'NOT_FOUND', message: 'Scan job scan-missing not found' });

    const cancel = await app.inject({ method: 'DELETE', url: '/scans/scan-missing' });
    expect(cancel.statusCode).toBe(404);
  });

  it('reports queue metrics and cancels pending scans', async () => {
    const first = orchestrator.trigger('shop', 'quick', { target: 'https://shop.test' });
    const second = orchestrator.trigger('cart', 'quick', { target: 'https://cart.test' });

    const metrics = await app.inject({ method: 'GET', url: '/scans' });
    expect(metrics.json()).toMatchObject({ running: 1, pending: 1, maxConcurrent: 1, total: 2 });
    expect(metrics.json().jobs.map((job: { id: string }) => job.id)).toEqual([first, second]);

    const cancel = await app.inject({ method: 'DELETE', url: `/scans/${second}` });
    expect(cancel.statusCode).toBe(202);
    expect(cancel.json().status).toBe('cancelled');
  });

  it('exposes the dispatch report once notifications finish', async () => {
    await app.close();
    await orchestrator.shutdown();
    start(new InstantEngine());

    const id = orchestrator.trigger('shop', 'quick', { target: 'https://shop.test' });
    await new Promise((resolve) => setTimeout(resolve, 10));
    await orchestrator.drain();

    const status = await app.inject({ method: 'GET', url: `/scans/${id}` });
    expect(status.json()).toMatchObject({ status: 'completed', buildOutcome: 'success', progress: 100 });

    const report = await app.inject({ method: 'GET', url: `/scans/${id}/notifications` });
    expect(report.statusCode).toBe(200);
    expect(report.json().results.chat).toEqual({ channelId: 'chat', attemptNumber: 1, result: 'sent', error: null });
  });

  it('has no dispatch report while a scan is running', async () => {
    const id = orchestrator.trigger('shop', 'quick', { target: 'https://shop.test' });
    const response = await app.inject({ method: 'GET', url: `/scans/${id}/notifications` });
    expect(response.statusCode).toBe(404);
    expect(response.json().message).toBe(`No dispatch report for ${id} yet`);
  });

  it('probes channel connections', async () => {
    const response = await app.inject({ method: 'GET', url: '/notifications/test' });
    expect(response.json()).toEqual({ chat: true });
  });
});
