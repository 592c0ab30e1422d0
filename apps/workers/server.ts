import Fastify, { type FastifyInstance } from 'fastify';
import {
  CANCEL_GRACE_MS,
  DATABASE_URL,
  DEFAULT_SCAN_POLICY,
  MAX_CONCURRENT_SCANS,
  NOTIFY_ATTEMPT_TIMEOUT_MS,
  NOTIFY_BASE_DELAY_MS,
  NOTIFY_CONCURRENCY,
  NOTIFY_MAX_ATTEMPTS,
  NOTIFY_MAX_DELAY_MS,
  PER_HOST_CONCURRENCY,
  PORT,
  REPORT_BASE_URL,
  SCANNER_COMMAND,
  SCAN_TIMEOUT_MS,
  channelsConfigFromEnv,
} from './core/env.js';
import { createPool, PgScanStore } from './core/database.js';
import { InvalidRequestError, NotFoundError } from './core/errors.js';
import { moduleLogger } from './core/logger.js';
import { MemoryScanStore, type ScanStore } from './core/scanStore.js';
import { createChannels } from './notify/channels/index.js';
import { NotificationDispatcher } from './notify/dispatcher.js';
import { CommandScanEngine } from './scan/commandEngine.js';
import { ScanOrchestrator, parseTriggerRequest } from './scan/orchestrator.js';
import { HostLimiters } from './src/core/limiters.js';

const log = moduleLogger('Server');

type ScanParams = { Params: { id: string } };

export interface ServerOptions {
  logger?: boolean;
}

export function buildServer(orchestrator: ScanOrchestrator, options: ServerOptions = {}): FastifyInstance {
  const app = Fastify({
    logger: options.logger === false ? false : { level: 'info' },
  });

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof InvalidRequestError) {
      return reply.code(400).send({ error: error.code, message: error.message, issues: error.issues });
    }
    if (error instanceof NotFoundError) {
      return reply.code(404).send({ error: error.code, message: error.message });
    }
    request.log.error(error);
    return reply.code(error.statusCode ?? 500).send({ error: 'INTERNAL', message: error.message });
  });

  // Health: no external calls
  app.get('/', async () => ({ status: 'ok', ts: Date.now() }));

  app.post('/scans', async (req, reply) => {
    const request = parseTriggerRequest(req.body);
    const scanJobId = orchestrator.trigger(request.application, request.scanType, request.config);
    return reply.code(202).send(orchestrator.getStatus(scanJobId));
  });

  app.get('/scans', async () => ({
    ...orchestrator.metrics(),
    jobs: orchestrator.listJobs(),
  }));

  app.get<ScanParams>('/scans/:id', async (req) => orchestrator.getStatus(req.params.id));

  // Pending jobs are cancelled before the reply; running ones finish within the grace period
  app.delete<ScanParams>('/scans/:id', async (req, reply) => {
    const { id } = req.params;
    orchestrator.getStatus(id);
    orchestrator.cancel(id).catch((err) => {
      req.log.error({ err, scanJobId: id }, 'cancel failed');
    });
    return reply.code(202).send(orchestrator.getStatus(id));
  });

  app.get<ScanParams>('/scans/:id/notifications', async (req, reply) => {
    const report = orchestrator.getDispatchReport(req.params.id);
    if (!report) {
      return reply.code(404).send({ error: 'NOT_FOUND', message: `No dispatch report for ${req.params.id} yet` });
    }
    return report;
  });

  app.get('/notifications/test', async () => orchestrator.testConnections());

  return app;
}

async function main() {
  const pool = DATABASE_URL ? createPool(DATABASE_URL) : null;
  let store: ScanStore;
  if (pool) {
    const pgStore = new PgScanStore(pool);
    await pgStore.initialize();
    store = pgStore;
  } else {
    log.warn('DATABASE_URL not set, scan state is kept in memory only');
    store = new MemoryScanStore();
  }

  const channels = createChannels(channelsConfigFromEnv(), {
    hostLimiters: new HostLimiters(PER_HOST_CONCURRENCY),
    requestTimeoutMs: NOTIFY_ATTEMPT_TIMEOUT_MS,
  });
  log.info(`Notification channels: ${channels.map((c) => c.id).join(', ') || 'none'}`);

  const orchestrator = new ScanOrchestrator({
    engine: new CommandScanEngine({ command: SCANNER_COMMAND }),
    dispatcher: new NotificationDispatcher({
      maxAttempts: NOTIFY_MAX_ATTEMPTS,
      baseDelayMs: NOTIFY_BASE_DELAY_MS,
      maxDelayMs: NOTIFY_MAX_DELAY_MS,
      attemptTimeoutMs: NOTIFY_ATTEMPT_TIMEOUT_MS,
      concurrency: NOTIFY_CONCURRENCY,
    }),
    channels,
    store,
    settings: {
      maxConcurrentScans: MAX_CONCURRENT_SCANS,
      defaultTimeoutMs: SCAN_TIMEOUT_MS,
      cancelGraceMs: CANCEL_GRACE_MS,
      defaultPolicy: DEFAULT_SCAN_POLICY,
      reportBaseUrl: REPORT_BASE_URL,
    },
  });

  const app = buildServer(orchestrator);

  const close = async (signal: string) => {
    log.info(`${signal} received, shutting down`);
    await app.close();
    await orchestrator.shutdown();
    if (pool) await pool.end();
    process.exit(0);
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      close(signal).catch((err) => {
        log.error('Shutdown failed', { error: err });
        process.exit(1);
      });
    });
  }

  await app.listen({ port: PORT, host: '0.0.0.0' });
}

// Start server if this is the main module
if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((err) => {
    log.error('Server failed to start', { error: err });
    process.exit(1);
  });
}
