import { Pool } from 'pg';
import { promises as fs } from 'fs';
import { join } from 'path';
import type { ScanJob } from '../src/core/jobTypes.js';
import type { DispatchReport } from '../notify/dispatcher.js';
import { moduleLogger } from './logger.js';
import type { ScanStore } from './scanStore.js';

const log = moduleLogger('Database');

export const SCHEMA_PATH = join(process.cwd(), 'apps', 'workers', 'db', 'schema.sql');

/** The slice of pg's Pool this store relies on. */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<unknown>;
}

const UPSERT_SCAN = `
  INSERT INTO scans (
    id, application, scan_type, target, status, progress,
    created_at, started_at, completed_at, thresholds, statistics,
    build_outcome, error_message, updated_at
  ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, NOW())
  ON CONFLICT (id) DO UPDATE SET
    status = EXCLUDED.status,
    progress = EXCLUDED.progress,
    started_at = EXCLUDED.started_at,
    completed_at = EXCLUDED.completed_at,
    statistics = EXCLUDED.statistics,
    build_outcome = EXCLUDED.build_outcome,
    error_message = EXCLUDED.error_message,
    updated_at = NOW()
`;

const UPSERT_DISPATCH_REPORT = `
  INSERT INTO dispatch_reports (scan_id, results, attempts, started_at, completed_at)
  VALUES ($1, $2, $3, $4, $5)
  ON CONFLICT (scan_id) DO UPDATE SET
    results = EXCLUDED.results,
    attempts = EXCLUDED.attempts,
    started_at = EXCLUDED.started_at,
    completed_at = EXCLUDED.completed_at
`;

export function createPool(connectionString: string): Pool {
  const pool = new Pool({
    connectionString,
    max: 10,
    idleTimeoutMillis: 10000,
    connectionTimeoutMillis: 5000,
    statement_timeout: 30000,
  });

  pool.on('error', (err) => {
    log.error('Pool error', { error: err });
  });

  return pool;
}

/**
 * PostgreSQL-backed ScanStore. Each save upserts the whole row, so callers
 * must issue one job's saves in order (the orchestrator chains them).
 */
export class PgScanStore implements ScanStore {
  constructor(private readonly db: Queryable) {}

  async initialize(schemaPath: string = SCHEMA_PATH): Promise<void> {
    const ddl = await fs.readFile(schemaPath, 'utf-8');
    await this.db.query(ddl);
    log.info('Schema verified');
  }

  async saveScanJob(job: ScanJob): Promise<void> {
    await this.db.query(UPSERT_SCAN, [
      job.id,
      job.application,
      job.scanType,
      job.target,
      job.status,
      job.progress,
      job.createdAt,
      job.startedAt,
      job.completedAt,
      JSON.stringify(job.thresholds),
      job.statistics ? JSON.stringify(job.statistics) : null,
      job.buildOutcome,
      job.errorMessage,
    ]);
  }

  async saveDispatchReport(report: DispatchReport): Promise<void> {
    await this.db.query(UPSERT_DISPATCH_REPORT, [
      report.scanJobId,
      JSON.stringify(report.results),
      JSON.stringify(report.attempts),
      report.startedAt,
      report.completedAt,
    ]);
  }
}
