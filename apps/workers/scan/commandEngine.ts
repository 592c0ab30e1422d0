/*
 * =============================================================================
 * MODULE: commandEngine.ts
 * =============================================================================
 * Runs an external scanner executable as a child process. The scanner writes
 * one JSON object per stdout line:
 *
 *   {"progress": 40}
 *   {"finding": {"severity": "high", "type": "...", "location": "...", "evidence": "..."}}
 *   {"findings": [ ... ]}
 *
 * Anything else on stdout is ignored. The exit code is passed through as-is.
 * =============================================================================
 */

import { spawn, type ChildProcess } from 'node:child_process';
import { createInterface } from 'node:readline';
import { EngineUnavailableError, InvalidTargetError } from '../core/errors.js';
import { moduleLogger } from '../core/logger.js';
import type {
  EngineFinding,
  EngineRequest,
  EngineResult,
  ScanEngine,
  ScanHandle,
  ScanProgress,
} from './engine.js';

const log = moduleLogger('commandEngine');

const STDERR_TAIL_BYTES = 2048;

export interface CommandEngineOptions {
  command: string;
  args?: string[];
  /** SIGKILL follows SIGTERM if the scanner has not exited by then. */
  killAfterMs?: number;
  env?: NodeJS.ProcessEnv;
}

export type EngineEvent =
  | { kind: 'progress'; progress: number }
  | { kind: 'findings'; findings: EngineFinding[] };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toFinding(value: unknown): EngineFinding | null {
  if (!isRecord(value)) return null;
  const severity = value.severity ?? value.risk;
  if (typeof severity !== 'string' && typeof severity !== 'number') return null;
  return {
    severity,
    type: typeof value.type === 'string' ? value.type : String(value.name ?? 'unknown'),
    location: typeof value.location === 'string' ? value.location : String(value.url ?? ''),
    evidence: typeof value.evidence === 'string' ? value.evidence : '',
  };
}

export function parseEngineLine(line: string): EngineEvent | null {
  const trimmed = line.trim();
  if (!trimmed.startsWith('{')) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    return null;
  }
  if (!isRecord(parsed)) return null;

  if (typeof parsed.progress === 'number') {
    return { kind: 'progress', progress: parsed.progress };
  }
  if (parsed.finding !== undefined) {
    const finding = toFinding(parsed.finding);
    return finding ? { kind: 'findings', findings: [finding] } : null;
  }
  if (Array.isArray(parsed.findings)) {
    const findings = parsed.findings
      .map(toFinding)
      .filter((f): f is EngineFinding => f !== null);
    return { kind: 'findings', findings };
  }
  return null;
}

export function validateTarget(target: string): URL {
  let url: URL;
  try {
    url = new URL(target);
  } catch {
    throw new InvalidTargetError(`"${target}" is not a valid URL`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new InvalidTargetError(`unsupported protocol ${url.protocol} in "${target}"`);
  }
  return url;
}

class ChildProcessHandle implements ScanHandle {
  readonly completion: Promise<EngineResult>;
  private readonly listeners: Array<(progress: ScanProgress) => void> = [];
  private readonly exited: Promise<void>;
  private hasExited = false;

  constructor(private readonly child: ChildProcess, private readonly killAfterMs: number, scanId: string) {
    const findings: EngineFinding[] = [];
    let stderrTail = '';

    child.stderr?.on('data', (chunk: Buffer) => {
      stderrTail = (stderrTail + chunk.toString('utf8')).slice(-STDERR_TAIL_BYTES);
    });

    if (child.stdout) {
      const lines = createInterface({ input: child.stdout });
      lines.on('line', (line) => {
        const event = parseEngineLine(line);
        if (!event) return;
        if (event.kind === 'progress') {
          this.emit({ progress: event.progress, done: false });
        } else {
          findings.push(...event.findings);
        }
      });
    }

    this.completion = new Promise<EngineResult>((resolve, reject) => {
      child.once('close', (code, signal) => {
        this.hasExited = true;
        if (code === null) {
          reject(new Error(`scanner terminated by ${signal ?? 'unknown signal'}`));
          return;
        }
        this.emit({ progress: 100, done: true });
        log.info(`Scanner exited with code ${code}, ${findings.length} findings`, { scanId });
        resolve({
          findings,
          exitCode: code,
          message: code === 0 ? undefined : stderrTail.trim() || undefined,
        });
      });
    });

    this.exited = new Promise<void>((resolve) => {
      child.once('exit', () => resolve());
    });
  }

  onProgress(listener: (progress: ScanProgress) => void): void {
    this.listeners.push(listener);
  }

  async terminate(): Promise<void> {
    if (this.hasExited || this.child.exitCode !== null) return;

    this.child.kill('SIGTERM');
    const killTimer = setTimeout(() => {
      if (this.child.exitCode === null) {
        log.warn(`Scanner ignored SIGTERM for ${this.killAfterMs}ms, sending SIGKILL`);
        this.child.kill('SIGKILL');
      }
    }, this.killAfterMs);
    killTimer.unref();

    await this.exited;
    clearTimeout(killTimer);
  }

  private emit(progress: ScanProgress) {
    for (const listener of this.listeners) {
      listener(progress);
    }
  }
}

/**
 * ScanEngine backed by a scanner CLI (for example a wrapper around a
 * containerised ZAP baseline scan).
 */
export class CommandScanEngine implements ScanEngine {
  private readonly killAfterMs: number;

  constructor(private readonly options: CommandEngineOptions) {
    this.killAfterMs = options.killAfterMs ?? 10_000;
  }

  async startScan(request: EngineRequest): Promise<ScanHandle> {
    const url = validateTarget(request.target);
    const args = [
      ...(this.options.args ?? []),
      '--target', url.toString(),
      '--scan-type', request.scanType,
      '--policy', request.policy,
      '--timeout', String(Math.ceil(request.timeoutMs / 1000)),
    ];

    log.info(`Launching ${this.options.command} against ${url.host}`, { scanId: request.scanId });

    const child = spawn(this.options.command, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
      env: this.options.env ?? process.env,
    });

    await new Promise<void>((resolve, reject) => {
      child.once('spawn', () => resolve());
      child.once('error', (err) => {
        reject(new EngineUnavailableError(`cannot launch ${this.options.command}: ${err.message}`));
      });
    });

    return new ChildProcessHandle(child, this.killAfterMs, request.scanId);
  }
}
