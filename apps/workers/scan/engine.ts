import type { ScanType } from '../src/core/jobTypes.js';

export interface EngineRequest {
  scanId: string;
  target: string;
  scanType: ScanType;
  policy: string;
  timeoutMs: number;
}

export interface ScanProgress {
  progress: number;
  done: boolean;
}

export interface EngineFinding {
  /** Severity name or numeric risk code, as the scanner reports it. */
  severity: string | number;
  type: string;
  location: string;
  evidence: string;
}

export interface EngineResult {
  findings: EngineFinding[];
  exitCode: number;
  /** Diagnostic text for a non-zero exit. */
  message?: string;
}

/**
 * One running scan. `completion` rejects when the scanner crashes;
 * `terminate` resolves once the scanner has acknowledged the stop.
 */
export interface ScanHandle {
  readonly completion: Promise<EngineResult>;
  onProgress(listener: (progress: ScanProgress) => void): void;
  terminate(): Promise<void>;
}

/**
 * The vulnerability scanner, seen as a black box. `startScan` rejects with
 * EngineUnavailableError or InvalidTargetError when the scan cannot launch.
 */
export interface ScanEngine {
  startScan(request: EngineRequest): Promise<ScanHandle>;
}
