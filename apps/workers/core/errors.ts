/**
 * Error taxonomy for the orchestration engine.
 *
 * Request errors surface synchronously to callers. Engine errors never reach
 * callers: the orchestrator folds them into a failed job's `errorMessage`.
 */

export type EngineErrorCode =
  | 'INVALID_REQUEST'
  | 'NOT_FOUND'
  | 'ENGINE_UNAVAILABLE'
  | 'INVALID_TARGET';

export class ScanEngineError extends Error {
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidRequestError extends ScanEngineError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('INVALID_REQUEST', `Invalid scan request: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export class NotFoundError extends ScanEngineError {
  constructor(scanJobId: string) {
    super('NOT_FOUND', `Scan job ${scanJobId} not found`);
  }
}

/** The scanner could not be launched or reached. */
export class EngineUnavailableError extends ScanEngineError {
  constructor(message: string) {
    super('ENGINE_UNAVAILABLE', message);
  }
}

/** The scanner refused the target (malformed URL, unresolvable host). */
export class InvalidTargetError extends ScanEngineError {
  constructor(message: string) {
    super('INVALID_TARGET', message);
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return typeof err === 'string' ? err : 'Unknown error';
}

/**
 * Human-readable failure reason stored on a failed job.
 */
export function describeEngineFailure(err: unknown): string {
  if (err instanceof InvalidTargetError) {
    return `invalid target: ${err.message}`;
  }
  if (err instanceof EngineUnavailableError) {
    return `engine unreachable: ${err.message}`;
  }
  return `engine error: ${errorMessage(err)}`;
}
