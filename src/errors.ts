/** Unified error hierarchy for percolator. */

export type ErrorCode =
  | 'ACQUISITION_TIMEOUT'
  | 'STORE_CORRUPT'
  | 'STORE_WRITE_FAILURE'
  | 'VCS_FAILURE'
  | 'UNKNOWN_TAG'
  | 'PATH_SAFETY_VIOLATION'
  | 'NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'CANCELLED'
  | 'NO_UPDATE_AVAILABLE'
  | 'SCRIPT_FAILURE'
  | 'UNEXPECTED';

export class PercolatorError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details?: Record<string, unknown>,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'PercolatorError';
  }
}

export class AcquisitionTimeoutError extends PercolatorError {
  constructor(lockPath: string, waitedMs: number) {
    super(`Timed out after ${waitedMs}ms waiting for lock: ${lockPath}`, 'ACQUISITION_TIMEOUT', {
      lockPath,
      waitedMs,
    });
    this.name = 'AcquisitionTimeoutError';
  }
}

export class StoreCorruptError extends PercolatorError {
  constructor(filePath: string, reason: string, options?: ErrorOptions) {
    super(`Registry document ${filePath} is corrupt: ${reason}`, 'STORE_CORRUPT', { filePath, reason }, options);
    this.name = 'StoreCorruptError';
  }
}

export class StoreWriteError extends PercolatorError {
  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to write registry document: ${filePath}`, 'STORE_WRITE_FAILURE', { filePath }, options);
    this.name = 'StoreWriteError';
  }
}

export class VcsError extends PercolatorError {
  constructor(
    public readonly operation: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(`${operation} failed: ${message}`, 'VCS_FAILURE', { operation }, options);
    this.name = 'VcsError';
  }
}

export class UnknownTagError extends PercolatorError {
  constructor(tag: string, remote?: string) {
    super(
      remote ? `Tag '${tag}' does not exist in ${remote}` : `Tag '${tag}' does not exist`,
      'UNKNOWN_TAG',
      { tag, remote },
    );
    this.name = 'UnknownTagError';
  }
}

export class PathSafetyError extends PercolatorError {
  constructor(target: string, root: string) {
    super(`Refusing to touch ${target}: outside managed root ${root}`, 'PATH_SAFETY_VIOLATION', {
      target,
      root,
    });
    this.name = 'PathSafetyError';
  }
}

export class NotFoundError extends PercolatorError {
  constructor(entity: string, id: string) {
    super(`${entity} not found: ${id}`, 'NOT_FOUND', { entity, id });
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends PercolatorError {
  constructor(
    message: string,
    public readonly errors: string[],
  ) {
    super(message, 'VALIDATION_ERROR', { errors });
    this.name = 'ValidationError';
  }
}

export class CancelledError extends PercolatorError {
  constructor(operation: string, phase: string) {
    super(`${operation} cancelled before ${phase}`, 'CANCELLED', { operation, phase });
    this.name = 'CancelledError';
  }
}

export class NoUpdateError extends PercolatorError {
  constructor(name: string) {
    super(`No update available for ${name}`, 'NO_UPDATE_AVAILABLE', { name });
    this.name = 'NoUpdateError';
  }
}

export class ScriptError extends PercolatorError {
  constructor(scriptPath: string, message: string, options?: ErrorOptions) {
    super(`Script ${scriptPath} failed: ${message}`, 'SCRIPT_FAILURE', { scriptPath }, options);
    this.name = 'ScriptError';
  }
}

export function toPercolatorError(error: unknown): PercolatorError {
  if (error instanceof PercolatorError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new PercolatorError(message, 'UNEXPECTED', undefined, { cause: error });
}
