import { resolve } from 'node:path';
import { CancelledError, PathSafetyError, toPercolatorError } from '../../errors.js';
import { isContainedIn } from '../../infra/fs-utils.js';
import { err, ok } from '../../infra/types.js';
import type { Result } from '../../infra/types.js';
import type { Logger } from '../../logging/logger.js';
import type { OperationOptions } from './types.js';

/**
 * One run of a lifecycle operation: progress reporting, cooperative cancellation and the
 * translation of thrown errors into a Result.
 */
export class OperationRun {
  private last = -1;
  private logger: Logger;

  constructor(
    private operation: string,
    name: string,
    private options: OperationOptions,
    logger: Logger,
  ) {
    this.logger = logger.child(operation, { name });
  }

  progress(value: number): void {
    const clamped = Math.max(0, Math.min(100, Math.round(value)));
    if (clamped === this.last) return;
    this.last = clamped;
    this.options.onProgress?.(clamped);
  }

  /** Throws CancelledError when the caller aborted; call only between phases. */
  checkpoint(phase: string): void {
    if (this.options.signal?.aborted) {
      throw new CancelledError(this.operation, phase);
    }
  }

  /**
   * Run the body. Success reports 100, failure reports 0. PathSafetyError is rethrown
   * instead of returned.
   */
  async execute<T>(body: () => Promise<T>): Promise<Result<T>> {
    this.logger.debug(`${this.operation} started`);
    try {
      const value = await body();
      this.progress(100);
      this.logger.info(`${this.operation} succeeded`);
      return ok(value);
    } catch (e) {
      this.progress(0);
      const error = toPercolatorError(e);
      this.logger.error(`${this.operation} failed`, { code: error.code, error: error.message });
      if (error instanceof PathSafetyError) throw error;
      return err(error);
    }
  }
}

/** Absolute working directory for a plugin; throws PathSafetyError unless it sits inside root. */
export function containedPluginPath(root: string, name: string): string {
  const target = resolve(root, name);
  if (!isContainedIn(root, target)) throw new PathSafetyError(target, resolve(root));
  return target;
}
