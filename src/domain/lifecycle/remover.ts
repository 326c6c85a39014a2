import { promises as fs } from 'node:fs';
import { NotFoundError, PercolatorError } from '../../errors.js';
import { pathExists } from '../../infra/fs-utils.js';
import type { Result } from '../../infra/types.js';
import { OperationRun, containedPluginPath } from './operation.js';
import type { LifecycleContext, OperationOptions, RemoveOutcome } from './types.js';

export const REMOVE_PROGRESS = {
  LOOKUP: 10,
  DELETING: 40,
  UNREGISTERING: 70,
} as const;

export class Remover {
  constructor(private ctx: LifecycleContext) {}

  /**
   * Delete a plugin's working directory, then its record. Once the directory is gone the
   * record is dropped without another cancellation check.
   */
  async remove(name: string, options: OperationOptions = {}): Promise<Result<RemoveOutcome>> {
    const { store, logger } = this.ctx;
    const run = new OperationRun('remove', name, options, logger);

    return run.execute(async () => {
      run.progress(REMOVE_PROGRESS.LOOKUP);
      const registry = await store.read();
      if (!registry.has(name)) throw new NotFoundError('Plugin record', name);

      run.checkpoint('deleting');
      run.progress(REMOVE_PROGRESS.DELETING);
      const pluginPath = containedPluginPath(this.ctx.pluginsDir, name);
      const existed = await pathExists(pluginPath);
      try {
        await fs.rm(pluginPath, { recursive: true, force: true });
      } catch (e) {
        throw new PercolatorError(`Failed to delete ${pluginPath}`, 'UNEXPECTED', { path: pluginPath }, { cause: e });
      }
      if (!existed) logger.warn('Working directory already absent', { name, path: pluginPath });

      run.progress(REMOVE_PROGRESS.UNREGISTERING);
      await store.update((current) => {
        current.delete(name);
      });
      return { name, directoryRemoved: existed };
    });
  }
}
