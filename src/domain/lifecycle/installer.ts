import { promises as fs } from 'node:fs';
import { resolve } from 'node:path';
import { pathExists } from '../../infra/fs-utils.js';
import { PercolatorError } from '../../errors.js';
import type { Result } from '../../infra/types.js';
import { resolveRemoteUrl } from '../vcs/remote.js';
import { resolveTarget } from '../version/resolver.js';
import type { PluginRecord } from '../registry/types.js';
import { OperationRun, containedPluginPath } from './operation.js';
import type { InstallOptions, InstallOutcome, InstallRequest, LifecycleContext } from './types.js';

/** Progress reported as each install phase starts or ends. */
export const INSTALL_PROGRESS = {
  START: 0,
  REMOVING: 5,
  CLONED: 40,
  RESOLVING: 55,
  CHECKOUT: 70,
  CHECKED_OUT: 85,
  PERSISTING: 95,
} as const;

export class Installer {
  constructor(private ctx: LifecycleContext) {}

  /**
   * Clone, resolve, check out and register one plugin.
   *
   * An existing working directory short-circuits without any VCS call unless `force` is set,
   * in which case it is deleted first. A failure after cloning removes the fresh clone so the
   * install can simply be retried.
   */
  async install(request: InstallRequest, options: InstallOptions = {}): Promise<Result<InstallOutcome>> {
    const { vcs, store, logger } = this.ctx;
    const run = new OperationRun('install', request.name, options, logger);
    const root = this.ctx.pluginsDir;

    return run.execute(async () => {
      const pluginPath = containedPluginPath(root, request.name);
      run.progress(INSTALL_PROGRESS.START);

      if (await pathExists(pluginPath)) {
        if (!options.force) {
          const existing = (await store.read()).get(request.name);
          return {
            name: request.name,
            status: 'already-installed',
            tag: existing?.resolvedTag ?? null,
            record: existing,
          };
        }
        run.checkpoint('removing');
        run.progress(INSTALL_PROGRESS.REMOVING);
        try {
          await fs.rm(pluginPath, { recursive: true, force: true });
        } catch (e) {
          throw new PercolatorError(`Failed to remove existing plugin at ${pluginPath}`, 'UNEXPECTED', { path: pluginPath }, { cause: e });
        }
      }

      const sourceRepo = request.local ? resolve(request.sourceRepo) : request.sourceRepo;
      const remote = resolveRemoteUrl(sourceRepo, this.ctx.remoteBaseUrl);

      run.checkpoint('cloning');
      try {
        await fs.mkdir(root, { recursive: true });
        await vcs.clone(remote, pluginPath);
        run.progress(INSTALL_PROGRESS.CLONED);

        run.checkpoint('resolving');
        run.progress(INSTALL_PROGRESS.RESOLVING);
        const tags = await vcs.listRemoteTags(remote);
        const head = await vcs.headCommit(pluginPath);
        const resolution = resolveTarget({ pin: request.pin, tags, head });

        if (resolution.kind === 'tag') {
          run.checkpoint('checkout');
          run.progress(INSTALL_PROGRESS.CHECKOUT);
          await vcs.checkout(pluginPath, resolution);
          run.progress(INSTALL_PROGRESS.CHECKED_OUT);
        }

        run.checkpoint('persisting');
        const commitHash = await vcs.headCommit(pluginPath);
        run.progress(INSTALL_PROGRESS.PERSISTING);
        const record = await store.update((registry) => {
          const next: PluginRecord = {
            name: request.name,
            sourceRepo,
            pin: request.pin,
            resolvedTag: resolution.kind === 'tag' ? resolution.ref : undefined,
            commitHash,
            lastSyncedAt: this.timestamp(),
            enabled: registry.get(request.name)?.enabled ?? true,
            skipAutoUpdate: request.skipAutoUpdate,
            sourceScripts: [...request.sourceScripts],
          };
          registry.set(next.name, next);
          return next;
        });

        return {
          name: request.name,
          status: 'installed',
          tag: record.resolvedTag ?? null,
          record,
        };
      } catch (e) {
        await this.discardClone(pluginPath);
        throw e;
      }
    });
  }

  private async discardClone(pluginPath: string): Promise<void> {
    try {
      await fs.rm(pluginPath, { recursive: true, force: true });
    } catch (e) {
      this.ctx.logger.warn('Could not remove partial clone; a forced reinstall will replace it', {
        path: pluginPath,
        error: e instanceof Error ? e.message : String(e),
      });
    }
  }

  private timestamp(): string {
    return (this.ctx.now?.() ?? new Date()).toISOString();
  }
}
