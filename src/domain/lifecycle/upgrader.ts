import { NoUpdateError, NotFoundError, VcsError } from '../../errors.js';
import type { Result } from '../../infra/types.js';
import { OperationRun, containedPluginPath } from './operation.js';
import type { LifecycleContext, OperationOptions, UpgradeOutcome, UpgradePlan } from './types.js';

export const UPGRADE_PROGRESS = {
  FETCHING: 10,
  FETCHED: 40,
  CHECKED_OUT: 70,
  VERIFIED: 90,
} as const;

/** Moves an installed plugin to the target of an `update-available` plan. */
export class Upgrader {
  constructor(private ctx: LifecycleContext) {}

  async upgrade(plan: UpgradePlan, options: OperationOptions = {}): Promise<Result<UpgradeOutcome>> {
    const { vcs, store, logger } = this.ctx;
    const run = new OperationRun('upgrade', plan.name, options, logger);

    return run.execute(async () => {
      if (plan.status !== 'update-available') {
        throw new NoUpdateError(plan.name);
      }
      const { name, target } = plan;
      const pluginPath = containedPluginPath(this.ctx.pluginsDir, name);

      run.checkpoint('fetching');
      run.progress(UPGRADE_PROGRESS.FETCHING);
      await vcs.fetchRef(pluginPath, target);
      run.progress(UPGRADE_PROGRESS.FETCHED);

      run.checkpoint('checkout');
      await vcs.checkout(pluginPath, target);
      run.progress(UPGRADE_PROGRESS.CHECKED_OUT);

      const head = await vcs.headCommit(pluginPath);
      if (target.kind === 'commit' && !head.startsWith(target.ref)) {
        throw new VcsError('verify', `expected ${target.ref} checked out in ${pluginPath}, found ${head}`);
      }
      run.progress(UPGRADE_PROGRESS.VERIFIED);

      const record = await store.update((registry) => {
        const existing = registry.get(name);
        if (!existing) throw new NotFoundError('Plugin record', name);
        const next = {
          ...existing,
          commitHash: head,
          lastSyncedAt: (this.ctx.now?.() ?? new Date()).toISOString(),
          resolvedTag: target.kind === 'tag' ? target.ref : undefined,
          pin: existing.pin && target.kind === 'tag' ? target.ref : existing.pin,
        };
        registry.set(name, next);
        return next;
      });
      logger.info('Plugin upgraded', { name, from: plan.from, to: plan.to });
      return { name, record };
    });
  }
}
