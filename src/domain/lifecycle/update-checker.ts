import { pathExists } from '../../infra/fs-utils.js';
import { NotFoundError, toPercolatorError } from '../../errors.js';
import { resolveRemoteUrl } from '../vcs/remote.js';
import { compareWithCurrent } from '../version/resolver.js';
import type { RemoteState } from '../version/resolver.js';
import type { PluginRecord } from '../registry/types.js';
import { containedPluginPath } from './operation.js';
import type { LifecycleContext, UpgradePlan } from './types.js';

/**
 * Classifies an installed plugin against its remote. Never throws for VCS problems: they come
 * back as a `failed` plan so bulk checks keep going.
 */
export class UpdateChecker {
  constructor(private ctx: LifecycleContext) {}

  async check(name: string, record?: PluginRecord): Promise<UpgradePlan> {
    const { logger } = this.ctx;
    try {
      const pluginPath = containedPluginPath(this.ctx.pluginsDir, name);
      if (!(await pathExists(pluginPath))) {
        return { status: 'not-installed', name };
      }
      const current = record ?? (await this.ctx.store.read()).get(name);
      if (!current) {
        throw new NotFoundError('Plugin record', name);
      }

      const remote = resolveRemoteUrl(current.sourceRepo, this.ctx.remoteBaseUrl);
      const state: RemoteState = current.resolvedTag
        ? { tags: await this.ctx.vcs.listRemoteTags(remote), head: null }
        : { tags: [], head: await this.ctx.vcs.remoteHead(remote) };

      const result = compareWithCurrent({ tag: current.resolvedTag, commit: current.commitHash }, state);
      const from = current.resolvedTag ?? current.commitHash;
      if (!result.available) {
        return { status: 'up-to-date', name, current: from };
      }
      logger.debug('Update available', { name, from, to: result.ref });
      return {
        status: 'update-available',
        name,
        from,
        to: result.ref,
        target: { kind: result.kind, ref: result.ref },
      };
    } catch (e) {
      const error = toPercolatorError(e);
      logger.warn('Update check failed', { name, code: error.code, error: error.message });
      return { status: 'failed', name, error };
    }
  }
}
