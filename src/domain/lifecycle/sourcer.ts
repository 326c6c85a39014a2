import { resolve } from 'node:path';
import { PathSafetyError, toPercolatorError } from '../../errors.js';
import { isContainedIn } from '../../infra/fs-utils.js';
import { err, ok } from '../../infra/types.js';
import type { Result } from '../../infra/types.js';
import { containedPluginPath } from './operation.js';
import type { LifecycleContext, SetEnabledOutcome, SourceReport } from './types.js';

/** Enable/disable flags and sourcing plugin scripts into tmux. */
export class Sourcer {
  constructor(private ctx: LifecycleContext) {}

  /**
   * Flip a plugin's enabled flag. Enabling re-sources every enabled plugin so tmux picks up
   * the change; disabling takes effect on the next server start.
   */
  async setEnabled(name: string, enabled: boolean): Promise<Result<SetEnabledOutcome>> {
    const { store, logger } = this.ctx;
    try {
      const found = await store.update((registry) => {
        const record = registry.get(name);
        if (!record) return false;
        registry.set(name, { ...record, enabled });
        return true;
      });
      if (!found) {
        logger.debug('setEnabled ignored unknown plugin', { name });
        return ok({ name, found, enabled });
      }
      logger.info(enabled ? 'Plugin enabled' : 'Plugin disabled', { name });

      if (!enabled) return ok({ name, found, enabled });
      return ok({ name, found, enabled, sourced: await this.sourceEnabled() });
    } catch (e) {
      if (e instanceof PathSafetyError) throw e;
      return err(toPercolatorError(e));
    }
  }

  /**
   * Run each enabled plugin's scripts, in name order then declaration order. Script failures are
   * collected, not thrown.
   */
  async sourceEnabled(): Promise<SourceReport> {
    const { store, runner, logger } = this.ctx;
    const registry = await store.read();
    const report: SourceReport = { ran: [], skipped: [], failed: [] };
    const records = [...registry.values()].filter((r) => r.enabled).sort((a, b) => a.name.localeCompare(b.name));

    for (const record of records) {
      const pluginPath = containedPluginPath(this.ctx.pluginsDir, record.name);
      for (const script of record.sourceScripts) {
        const scriptPath = resolve(pluginPath, script);
        if (!isContainedIn(pluginPath, scriptPath)) {
          logger.warn('Skipping script outside plugin directory', { name: record.name, script });
          report.skipped.push(scriptPath);
          continue;
        }
        try {
          await runner.run(scriptPath);
          report.ran.push(scriptPath);
        } catch (e) {
          const error = toPercolatorError(e);
          logger.error('Script failed', { name: record.name, scriptPath, error: error.message });
          report.failed.push({ scriptPath, error });
        }
      }
    }
    return report;
  }
}
