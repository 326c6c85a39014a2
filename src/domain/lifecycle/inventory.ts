import type { Logger } from '../../logging/logger.js';
import type { Registry } from '../registry/types.js';
import type { VcsClient } from '../vcs/types.js';
import { containedPluginPath } from './operation.js';
import type { InstalledPlugin, UpdateAvailablePlan, UpdateView } from './types.js';

const UNKNOWN = 'Unknown';

export function displayVersion(tag: string | undefined, commit: string | undefined): string {
  if (tag) return tag;
  if (commit) return commit.slice(0, 7);
  return 'N/A';
}

/** `YYYY-MM-DD` of an ISO timestamp, or "Unknown". */
export function displayDate(iso: string): string {
  const date = new Date(iso);
  return Number.isNaN(date.getTime()) ? UNKNOWN : date.toISOString().slice(0, 10);
}

/** Human-facing rows for installed plugins and pending updates. */
export class Inventory {
  constructor(
    private pluginsDir: string,
    private vcs: VcsClient,
    private logger: Logger,
  ) {}

  async listInstalled(registry: Registry): Promise<InstalledPlugin[]> {
    const records = [...registry.values()].sort((a, b) => a.name.localeCompare(b.name));
    return Promise.all(
      records.map(async (record) => ({
        name: record.name,
        version: displayVersion(record.resolvedTag, record.commitHash),
        size: await this.sizeOf(record.name),
        installedOn: displayDate(record.lastSyncedAt),
        enabled: record.enabled,
      })),
    );
  }

  async describeUpdate(plan: UpdateAvailablePlan): Promise<UpdateView> {
    let released = UNKNOWN;
    try {
      released = await this.vcs.commitAge(containedPluginPath(this.pluginsDir, plan.name), plan.target);
    } catch (e) {
      this.logger.debug('Release age unavailable', { name: plan.name, error: e instanceof Error ? e.message : String(e) });
    }
    return {
      name: plan.name,
      currentVersion: plan.target.kind === 'commit' ? displayVersion(undefined, plan.from) : plan.from,
      newVersion: displayVersion(plan.target.kind === 'tag' ? plan.to : undefined, plan.to),
      size: await this.sizeOf(plan.name),
      released,
    };
  }

  private async sizeOf(name: string): Promise<string> {
    try {
      return await this.vcs.directorySize(containedPluginPath(this.pluginsDir, name));
    } catch (e) {
      this.logger.debug('Size unavailable', { name, error: e instanceof Error ? e.message : String(e) });
      return UNKNOWN;
    }
  }
}
