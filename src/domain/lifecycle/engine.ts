import { PathSafetyError } from '../../errors.js';
import { err } from '../../infra/types.js';
import type { Result } from '../../infra/types.js';
import { WorkerPool } from '../../orchestration/worker-pool.js';
import type { Registry } from '../registry/types.js';
import { Installer } from './installer.js';
import { Inventory } from './inventory.js';
import { Remover } from './remover.js';
import { Sourcer } from './sourcer.js';
import { UpdateChecker } from './update-checker.js';
import { Upgrader } from './upgrader.js';
import type {
  InstallOptions,
  InstallOutcome,
  InstallRequest,
  InstalledPlugin,
  LifecycleContext,
  OperationOptions,
  RemoveOutcome,
  SetEnabledOutcome,
  SourceReport,
  UpdateAvailablePlan,
  UpdateView,
  UpgradeOutcome,
  UpgradePlan,
} from './types.js';

export interface UpgradeAllOptions {
  /** Unattended sweep: plugins flagged skipAutoUpdate are left alone. */
  automatic?: boolean;
}

export type UpgradeAllEntry =
  | { name: string; status: 'skipped' }
  | { name: string; status: 'done'; result: Result<UpgradeOutcome> };

/**
 * Entry point for every plugin lifecycle operation. Single-plugin calls delegate to one
 * component each; the *All helpers fan out through a bounded WorkerPool.
 */
export class LifecycleEngine {
  private installer: Installer;
  private checker: UpdateChecker;
  private upgrader: Upgrader;
  private remover: Remover;
  private sourcer: Sourcer;
  private inventory: Inventory;

  constructor(
    private ctx: LifecycleContext,
    private pool: WorkerPool = new WorkerPool(4),
  ) {
    this.installer = new Installer(ctx);
    this.checker = new UpdateChecker(ctx);
    this.upgrader = new Upgrader(ctx);
    this.remover = new Remover(ctx);
    this.sourcer = new Sourcer(ctx);
    this.inventory = new Inventory(ctx.pluginsDir, ctx.vcs, ctx.logger.child('inventory'));
  }

  install(request: InstallRequest, options?: InstallOptions): Promise<Result<InstallOutcome>> {
    return this.installer.install(request, options);
  }

  checkForUpdates(name: string): Promise<UpgradePlan> {
    return this.checker.check(name);
  }

  upgrade(plan: UpgradePlan, options?: OperationOptions): Promise<Result<UpgradeOutcome>> {
    return this.upgrader.upgrade(plan, options);
  }

  remove(name: string, options?: OperationOptions): Promise<Result<RemoveOutcome>> {
    return this.remover.remove(name, options);
  }

  setEnabled(name: string, enabled: boolean): Promise<Result<SetEnabledOutcome>> {
    return this.sourcer.setEnabled(name, enabled);
  }

  sourceEnabled(): Promise<SourceReport> {
    return this.sourcer.sourceEnabled();
  }

  installAll(requests: readonly InstallRequest[], options?: InstallOptions): Promise<Result<InstallOutcome>[]> {
    return this.pool.map(requests, (request) => isolatePathSafety(() => this.installer.install(request, options)));
  }

  /** Plans for every record in the snapshot, in name order. Read-only. */
  async checkAll(snapshot?: Registry): Promise<UpgradePlan[]> {
    const registry = snapshot ?? (await this.ctx.store.read());
    const records = [...registry.values()].sort((a, b) => a.name.localeCompare(b.name));
    return this.pool.map(records, (record) => this.checker.check(record.name, record));
  }

  /** Upgrades every `update-available` plan; other plans are dropped. */
  async upgradeAll(plans: readonly UpgradePlan[], options: UpgradeAllOptions = {}): Promise<UpgradeAllEntry[]> {
    const available = plans.filter((p): p is UpdateAvailablePlan => p.status === 'update-available');
    const registry = options.automatic ? await this.ctx.store.read() : undefined;
    return this.pool.map(available, async (plan): Promise<UpgradeAllEntry> => {
      if (registry?.get(plan.name)?.skipAutoUpdate) {
        this.ctx.logger.info('Skipping plugin excluded from automatic updates', { name: plan.name });
        return { name: plan.name, status: 'skipped' };
      }
      const result = await isolatePathSafety(() => this.upgrader.upgrade(plan));
      return { name: plan.name, status: 'done', result };
    });
  }

  async listInstalled(): Promise<InstalledPlugin[]> {
    return this.inventory.listInstalled(await this.ctx.store.read());
  }

  describeUpdate(plan: UpdateAvailablePlan): Promise<UpdateView> {
    return this.inventory.describeUpdate(plan);
  }
}

/**
 * Within a batch a path-safety violation fails its own item only; the other items still
 * finish and report.
 */
async function isolatePathSafety<T>(run: () => Promise<Result<T>>): Promise<Result<T>> {
  try {
    return await run();
  } catch (e) {
    if (e instanceof PathSafetyError) return err(e);
    throw e;
  }
}
