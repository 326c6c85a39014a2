import type { PercolatorError } from '../../errors.js';
import type { Logger } from '../../logging/logger.js';
import type { PluginRecord } from '../registry/types.js';
import type { StateStore } from '../registry/state-store.js';
import type { ResolvedRef } from '../version/resolver.js';
import type { VcsClient } from '../vcs/types.js';
import type { ScriptRunner } from '../scripts/types.js';

/** A plugin the user wants installed, as produced by the definitions loader. */
export interface InstallRequest {
  name: string;
  sourceRepo: string;
  /** Source is a path on this machine rather than a remote. */
  local: boolean;
  pin?: string;
  sourceScripts: string[];
  skipAutoUpdate: boolean;
}

/** Receives integers in [0, 100]; the last value of an operation is always 100 or 0. */
export type ProgressFn = (value: number) => void;

export interface OperationOptions {
  onProgress?: ProgressFn;
  /** Checked between phases; an in-flight clone or fetch still runs to completion. */
  signal?: AbortSignal;
}

export interface InstallOptions extends OperationOptions {
  force?: boolean;
}

export interface InstallOutcome {
  name: string;
  status: 'installed' | 'already-installed';
  /** Tag checked out, or null when tracking a commit or untracked. */
  tag: string | null;
  record?: PluginRecord;
}

export type UpgradePlan =
  | { status: 'not-installed'; name: string }
  | { status: 'up-to-date'; name: string; current: string }
  | {
      status: 'update-available';
      name: string;
      /** Current tag, or commit when not on a tag. */
      from: string;
      to: string;
      target: ResolvedRef;
    }
  | { status: 'failed'; name: string; error: PercolatorError };

export type UpdateAvailablePlan = Extract<UpgradePlan, { status: 'update-available' }>;

export interface UpgradeOutcome {
  name: string;
  record: PluginRecord;
}

export interface RemoveOutcome {
  name: string;
  /** False when the working directory was already gone. */
  directoryRemoved: boolean;
}

export interface SourceReport {
  ran: string[];
  skipped: string[];
  failed: { scriptPath: string; error: PercolatorError }[];
}

export interface SetEnabledOutcome {
  name: string;
  /** False when no record had that name; nothing was written. */
  found: boolean;
  enabled: boolean;
  /** Present when enabling triggered a re-source of every enabled plugin. */
  sourced?: SourceReport;
}

export interface InstalledPlugin {
  name: string;
  version: string;
  size: string;
  installedOn: string;
  enabled: boolean;
}

export interface UpdateView {
  name: string;
  currentVersion: string;
  newVersion: string;
  size: string;
  released: string;
}

/** Collaborators shared by every lifecycle component. */
export interface LifecycleContext {
  pluginsDir: string;
  remoteBaseUrl: string;
  store: StateStore;
  vcs: VcsClient;
  runner: ScriptRunner;
  logger: Logger;
  now?: () => Date;
}
