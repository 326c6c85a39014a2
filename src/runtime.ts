import { homedir } from 'node:os';
import type { PercolatorConfig } from './domain/config/types.js';
import { DefinitionLoader } from './domain/definitions/loader.js';
import { Migrator, defaultTmuxConfPaths } from './domain/definitions/migrator.js';
import { LifecycleEngine } from './domain/lifecycle/engine.js';
import { StateStore } from './domain/registry/state-store.js';
import type { ScriptRunner } from './domain/scripts/types.js';
import { TmuxScriptRunner } from './domain/scripts/tmux-runner.js';
import { GitCli } from './domain/vcs/git-client.js';
import type { VcsClient } from './domain/vcs/types.js';
import { createLogger } from './logging/logger.js';
import type { Logger } from './logging/logger.js';
import { WorkerPool } from './orchestration/worker-pool.js';

export interface RuntimeOverrides {
  logger?: Logger;
  vcs?: VcsClient;
  runner?: ScriptRunner;
  /** tmux.conf files for the migrator; defaults to the usual locations. */
  tmuxConfPaths?: string[];
  env?: Record<string, string | undefined>;
  home?: string;
  now?: () => Date;
}

export interface PercolatorRuntime {
  config: PercolatorConfig;
  logger: Logger;
  store: StateStore;
  engine: LifecycleEngine;
  loader: DefinitionLoader;
  migrator: Migrator;
}

/** Wire every component from one validated config. Nothing else reads global state. */
export async function createRuntime(config: PercolatorConfig, overrides: RuntimeOverrides = {}): Promise<PercolatorRuntime> {
  const logger = overrides.logger ?? createLogger(config.logging.level);
  const store = new StateStore(
    { registryPath: config.registryPath, lockPath: config.lockPath, lock: config.lock },
    logger.child('store'),
  );
  const vcs = overrides.vcs ?? new GitCli(logger.child('git'), { timeoutMs: config.vcs.timeoutMs });
  const runner = overrides.runner ?? new TmuxScriptRunner(logger.child('tmux'));

  const engine = new LifecycleEngine(
    {
      pluginsDir: config.pluginsDir,
      remoteBaseUrl: config.remoteBaseUrl,
      store,
      vcs,
      runner,
      logger: logger.child('lifecycle'),
      now: overrides.now,
    },
    new WorkerPool(config.concurrency),
  );

  const tmuxConfPaths =
    overrides.tmuxConfPaths ??
    (await defaultTmuxConfPaths({ env: overrides.env ?? process.env, home: overrides.home ?? homedir() }));

  return {
    config,
    logger,
    store,
    engine,
    loader: new DefinitionLoader(logger.child('definitions')),
    migrator: new Migrator(config.definitionsDir, tmuxConfPaths, logger.child('migrate')),
  };
}
