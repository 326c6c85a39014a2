// Errors & results
export {
  PercolatorError,
  AcquisitionTimeoutError,
  StoreCorruptError,
  StoreWriteError,
  VcsError,
  UnknownTagError,
  PathSafetyError,
  NotFoundError,
  ValidationError,
  CancelledError,
  NoUpdateError,
  ScriptError,
  toPercolatorError,
} from './errors.js';
export type { ErrorCode } from './errors.js';
export { ok, err, unwrap } from './infra/types.js';
export type { Result } from './infra/types.js';

// Infrastructure
export { FileLock } from './infra/file-lock.js';
export type { FileLockOptions, LockHandle } from './infra/file-lock.js';
export { JsonDocumentStore } from './infra/json-store.js';
export { isContainedIn } from './infra/fs-utils.js';
export { WorkerPool } from './orchestration/worker-pool.js';

// Logging
export { Logger, createLogger, stderrTransport, formatEntry } from './logging/logger.js';
export type { LogLevel, LogEntry, LogData, Transport } from './logging/logger.js';

// Config
export { ConfigLoader } from './domain/config/loader.js';
export { PercolatorConfigSchema, defaultConfig } from './domain/config/types.js';
export type { PercolatorConfig } from './domain/config/types.js';

// Registry
export { StateStore } from './domain/registry/state-store.js';
export type { RegistrySession, LoadResult } from './domain/registry/state-store.js';
export { serializeRegistry, decodeRegistry } from './domain/registry/serialization.js';
export type { PluginRecord, Registry } from './domain/registry/types.js';

// Versions & VCS
export {
  resolveTarget,
  compareWithCurrent,
  sortTags,
  latestTag,
  parseTagVersion,
  isNewerTag,
} from './domain/version/resolver.js';
export type { ResolvedRef, ResolutionResult, RemoteState, RefKind } from './domain/version/resolver.js';
export { GitCli, parseTagListing } from './domain/vcs/git-client.js';
export type { VcsClient } from './domain/vcs/types.js';
export { resolveRemoteUrl, deriveName } from './domain/vcs/remote.js';
export { TmuxScriptRunner } from './domain/scripts/tmux-runner.js';
export type { ScriptRunner } from './domain/scripts/types.js';

// Lifecycle
export { LifecycleEngine } from './domain/lifecycle/engine.js';
export type { UpgradeAllOptions, UpgradeAllEntry } from './domain/lifecycle/engine.js';
export type {
  InstallRequest,
  InstallOptions,
  InstallOutcome,
  OperationOptions,
  ProgressFn,
  UpgradePlan,
  UpdateAvailablePlan,
  UpgradeOutcome,
  RemoveOutcome,
  SetEnabledOutcome,
  SourceReport,
  InstalledPlugin,
  UpdateView,
  LifecycleContext,
} from './domain/lifecycle/types.js';

// Definitions
export { DefinitionLoader } from './domain/definitions/loader.js';
export type { LoadedDefinitions, DefinitionWarning } from './domain/definitions/loader.js';
export { Migrator, defaultTmuxConfPaths } from './domain/definitions/migrator.js';
export type { MigrationPlan, MigrationResult } from './domain/definitions/migrator.js';

// Runtime
export { createRuntime } from './runtime.js';
export type { PercolatorRuntime, RuntimeOverrides } from './runtime.js';
