import { join } from 'node:path';
import { homedir } from 'node:os';
import { z } from 'zod';

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const PercolatorConfigSchema = z.object({
  /** Root that every plugin working directory must live under. */
  pluginsDir: z.string().min(1),
  registryPath: z.string().min(1),
  lockPath: z.string().min(1),
  /** Directory of per-plugin YAML definitions. */
  definitionsDir: z.string().min(1),
  /** Prefix for `owner/repo` style sources. */
  remoteBaseUrl: z.string().url(),
  lock: z.object({
    timeoutMs: z.number().int().nonnegative(),
    pollIntervalMs: z.number().int().positive(),
    staleAfterMs: z.number().int().positive(),
  }),
  vcs: z.object({
    /** Per-command limit; 0 disables it. */
    timeoutMs: z.number().int().nonnegative(),
  }),
  /** Upper bound on plugins processed at once by bulk operations. */
  concurrency: z.number().int().min(1),
  logging: z.object({
    level: LogLevelSchema,
  }),
});

export type PercolatorConfig = z.infer<typeof PercolatorConfigSchema>;

export const REGISTRY_FILE = 'percolator-lock.json';
export const LOCK_SUFFIX = '.lock';

export function defaultConfig(home: string = homedir()): PercolatorConfig {
  const tmuxDir = join(home, '.tmux');
  const stateDir = join(tmuxDir, 'percolator');
  const registryPath = join(stateDir, REGISTRY_FILE);
  return {
    pluginsDir: join(tmuxDir, 'plugins'),
    registryPath,
    lockPath: registryPath + LOCK_SUFFIX,
    definitionsDir: join(stateDir, 'plugins'),
    remoteBaseUrl: 'https://github.com',
    lock: {
      timeoutMs: 5000,
      pollIntervalMs: 50,
      staleAfterMs: 30000,
    },
    vcs: {
      timeoutMs: 120000,
    },
    concurrency: 4,
    logging: { level: 'info' },
  };
}
