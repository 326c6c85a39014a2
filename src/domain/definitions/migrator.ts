import { promises as fs } from 'node:fs';
import { join, resolve } from 'node:path';
import { stringify as stringifyYaml } from 'yaml';
import { isEexist, isEnoent, pathExists } from '../../infra/fs-utils.js';
import type { Logger } from '../../logging/logger.js';
import { deriveName } from '../vcs/remote.js';

const PLUGIN_LINE = /^\s*set\s+-g\s+@plugin\s+['"]([^'"]+)['"]/;
const TPM_BOOTSTRAP = /run(?:-shell)?\s+['"].*tpm.*['"]/;
const TPM_SELF = 'tmux-plugins/tpm';

export interface MigrationScan {
  /** Plugin sources found across all tmux.conf files, sorted. */
  plugins: string[];
  tpmDetected: boolean;
  tmuxConfPaths: string[];
  warnings: string[];
}

export interface MigrationPlan extends MigrationScan {
  planned: { toCreate: string[]; toSkip: string[] };
}

export interface MigrationResult extends MigrationScan {
  generatedFiles: string[];
  skippedFiles: string[];
}

/**
 * Candidate tmux.conf locations: `$TMUX_CONF` as given, then the XDG and home-directory
 * files that exist. Deduplicated by absolute path.
 */
export async function defaultTmuxConfPaths(opts: {
  env: Record<string, string | undefined>;
  home: string;
}): Promise<string[]> {
  const paths: string[] = [];
  if (opts.env.TMUX_CONF) paths.push(expandHome(opts.env.TMUX_CONF, opts.home));

  const xdg = opts.env.XDG_CONFIG_HOME || join(opts.home, '.config');
  for (const candidate of [join(xdg, 'tmux', 'tmux.conf'), join(opts.home, '.tmux.conf')]) {
    if (await pathExists(candidate)) paths.push(candidate);
  }
  return [...new Set(paths.map((p) => resolve(p)))];
}

function expandHome(p: string, home: string): string {
  return p === '~' || p.startsWith('~/') ? join(home, p.slice(1)) : p;
}

/** Converts TPM `set -g @plugin` declarations into definition files. */
export class Migrator {
  constructor(
    private definitionsDir: string,
    private tmuxConfPaths: string[],
    private logger: Logger,
  ) {}

  async discover(): Promise<MigrationPlan> {
    const scan = await this.scan();
    const toCreate: string[] = [];
    const toSkip: string[] = [];
    for (const plugin of scan.plugins) {
      const path = this.definitionPath(plugin);
      if (await pathExists(path)) toSkip.push(path);
      else toCreate.push(path);
    }
    return { ...scan, planned: { toCreate, toSkip } };
  }

  async apply(options: { overwrite?: boolean } = {}): Promise<MigrationResult> {
    const scan = await this.scan();
    const generatedFiles: string[] = [];
    const skippedFiles: string[] = [];
    const warnings = [...scan.warnings];

    if (scan.plugins.length > 0) {
      await fs.mkdir(this.definitionsDir, { recursive: true });
    }
    for (const plugin of scan.plugins) {
      const path = this.definitionPath(plugin);
      try {
        await fs.writeFile(path, stringifyYaml({ url: plugin }), { flag: options.overwrite ? 'w' : 'wx' });
        generatedFiles.push(path);
      } catch (e) {
        if (isEexist(e)) {
          skippedFiles.push(path);
          continue;
        }
        const message = `Could not write ${path}: ${e instanceof Error ? e.message : String(e)}`;
        this.logger.warn(message);
        warnings.push(message);
      }
    }
    this.logger.info('Migration applied', { created: generatedFiles.length, skipped: skippedFiles.length });
    return { ...scan, warnings, generatedFiles, skippedFiles };
  }

  private definitionPath(plugin: string): string {
    return join(this.definitionsDir, `${deriveName(plugin)}.yaml`);
  }

  private async scan(): Promise<MigrationScan> {
    const plugins = new Set<string>();
    const warnings: string[] = [];
    let tpmDetected = false;

    for (const path of this.tmuxConfPaths) {
      let text: string;
      try {
        text = await fs.readFile(path, 'utf-8');
      } catch (e) {
        if (isEnoent(e)) continue;
        const message = `Could not read ${path}: ${e instanceof Error ? e.message : String(e)}`;
        this.logger.warn(message);
        warnings.push(message);
        continue;
      }
      for (const line of text.split(/\r?\n/)) {
        const plugin = PLUGIN_LINE.exec(line)?.[1]?.trim();
        if (plugin && plugin !== TPM_SELF) plugins.add(plugin);
        if (TPM_BOOTSTRAP.test(line)) tpmDetected = true;
      }
    }

    return { plugins: [...plugins].sort(), tpmDetected, tmuxConfPaths: [...this.tmuxConfPaths], warnings };
  }
}
