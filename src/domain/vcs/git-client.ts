import { execFile as defaultExecFile } from 'node:child_process';
import type { ExecFileException, ExecFileOptionsWithStringEncoding } from 'node:child_process';
import { VcsError } from '../../errors.js';
import type { Logger } from '../../logging/logger.js';
import type { ResolvedRef } from '../version/resolver.js';
import type { VcsClient } from './types.js';

export type ExecFileFn = (
  file: string,
  args: readonly string[],
  options: ExecFileOptionsWithStringEncoding,
  callback: (error: ExecFileException | null, stdout: string, stderr: string) => void,
) => unknown;

export interface GitCliOptions {
  /** Per-command limit in milliseconds; 0 or absent disables it. */
  timeoutMs?: number;
  gitBinary?: string;
  /** Override for testing. */
  execFile?: ExecFileFn;
}

const TAG_REF_PREFIX = 'refs/tags/';
const PEELED_SUFFIX = '^{}';

/**
 * VcsClient backed by the git and du binaries. Commands never prompt for credentials;
 * a remote that needs them fails instead of hanging.
 */
export class GitCli implements VcsClient {
  private execFile: ExecFileFn;
  private git: string;
  private timeoutMs: number;

  constructor(
    private logger: Logger,
    options: GitCliOptions = {},
  ) {
    this.execFile = options.execFile ?? defaultExecFile;
    this.git = options.gitBinary ?? 'git';
    this.timeoutMs = options.timeoutMs ?? 0;
  }

  // -------------------------------------------------------------------------
  // Working copy
  // -------------------------------------------------------------------------

  async clone(remote: string, destination: string): Promise<void> {
    assertNotOption(remote, 'clone');
    await this.run(this.git, ['clone', '--', remote, destination]);
  }

  async fetchRef(path: string, target: ResolvedRef): Promise<void> {
    assertNotOption(target.ref, 'fetch');
    const refspec = target.kind === 'tag' ? `${TAG_REF_PREFIX}${target.ref}:${TAG_REF_PREFIX}${target.ref}` : target.ref;
    await this.run(this.git, ['fetch', 'origin', refspec], path);
  }

  async checkout(path: string, target: ResolvedRef): Promise<void> {
    assertNotOption(target.ref, 'checkout');
    await this.run(this.git, ['checkout', '--detach', revision(target)], path);
  }

  async headCommit(path: string): Promise<string> {
    const out = (await this.run(this.git, ['rev-parse', 'HEAD'], path)).trim();
    if (!out) throw new VcsError('git rev-parse', `no HEAD commit in ${path}`);
    return out;
  }

  // -------------------------------------------------------------------------
  // Remote queries
  // -------------------------------------------------------------------------

  async listRemoteTags(remote: string): Promise<string[]> {
    assertNotOption(remote, 'ls-remote');
    const out = await this.run(this.git, ['ls-remote', '--tags', remote]);
    return parseTagListing(out);
  }

  async remoteHead(remote: string): Promise<string | null> {
    assertNotOption(remote, 'ls-remote');
    const out = await this.run(this.git, ['ls-remote', remote, 'HEAD']);
    const first = out.trim().split(/\s+/)[0];
    return first ? first : null;
  }

  // -------------------------------------------------------------------------
  // Diagnostics
  // -------------------------------------------------------------------------

  async directorySize(path: string): Promise<string> {
    const out = await this.run('du', ['-sh', path]);
    const size = out.trim().split(/\s+/)[0];
    if (!size) throw new VcsError('du', `no size reported for ${path}`);
    return size;
  }

  async commitAge(path: string, ref: ResolvedRef): Promise<string> {
    assertNotOption(ref.ref, 'log');
    const out = await this.run(this.git, ['log', '-1', '--format=%cr', revision(ref)], path);
    return out.trim();
  }

  private run(file: string, args: string[], cwd?: string): Promise<string> {
    const operation = file === this.git ? `git ${args[0]}` : file;
    this.logger.debug('exec', { file, args: args.join(' '), cwd });
    return new Promise((resolve, reject) => {
      this.execFile(
        file,
        args,
        {
          cwd,
          encoding: 'utf8',
          timeout: this.timeoutMs,
          env: { ...process.env, GIT_TERMINAL_PROMPT: '0' },
        },
        (error, stdout, stderr) => {
          if (error) {
            const detail = stderr.trim() || error.message;
            reject(new VcsError(operation, detail, { cause: error }));
            return;
          }
          resolve(stdout);
        },
      );
    });
  }
}

function revision(target: ResolvedRef): string {
  return target.kind === 'tag' ? `tags/${target.ref}` : target.ref;
}

function assertNotOption(value: string, operation: string): void {
  if (value.startsWith('-')) {
    throw new VcsError(operation, `refusing argument that looks like an option: ${value}`);
  }
}

/** Tag names from `git ls-remote --tags` output, peeled duplicates folded, in listing order. */
export function parseTagListing(output: string): string[] {
  const tags = new Set<string>();
  for (const line of output.split('\n')) {
    const [, ref] = line.trim().split(/\s+/);
    if (!ref?.startsWith(TAG_REF_PREFIX)) continue;
    let tag = ref.slice(TAG_REF_PREFIX.length);
    if (tag.endsWith(PEELED_SUFFIX)) tag = tag.slice(0, -PEELED_SUFFIX.length);
    tags.add(tag);
  }
  return [...tags];
}
