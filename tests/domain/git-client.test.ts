import { describe, it, expect } from 'vitest';
import type { ExecFileException, ExecFileOptionsWithStringEncoding } from 'node:child_process';
import { GitCli, parseTagListing } from '../../src/domain/vcs/git-client.js';
import type { ExecFileFn } from '../../src/domain/vcs/git-client.js';
import { VcsError } from '../../src/errors.js';
import { quietLogger } from '../fixtures/test-helpers.js';

interface Invocation {
  file: string;
  args: readonly string[];
  options: ExecFileOptionsWithStringEncoding;
}

type Reply = { stdout?: string; stderr?: string; error?: ExecFileException };

function fakeExec(reply: (inv: Invocation) => Reply = () => ({})): { execFile: ExecFileFn; calls: Invocation[] } {
  const calls: Invocation[] = [];
  const execFile: ExecFileFn = (file, args, options, callback) => {
    const inv = { file, args, options };
    calls.push(inv);
    const r = reply(inv);
    callback(r.error ?? null, r.stdout ?? '', r.stderr ?? '');
    return undefined;
  };
  return { execFile, calls };
}

const LS_REMOTE_TAGS = [
  'aaa1\trefs/tags/v1.0.0',
  'bbb2\trefs/tags/v1.1.0',
  'ccc3\trefs/tags/v1.1.0^{}',
  'ddd4\trefs/tags/nightly',
  '',
].join('\n');

describe('parseTagListing', () => {
  it('strips the ref prefix and folds peeled entries', () => {
    expect(parseTagListing(LS_REMOTE_TAGS)).toEqual(['v1.0.0', 'v1.1.0', 'nightly']);
  });

  it('ignores non-tag refs and blank output', () => {
    expect(parseTagListing('eee5\tHEAD\nfff6\trefs/heads/main\n')).toEqual([]);
    expect(parseTagListing('')).toEqual([]);
  });
});

describe('GitCli', () => {
  it('clones with an option terminator and no credential prompts', async () => {
    const { execFile, calls } = fakeExec();
    const git = new GitCli(quietLogger(), { execFile, timeoutMs: 1234 });

    await git.clone('https://git.example.test/a/b', '/plugins/b');

    expect(calls[0]?.file).toBe('git');
    expect(calls[0]?.args).toEqual(['clone', '--', 'https://git.example.test/a/b', '/plugins/b']);
    expect(calls[0]?.options.timeout).toBe(1234);
    expect(calls[0]?.options.env?.GIT_TERMINAL_PROMPT).toBe('0');
  });

  it('fetches exactly one tag into the matching local ref', async () => {
    const { execFile, calls } = fakeExec();
    const git = new GitCli(quietLogger(), { execFile });

    await git.fetchRef('/plugins/b', { kind: 'tag', ref: 'v1.1.0' });
    await git.fetchRef('/plugins/b', { kind: 'commit', ref: 'abc123' });

    expect(calls.map((c) => c.args)).toEqual([
      ['fetch', 'origin', 'refs/tags/v1.1.0:refs/tags/v1.1.0'],
      ['fetch', 'origin', 'abc123'],
    ]);
    expect(calls[0]?.options.cwd).toBe('/plugins/b');
  });

  it('checks out a detached tag or commit', async () => {
    const { execFile, calls } = fakeExec();
    const git = new GitCli(quietLogger(), { execFile });

    await git.checkout('/p', { kind: 'tag', ref: 'v1.1.0' });
    await git.checkout('/p', { kind: 'commit', ref: 'abc123' });

    expect(calls.map((c) => c.args)).toEqual([
      ['checkout', '--detach', 'tags/v1.1.0'],
      ['checkout', '--detach', 'abc123'],
    ]);
  });

  it('lists remote tags', async () => {
    const { execFile, calls } = fakeExec(() => ({ stdout: LS_REMOTE_TAGS }));
    const git = new GitCli(quietLogger(), { execFile });

    expect(await git.listRemoteTags('https://git.example.test/a/b')).toEqual(['v1.0.0', 'v1.1.0', 'nightly']);
    expect(calls[0]?.args).toEqual(['ls-remote', '--tags', 'https://git.example.test/a/b']);
  });

  it('reads the remote head or null', async () => {
    const withHead = new GitCli(quietLogger(), { execFile: fakeExec(() => ({ stdout: 'abc123\tHEAD\n' })).execFile });
    const empty = new GitCli(quietLogger(), { execFile: fakeExec(() => ({ stdout: '' })).execFile });

    expect(await withHead.remoteHead('r')).toBe('abc123');
    expect(await empty.remoteHead('r')).toBeNull();
  });

  it('trims the local head commit and rejects empty output', async () => {
    const git = new GitCli(quietLogger(), { execFile: fakeExec(() => ({ stdout: 'abc123\n' })).execFile });
    const broken = new GitCli(quietLogger(), { execFile: fakeExec(() => ({ stdout: '\n' })).execFile });

    expect(await git.headCommit('/p')).toBe('abc123');
    await expect(broken.headCommit('/p')).rejects.toBeInstanceOf(VcsError);
  });

  it('reports size and age for display', async () => {
    const { execFile, calls } = fakeExec((inv) => ({ stdout: inv.file === 'du' ? '1.2M\t/p\n' : '3 weeks ago\n' }));
    const git = new GitCli(quietLogger(), { execFile });

    expect(await git.directorySize('/p')).toBe('1.2M');
    expect(await git.commitAge('/p', { kind: 'tag', ref: 'v1.1.0' })).toBe('3 weeks ago');
    expect(calls.map((c) => [c.file, ...c.args])).toEqual([
      ['du', '-sh', '/p'],
      ['git', 'log', '-1', '--format=%cr', 'tags/v1.1.0'],
    ]);
  });

  it('wraps command failures in VcsError with stderr as detail', async () => {
    const error: ExecFileException = Object.assign(new Error('Command failed'), { code: 128 });
    const { execFile } = fakeExec(() => ({ error, stderr: 'fatal: repository not found\n' }));
    const git = new GitCli(quietLogger(), { execFile });

    const failure = git.clone('https://git.example.test/a/missing', '/p');

    await expect(failure).rejects.toBeInstanceOf(VcsError);
    await expect(failure).rejects.toMatchObject({
      message: 'git clone failed: fatal: repository not found',
      operation: 'git clone',
      cause: error,
    });
  });

  it('refuses refs that look like options before running anything', async () => {
    const { execFile, calls } = fakeExec();
    const git = new GitCli(quietLogger(), { execFile });

    await expect(git.checkout('/p', { kind: 'commit', ref: '--orphan' })).rejects.toBeInstanceOf(VcsError);
    await expect(git.clone('-uupload-pack=touch', '/p')).rejects.toBeInstanceOf(VcsError);
    expect(calls).toEqual([]);
  });
});
