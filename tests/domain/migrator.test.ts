import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import { Migrator, defaultTmuxConfPaths } from '../../src/domain/definitions/migrator.js';
import { makeTempDir, quietLogger, removeDir } from '../fixtures/test-helpers.js';

const TMUX_CONF = [
  "set -g @plugin 'tmux-plugins/tpm'",
  "set -g @plugin 'tmux-plugins/tmux-sensible'",
  'set -g @plugin "tmux-plugins/tmux-resurrect"',
  "   set  -g  @plugin 'tmux-plugins/tmux-yank'",
  "# set -g @plugin 'commented/out'",
  'set -g mouse on',
  "run '~/.tmux/plugins/tpm/tpm'",
  '',
].join('\n');

describe('Migrator', () => {
  let dir: string;
  let confPath: string;
  let defsDir: string;

  beforeEach(async () => {
    dir = await makeTempDir('migrate');
    confPath = join(dir, 'tmux.conf');
    defsDir = join(dir, 'definitions');
    await fs.writeFile(confPath, TMUX_CONF);
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('discovers plugins, detects the TPM bootstrap and plans files', async () => {
    await fs.mkdir(defsDir);
    await fs.writeFile(join(defsDir, 'tmux-sensible.yaml'), 'url: mine/tmux-sensible\n');
    const migrator = new Migrator(defsDir, [confPath, join(dir, 'missing.conf')], quietLogger());

    const plan = await migrator.discover();

    expect(plan.plugins).toEqual(['tmux-plugins/tmux-resurrect', 'tmux-plugins/tmux-sensible', 'tmux-plugins/tmux-yank']);
    expect(plan.tpmDetected).toBe(true);
    expect(plan.warnings).toEqual([]);
    expect(plan.planned).toEqual({
      toCreate: [join(defsDir, 'tmux-resurrect.yaml'), join(defsDir, 'tmux-yank.yaml')],
      toSkip: [join(defsDir, 'tmux-sensible.yaml')],
    });
  });

  it('writes url-only definitions and leaves existing files alone', async () => {
    await fs.mkdir(defsDir);
    await fs.writeFile(join(defsDir, 'tmux-sensible.yaml'), 'url: mine/tmux-sensible\n');
    const migrator = new Migrator(defsDir, [confPath], quietLogger());

    const result = await migrator.apply();

    expect(result.generatedFiles).toEqual([join(defsDir, 'tmux-resurrect.yaml'), join(defsDir, 'tmux-yank.yaml')]);
    expect(result.skippedFiles).toEqual([join(defsDir, 'tmux-sensible.yaml')]);
    expect(await fs.readFile(join(defsDir, 'tmux-resurrect.yaml'), 'utf-8')).toBe('url: tmux-plugins/tmux-resurrect\n');
    expect(await fs.readFile(join(defsDir, 'tmux-sensible.yaml'), 'utf-8')).toBe('url: mine/tmux-sensible\n');
  });

  it('overwrites existing definitions when asked', async () => {
    await fs.mkdir(defsDir);
    await fs.writeFile(join(defsDir, 'tmux-sensible.yaml'), 'url: mine/tmux-sensible\n');
    const migrator = new Migrator(defsDir, [confPath], quietLogger());

    const result = await migrator.apply({ overwrite: true });

    expect(result.skippedFiles).toEqual([]);
    expect(result.generatedFiles).toHaveLength(3);
    expect(await fs.readFile(join(defsDir, 'tmux-sensible.yaml'), 'utf-8')).toBe('url: tmux-plugins/tmux-sensible\n');
  });

  it('reports unreadable config files as warnings', async () => {
    const unreadable = join(dir, 'conf-dir');
    await fs.mkdir(unreadable);
    const migrator = new Migrator(defsDir, [unreadable], quietLogger());

    const plan = await migrator.discover();

    expect(plan.plugins).toEqual([]);
    expect(plan.tpmDetected).toBe(false);
    expect(plan.warnings).toHaveLength(1);
    expect(plan.warnings[0]).toMatch(new RegExp(`^Could not read ${unreadable}: `));
  });
});

describe('defaultTmuxConfPaths', () => {
  let home: string;

  beforeEach(async () => {
    home = await makeTempDir('home');
  });

  afterEach(async () => {
    await removeDir(home);
  });

  it('lists TMUX_CONF first, then existing XDG and home files', async () => {
    const xdg = join(home, 'xdg');
    await fs.mkdir(join(xdg, 'tmux'), { recursive: true });
    await fs.writeFile(join(xdg, 'tmux', 'tmux.conf'), '');
    await fs.writeFile(join(home, '.tmux.conf'), '');

    const paths = await defaultTmuxConfPaths({ env: { TMUX_CONF: '~/custom.conf', XDG_CONFIG_HOME: xdg }, home });

    expect(paths).toEqual([join(home, 'custom.conf'), join(xdg, 'tmux', 'tmux.conf'), join(home, '.tmux.conf')]);
  });

  it('skips missing candidates and removes duplicates', async () => {
    await fs.writeFile(join(home, '.tmux.conf'), '');

    const paths = await defaultTmuxConfPaths({ env: { TMUX_CONF: join(home, '.tmux.conf') }, home });

    expect(paths).toEqual([join(home, '.tmux.conf')]);
  });
});
