import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ConfigLoader } from '../../src/domain/config/loader.js';
import { defaultConfig } from '../../src/domain/config/types.js';
import { ValidationError } from '../../src/errors.js';
import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

describe('defaultConfig', () => {
  it('places everything under ~/.tmux', () => {
    const config = defaultConfig('/home/tester');
    expect(config.pluginsDir).toBe('/home/tester/.tmux/plugins');
    expect(config.registryPath).toBe('/home/tester/.tmux/percolator/percolator-lock.json');
    expect(config.lockPath).toBe('/home/tester/.tmux/percolator/percolator-lock.json.lock');
    expect(config.definitionsDir).toBe('/home/tester/.tmux/percolator/plugins');
    expect(config.lock).toEqual({ timeoutMs: 5000, pollIntervalMs: 50, staleAfterMs: 30000 });
    expect(config.vcs.timeoutMs).toBe(120000);
    expect(config.concurrency).toBe(4);
  });
});

describe('ConfigLoader', () => {
  let dir: string;
  let configPath: string;
  let loader: ConfigLoader;
  const home = '/home/tester';

  beforeEach(async () => {
    dir = join(tmpdir(), `config-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await fs.mkdir(dir, { recursive: true });
    configPath = join(dir, 'config.json');
    loader = new ConfigLoader(home);
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('returns defaults when no config file is given', async () => {
    expect(await loader.load()).toEqual(defaultConfig(home));
  });

  it('returns defaults when the config file is missing', async () => {
    expect(await loader.load(join(dir, 'absent.json'))).toEqual(defaultConfig(home));
  });

  it('merges file config over defaults and expands ~', async () => {
    await fs.writeFile(
      configPath,
      JSON.stringify({ pluginsDir: '~/tmux-plugins', concurrency: 8, lock: { timeoutMs: 100 } }),
    );

    const config = await loader.load(configPath);

    expect(config.pluginsDir).toBe('/home/tester/tmux-plugins');
    expect(config.concurrency).toBe(8);
    expect(config.lock).toEqual({ timeoutMs: 100, pollIntervalMs: 50, staleAfterMs: 30000 });
  });

  it('moves the lock marker along with a relocated registry', async () => {
    await fs.writeFile(configPath, JSON.stringify({ registryPath: '~/state/registry.json' }));

    const config = await loader.load(configPath);

    expect(config.registryPath).toBe('/home/tester/state/registry.json');
    expect(config.lockPath).toBe('/home/tester/state/registry.json.lock');
  });

  it('keeps an explicit lock path', async () => {
    const config = await loader.load(undefined, { registryPath: '/srv/r.json', lockPath: '/run/r.lock' });
    expect(config.lockPath).toBe('/run/r.lock');
  });

  it('trims trailing slashes from the remote base URL', async () => {
    const config = await loader.load(undefined, { remoteBaseUrl: 'https://git.example.test/' });
    expect(config.remoteBaseUrl).toBe('https://git.example.test');
  });

  it('throws ValidationError for invalid JSON', async () => {
    await fs.writeFile(configPath, '{ nope');
    await expect(loader.load(configPath)).rejects.toBeInstanceOf(ValidationError);
  });

  it('throws ValidationError for a non-object document', async () => {
    await fs.writeFile(configPath, '[1, 2]');
    await expect(loader.load(configPath)).rejects.toThrow(`Config file must contain an object: ${configPath}`);
  });

  it('reports each invalid field by path', async () => {
    await fs.writeFile(configPath, JSON.stringify({ concurrency: 0, logging: { level: 'loud' } }));

    const error = await loader.load(configPath).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ValidationError);
    if (!(error instanceof ValidationError)) return;
    expect(error.errors.map((e) => e.split(':')[0])).toEqual(['concurrency', 'logging.level']);
  });

  it('ignores prototype keys while merging', async () => {
    await fs.writeFile(configPath, '{"__proto__": {"polluted": true}, "concurrency": 2}');

    const config = await loader.load(configPath);

    expect(config.concurrency).toBe(2);
    expect(Object.prototype).not.toHaveProperty('polluted');
  });
});
