import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import { Remover } from '../../src/domain/lifecycle/remover.js';
import { PathSafetyError } from '../../src/errors.js';
import { pathExists } from '../../src/infra/fs-utils.js';
import { makeHarness, makeRecord, removeDir } from '../fixtures/test-helpers.js';
import type { Harness } from '../fixtures/test-helpers.js';

describe('Remover', () => {
  let h: Harness;
  let remover: Remover;
  let progress: number[];
  const onProgress = (v: number) => {
    progress.push(v);
  };

  beforeEach(async () => {
    h = await makeHarness();
    remover = new Remover(h.ctx);
    progress = [];
  });

  afterEach(async () => {
    await removeDir(h.root);
  });

  it('deletes the working directory and then the record', async () => {
    const dir = join(h.pluginsDir, 'tmux-sensible');
    await fs.mkdir(join(dir, 'scripts'), { recursive: true });
    await h.store.update((r) => {
      r.set('tmux-sensible', makeRecord());
      r.set('tmux-yank', makeRecord({ name: 'tmux-yank', sourceRepo: 'tmux-plugins/tmux-yank' }));
    });

    const result = await remover.remove('tmux-sensible', { onProgress });

    expect(result).toEqual({ ok: true, value: { name: 'tmux-sensible', directoryRemoved: true } });
    expect(progress).toEqual([10, 40, 70, 100]);
    expect(await pathExists(dir)).toBe(false);
    expect([...(await h.store.read()).keys()]).toEqual(['tmux-yank']);
  });

  it('fails with NOT_FOUND and changes nothing for an unknown name', async () => {
    const dir = join(h.pluginsDir, 'tmux-sensible');
    await fs.mkdir(dir);

    const result = await remover.remove('tmux-sensible', { onProgress });

    expect(!result.ok && result.error.code).toBe('NOT_FOUND');
    expect(progress).toEqual([10, 0]);
    expect(await pathExists(dir)).toBe(true);
  });

  it('drops the record when the directory is already gone', async () => {
    await h.store.update((r) => {
      r.set('tmux-sensible', makeRecord());
    });

    const result = await remover.remove('tmux-sensible');

    expect(result.ok && result.value.directoryRemoved).toBe(false);
    expect((await h.store.read()).has('tmux-sensible')).toBe(false);
  });

  it('keeps the record when the directory cannot be deleted', async () => {
    await fs.mkdir(join(h.pluginsDir, 'tmux-sensible'));
    await h.store.update((r) => {
      r.set('tmux-sensible', makeRecord());
    });
    vi.spyOn(fs, 'rm').mockRejectedValueOnce(Object.assign(new Error('busy'), { code: 'EBUSY' }));

    const result = await remover.remove('tmux-sensible');

    expect(!result.ok && result.error.code).toBe('UNEXPECTED');
    expect((await h.store.read()).has('tmux-sensible')).toBe(true);
  });

  it('throws for a recorded name that escapes the plugins root', async () => {
    const outside = join(h.root, 'victim');
    await fs.mkdir(outside);
    await h.store.update((r) => {
      r.set('../victim', makeRecord({ name: '../victim' }));
    });

    await expect(remover.remove('../victim')).rejects.toBeInstanceOf(PathSafetyError);
    expect(await pathExists(outside)).toBe(true);
    expect((await h.store.read()).has('../victim')).toBe(true);
  });

  it('stops before deleting when cancelled', async () => {
    await fs.mkdir(join(h.pluginsDir, 'tmux-sensible'));
    await h.store.update((r) => {
      r.set('tmux-sensible', makeRecord());
    });
    const controller = new AbortController();

    const result = await remover.remove('tmux-sensible', {
      signal: controller.signal,
      onProgress: (v) => {
        if (v === 10) controller.abort();
      },
    });

    expect(!result.ok && result.error.code).toBe('CANCELLED');
    expect(await pathExists(join(h.pluginsDir, 'tmux-sensible'))).toBe(true);
  });
});
