import { promises as fs } from 'node:fs';
import { dirname } from 'node:path';
import { hostname } from 'node:os';
import { nanoid } from 'nanoid';
import { isEexist, isEnoent, readFileOrNull } from './fs-utils.js';
import { AcquisitionTimeoutError } from '../errors.js';
import type { Logger } from '../logging/logger.js';

export interface FileLockOptions {
  /** Default wait before giving up on a held marker. */
  timeoutMs: number;
  pollIntervalMs: number;
  /** A marker whose mtime is older than this is presumed abandoned. */
  staleAfterMs: number;
}

export interface LockHandle {
  readonly path: string;
  readonly owner: string;
  readonly acquiredAt: number;
}

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

/**
 * Cross-process mutex backed by a marker file created with O_CREAT|O_EXCL.
 *
 * Only cooperating processes that go through this class are excluded. There is no fencing
 * token; a holder whose marker was reclaimed as stale is not told so until it releases.
 */
export class FileLock {
  constructor(
    readonly lockPath: string,
    private options: FileLockOptions,
    private logger: Logger,
  ) {}

  async acquire(timeoutMs = this.options.timeoutMs): Promise<LockHandle> {
    const owner = `${process.pid}@${hostname()}#${nanoid(6)}`;
    const start = Date.now();
    await fs.mkdir(dirname(this.lockPath), { recursive: true });

    for (;;) {
      if (await this.tryCreate(owner)) {
        return { path: this.lockPath, owner, acquiredAt: Date.now() };
      }

      const waited = Date.now() - start;
      if (waited < timeoutMs) {
        await sleep(Math.min(this.options.pollIntervalMs, timeoutMs - waited));
        continue;
      }

      const age = await this.markerAge();
      if (age === null) continue; // released between our attempt and the stat
      if (age > this.options.staleAfterMs) {
        const previous = await readFileOrNull(this.lockPath);
        this.logger.warn('Reclaiming stale lock', {
          lockPath: this.lockPath,
          ageMs: age,
          previousOwner: previous?.trim(),
        });
        if ((await this.reclaimStale(previous)) && (await this.tryCreate(owner))) {
          return { path: this.lockPath, owner, acquiredAt: Date.now() };
        }
      }
      throw new AcquisitionTimeoutError(this.lockPath, waited);
    }
  }

  /** Remove the marker. A marker that is already gone, or now owned by someone else, is left alone. */
  async release(handle: LockHandle): Promise<void> {
    const current = await readFileOrNull(this.lockPath);
    if (current === null) {
      this.logger.debug('Lock marker already removed', { lockPath: this.lockPath });
      return;
    }
    if (current.trim() !== handle.owner) {
      this.logger.warn('Lock marker owned by another holder; not removing', {
        lockPath: this.lockPath,
        owner: current.trim(),
      });
      return;
    }
    try {
      await fs.unlink(this.lockPath);
    } catch (e) {
      if (!isEnoent(e)) throw e;
    }
  }

  async withLock<T>(fn: () => Promise<T>, timeoutMs?: number): Promise<T> {
    const handle = await this.acquire(timeoutMs);
    try {
      return await fn();
    } finally {
      await this.release(handle);
    }
  }

  /**
   * Move the marker aside and delete it only if it is still the one judged stale. A live marker
   * created by a faster waiter in the meantime is linked back into place.
   */
  private async reclaimStale(previous: string | null): Promise<boolean> {
    const aside = `${this.lockPath}.${nanoid(6)}.stale`;
    try {
      await fs.rename(this.lockPath, aside);
    } catch (e) {
      if (isEnoent(e)) return true;
      throw e;
    }
    const moved = await readFileOrNull(aside);
    if (moved === previous) {
      await fs.unlink(aside);
      return true;
    }
    try {
      await fs.link(aside, this.lockPath);
    } catch (e) {
      if (!isEexist(e)) throw e;
      this.logger.warn('Lock marker replaced while restoring a live holder', {
        lockPath: this.lockPath,
        displacedOwner: moved?.trim(),
      });
    }
    await fs.unlink(aside);
    return false;
  }

  private async tryCreate(owner: string): Promise<boolean> {
    try {
      await fs.writeFile(this.lockPath, owner + '\n', { flag: 'wx' });
      return true;
    } catch (e) {
      if (isEexist(e)) return false;
      throw e;
    }
  }

  private async markerAge(): Promise<number | null> {
    try {
      const stat = await fs.stat(this.lockPath);
      return Date.now() - stat.mtimeMs;
    } catch (e) {
      if (isEnoent(e)) return null;
      throw e;
    }
  }
}
