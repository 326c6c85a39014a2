import { promises as fs } from 'node:fs';
import type { FileHandle } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { nanoid } from 'nanoid';
import { errorCode, readFileOrNull } from './fs-utils.js';
import { StoreWriteError } from '../errors.js';
import type { Logger } from '../logging/logger.js';

const NO_DIRECTORY_SYNC = new Set(['EISDIR', 'EPERM', 'EINVAL', 'EBADF']);

export interface DocumentStoreOptions<T> {
  serialize?: (doc: T) => string;
}

/**
 * A single JSON document on disk, replaced atomically on every save.
 *
 * A save writes a uniquely named temp file beside the canonical path, fsyncs it and renames it
 * over the canonical file. Readers see either the previous document or the new one. Once the
 * rename has happened the save has succeeded; a later directory sync failure is only logged.
 */
export class JsonDocumentStore<T> {
  private serialize: (doc: T) => string;

  constructor(
    readonly filePath: string,
    private logger: Logger,
    options?: DocumentStoreOptions<T>,
  ) {
    this.serialize = options?.serialize ?? ((doc) => JSON.stringify(doc, null, 2) + '\n');
  }

  /** Raw file content, or null when the document has never been written. Parsing is the caller's. */
  async loadRaw(): Promise<string | null> {
    return readFileOrNull(this.filePath);
  }

  async save(doc: T): Promise<void> {
    const dir = dirname(this.filePath);
    const tmp = join(dir, `.${basename(this.filePath)}.${nanoid(8)}.tmp`);
    try {
      await fs.mkdir(dir, { recursive: true });
      const handle = await fs.open(tmp, 'w');
      try {
        await handle.writeFile(this.serialize(doc), 'utf-8');
        await handle.sync();
      } finally {
        await handle.close();
      }
      await fs.rename(tmp, this.filePath);
    } catch (e) {
      throw await discardTemp(tmp, new StoreWriteError(this.filePath, { cause: e }));
    }
    await this.syncDirectory(dir);
  }

  /** Persist the rename itself. Directories cannot be opened for sync on every platform. */
  private async syncDirectory(dir: string): Promise<void> {
    let handle: FileHandle | undefined;
    try {
      handle = await fs.open(dir, 'r');
      await handle.sync();
    } catch (e) {
      const code = errorCode(e);
      const data = { dir, code, error: e instanceof Error ? e.message : String(e) };
      if (code !== undefined && NO_DIRECTORY_SYNC.has(code)) {
        this.logger.debug('Directory sync unsupported', data);
      } else {
        this.logger.warn('Directory sync failed after save', data);
      }
    } finally {
      await handle?.close();
    }
  }
}

async function discardTemp(tmp: string, failure: StoreWriteError): Promise<StoreWriteError> {
  try {
    await fs.rm(tmp, { force: true });
    return failure;
  } catch (cleanupError) {
    return new StoreWriteError(tmp, { cause: new AggregateError([failure, cleanupError]) });
  }
}
