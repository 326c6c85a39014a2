import { FileLock } from '../../infra/file-lock.js';
import type { FileLockOptions } from '../../infra/file-lock.js';
import { JsonDocumentStore } from '../../infra/json-store.js';
import { StoreCorruptError } from '../../errors.js';
import type { Logger } from '../../logging/logger.js';
import { decodeRegistry, serializeRegistry } from './serialization.js';
import type { Registry } from './types.js';

export interface StateStoreOptions {
  registryPath: string;
  lockPath: string;
  lock: FileLockOptions;
}

export interface LoadResult {
  registry: Registry;
  /** Problems found while decoding; the registry holds whatever survived. */
  issues: StoreCorruptError[];
}

/** Reads and writes that share one held lock. Call release() exactly once. */
export interface RegistrySession {
  read(): Promise<Registry>;
  write(registry: Registry): Promise<void>;
  release(): Promise<void>;
}

/**
 * Lock-guarded persistence of the plugin registry.
 *
 * Every public read or write holds the lock marker only for the file operation itself. The
 * document is replaced atomically, so an interrupted write leaves the previous snapshot.
 */
export class StateStore {
  private lock: FileLock;
  private document: JsonDocumentStore<Registry>;

  constructor(
    options: StateStoreOptions,
    private logger: Logger,
  ) {
    this.lock = new FileLock(options.lockPath, options.lock, logger);
    this.document = new JsonDocumentStore<Registry>(options.registryPath, logger, {
      serialize: serializeRegistry,
    });
  }

  async acquire(timeoutMs?: number): Promise<RegistrySession> {
    const handle = await this.lock.acquire(timeoutMs);
    let released = false;
    const ensureHeld = () => {
      if (released) throw new Error('Registry session already released');
    };
    return {
      read: async () => {
        ensureHeld();
        return (await this.readUnlocked()).registry;
      },
      write: async (registry) => {
        ensureHeld();
        await this.document.save(registry);
      },
      release: async () => {
        if (released) return;
        released = true;
        await this.lock.release(handle);
      },
    };
  }

  /** Absent or unreadable documents load as an empty registry. */
  async load(): Promise<LoadResult> {
    return this.lock.withLock(() => this.readUnlocked());
  }

  async read(): Promise<Registry> {
    return (await this.load()).registry;
  }

  async write(registry: Registry): Promise<void> {
    await this.lock.withLock(() => this.document.save(registry));
  }

  /**
   * Read-modify-write inside one critical section. The mutator edits the registry in place;
   * the document is rewritten only when its serialized form changed.
   */
  async update<T>(mutate: (registry: Registry) => T): Promise<T> {
    return this.lock.withLock(async () => {
      const { registry } = await this.readUnlocked();
      const before = serializeRegistry(registry);
      const result = mutate(registry);
      if (serializeRegistry(registry) !== before) {
        await this.document.save(registry);
      }
      return result;
    });
  }

  private async readUnlocked(): Promise<LoadResult> {
    let raw: string | null;
    try {
      raw = await this.document.loadRaw();
    } catch (e) {
      const issue = new StoreCorruptError(this.document.filePath, 'unreadable', { cause: e });
      this.logger.warn('Registry document issue', { code: issue.code, reason: String(e) });
      return { registry: new Map(), issues: [issue] };
    }
    const result = decodeRegistry(raw, this.document.filePath);
    for (const issue of result.issues) {
      this.logger.warn('Registry document issue', { code: issue.code, reason: issue.details?.reason });
    }
    return result;
  }
}
