import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { readFileOrNull } from '../../infra/fs-utils.js';
import { ValidationError } from '../../errors.js';
import { LOCK_SUFFIX, PercolatorConfigSchema, defaultConfig } from './types.js';
import type { PercolatorConfig } from './types.js';

const UNSAFE_MERGE_KEYS = new Set(['__proto__', 'constructor', 'prototype']);

type Json = Record<string, unknown>;

function isPlainObject(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(base: Json, override: Json): Json {
  const result: Json = { ...base };
  for (const key of Object.keys(override)) {
    if (UNSAFE_MERGE_KEYS.has(key)) continue;
    const val = override[key];
    const current = result[key];
    if (isPlainObject(val)) {
      result[key] = deepMerge(isPlainObject(current) ? current : {}, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

function expandHome(p: string, home: string): string {
  if (p === '~') return home;
  if (p.startsWith('~/')) return join(home, p.slice(2));
  return resolve(p);
}

export class ConfigLoader {
  constructor(private home: string = homedir()) {}

  /**
   * Defaults, overlaid with the JSON file at `configPath` when it exists.
   * Invalid JSON or an invalid merged shape throws ValidationError.
   */
  async load(configPath?: string, overrides: Json = {}): Promise<PercolatorConfig> {
    let merged: Json = { ...defaultConfig(this.home) };
    let explicit: Json = overrides;

    if (configPath) {
      const raw = await readFileOrNull(configPath);
      if (raw !== null) {
        let fileConfig: unknown;
        try {
          fileConfig = JSON.parse(raw);
        } catch (e) {
          throw new ValidationError(`Invalid JSON in config file: ${configPath}`, [
            e instanceof Error ? e.message : String(e),
          ]);
        }
        if (!isPlainObject(fileConfig)) {
          throw new ValidationError(`Config file must contain an object: ${configPath}`, []);
        }
        merged = deepMerge(merged, fileConfig);
        explicit = { ...fileConfig, ...overrides };
      }
    }

    // A relocated registry takes its lock marker with it unless the lock is placed explicitly.
    const deriveLock = 'registryPath' in explicit && !('lockPath' in explicit);
    return this.finalize(deepMerge(merged, overrides), configPath ?? 'overrides', deriveLock);
  }

  private finalize(merged: Json, source: string, deriveLock: boolean): PercolatorConfig {
    const parsed = PercolatorConfigSchema.safeParse(merged);
    if (!parsed.success) {
      throw new ValidationError(
        `Invalid configuration in ${source}`,
        parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      );
    }
    const config = parsed.data;
    const registryPath = expandHome(config.registryPath, this.home);
    return {
      ...config,
      pluginsDir: expandHome(config.pluginsDir, this.home),
      registryPath,
      lockPath: deriveLock ? registryPath + LOCK_SUFFIX : expandHome(config.lockPath, this.home),
      definitionsDir: expandHome(config.definitionsDir, this.home),
      remoteBaseUrl: config.remoteBaseUrl.replace(/\/+$/, ''),
    };
  }
}
