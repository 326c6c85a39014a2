import { promises as fs } from 'node:fs';
import { extname, join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { NotFoundError } from '../../errors.js';
import { isEnoent } from '../../infra/fs-utils.js';
import type { Logger } from '../../logging/logger.js';
import type { InstallRequest } from '../lifecycle/types.js';
import { deriveName } from '../vcs/remote.js';
import { DefinitionFileSchema, isPlainPluginName } from './schemas.js';

const DEFINITION_EXTENSIONS = new Set(['.yaml', '.yml']);

export interface DefinitionWarning {
  file: string;
  message: string;
}

export interface LoadedDefinitions {
  requests: InstallRequest[];
  /** Files that were skipped, with why. */
  warnings: DefinitionWarning[];
}

/** Turns a directory of YAML plugin definitions into install requests. */
export class DefinitionLoader {
  constructor(private logger: Logger) {}

  async load(dir: string): Promise<LoadedDefinitions> {
    let entries: string[];
    try {
      entries = await fs.readdir(dir);
    } catch (e) {
      if (isEnoent(e)) throw new NotFoundError('Definitions directory', dir);
      throw e;
    }

    const files = entries.filter((f) => DEFINITION_EXTENSIONS.has(extname(f).toLowerCase())).sort();
    const requests: InstallRequest[] = [];
    const warnings: DefinitionWarning[] = [];
    const seen = new Map<string, string>();

    const warn = (file: string, message: string) => {
      this.logger.warn('Skipping plugin definition', { file, message });
      warnings.push({ file, message });
    };

    for (const file of files) {
      const path = join(dir, file);
      let data: unknown;
      try {
        data = parseYaml(await fs.readFile(path, 'utf-8'));
      } catch (e) {
        warn(path, e instanceof Error ? e.message : String(e));
        continue;
      }
      if (data === null || data === undefined) {
        warn(path, 'empty definition');
        continue;
      }

      const parsed = DefinitionFileSchema.safeParse(data);
      if (!parsed.success) {
        warn(path, parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; '));
        continue;
      }

      const def = parsed.data;
      const name = def.name ?? deriveName(def.url);
      if (!name || !isPlainPluginName(name)) {
        warn(path, `cannot derive a plugin name from '${def.url}'`);
        continue;
      }
      const earlier = seen.get(name);
      if (earlier) {
        warn(path, `duplicate plugin name '${name}' (already defined in ${earlier})`);
        continue;
      }
      seen.set(name, path);

      requests.push({
        name,
        sourceRepo: def.url,
        local: def.local,
        pin: def.tag,
        sourceScripts: def.source,
        skipAutoUpdate: def.skip_auto_update,
      });
    }

    this.logger.debug('Loaded plugin definitions', { dir, count: requests.length, skipped: warnings.length });
    return { requests, warnings };
  }
}
