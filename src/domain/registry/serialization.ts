/**
 * Conversion between the in-memory Registry and its JSON document.
 */

import { StoreCorruptError } from '../../errors.js';
import { PluginRecordSchema, RegistryDocumentSchema } from './schemas.js';
import type { PluginRecord, Registry, RegistryDocument } from './types.js';

export interface DecodeResult {
  registry: Registry;
  issues: StoreCorruptError[];
}

/** Records sorted by name, optional fields omitted when absent. Equal registries give equal bytes. */
export function toDocument(registry: Registry): RegistryDocument {
  const plugins = [...registry.values()]
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
    .map(normalizeRecord);
  return { plugins };
}

export function serializeRegistry(registry: Registry): string {
  return JSON.stringify(toDocument(registry), null, 2) + '\n';
}

function normalizeRecord(record: PluginRecord): PluginRecord {
  const out: PluginRecord = {
    name: record.name,
    sourceRepo: record.sourceRepo,
    commitHash: record.commitHash,
    lastSyncedAt: record.lastSyncedAt,
    enabled: record.enabled,
    skipAutoUpdate: record.skipAutoUpdate,
    sourceScripts: [...record.sourceScripts],
  };
  if (record.pin !== undefined) out.pin = record.pin;
  if (record.resolvedTag !== undefined) out.resolvedTag = record.resolvedTag;
  return out;
}

/**
 * Decode raw file content. Never throws: an unreadable document yields an empty registry and
 * an issue, and malformed or duplicate records are dropped with an issue each.
 */
export function decodeRegistry(raw: string | null, filePath: string): DecodeResult {
  const registry: Registry = new Map();
  const issues: StoreCorruptError[] = [];
  if (raw === null) return { registry, issues };

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    issues.push(new StoreCorruptError(filePath, 'not valid JSON', { cause: e }));
    return { registry, issues };
  }

  const doc = RegistryDocumentSchema.safeParse(json);
  if (!doc.success) {
    issues.push(new StoreCorruptError(filePath, 'expected an object with a "plugins" array'));
    return { registry, issues };
  }

  doc.data.plugins.forEach((entry, index) => {
    const parsed = PluginRecordSchema.safeParse(entry);
    if (!parsed.success) {
      const reason = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
      issues.push(new StoreCorruptError(filePath, `plugins[${index}] dropped (${reason})`));
      return;
    }
    if (registry.has(parsed.data.name)) {
      issues.push(new StoreCorruptError(filePath, `duplicate record '${parsed.data.name}'; keeping the later one`));
    }
    registry.set(parsed.data.name, parsed.data);
  });

  return { registry, issues };
}
